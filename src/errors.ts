//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Error taxonomy.  Every condition raised by the library is local and
// recoverable; callers catch these and re-prompt.

export type ScreeningErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_STATE"
  | "NOT_STARTED"
  | "INSUFFICIENT_DATA";

export class ScreeningError extends Error {
  public readonly code: ScreeningErrorCode;

  constructor(code: ScreeningErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class InvalidArgumentError extends ScreeningError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super("INVALID_ARGUMENT", message);
    this.issues = issues;
  }
}

export class InvalidStateError extends ScreeningError {
  constructor(message: string) {
    super("INVALID_STATE", message);
  }
}

export class NotStartedError extends ScreeningError {
  constructor(message: string = "No prior has been set; call start() first") {
    super("NOT_STARTED", message);
  }
}

export class InsufficientDataError extends ScreeningError {
  constructor(message: string) {
    super("INSUFFICIENT_DATA", message);
  }
}

export function isScreeningError(err: unknown): err is ScreeningError {
  return err instanceof ScreeningError;
}
