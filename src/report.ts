//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Session summaries: the verdict band of a posterior and the per-trial
// history of how each outcome moved it.

import { DEFAULT_VERDICT_BANDS, type VerdictBands } from "./config.js";
import { InvalidArgumentError } from "./errors.js";
import type { Observation } from "./tracker.js";

export type Verdict = "very_unlikely" | "unlikely" | "uncertain" | "likely";

// Bands are upper bounds (exclusive) for the first three verdicts.
export function verdictFor(
  posterior: number,
  bands: VerdictBands = DEFAULT_VERDICT_BANDS,
): Verdict {
  const [veryUnlikely, unlikely, uncertain] = bands;
  if (posterior < veryUnlikely) return "very_unlikely";
  if (posterior < unlikely) return "unlikely";
  if (posterior < uncertain) return "uncertain";
  return "likely";
}

export interface HistoryRow {
  trial: number;
  outcome: boolean;
  likelihoodIfPositive: number;
  likelihoodIfNegative: number;
  before: number;
  after: number;
  change: number;
}

export interface HistoryReport {
  prior: number;
  posterior: number;
  totalChange: number;
  correctCount: number;
  rows: HistoryRow[];
}

// trajectory[0] is the prior; trajectory[k] the posterior after trial k.
export function historyReport(
  observations: readonly Observation[],
  trajectory: readonly number[],
): HistoryReport {
  if (trajectory.length !== observations.length + 1) {
    throw new InvalidArgumentError(
      `trajectory must have ${observations.length + 1} entries, got ${trajectory.length}`,
    );
  }
  const prior = trajectory[0]!;
  const posterior = trajectory[trajectory.length - 1]!;

  const rows = observations.map((o, i) => {
    const before = trajectory[i]!;
    const after = trajectory[i + 1]!;
    return {
      trial: i + 1,
      outcome: o.outcome,
      likelihoodIfPositive: o.likelihoodIfPositive,
      likelihoodIfNegative: o.likelihoodIfNegative,
      before,
      after,
      change: after - before,
    };
  });

  return {
    prior,
    posterior,
    totalChange: posterior - prior,
    correctCount: observations.filter((o) => o.outcome).length,
    rows,
  };
}
