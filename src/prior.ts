//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Maps a subject category to the prior probability of being
// condition-positive.  Rate categories carry their base rate directly;
// mixture categories are the weighted average of rate categories.

import { DEFAULT_PRIOR_TABLE, PriorTableSchema, toValidationIssues, type PriorTable } from "./config.js";
import { InvalidArgumentError } from "./errors.js";

export class PriorModel {
  private readonly _table: PriorTable;

  constructor(table: PriorTable = DEFAULT_PRIOR_TABLE) {
    const parsed = PriorTableSchema.safeParse(table);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        "Invalid prior table",
        toValidationIssues(parsed.error),
      );
    }
    this._table = parsed.data;
  }

  get categories(): string[] {
    return Object.keys(this._table);
  }

  has(category: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._table, category);
  }

  priorFor(category: string): number {
    const entry = this.has(category) ? this._table[category] : undefined;
    if (entry === undefined) {
      throw new InvalidArgumentError(
        `category must be one of ${this.categories.map((c) => `"${c}"`).join(", ")}, got "${category}"`,
      );
    }
    if (entry.kind === "rate") {
      return entry.rate;
    }

    let totalWeight = 0;
    let weighted = 0;
    for (const { category: component, weight } of entry.components) {
      // The table schema guarantees every component names a rate entry.
      const target = this._table[component];
      if (target === undefined || target.kind !== "rate") {
        throw new InvalidArgumentError(
          `mixture component must reference a rate category, got "${component}"`,
        );
      }
      totalWeight += weight;
      weighted += weight * target.rate;
    }
    return weighted / totalWeight;
  }
}
