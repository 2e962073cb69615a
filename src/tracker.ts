//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Sequential likelihood-ratio posterior over the condition-positive
// hypothesis.
//
// After every recorded outcome the posterior is recomputed from the prior
// and the entire stored history:
//
//   L_pos = prod_t (outcome_t ? p_pos_t : 1 - p_pos_t)
//   L_neg = prod_t (outcome_t ? p_neg_t : 1 - p_neg_t)
//   P     = prior * L_pos / (prior * L_pos + (1 - prior) * L_neg)
//
// so every trajectory entry can be reproduced from the stored triples
// alone.  A zero denominator (both products underflowed) keeps the
// previous posterior.

import {
  InvalidArgumentError,
  InvalidStateError,
  NotStartedError,
} from "./errors.js";
import { clampProbability } from "./probability.js";

export interface Observation {
  readonly outcome: boolean;
  readonly likelihoodIfPositive: number;
  readonly likelihoodIfNegative: number;
}

export interface HistoryLikelihoods {
  positive: number;
  negative: number;
}

function assertOpenProbability(name: string, p: number): void {
  if (!Number.isFinite(p) || p <= 0.0 || p >= 1.0) {
    throw new InvalidArgumentError(`${name} must be in (0, 1), got ${p}`);
  }
}

export class SequentialPosteriorTracker {
  private _prior: number | null = null;
  private _history: Observation[] = [];
  private _trajectory: number[] = [];

  constructor(prior?: number) {
    if (prior !== undefined) {
      this.start(prior);
    }
  }

  get started(): boolean {
    return this._prior !== null;
  }

  get prior(): number {
    if (this._prior === null) {
      throw new NotStartedError();
    }
    return this._prior;
  }

  get length(): number {
    return this._history.length;
  }

  get history(): readonly Observation[] {
    return this._history.slice();
  }

  // Product of the per-trial probabilities of the observed outcomes under
  // each hypothesis.
  static likelihoods(observations: readonly Observation[]): HistoryLikelihoods {
    let positive = 1.0;
    let negative = 1.0;
    for (const o of observations) {
      if (o.outcome) {
        positive *= o.likelihoodIfPositive;
        negative *= o.likelihoodIfNegative;
      } else {
        positive *= 1.0 - o.likelihoodIfPositive;
        negative *= 1.0 - o.likelihoodIfNegative;
      }
    }
    return { positive, negative };
  }

  // Posterior after folding the full history into the prior.  Returns
  // fallback when the denominator is exactly zero.
  static posterior(
    prior: number,
    observations: readonly Observation[],
    fallback: number = prior,
  ): number {
    const { positive, negative } =
      SequentialPosteriorTracker.likelihoods(observations);
    const numerator = prior * positive;
    const denominator = numerator + (1.0 - prior) * negative;
    if (denominator === 0) {
      return fallback;
    }
    return clampProbability(numerator / denominator);
  }

  start(prior: number): void {
    if (this._prior !== null) {
      throw new InvalidStateError(
        "Tracker already has a prior; call reset() before starting again",
      );
    }
    assertOpenProbability("prior", prior);
    this._prior = prior;
    this._history = [];
    this._trajectory = [prior];
  }

  record(
    outcome: boolean,
    likelihoodIfPositive: number,
    likelihoodIfNegative: number,
  ): number {
    if (this._prior === null) {
      throw new InvalidStateError("Cannot record an outcome before a prior is set");
    }
    assertOpenProbability("likelihoodIfPositive", likelihoodIfPositive);
    assertOpenProbability("likelihoodIfNegative", likelihoodIfNegative);

    this._history.push(
      Object.freeze({ outcome, likelihoodIfPositive, likelihoodIfNegative }),
    );
    const previous = this._trajectory[this._trajectory.length - 1] ?? this._prior;
    const posterior = SequentialPosteriorTracker.posterior(
      this._prior,
      this._history,
      previous,
    );
    this._trajectory.push(posterior);
    return posterior;
  }

  currentPosterior(): number {
    const last = this._trajectory[this._trajectory.length - 1];
    if (this._prior === null || last === undefined) {
      throw new NotStartedError();
    }
    return last;
  }

  // Index 0 is the prior; index k is the posterior after trial k.
  trajectory(): number[] {
    if (this._prior === null) {
      throw new NotStartedError();
    }
    return this._trajectory.slice();
  }

  reset(): void {
    this._prior = null;
    this._history = [];
    this._trajectory = [];
  }
}
