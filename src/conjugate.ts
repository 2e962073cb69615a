//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Beta-Bernoulli cross-check estimator.
//
// The prior is spread over w virtual observations:
//
//   alphaPrior = prior * w,  betaPrior = (1 - prior) * w
//   alphaPost  = alphaPrior + k,  betaPost = betaPrior + (n - k)
//
// where n is the number of trials and k the number of correct outcomes.
// It is reported alongside the likelihood-ratio posterior and never fed
// back into it; the two estimates are free to disagree.

import { DEFAULT_VIRTUAL_SAMPLE_SIZE } from "./config.js";
import { InsufficientDataError, InvalidArgumentError } from "./errors.js";

export interface BetaParameters {
  alpha: number;
  beta: number;
}

export class ConjugateSummary {
  public readonly prior: number;
  public readonly trials: number;
  public readonly correct: number;
  public readonly virtualSampleSize: number;

  // Zero trials raises InsufficientDataError.
  constructor(
    prior: number,
    trials: number,
    correct: number,
    virtualSampleSize: number = DEFAULT_VIRTUAL_SAMPLE_SIZE,
  ) {
    if (!Number.isFinite(prior) || prior <= 0.0 || prior >= 1.0) {
      throw new InvalidArgumentError(`prior must be in (0, 1), got ${prior}`);
    }
    if (!Number.isFinite(virtualSampleSize) || virtualSampleSize <= 0) {
      throw new InvalidArgumentError(
        `virtualSampleSize must be positive, got ${virtualSampleSize}`,
      );
    }
    if (!Number.isInteger(trials) || trials < 0) {
      throw new InvalidArgumentError(
        `trials must be a non-negative integer, got ${trials}`,
      );
    }
    if (!Number.isInteger(correct) || correct < 0 || correct > trials) {
      throw new InvalidArgumentError(
        `correct must be an integer in [0, ${trials}], got ${correct}`,
      );
    }
    if (trials === 0) {
      throw new InsufficientDataError(
        "Conjugate summary needs at least one recorded trial",
      );
    }
    this.prior = prior;
    this.trials = trials;
    this.correct = correct;
    this.virtualSampleSize = virtualSampleSize;
  }

  static fromOutcomes(
    prior: number,
    outcomes: readonly boolean[],
    virtualSampleSize?: number,
  ): ConjugateSummary {
    const correct = outcomes.filter((o) => o).length;
    return new ConjugateSummary(
      prior,
      outcomes.length,
      correct,
      virtualSampleSize,
    );
  }

  get priorParameters(): BetaParameters {
    return {
      alpha: this.prior * this.virtualSampleSize,
      beta: (1.0 - this.prior) * this.virtualSampleSize,
    };
  }

  get posteriorParameters(): BetaParameters {
    const { alpha, beta } = this.priorParameters;
    return {
      alpha: alpha + this.correct,
      beta: beta + (this.trials - this.correct),
    };
  }

  get mean(): number {
    const { alpha, beta } = this.posteriorParameters;
    return alpha / (alpha + beta);
  }

  // Var = a*b / ((a+b)^2 * (a+b+1))
  get variance(): number {
    const { alpha, beta } = this.posteriorParameters;
    const total = alpha + beta;
    return (alpha * beta) / (total * total * (total + 1.0));
  }

  get standardDeviation(): number {
    return Math.sqrt(this.variance);
  }
}
