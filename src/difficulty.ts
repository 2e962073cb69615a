//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Trial difficulty: maps a trial index and a discriminability value to the
// probability of a correct answer under each hypothesis.
//
//   factor(i) = max(1 - decayRate * i, floor)
//   d_eff     = d * factor(i)
//   p         = min(intercept + slope * d_eff, cap)
//
// Both lines are non-decreasing in d and bounded inside (0, 1).  The
// negative line dominates the positive one, so p_pos <= p_neg always.

import {
  LikelihoodSchema,
  PRESETS,
  RampSchema,
  toValidationIssues,
  type LikelihoodConfig,
  type LikelihoodLine,
  type RampConfig,
  type ScreeningConfig,
  type StimulusConfig,
} from "./config.js";
import { InvalidArgumentError } from "./errors.js";
import { drawStimulus } from "./stimulus.js";

export interface TrialParameters {
  likelihoodIfPositive: number;
  likelihoodIfNegative: number;
}

// A generated trial.  Immutable once created.
export interface Trial extends Readonly<TrialParameters> {
  readonly index: number;
  readonly seed: number;
  readonly target: number;
  readonly discriminability: number;
  readonly effectiveDiscriminability: number;
}

export interface TrialDifficultyOptions {
  ramp?: RampConfig;
  likelihood?: LikelihoodConfig;
}

function assertTrialIndex(trialIndex: number): void {
  if (!Number.isInteger(trialIndex) || trialIndex < 0) {
    throw new InvalidArgumentError(
      `trialIndex must be a non-negative integer, got ${trialIndex}`,
    );
  }
}

export class TrialDifficultyModel {
  public readonly ramp: RampConfig;
  public readonly likelihood: LikelihoodConfig;

  constructor(options: TrialDifficultyOptions = {}) {
    const ramp = RampSchema.safeParse(options.ramp ?? PRESETS.gradual.ramp);
    if (!ramp.success) {
      throw new InvalidArgumentError(
        "Invalid ramp parameters",
        toValidationIssues(ramp.error),
      );
    }
    const likelihood = LikelihoodSchema.safeParse(
      options.likelihood ?? PRESETS.gradual.likelihood,
    );
    if (!likelihood.success) {
      throw new InvalidArgumentError(
        "Invalid likelihood parameters",
        toValidationIssues(likelihood.error),
      );
    }
    this.ramp = ramp.data;
    this.likelihood = likelihood.data;
  }

  static fromConfig(config: ScreeningConfig): TrialDifficultyModel {
    return new TrialDifficultyModel({
      ramp: config.ramp,
      likelihood: config.likelihood,
    });
  }

  static lineValue(line: LikelihoodLine, d: number): number {
    return Math.min(line.intercept + line.slope * d, line.cap);
  }

  rampFactor(trialIndex: number): number {
    assertTrialIndex(trialIndex);
    return Math.max(1.0 - this.ramp.decayRate * trialIndex, this.ramp.floor);
  }

  effectiveDiscriminability(trialIndex: number, discriminability: number): number {
    if (
      !Number.isFinite(discriminability) ||
      discriminability < 0 ||
      discriminability > 1
    ) {
      throw new InvalidArgumentError(
        `discriminability must be in [0, 1], got ${discriminability}`,
      );
    }
    return discriminability * this.rampFactor(trialIndex);
  }

  parametersFor(trialIndex: number, discriminability: number): TrialParameters {
    const d = this.effectiveDiscriminability(trialIndex, discriminability);
    return {
      likelihoodIfPositive: TrialDifficultyModel.lineValue(
        this.likelihood.positive,
        d,
      ),
      likelihoodIfNegative: TrialDifficultyModel.lineValue(
        this.likelihood.negative,
        d,
      ),
    };
  }

  // Draw the stimulus for trialIndex from seed and derive its parameters.
  // Same (trialIndex, seed, stimulus) in, bit-identical trial out.
  trialFor(
    trialIndex: number,
    seed: number,
    stimulus?: StimulusConfig,
  ): Trial {
    assertTrialIndex(trialIndex);
    const { target, discriminability } = drawStimulus(seed, stimulus);
    const effective = this.effectiveDiscriminability(trialIndex, discriminability);
    return Object.freeze({
      index: trialIndex,
      seed,
      target,
      discriminability,
      effectiveDiscriminability: effective,
      likelihoodIfPositive: TrialDifficultyModel.lineValue(
        this.likelihood.positive,
        effective,
      ),
      likelihoodIfNegative: TrialDifficultyModel.lineValue(
        this.likelihood.negative,
        effective,
      ),
    });
  }
}
