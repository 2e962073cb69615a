//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Deterministic stimulus draws and response grading.
//
// A stimulus is a target number drawn on a field of randomly coloured
// background dots.  Only two scalars reach the inference core: the target
// (ground truth) and the discriminability, the distance between the mean
// brightness of the number colour and that of the background.  Rendering
// is left to the presentation layer.

import { DEFAULT_STIMULUS, type StimulusConfig } from "./config.js";
import { InvalidArgumentError } from "./errors.js";
import { clampUnit, mean, mulberry32 } from "./probability.js";

export interface Stimulus {
  target: number;
  discriminability: number;
}

// Seed material for one trial: i * 42 + floor(prior * 10000).
export function trialSeed(trialIndex: number, prior: number): number {
  return trialIndex * 42 + Math.floor(prior * 10000);
}

// Draw the stimulus for one trial.  The generator is created inside the
// call, so the result depends on the seed alone.
export function drawStimulus(
  seed: number,
  options: StimulusConfig = DEFAULT_STIMULUS,
): Stimulus {
  const { targetRange, backgroundDots } = options;
  if (!Number.isInteger(targetRange) || targetRange <= 0) {
    throw new InvalidArgumentError(
      `targetRange must be a positive integer, got ${targetRange}`,
    );
  }
  if (!Number.isInteger(backgroundDots) || backgroundDots <= 0) {
    throw new InvalidArgumentError(
      `backgroundDots must be a positive integer, got ${backgroundDots}`,
    );
  }

  const rng = mulberry32(seed);
  const target = Math.floor(rng() * targetRange);

  let backgroundSum = 0;
  const channels = backgroundDots * 3;
  for (let i = 0; i < channels; i++) {
    backgroundSum += rng();
  }
  const backgroundBrightness = backgroundSum / channels;
  const numberBrightness = mean([rng(), rng(), rng()]);

  return {
    target,
    discriminability: clampUnit(
      Math.abs(numberBrightness - backgroundBrightness),
    ),
  };
}

const DIGITS = /^\d+$/;

// Compare a raw typed answer against the target.  Anything other than a
// non-empty run of decimal digits is rejected and never becomes an outcome.
export function gradeResponse(raw: string, target: number): boolean {
  const trimmed = raw.trim();
  if (!DIGITS.test(trimmed)) {
    throw new InvalidArgumentError(
      `response must be a non-negative whole number, got "${raw}"`,
    );
  }
  return Number(trimmed) === target;
}
