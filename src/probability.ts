//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Numeric helpers shared by the prior, difficulty and posterior models.
//
// Probabilities leaving this library are clamped to [EPSILON, 1 - EPSILON]
// so that no posterior ever reaches a hard 0 or 1.

export const EPSILON = 1e-10;

export function clampProbability(p: number): number {
  return Math.max(EPSILON, Math.min(1.0 - EPSILON, p));
}

// Clamp into the closed unit interval (no EPSILON margin).
export function clampUnit(x: number): number {
  return Math.max(0.0, Math.min(1.0, x));
}

export function sigmoid(x: number): number {
  if (x >= 0) {
    return 1.0 / (1.0 + Math.exp(-x));
  }
  const expX = Math.exp(x);
  return expX / (1.0 + expX);
}

export function logit(p: number): number {
  const clamped = clampProbability(p);
  return Math.log(clamped / (1.0 - clamped));
}

// Seeded PRNG (mulberry32).  Each call returns an independent generator,
// so two generators built from the same seed yield identical sequences.
export function mulberry32(seed: number): () => number {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) {
    sum += v;
  }
  return sum / values.length;
}
