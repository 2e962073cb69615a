//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

import { describe, expect, it } from "vitest";

import { SessionDebugger } from "../src/debug.js";
import { logit, mulberry32 } from "../src/probability.js";
import { Session } from "../src/session.js";
import { SequentialPosteriorTracker, type Observation } from "../src/tracker.js";

// ---------------------------------------------------------------------------
// Shared fixtures
// ---------------------------------------------------------------------------

const CORRECT: Observation = {
  outcome: true,
  likelihoodIfPositive: 0.4,
  likelihoodIfNegative: 0.6,
};

const WRONG: Observation = {
  outcome: false,
  likelihoodIfPositive: 0.4,
  likelihoodIfNegative: 0.6,
};

function createSession(outcomes: boolean[]): Session {
  const session = new Session({
    trialCount: outcomes.length,
    stimulus: { targetRange: 100, backgroundDots: 200 },
  });
  session.start("A");
  for (const o of outcomes) {
    session.record(o);
  }
  return session;
}

// ---------------------------------------------------------------------------
// traceTrial
// ---------------------------------------------------------------------------

describe("traceTrial", () => {
  const debugger_ = new SessionDebugger();

  it("uses p for a correct outcome", () => {
    const trace = debugger_.traceTrial(0.08, CORRECT);
    expect(trace.factorPositive).toBe(0.4);
    expect(trace.factorNegative).toBe(0.6);
    expect(trace.logLikelihoodRatio).toBeCloseTo(Math.log(2 / 3), 12);
  });

  it("uses 1 - p for a wrong outcome", () => {
    const trace = debugger_.traceTrial(0.08, WRONG);
    expect(trace.factorPositive).toBeCloseTo(0.6, 15);
    expect(trace.factorNegative).toBeCloseTo(0.4, 15);
    expect(trace.after).toBeCloseTo(0.048 / 0.416, 12);
  });

  it("agrees with the tracker", () => {
    const trace = debugger_.traceTrial(0.08, CORRECT);
    const tracker = new SequentialPosteriorTracker(0.08);
    expect(trace.after).toBeCloseTo(tracker.record(true, 0.4, 0.6), 12);
    expect(trace.logitBefore).toBeCloseTo(logit(0.08), 15);
    expect(trace.logitAfter).toBeCloseTo(
      trace.logitBefore + trace.logLikelihoodRatio,
      15,
    );
  });

  it("defaults the trial number to 1", () => {
    expect(debugger_.traceTrial(0.08, CORRECT).trial).toBe(1);
    expect(debugger_.traceTrial(0.08, CORRECT, { trial: 4 }).trial).toBe(4);
  });
});

// ---------------------------------------------------------------------------
// traceHistory
// ---------------------------------------------------------------------------

describe("traceHistory", () => {
  const debugger_ = new SessionDebugger();

  it("chains trials and matches the tracker trajectory", () => {
    const rng = mulberry32(5);
    const history: Observation[] = [];
    const tracker = new SequentialPosteriorTracker(0.02975);
    for (let i = 0; i < 15; i++) {
      const pPos = 0.3 + rng() * 0.3;
      const o: Observation = {
        outcome: rng() < 0.6,
        likelihoodIfPositive: pPos,
        likelihoodIfNegative: pPos + 0.1,
      };
      history.push(o);
      tracker.record(o.outcome, o.likelihoodIfPositive, o.likelihoodIfNegative);
    }

    const trace = debugger_.traceHistory(0.02975, history);
    const trajectory = tracker.trajectory();
    expect(trace.trials).toHaveLength(15);
    trace.trials.forEach((t, i) => {
      expect(t.trial).toBe(i + 1);
      expect(t.after).toBeCloseTo(trajectory[i + 1]!, 10);
    });
    expect(trace.posterior).toBeCloseTo(tracker.currentPosterior(), 10);
  });

  it("sums the log-likelihood ratios", () => {
    const trace = debugger_.traceHistory(0.08, [CORRECT, WRONG, CORRECT]);
    // ln(2/3) + ln(3/2) + ln(2/3)
    expect(trace.cumulativeLogLikelihoodRatio).toBeCloseTo(Math.log(2 / 3), 12);
    expect(trace.logitPosterior).toBeCloseTo(
      trace.logitPrior + Math.log(2 / 3),
      12,
    );
  });

  it("returns the prior for an empty history", () => {
    const trace = debugger_.traceHistory(0.08, []);
    expect(trace.trials).toEqual([]);
    expect(trace.posterior).toBeCloseTo(0.08, 12);
  });

  it("traces a session", () => {
    const session = createSession([true, false, true]);
    const trace = debugger_.traceSession(session);
    expect(trace.prior).toBe(0.08);
    expect(trace.trials.map((t) => t.outcome)).toEqual([true, false, true]);
    expect(trace.posterior).toBeCloseTo(session.currentPosterior(), 10);
  });
});

// ---------------------------------------------------------------------------
// compareEstimators
// ---------------------------------------------------------------------------

describe("compareEstimators", () => {
  const debugger_ = new SessionDebugger();

  it("sets the conjugate mean beside the posterior", () => {
    const session = createSession([true, false, false]);
    const comparison = debugger_.compareEstimators(session);
    expect(comparison.trials).toBe(3);
    expect(comparison.correct).toBe(1);
    expect(comparison.conjugateMean).toBeCloseTo(1.8 / 13.0, 12);
    expect(comparison.likelihoodRatioPosterior).toBe(session.currentPosterior());
    expect(comparison.difference).toBeCloseTo(
      session.currentPosterior() - 1.8 / 13.0,
      12,
    );
  });
});

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe("formatTrial", () => {
  it("renders every step of the update", () => {
    const debugger_ = new SessionDebugger();
    const text = debugger_.formatTrial(debugger_.traceTrial(0.08, CORRECT));
    expect(text.split("\n")).toEqual([
      "  [Trial 1] correct",
      "    P(correct | positive)=0.400  P(correct | negative)=0.600",
      "    ln(0.400 / 0.600) = -0.405",
      "    logit: -2.442 -> -2.848",
      "    posterior: 0.080000 -> 0.054795",
    ]);
  });

  it("labels wrong answers", () => {
    const debugger_ = new SessionDebugger();
    const lines = debugger_
      .formatTrial(debugger_.traceTrial(0.08, WRONG, { trial: 2 }))
      .split("\n");
    expect(lines[0]).toBe("  [Trial 2] wrong");
    expect(lines[2]).toBe("    ln(0.600 / 0.400) = +0.405");
  });
});

describe("formatHistory", () => {
  it("frames the trials with prior and posterior", () => {
    const debugger_ = new SessionDebugger();
    const lines = debugger_
      .formatHistory(debugger_.traceHistory(0.08, [CORRECT]))
      .split("\n");
    expect(lines[0]).toBe("Prior: 0.080000 (logit -2.442)");
    expect(lines).toHaveLength(8);
    expect(lines[6]).toBe("Sum of ln LR: -0.405");
    expect(lines[7]).toBe("Posterior: 0.054795 (logit -2.848)");
  });
});

describe("formatComparison", () => {
  it("starts with the trial counts", () => {
    const debugger_ = new SessionDebugger();
    const session = createSession([true, false, false]);
    const text = debugger_.formatComparison(debugger_.compareEstimators(session));
    const lines = text.split("\n");
    expect(lines[0]).toBe("Estimators after 3 trials (1 correct)");
    expect(lines[2]).toBe("  conjugate mean:             0.1385 (sd 0.0923)");
  });
});
