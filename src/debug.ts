//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Session debugger for tracing how each outcome moves the posterior.
//
// In log-odds space the likelihood-ratio update is additive:
//
//   logit(P_k) = logit(prior) + sum_{t<=k} ln(f_pos_t / f_neg_t)
//
// where f_h_t is the probability of the observed outcome t under
// hypothesis h.  The debugger records every term of that sum so a final
// posterior can be explained trial by trial, and sets the conjugate
// summary beside it.

import type { Session } from "./session.js";
import type { Observation } from "./tracker.js";
import { clampProbability, logit, sigmoid } from "./probability.js";

// ---------------------------------------------------------------------------
// Data structures
// ---------------------------------------------------------------------------

// Trace of a single outcome folded into the posterior.
export interface TrialTrace {
  // Input
  trial: number;
  outcome: boolean;
  likelihoodIfPositive: number;
  likelihoodIfNegative: number;

  // Probability of the observed outcome under each hypothesis
  factorPositive: number;
  factorNegative: number;

  // Log-odds space
  logLikelihoodRatio: number;
  logitBefore: number;
  logitAfter: number;

  // Output
  before: number;
  after: number;
}

// Trace of a whole outcome history.
export interface HistoryTrace {
  prior: number;
  logitPrior: number;
  trials: TrialTrace[];
  cumulativeLogLikelihoodRatio: number;
  logitPosterior: number;
  posterior: number;
}

// Likelihood-ratio posterior set beside the conjugate estimate.
export interface EstimatorComparison {
  trials: number;
  correct: number;
  likelihoodRatioPosterior: number;
  conjugateMean: number;
  conjugateVariance: number;
  difference: number;
}

function signed(x: number, digits: number = 3): string {
  return `${x >= 0 ? "+" : ""}${x.toFixed(digits)}`;
}

// ---------------------------------------------------------------------------
// SessionDebugger
// ---------------------------------------------------------------------------

export class SessionDebugger {
  // Trace one observation applied to the posterior `before`.
  traceTrial(
    before: number,
    observation: Observation,
    options: { trial?: number } = {},
  ): TrialTrace {
    const { outcome, likelihoodIfPositive, likelihoodIfNegative } = observation;
    const factorPositive = outcome
      ? likelihoodIfPositive
      : 1.0 - likelihoodIfPositive;
    const factorNegative = outcome
      ? likelihoodIfNegative
      : 1.0 - likelihoodIfNegative;
    const llr = Math.log(factorPositive / factorNegative);
    const logitBefore = logit(before);
    const logitAfter = logitBefore + llr;

    return {
      trial: options.trial ?? 1,
      outcome,
      likelihoodIfPositive,
      likelihoodIfNegative,
      factorPositive,
      factorNegative,
      logLikelihoodRatio: llr,
      logitBefore,
      logitAfter,
      before,
      after: clampProbability(sigmoid(logitAfter)),
    };
  }

  traceHistory(prior: number, observations: readonly Observation[]): HistoryTrace {
    const logitPrior = logit(prior);
    const trials: TrialTrace[] = [];
    let current = prior;
    let cumulative = 0;

    observations.forEach((o, i) => {
      const trace = this.traceTrial(current, o, { trial: i + 1 });
      trials.push(trace);
      cumulative += trace.logLikelihoodRatio;
      current = trace.after;
    });

    const logitPosterior = logitPrior + cumulative;
    return {
      prior,
      logitPrior,
      trials,
      cumulativeLogLikelihoodRatio: cumulative,
      logitPosterior,
      posterior: clampProbability(sigmoid(logitPosterior)),
    };
  }

  traceSession(session: Session): HistoryTrace {
    return this.traceHistory(session.prior, session.observations);
  }

  compareEstimators(session: Session): EstimatorComparison {
    const summary = session.conjugateSummary();
    const posterior = session.currentPosterior();
    return {
      trials: summary.trials,
      correct: summary.correct,
      likelihoodRatioPosterior: posterior,
      conjugateMean: summary.mean,
      conjugateVariance: summary.variance,
      difference: posterior - summary.mean,
    };
  }

  // Format a trial trace as human-readable text.
  formatTrial(trace: TrialTrace): string {
    const lines = [
      `  [Trial ${trace.trial}] ${trace.outcome ? "correct" : "wrong"}`,
      `    P(correct | positive)=${trace.likelihoodIfPositive.toFixed(3)}` +
        `  P(correct | negative)=${trace.likelihoodIfNegative.toFixed(3)}`,
      `    ln(${trace.factorPositive.toFixed(3)} / ${trace.factorNegative.toFixed(3)})` +
        ` = ${signed(trace.logLikelihoodRatio)}`,
      `    logit: ${signed(trace.logitBefore)} -> ${signed(trace.logitAfter)}`,
      `    posterior: ${trace.before.toFixed(6)} -> ${trace.after.toFixed(6)}`,
    ];
    return lines.join("\n");
  }

  formatHistory(trace: HistoryTrace): string {
    const lines: string[] = [];
    lines.push(
      `Prior: ${trace.prior.toFixed(6)} (logit ${signed(trace.logitPrior)})`,
    );
    for (const t of trace.trials) {
      lines.push(this.formatTrial(t));
    }
    lines.push(
      `Sum of ln LR: ${signed(trace.cumulativeLogLikelihoodRatio)}`,
    );
    lines.push(
      `Posterior: ${trace.posterior.toFixed(6)} (logit ${signed(trace.logitPosterior)})`,
    );
    return lines.join("\n");
  }

  formatComparison(comparison: EstimatorComparison): string {
    const lines = [
      `Estimators after ${comparison.trials} trials (${comparison.correct} correct)`,
      `  likelihood-ratio posterior: ${comparison.likelihoodRatioPosterior.toFixed(4)}`,
      `  conjugate mean:             ${comparison.conjugateMean.toFixed(4)}` +
        ` (sd ${Math.sqrt(comparison.conjugateVariance).toFixed(4)})`,
      `  difference:                 ${signed(comparison.difference, 4)}`,
    ];
    return lines.join("\n");
  }
}
