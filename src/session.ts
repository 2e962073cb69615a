//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// One screening session for one subject.
//
//   awaiting_prior --start()--> in_progress --last record()--> completed
//          ^                                                       |
//          +------------------------ reset() ---------------------+
//
// The session owns its tracker and its trial cache; sessions share only
// the frozen configuration.  Trials are generated lazily from
// (trialIndex, prior) and cached, so revisiting a trial never re-draws it.

import { resolveConfig, type ScreeningConfig, type ScreeningConfigInput } from "./config.js";
import { ConjugateSummary } from "./conjugate.js";
import { TrialDifficultyModel, type Trial } from "./difficulty.js";
import {
  InvalidArgumentError,
  InvalidStateError,
  NotStartedError,
} from "./errors.js";
import { PriorModel } from "./prior.js";
import { historyReport, verdictFor, type HistoryReport, type Verdict } from "./report.js";
import { gradeResponse, trialSeed } from "./stimulus.js";
import { SequentialPosteriorTracker, type Observation } from "./tracker.js";

export type SessionState = "awaiting_prior" | "in_progress" | "completed";

export interface TrialResult {
  trial: Trial;
  correct: boolean;
  before: number;
  after: number;
}

export class Session {
  public readonly config: ScreeningConfig;
  public readonly priorModel: PriorModel;
  public readonly difficulty: TrialDifficultyModel;

  private _category: string | null = null;
  private readonly _tracker = new SequentialPosteriorTracker();
  private readonly _trials = new Map<number, Trial>();

  constructor(config: ScreeningConfigInput = {}) {
    this.config = resolveConfig(config);
    this.priorModel = new PriorModel(this.config.priorTable);
    this.difficulty = TrialDifficultyModel.fromConfig(this.config);
  }

  get state(): SessionState {
    if (!this._tracker.started) return "awaiting_prior";
    if (this._tracker.length >= this.config.trialCount) return "completed";
    return "in_progress";
  }

  get trialCount(): number {
    return this.config.trialCount;
  }

  get completedCount(): number {
    return this._tracker.length;
  }

  get category(): string | null {
    return this._category;
  }

  get prior(): number {
    return this._tracker.prior;
  }

  get observations(): readonly Observation[] {
    return this._tracker.history;
  }

  // Resolve the prior for category and begin the session.
  start(category: string): number {
    if (this.state !== "awaiting_prior") {
      throw new InvalidStateError(
        `start() requires state "awaiting_prior", got "${this.state}"`,
      );
    }
    const prior = this.priorModel.priorFor(category);
    this._tracker.start(prior);
    this._category = category;
    return prior;
  }

  trial(index: number): Trial {
    if (!this._tracker.started) {
      throw new NotStartedError();
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.trialCount) {
      throw new InvalidArgumentError(
        `trial index must be an integer in [0, ${this.trialCount}), got ${index}`,
      );
    }
    const cached = this._trials.get(index);
    if (cached !== undefined) {
      return cached;
    }
    const trial = this.difficulty.trialFor(
      index,
      trialSeed(index, this._tracker.prior),
      this.config.stimulus,
    );
    this._trials.set(index, trial);
    return trial;
  }

  // The next trial awaiting an outcome.
  currentTrial(): Trial {
    this.assertInProgress("currentTrial()");
    return this.trial(this.completedCount);
  }

  // Record whether the subject answered the current trial correctly.
  record(outcome: boolean): TrialResult {
    this.assertInProgress("record()");
    const trial = this.trial(this.completedCount);
    const before = this._tracker.currentPosterior();
    const after = this._tracker.record(
      outcome,
      trial.likelihoodIfPositive,
      trial.likelihoodIfNegative,
    );
    return { trial, correct: outcome, before, after };
  }

  // Grade a raw answer for trialIndex and record it.  Answers for trials
  // that are already recorded, or not yet reached, are refused.
  submit(trialIndex: number, raw: string): TrialResult {
    this.assertInProgress("submit()");
    if (!Number.isInteger(trialIndex)) {
      throw new InvalidArgumentError(
        `trial index must be an integer, got ${trialIndex}`,
      );
    }
    if (trialIndex !== this.completedCount) {
      throw new InvalidStateError(
        trialIndex < this.completedCount
          ? `trial ${trialIndex} has already been recorded`
          : `trial ${trialIndex} is not open; the current trial is ${this.completedCount}`,
      );
    }
    const trial = this.trial(trialIndex);
    return this.record(gradeResponse(raw, trial.target));
  }

  currentPosterior(): number {
    return this._tracker.currentPosterior();
  }

  trajectory(): number[] {
    return this._tracker.trajectory();
  }

  conjugateSummary(): ConjugateSummary {
    return ConjugateSummary.fromOutcomes(
      this._tracker.prior,
      this._tracker.history.map((o) => o.outcome),
      this.config.virtualSampleSize,
    );
  }

  verdict(): Verdict {
    return verdictFor(this.currentPosterior(), this.config.verdictBands);
  }

  report(): HistoryReport {
    return historyReport(this._tracker.history, this._tracker.trajectory());
  }

  // Discard the prior, every trial and every outcome.
  reset(): void {
    this._tracker.reset();
    this._trials.clear();
    this._category = null;
  }

  private assertInProgress(operation: string): void {
    const state = this.state;
    if (state !== "in_progress") {
      throw new InvalidStateError(
        `${operation} requires state "in_progress", got "${state}"`,
      );
    }
  }
}
