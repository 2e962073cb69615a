//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

export {
  sigmoid,
  logit,
  clampProbability,
  clampUnit,
  mulberry32,
  mean,
  EPSILON,
} from "./probability.js";

export {
  ScreeningError,
  InvalidArgumentError,
  InvalidStateError,
  NotStartedError,
  InsufficientDataError,
  isScreeningError,
  type ScreeningErrorCode,
  type ValidationIssue,
} from "./errors.js";

export {
  resolveConfig,
  PRESETS,
  DEFAULT_PRIOR_TABLE,
  DEFAULT_PRESET,
  DEFAULT_TRIAL_COUNT,
  DEFAULT_VIRTUAL_SAMPLE_SIZE,
  DEFAULT_STIMULUS,
  DEFAULT_VERDICT_BANDS,
  ScreeningConfigSchema,
  type ScreeningConfig,
  type ScreeningConfigInput,
  type PriorEntry,
  type PriorTable,
  type RampConfig,
  type LikelihoodLine,
  type LikelihoodConfig,
  type StimulusConfig,
  type VerdictBands,
  type PresetName,
  type DifficultyPreset,
} from "./config.js";

export { PriorModel } from "./prior.js";

export {
  TrialDifficultyModel,
  type Trial,
  type TrialParameters,
  type TrialDifficultyOptions,
} from "./difficulty.js";

export {
  drawStimulus,
  gradeResponse,
  trialSeed,
  type Stimulus,
} from "./stimulus.js";

export {
  SequentialPosteriorTracker,
  type Observation,
  type HistoryLikelihoods,
} from "./tracker.js";

export { ConjugateSummary, type BetaParameters } from "./conjugate.js";

export {
  Session,
  type SessionState,
  type TrialResult,
} from "./session.js";

export {
  verdictFor,
  historyReport,
  type Verdict,
  type HistoryRow,
  type HistoryReport,
} from "./report.js";

export {
  SessionDebugger,
  type TrialTrace,
  type HistoryTrace,
  type EstimatorComparison,
} from "./debug.js";
