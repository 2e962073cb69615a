//
// Sequential Screening
//
// Copyright (c) 2023-2026 Cognica, Inc.
//

// Session configuration: prior table, trial count, difficulty ramp,
// likelihood lines, conjugate sample size, stimulus and verdict settings.
//
// Inputs are validated with zod.  A named preset supplies the ramp and
// likelihood lines; explicit fields override the preset.  The resolved
// configuration is frozen and may be shared between sessions.

import { z, type ZodError } from "zod";

import { InvalidArgumentError, type ValidationIssue } from "./errors.js";

const openProbability = z.number().gt(0).lt(1);

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const RateEntrySchema = z.object({
  kind: z.literal("rate"),
  rate: openProbability,
});

export const MixtureComponentSchema = z.object({
  category: z.string().min(1),
  weight: z.number().positive().finite(),
});

export const MixtureEntrySchema = z.object({
  kind: z.literal("mixture"),
  components: z.array(MixtureComponentSchema).min(1),
});

export const PriorEntrySchema = z.discriminatedUnion("kind", [
  RateEntrySchema,
  MixtureEntrySchema,
]);

export const PriorTableSchema = z
  .record(z.string().min(1), PriorEntrySchema)
  .superRefine((table, ctx) => {
    if (Object.keys(table).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "priorTable must define at least one category",
      });
    }
    for (const [category, entry] of Object.entries(table)) {
      if (entry.kind !== "mixture") continue;
      entry.components.forEach((component, i) => {
        const target = table[component.category];
        if (target === undefined || target.kind !== "rate") {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [category, "components", i, "category"],
            message: `mixture component must reference a rate category, got "${component.category}"`,
          });
        }
      });
    }
  });

export const RampSchema = z.object({
  decayRate: z.number().min(0).finite(),
  floor: z.number().gt(0).max(1),
});

export const LikelihoodLineSchema = z
  .object({
    intercept: openProbability,
    slope: z.number().min(0).finite(),
    cap: openProbability,
  })
  .refine((line) => line.intercept <= line.cap, {
    message: "intercept must not exceed cap",
    path: ["cap"],
  });

// The negative hypothesis must dominate the positive one on every field,
// and be strictly higher on intercept or slope.
export const LikelihoodSchema = z
  .object({
    positive: LikelihoodLineSchema,
    negative: LikelihoodLineSchema,
  })
  .superRefine(({ positive, negative }, ctx) => {
    for (const field of ["intercept", "slope", "cap"] as const) {
      if (negative[field] < positive[field]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["negative", field],
          message: `negative.${field} must be >= positive.${field}`,
        });
      }
    }
    if (
      negative.intercept === positive.intercept &&
      negative.slope === positive.slope
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["negative"],
        message: "negative line must have a higher intercept or slope",
      });
    }
  });

export const StimulusSchema = z.object({
  targetRange: z.number().int().positive(),
  backgroundDots: z.number().int().positive(),
});

export const VerdictBandsSchema = z
  .tuple([openProbability, openProbability, openProbability])
  .refine(([a, b, c]) => a < b && b < c, {
    message: "verdict bands must be strictly ascending",
  });

export const PresetNameSchema = z.enum(["gradual", "moderate", "steep"]);

export const ScreeningConfigSchema = z.object({
  preset: PresetNameSchema,
  priorTable: PriorTableSchema,
  trialCount: z.number().int().positive(),
  ramp: RampSchema,
  likelihood: LikelihoodSchema,
  virtualSampleSize: z.number().positive().finite(),
  stimulus: StimulusSchema,
  verdictBands: VerdictBandsSchema,
});

export const ScreeningConfigInputSchema = ScreeningConfigSchema.partial();

export type PriorEntry = z.infer<typeof PriorEntrySchema>;
export type PriorTable = z.infer<typeof PriorTableSchema>;
export type RampConfig = z.infer<typeof RampSchema>;
export type LikelihoodLine = z.infer<typeof LikelihoodLineSchema>;
export type LikelihoodConfig = z.infer<typeof LikelihoodSchema>;
export type StimulusConfig = z.infer<typeof StimulusSchema>;
export type VerdictBands = z.infer<typeof VerdictBandsSchema>;
export type PresetName = z.infer<typeof PresetNameSchema>;
export type ScreeningConfig = z.infer<typeof ScreeningConfigSchema>;
export type ScreeningConfigInput = z.input<typeof ScreeningConfigInputSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}

export interface DifficultyPreset {
  ramp: RampConfig;
  likelihood: LikelihoodConfig;
}

// Difficulty presets.  "gradual" keeps the two likelihood lines ten points
// apart so the posterior moves slowly; the others widen the gap.
// Every default below is frozen; sessions read them but never own them.
export const PRESETS: Readonly<Record<PresetName, DifficultyPreset>> = deepFreeze<
  Record<PresetName, DifficultyPreset>
>({
  gradual: {
    ramp: { decayRate: 0.04, floor: 0.7 },
    likelihood: {
      positive: { intercept: 0.35, slope: 0.2, cap: 0.6 },
      negative: { intercept: 0.45, slope: 0.25, cap: 0.7 },
    },
  },
  moderate: {
    ramp: { decayRate: 0.05, floor: 0.6 },
    likelihood: {
      positive: { intercept: 0.4, slope: 0.2, cap: 0.65 },
      negative: { intercept: 0.5, slope: 0.25, cap: 0.75 },
    },
  },
  steep: {
    ramp: { decayRate: 0.1, floor: 0.5 },
    likelihood: {
      positive: { intercept: 0.4, slope: 0.25, cap: 0.65 },
      negative: { intercept: 0.7, slope: 0.25, cap: 0.95 },
    },
  },
});

export const DEFAULT_PRIOR_TABLE: PriorTable = deepFreeze<PriorTable>({
  A: { kind: "rate", rate: 0.08 },
  B: { kind: "rate", rate: 0.005 },
  C: {
    kind: "mixture",
    components: [
      { category: "A", weight: 0.33 },
      { category: "B", weight: 0.67 },
    ],
  },
});

export const DEFAULT_PRESET: PresetName = "gradual";
export const DEFAULT_TRIAL_COUNT = 5;
export const DEFAULT_VIRTUAL_SAMPLE_SIZE = 10;
export const DEFAULT_STIMULUS: StimulusConfig = deepFreeze<StimulusConfig>({
  targetRange: 100,
  backgroundDots: 15000,
});
export const DEFAULT_VERDICT_BANDS: VerdictBands = deepFreeze<VerdictBands>([
  0.01, 0.05, 0.15,
]);

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function invalidConfig(error: ZodError): InvalidArgumentError {
  const issues = toValidationIssues(error);
  const summary = issues
    .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
    .join("; ");
  return new InvalidArgumentError(`Invalid configuration: ${summary}`, issues);
}

// Merge the input over the selected preset and the defaults, validate the
// result, and return a frozen copy.
export function resolveConfig(input: ScreeningConfigInput = {}): ScreeningConfig {
  const parsedInput = ScreeningConfigInputSchema.safeParse(input);
  if (!parsedInput.success) {
    throw invalidConfig(parsedInput.error);
  }
  const given = parsedInput.data;
  const preset = PRESETS[given.preset ?? DEFAULT_PRESET];

  const merged = ScreeningConfigSchema.safeParse({
    preset: given.preset ?? DEFAULT_PRESET,
    priorTable: given.priorTable ?? DEFAULT_PRIOR_TABLE,
    trialCount: given.trialCount ?? DEFAULT_TRIAL_COUNT,
    ramp: given.ramp ?? preset.ramp,
    likelihood: given.likelihood ?? preset.likelihood,
    virtualSampleSize: given.virtualSampleSize ?? DEFAULT_VIRTUAL_SAMPLE_SIZE,
    stimulus: given.stimulus ?? DEFAULT_STIMULUS,
    verdictBands: given.verdictBands ?? DEFAULT_VERDICT_BANDS,
  });
  if (!merged.success) {
    throw invalidConfig(merged.error);
  }
  // safeParse returns fresh objects, so the result is a private copy.
  return deepFreeze(merged.data);
}
