/**
 * TROTLINE - Configuration
 *
 * Every tunable constant of the rating engine lives on one TrotlineConfig
 * object that is built once and handed to each component's constructor.
 * Two engines with different configs can run side by side (tests do this).
 *
 * Environment overrides (all optional):
 *   TROTLINE_DEFAULT_MU, TROTLINE_DEFAULT_SIGMA,
 *   TROTLINE_MIN_DAYS_NO_DECAY, TROTLINE_MAX_DAYS_DECAY, TROTLINE_MAX_DECAY,
 *   TROTLINE_BETA, TROTLINE_TAU, TROTLINE_DRAW_PROBABILITY,
 *   TROTLINE_ODDS_BETA, TROTLINE_FUSION_WEIGHTS (JSON), TROTLINE_DB_PATH
 */

import { z } from 'zod';
import { ConfigError } from './errors';

// ─── Defaults ────────────────────────────────────────────────────

/** Initial skill estimate for an entity seen for the first time. */
export const DEFAULT_MU = 1000;

/** Initial uncertainty (mu / 3). */
export const DEFAULT_SIGMA = 333.333;

/** Inactivity (in days) tolerated before mu starts to shrink. */
export const MIN_DAYS_NO_DECAY = 28;

/** Inactivity at which the decay ceiling is reached. */
export const MAX_DAYS_DECAY = 365;

/** Fraction of mu lost at the decay ceiling. */
export const MAX_DECAY = 0.5;

/** Scale of the log-sum-exp odds transform. */
export const ODDS_BETA = 166.5;

// ─── Schemas ─────────────────────────────────────────────────────

export const ClassWeightsSchema = z
  .object({
    horse: z.number().min(0).max(1),
    driver: z.number().min(0).max(1),
    trainer: z.number().min(0).max(1),
  })
  .refine(
    (w) => Math.abs(w.horse + w.driver + w.trainer - 1) <= 1e-9,
    { message: 'horse + driver + trainer weights must sum to 1' },
  );
export type ClassWeights = z.infer<typeof ClassWeightsSchema>;

/**
 * Fusion weights keyed by which of driver/trainer are named on the card.
 * A zero weight means the component never enters the fused rating.
 */
export const FusionWeightTableSchema = z.object({
  both: ClassWeightsSchema,
  driverOnly: ClassWeightsSchema.refine((w) => w.trainer === 0, {
    message: 'driverOnly must give the trainer a weight of 0',
  }),
  trainerOnly: ClassWeightsSchema.refine((w) => w.driver === 0, {
    message: 'trainerOnly must give the driver a weight of 0',
  }),
  neither: ClassWeightsSchema.refine((w) => w.horse === 1, {
    message: 'neither must give the horse a weight of 1',
  }),
});
export type FusionWeightTable = z.infer<typeof FusionWeightTableSchema>;

export const DEFAULT_FUSION_WEIGHTS: FusionWeightTable = {
  both: { horse: 0.6, driver: 0.25, trainer: 0.15 },
  driverOnly: { horse: 0.7, driver: 0.3, trainer: 0 },
  trainerOnly: { horse: 0.8, driver: 0, trainer: 0.2 },
  neither: { horse: 1, driver: 0, trainer: 0 },
};

export const ConfigSchema = z.object({
  defaultMu: z.number().finite(),
  defaultSigma: z.number().finite().positive(),
  minDaysNoDecay: z.number().int().min(0),
  maxDaysDecay: z.number().int().min(0),
  maxDecay: z.number().min(0).max(1),
  /** Performance variation of a single race. */
  beta: z.number().finite().positive(),
  /** Additive sigma drift applied before every update. */
  tau: z.number().finite().min(0),
  drawProbability: z.number().min(0).lt(1),
  oddsBeta: z.number().finite().positive(),
  fusionWeights: FusionWeightTableSchema,
  dbPath: z.string().min(1),
});
export type TrotlineConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = Partial<TrotlineConfig>;

// ─── Construction ────────────────────────────────────────────────

/**
 * Build a validated config from defaults plus overrides.
 * beta and tau follow defaultSigma (sigma/2, sigma/100) unless given.
 */
export function createConfig(overrides: ConfigOverrides = {}): TrotlineConfig {
  const defaultSigma = overrides.defaultSigma ?? DEFAULT_SIGMA;

  const candidate: TrotlineConfig = {
    defaultMu: overrides.defaultMu ?? DEFAULT_MU,
    defaultSigma,
    minDaysNoDecay: overrides.minDaysNoDecay ?? MIN_DAYS_NO_DECAY,
    maxDaysDecay: overrides.maxDaysDecay ?? MAX_DAYS_DECAY,
    maxDecay: overrides.maxDecay ?? MAX_DECAY,
    beta: overrides.beta ?? defaultSigma / 2,
    tau: overrides.tau ?? defaultSigma / 100,
    drawProbability: overrides.drawProbability ?? 0,
    oddsBeta: overrides.oddsBeta ?? ODDS_BETA,
    fusionWeights: overrides.fusionWeights ?? DEFAULT_FUSION_WEIGHTS,
    dbPath: overrides.dbPath ?? 'trotline.db',
  };

  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

const optionalNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().finite().optional(),
);

const EnvSchema = z.object({
  TROTLINE_DEFAULT_MU: optionalNumber,
  TROTLINE_DEFAULT_SIGMA: optionalNumber,
  TROTLINE_MIN_DAYS_NO_DECAY: optionalNumber,
  TROTLINE_MAX_DAYS_DECAY: optionalNumber,
  TROTLINE_MAX_DECAY: optionalNumber,
  TROTLINE_BETA: optionalNumber,
  TROTLINE_TAU: optionalNumber,
  TROTLINE_DRAW_PROBABILITY: optionalNumber,
  TROTLINE_ODDS_BETA: optionalNumber,
  TROTLINE_FUSION_WEIGHTS: z.string().optional(),
  TROTLINE_DB_PATH: z.string().optional(),
});

/**
 * Read overrides from an environment map (process.env by default).
 * Unset or blank variables fall back to the defaults.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): TrotlineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  const vars = parsed.data;

  return createConfig({
    defaultMu: vars.TROTLINE_DEFAULT_MU,
    defaultSigma: vars.TROTLINE_DEFAULT_SIGMA,
    minDaysNoDecay: vars.TROTLINE_MIN_DAYS_NO_DECAY,
    maxDaysDecay: vars.TROTLINE_MAX_DAYS_DECAY,
    maxDecay: vars.TROTLINE_MAX_DECAY,
    beta: vars.TROTLINE_BETA,
    tau: vars.TROTLINE_TAU,
    drawProbability: vars.TROTLINE_DRAW_PROBABILITY,
    oddsBeta: vars.TROTLINE_ODDS_BETA,
    fusionWeights: parseFusionWeights(vars.TROTLINE_FUSION_WEIGHTS),
    dbPath: vars.TROTLINE_DB_PATH?.trim() || undefined,
  });
}

function parseFusionWeights(raw: string | undefined): FusionWeightTable | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`TROTLINE_FUSION_WEIGHTS is not valid JSON: ${reason}`);
  }

  const parsed = FusionWeightTableSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`TROTLINE_FUSION_WEIGHTS: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
