import { z, type ZodError } from "zod";
import { ConfigError } from "../utils/errors.js";
import type { BalanceStrategy, MissingValuePolicy } from "../utils/types.js";

export interface IndicatorPeriods {
  atr: number;
  sma: readonly number[];
  bollinger: { period: number; multiplier: number };
  rsi: number;
  macd: { fast: number; slow: number; signal: number };
  stochastic: { period: number; smoothing: number };
  adx: number;
  cci: number;
}

export interface PipelineConfig {
  readonly indicatorPeriods: Readonly<IndicatorPeriods>;
  readonly labelThreshold: number;
  readonly splitRatios: readonly [number, number, number];
  readonly imbalanceThreshold: number;
  readonly balanceStrategy: BalanceStrategy;
  readonly missingValuePolicy: MissingValuePolicy;
  readonly oversampleNeighbors: number;
  readonly randomSeed: number;
  readonly minBars: number;
}

export type PipelineConfigOverrides = {
  -readonly [K in keyof Omit<PipelineConfig, "indicatorPeriods">]?: PipelineConfig[K];
} & { indicatorPeriods?: Partial<IndicatorPeriods> };

export const DEFAULT_INDICATOR_PERIODS: IndicatorPeriods = {
  atr: 14,
  sma: [20, 50],
  bollinger: { period: 20, multiplier: 2 },
  rsi: 14,
  macd: { fast: 12, slow: 26, signal: 9 },
  stochastic: { period: 14, smoothing: 3 },
  adx: 14,
  cci: 20,
};

const period = z.number().int().min(1);

const indicatorPeriodsSchema = z.object({
  atr: period,
  sma: z.array(period).min(1),
  bollinger: z.object({ period: period.min(2), multiplier: z.number().positive() }),
  rsi: period,
  macd: z
    .object({ fast: period, slow: period, signal: period })
    .refine(m => m.fast < m.slow, { message: "fast period must be shorter than slow period" }),
  stochastic: z.object({ period, smoothing: period }),
  adx: period,
  cci: period,
});

const configSchema = z.object({
  indicatorPeriods: indicatorPeriodsSchema,
  labelThreshold: z.number().min(0).finite(),
  splitRatios: z
    .tuple([z.number(), z.number(), z.number()])
    .refine(r => r.every(x => x > 0 && x < 1), { message: "every ratio must lie in (0, 1)" })
    .refine(r => Math.abs(r[0] + r[1] + r[2] - 1) <= 0.001, { message: "ratios must sum to 1.0" }),
  imbalanceThreshold: z.number().gt(0).max(0.5),
  balanceStrategy: z.enum(["oversample", "weight", "none"]),
  missingValuePolicy: z.enum(["forward_fill", "drop"]),
  oversampleNeighbors: z.number().int().min(1),
  randomSeed: z.number().int(),
  minBars: z.number().int().min(2),
});

export const DEFAULT_CONFIG: PipelineConfig = deepFreeze<PipelineConfig>({
  indicatorPeriods: DEFAULT_INDICATOR_PERIODS,
  labelThreshold: 0.005,
  splitRatios: [0.7, 0.15, 0.15],
  imbalanceThreshold: 0.4,
  balanceStrategy: "weight",
  missingValuePolicy: "forward_fill",
  oversampleNeighbors: 5,
  randomSeed: 42,
  minBars: 500,
});

/**
 * Format Zod validation errors into a consistent structure
 */
function formatZodErrors(error: ZodError): Record<string, string[]> {
  const errors: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const key = issue.path.join(".") || "root";
    if (!errors[key]) {
      errors[key] = [];
    }
    errors[key].push(issue.message);
  }

  return errors;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Merge overrides onto the defaults, validate, and freeze the result
 */
export function resolveConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const candidate = {
    ...DEFAULT_CONFIG,
    ...overrides,
    indicatorPeriods: {
      ...DEFAULT_CONFIG.indicatorPeriods,
      ...overrides.indicatorPeriods,
    },
  };

  const result = configSchema.safeParse(candidate);
  if (!result.success) {
    const details = formatZodErrors(result.error);
    const summary = Object.entries(details)
      .map(([key, messages]) => `${key}: ${messages.join(", ")}`)
      .join("; ");
    throw new ConfigError(`Invalid pipeline configuration (${summary})`, details);
  }

  return deepFreeze<PipelineConfig>({
    ...result.data,
    splitRatios: [result.data.splitRatios[0], result.data.splitRatios[1], result.data.splitRatios[2]],
  });
}

function parseNumber(raw: string | undefined, key: string): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be numeric, got "${raw}"`, { [key]: ["not a number"] });
  }
  return value;
}

function parseRatios(raw: string | undefined): [number, number, number] | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parts = raw.split(",").map(part => Number(part.trim()));
  if (parts.length !== 3 || parts.some(p => !Number.isFinite(p))) {
    throw new ConfigError(`SPLIT_RATIOS must hold three comma-separated numbers, got "${raw}"`, {
      SPLIT_RATIOS: ["expected train,validation,test"],
    });
  }
  return [parts[0], parts[1], parts[2]];
}

function parseChoice<T extends string>(
  raw: string | undefined,
  key: string,
  choices: readonly T[]
): T | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const match = choices.find(choice => choice === raw.trim());
  if (match === undefined) {
    throw new ConfigError(`${key} must be one of ${choices.join(", ")}, got "${raw}"`, {
      [key]: [`expected one of ${choices.join(", ")}`],
    });
  }
  return match;
}

/**
 * Read configuration overrides from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const overrides: PipelineConfigOverrides = {};

  const labelThreshold = parseNumber(env.LABEL_THRESHOLD, "LABEL_THRESHOLD");
  if (labelThreshold !== undefined) overrides.labelThreshold = labelThreshold;

  const splitRatios = parseRatios(env.SPLIT_RATIOS);
  if (splitRatios !== undefined) overrides.splitRatios = splitRatios;

  const imbalanceThreshold = parseNumber(env.IMBALANCE_THRESHOLD, "IMBALANCE_THRESHOLD");
  if (imbalanceThreshold !== undefined) overrides.imbalanceThreshold = imbalanceThreshold;

  const balanceStrategy = parseChoice(env.BALANCE_STRATEGY, "BALANCE_STRATEGY", [
    "oversample",
    "weight",
    "none",
  ] as const);
  if (balanceStrategy !== undefined) overrides.balanceStrategy = balanceStrategy;

  const missingValuePolicy = parseChoice(env.MISSING_VALUE_POLICY, "MISSING_VALUE_POLICY", [
    "forward_fill",
    "drop",
  ] as const);
  if (missingValuePolicy !== undefined) overrides.missingValuePolicy = missingValuePolicy;

  const randomSeed = parseNumber(env.RANDOM_SEED, "RANDOM_SEED");
  if (randomSeed !== undefined) overrides.randomSeed = randomSeed;

  const minBars = parseNumber(env.MIN_BARS, "MIN_BARS");
  if (minBars !== undefined) overrides.minBars = minBars;

  return resolveConfig(overrides);
}
