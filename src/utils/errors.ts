/**
 * Error taxonomy for the feature engine.
 *
 * Structural failures (too little history, empty split segments, single-class
 * labels) are fatal and carry the counts a caller needs to adjust its input
 * or configuration. Numeric edge cases inside calculators never surface here.
 */

export type FeatureEngineErrorCode =
  | "INSUFFICIENT_HISTORY"
  | "SPLIT_UNDERFLOW"
  | "SINGLE_CLASS_LABELS"
  | "ROUND_TRIP_MISMATCH"
  | "TEMPORAL_ORDERING"
  | "INDICATOR_FAILED"
  | "INVALID_CONFIG"
  | "INVALID_BARS"
  | "NOT_FITTED"
  | "INVALID_IMPORTANCE";

export class FeatureEngineError extends Error {
  readonly code: FeatureEngineErrorCode;

  constructor(code: FeatureEngineErrorCode, message: string) {
    super(message);
    this.name = "FeatureEngineError";
    this.code = code;
  }
}

export interface HistoryShortfall {
  indicator: string;
  requiredLength: number;
}

export class InsufficientHistoryError extends FeatureEngineError {
  readonly shortfalls: HistoryShortfall[];
  readonly actualLength: number;

  constructor(shortfalls: HistoryShortfall[], actualLength: number) {
    const detail = shortfalls
      .map(s => `${s.indicator} requires ${s.requiredLength}`)
      .join(", ");
    super("INSUFFICIENT_HISTORY", `Insufficient history: ${actualLength} bars available; ${detail}`);
    this.name = "InsufficientHistoryError";
    this.shortfalls = shortfalls;
    this.actualLength = actualLength;
  }

  /**
   * First shortfall in pipeline order (Range-Volatility first, Channel-Index
   * last). Use `shortfallOf` to ask about one calculator.
   */
  get indicator(): string {
    return this.shortfalls[0]?.indicator ?? "";
  }

  get requiredLength(): number {
    return this.shortfalls[0]?.requiredLength ?? 0;
  }

  shortfallOf(indicator: string): HistoryShortfall | undefined {
    return this.shortfalls.find(s => s.indicator === indicator);
  }
}

export class SplitUnderflowError extends FeatureEngineError {
  readonly ratios: readonly [number, number, number];
  readonly totalRows: number;
  readonly segmentSizes: readonly [number, number, number];

  constructor(
    ratios: readonly [number, number, number],
    totalRows: number,
    segmentSizes: readonly [number, number, number]
  ) {
    super(
      "SPLIT_UNDERFLOW",
      `Split ratios ${ratios.join("/")} over ${totalRows} rows produce an empty segment ` +
        `(train=${segmentSizes[0]}, validation=${segmentSizes[1]}, test=${segmentSizes[2]})`
    );
    this.name = "SplitUnderflowError";
    this.ratios = ratios;
    this.totalRows = totalRows;
    this.segmentSizes = segmentSizes;
  }
}

export class SingleClassLabelsError extends FeatureEngineError {
  readonly label: string;
  readonly rows: number;

  constructor(label: string, rows: number) {
    super("SINGLE_CLASS_LABELS", `Training segment holds only "${label}" labels across ${rows} rows`);
    this.name = "SingleClassLabelsError";
    this.label = label;
    this.rows = rows;
  }
}

export class NormalizationRoundTripError extends FeatureEngineError {
  readonly column: string;
  readonly row: number;

  constructor(column: string, row: number, expected: number, actual: number) {
    super(
      "ROUND_TRIP_MISMATCH",
      `Inverse transform of ${column} at row ${row} gave ${actual}, expected ${expected}`
    );
    this.name = "NormalizationRoundTripError";
    this.column = column;
    this.row = row;
  }
}

export class TemporalOrderingError extends FeatureEngineError {
  constructor(message: string) {
    super("TEMPORAL_ORDERING", message);
    this.name = "TemporalOrderingError";
  }
}

export class IndicatorComputationError extends FeatureEngineError {
  readonly indicator: string;

  constructor(indicator: string, cause: unknown) {
    super(
      "INDICATOR_FAILED",
      `${indicator} failed: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = "IndicatorComputationError";
    this.indicator = indicator;
    this.cause = cause;
  }
}

export class ConfigError extends FeatureEngineError {
  readonly details: Record<string, string[]>;

  constructor(message: string, details: Record<string, string[]> = {}) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
    this.details = details;
  }
}

export class InvalidBarsError extends FeatureEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_BARS", `Bar sequence rejected: ${issues.slice(0, 5).join("; ")}${issues.length > 5 ? ` (+${issues.length - 5} more)` : ""}`);
    this.name = "InvalidBarsError";
    this.issues = issues;
  }
}

export class NotFittedError extends FeatureEngineError {
  constructor(component: string) {
    super("NOT_FITTED", `${component} has no fitted state for the requested columns`);
    this.name = "NotFittedError";
  }
}

export class ImportanceContractError extends FeatureEngineError {
  constructor(message: string) {
    super("INVALID_IMPORTANCE", message);
    this.name = "ImportanceContractError";
  }
}
