/**
 * One OHLCV bar. Timestamps are epoch milliseconds of the bar open.
 */
export interface Bar {
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export type BarSequence = readonly Bar[];

/**
 * Named value columns produced by one calculator, aligned 1:1 with the bars
 */
export type IndicatorColumns = Record<string, number[]>;

export const OHLCV_COLUMNS = ["open", "high", "low", "close", "volume"] as const;

export type OhlcvColumn = (typeof OHLCV_COLUMNS)[number];

export type MissingValuePolicy = "forward_fill" | "drop";

export type BalanceStrategy = "oversample" | "weight" | "none";

/**
 * Column arena built once by the indicator pipeline. Every column has
 * rowCount entries and no NaN.
 */
export interface FeatureTable {
  readonly timestamps: readonly number[];
  readonly columns: Readonly<Record<string, readonly number[]>>;
  readonly featureNames: readonly string[];
  readonly rowCount: number;
  readonly missingValuePolicy: MissingValuePolicy;
  readonly droppedRows: number;
}

export type Label = "up" | "down";

export interface LabeledTable extends FeatureTable {
  readonly labels: readonly Label[];
  readonly labelThreshold: number;
}

/**
 * Half-open row range [start, end)
 */
export interface RowRange {
  readonly start: number;
  readonly end: number;
}

export type SegmentName = "train" | "validation" | "test";

export interface SplitSegment<N extends SegmentName = SegmentName> {
  readonly name: N;
  readonly range: RowRange;
  readonly table: LabeledTable;
}

export interface DataSplits {
  readonly train: SplitSegment<"train">;
  readonly validation: SplitSegment<"validation">;
  readonly test: SplitSegment<"test">;
  readonly ratios: readonly [number, number, number];
}

/**
 * Matrix form consumed by the classifier
 */
export interface TrainingSet {
  readonly featureNames: readonly string[];
  readonly rows: readonly (readonly number[])[];
  readonly labels: readonly Label[];
  readonly weights: readonly number[];
  readonly synthetic: readonly boolean[];
  readonly timestamps: readonly number[];
}

export interface ColumnStats {
  readonly mean: number;
  readonly std: number;
  readonly degenerate: boolean;
}

export interface NormalizationState {
  readonly featureNames: readonly string[];
  readonly stats: Readonly<Record<string, ColumnStats>>;
  readonly referenceRows: number;
}

/**
 * Warning record for a zero-variance feature column
 */
export interface DegenerateColumn {
  readonly column: string;
  readonly value: number;
  readonly referenceRows: number;
}

export interface ImbalanceReport {
  readonly counts: Readonly<Record<Label, number>>;
  readonly total: number;
  readonly minorityClass: Label;
  readonly minorityProportion: number;
  readonly imbalanceRatio: number;
  readonly isImbalanced: boolean;
  readonly threshold: number;
}

/**
 * Mapping from feature column to a non-negative importance weight
 */
export type FeatureImportance = Record<string, number>;
