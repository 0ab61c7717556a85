import type { BarSequence, IndicatorColumns } from "../utils/types.js";

/**
 * A pure, deterministic transform of the bar sequence into one or more
 * columns aligned 1:1 with the bars. Rows whose lookback window is
 * incomplete hold NaN; a calculator never throws on a short sequence.
 */
export interface IndicatorCalculator {
  /** Family name used in error reports, e.g. "Directional-Trend" */
  readonly name: string;
  readonly columns: readonly string[];
  /** Longest lookback period; the pipeline rejects shorter sequences */
  readonly requiredLength: number;
  /** Bars needed before every column holds a defined value */
  readonly warmUpLength: number;
  compute(bars: BarSequence): IndicatorColumns;
}
