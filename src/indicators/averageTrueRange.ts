import type { IndicatorCalculator } from "./calculator.js";
import { rollingMean, trueRange } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

/**
 * Simple rolling mean of true range. First period - 1 rows are NaN.
 */
export function averageTrueRange(bars: BarSequence, period: number = 14): number[] {
  return rollingMean(trueRange(bars), period);
}

export function createRangeVolatility(period: number = 14): IndicatorCalculator {
  return {
    name: "Range-Volatility",
    columns: ["ATR"],
    requiredLength: period,
    warmUpLength: period,
    compute: bars => ({ ATR: averageTrueRange(bars, period) }),
  };
}
