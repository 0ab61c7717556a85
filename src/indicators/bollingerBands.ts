import type { IndicatorCalculator } from "./calculator.js";
import { closes, rollingMean, rollingStd } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

export interface BollingerBands {
  upper: number[];
  middle: number[];
  lower: number[];
}

/**
 * Middle band is the period SMA of close; the bands sit multiplier sample
 * standard deviations above and below it.
 */
export function bollingerBands(
  bars: BarSequence,
  period: number = 20,
  multiplier: number = 2
): BollingerBands {
  const closeValues = closes(bars);
  const middle = rollingMean(closeValues, period);
  const std = rollingStd(closeValues, period);

  return {
    upper: middle.map((m, i) => m + multiplier * std[i]),
    middle,
    lower: middle.map((m, i) => m - multiplier * std[i]),
  };
}

export function createBandedVolatility(period: number = 20, multiplier: number = 2): IndicatorCalculator {
  return {
    name: "Banded-Volatility",
    columns: ["BB_Upper", "BB_Middle", "BB_Lower"],
    requiredLength: period,
    warmUpLength: period,
    compute: bars => {
      const bands = bollingerBands(bars, period, multiplier);
      return { BB_Upper: bands.upper, BB_Middle: bands.middle, BB_Lower: bands.lower };
    },
  };
}
