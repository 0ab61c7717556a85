import type { IndicatorCalculator } from "./calculator.js";
import { isNegligibleSpread, rollingMean, rollingMeanDeviation } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

const LAMBERT_CONSTANT = 0.015;

export function typicalPrice(bars: BarSequence): number[] {
  return bars.map(bar => (bar.high + bar.low + bar.close) / 3);
}

/**
 * (TP - SMA(TP)) / (0.015 * mean deviation of TP); NaN when the deviation is
 * zero up to rounding
 */
export function commodityChannelIndex(bars: BarSequence, period: number = 20): number[] {
  const tp = typicalPrice(bars);
  const mean = rollingMean(tp, period);
  const deviation = rollingMeanDeviation(tp, period);

  return tp.map((value, i) => {
    if (Number.isNaN(mean[i]) || Number.isNaN(deviation[i]) || isNegligibleSpread(deviation[i], mean[i])) {
      return NaN;
    }
    return (value - mean[i]) / (LAMBERT_CONSTANT * deviation[i]);
  });
}

export function createChannelIndex(period: number = 20): IndicatorCalculator {
  return {
    name: "Channel-Index",
    columns: ["CCI"],
    requiredLength: period,
    warmUpLength: period,
    compute: bars => ({ CCI: commodityChannelIndex(bars, period) }),
  };
}
