import type { IndicatorCalculator } from "./calculator.js";
import { rollingMax, rollingMean, rollingMin } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

export interface StochasticResult {
  k: number[];
  d: number[];
}

/**
 * %K over the period high/low range, %D as its SMA. %K is NaN where the
 * range is zero.
 */
export function stochasticOscillator(
  bars: BarSequence,
  period: number = 14,
  smoothing: number = 3
): StochasticResult {
  const lowestLow = rollingMin(bars.map(b => b.low), period);
  const highestHigh = rollingMax(bars.map(b => b.high), period);

  const k = bars.map((bar, i) => {
    const range = highestHigh[i] - lowestLow[i];
    if (Number.isNaN(range) || range === 0) {
      return NaN;
    }
    const raw = (100 * (bar.close - lowestLow[i])) / range;
    return Math.min(100, Math.max(0, raw));
  });

  return { k, d: rollingMean(k, smoothing) };
}

export function createStochasticOscillator(period: number = 14, smoothing: number = 3): IndicatorCalculator {
  return {
    name: "Stochastic-Oscillator",
    columns: ["Stoch_K", "Stoch_D"],
    requiredLength: period,
    warmUpLength: period + smoothing - 1,
    compute: bars => {
      const { k, d } = stochasticOscillator(bars, period, smoothing);
      return { Stoch_K: k, Stoch_D: d };
    },
  };
}
