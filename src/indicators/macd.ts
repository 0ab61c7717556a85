import type { IndicatorCalculator } from "./calculator.js";
import { closes, exponentialMovingAverage } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

export interface MacdResult {
  line: number[];
  signal: number[];
  histogram: number[];
}

/**
 * line = EMA(fast) - EMA(slow); signal = EMA(line, signal); histogram = line - signal.
 * Each EMA is seeded with the mean of its first full window, so the line
 * starts at row slow - 1 and the signal at row slow + signal - 2.
 */
export function movingAverageConvergenceDivergence(
  bars: BarSequence,
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9
): MacdResult {
  const closeValues = closes(bars);
  const emaFast = exponentialMovingAverage(closeValues, fast);
  const emaSlow = exponentialMovingAverage(closeValues, slow);

  const line = emaFast.map((f, i) => f - emaSlow[i]);
  const signal = exponentialMovingAverage(line, signalPeriod);
  const histogram = line.map((l, i) => l - signal[i]);

  return { line, signal, histogram };
}

export function createConvergenceDivergence(
  fast: number = 12,
  slow: number = 26,
  signal: number = 9
): IndicatorCalculator {
  return {
    name: "Convergence-Divergence",
    columns: ["MACD", "MACD_Signal", "MACD_Histogram"],
    requiredLength: slow,
    warmUpLength: slow + signal - 1,
    compute: bars => {
      const result = movingAverageConvergenceDivergence(bars, fast, slow, signal);
      return {
        MACD: result.line,
        MACD_Signal: result.signal,
        MACD_Histogram: result.histogram,
      };
    },
  };
}
