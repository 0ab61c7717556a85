import type { IndicatorCalculator } from "./calculator.js";
import { rollingMean } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

/**
 * Relative strength index over simple rolling means of gains and losses.
 * Row 0 has no change, so the first defined value is at row `period`.
 * A window without losses saturates at 100.
 */
export function relativeStrengthIndex(bars: BarSequence, period: number = 14): number[] {
  const gains: number[] = [];
  const losses: number[] = [];

  bars.forEach((bar, i) => {
    if (i === 0) {
      gains.push(NaN);
      losses.push(NaN);
      return;
    }
    const change = bar.close - bars[i - 1].close;
    gains.push(Math.max(change, 0));
    losses.push(Math.max(-change, 0));
  });

  const avgGains = rollingMean(gains, period);
  const avgLosses = rollingMean(losses, period);

  return avgGains.map((avgGain, i) => {
    const avgLoss = avgLosses[i];
    if (Number.isNaN(avgGain) || Number.isNaN(avgLoss)) {
      return NaN;
    }
    if (avgLoss === 0) {
      return 100;
    }
    const rs = avgGain / avgLoss;
    return 100 - 100 / (1 + rs);
  });
}

export function createMomentumOscillator(period: number = 14): IndicatorCalculator {
  return {
    name: "Momentum-Oscillator",
    columns: ["RSI"],
    requiredLength: period,
    // row 0 has no change
    warmUpLength: period + 1,
    compute: bars => ({ RSI: relativeStrengthIndex(bars, period) }),
  };
}
