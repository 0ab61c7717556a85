import type { IndicatorCalculator } from "./calculator.js";
import { rollingMean, rollingSum, trueRange } from "./windowMath.js";
import type { BarSequence } from "../utils/types.js";

export interface DirectionalMovement {
  plus: number[];
  minus: number[];
}

/**
 * Wilder's rule: the up-move counts only when it is positive and larger than
 * the down-move, and symmetrically. Row 0 has no previous bar and is NaN.
 */
export function directionalMovement(bars: BarSequence): DirectionalMovement {
  const plus: number[] = [];
  const minus: number[] = [];

  bars.forEach((bar, i) => {
    if (i === 0) {
      plus.push(NaN);
      minus.push(NaN);
      return;
    }
    const upMove = bar.high - bars[i - 1].high;
    const downMove = bars[i - 1].low - bar.low;
    plus.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minus.push(downMove > upMove && downMove > 0 ? downMove : 0);
  });

  return { plus, minus };
}

/**
 * Average directional index: DI+/DI- from period sums of directional movement
 * over period sums of true range, DX from their spread, ADX as the simple
 * mean of the last period DX values. First defined at row 2 * period - 1.
 */
export function averageDirectionalIndex(bars: BarSequence, period: number = 14): number[] {
  const { plus, minus } = directionalMovement(bars);
  // True range aligned with the movement rows (row 0 excluded)
  const tr = trueRange(bars).map((value, i) => (i === 0 ? NaN : value));

  const plusSum = rollingSum(plus, period);
  const minusSum = rollingSum(minus, period);
  const trSum = rollingSum(tr, period);

  const dx = trSum.map((range, i) => {
    if (Number.isNaN(range)) {
      return NaN;
    }
    const plusDi = range === 0 ? 0 : (100 * plusSum[i]) / range;
    const minusDi = range === 0 ? 0 : (100 * minusSum[i]) / range;
    const diSum = plusDi + minusDi;
    return diSum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / diSum;
  });

  return rollingMean(dx, period);
}

export function createDirectionalTrend(period: number = 14): IndicatorCalculator {
  return {
    name: "Directional-Trend",
    columns: ["ADX"],
    requiredLength: period,
    warmUpLength: 2 * period,
    compute: bars => ({ ADX: averageDirectionalIndex(bars, period) }),
  };
}
