import type { IndicatorCalculator } from "./calculator.js";
import { closes, rollingMean } from "./windowMath.js";
import type { BarSequence, IndicatorColumns } from "../utils/types.js";

export function smaColumnName(period: number): string {
  return `SMA_${period}`;
}

export function simpleMovingAverage(bars: BarSequence, period: number): number[] {
  return rollingMean(closes(bars), period);
}

/**
 * One independent SMA column of close per period
 */
export function createMovingAverage(periods: readonly number[] = [20, 50]): IndicatorCalculator {
  return {
    name: "Moving-Average",
    columns: periods.map(smaColumnName),
    requiredLength: Math.max(...periods),
    warmUpLength: Math.max(...periods),
    compute: bars => {
      const columns: IndicatorColumns = {};
      for (const period of periods) {
        columns[smaColumnName(period)] = simpleMovingAverage(bars, period);
      }
      return columns;
    },
  };
}
