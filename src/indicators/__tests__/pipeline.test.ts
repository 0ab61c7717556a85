import { describe, it, expect } from "vitest";
import {
  applyMissingValuePolicy,
  computeAll,
  createCalculators,
  findShortfalls,
  getIndicatorColumns,
} from "../pipeline.js";
import type { IndicatorCalculator } from "../calculator.js";
import { DEFAULT_CONFIG, resolveConfig } from "../../config/pipelineConfig.js";
import { IndicatorComputationError, InsufficientHistoryError } from "../../utils/errors.js";
import { flatBars, waveBars } from "../../__tests__/helpers/bars.js";

const EXPECTED_COLUMNS = [
  "ATR",
  "SMA_20",
  "SMA_50",
  "BB_Upper",
  "BB_Middle",
  "BB_Lower",
  "RSI",
  "MACD",
  "MACD_Signal",
  "MACD_Histogram",
  "Stoch_K",
  "Stoch_D",
  "ADX",
  "CCI",
];

describe("indicator pipeline", () => {
  describe("computeAll", () => {
    it("merges OHLCV with every indicator column in schema order", () => {
      const table = computeAll(waveBars(300));
      expect(table.featureNames).toEqual(EXPECTED_COLUMNS);
      expect(Object.keys(table.columns)).toEqual(["open", "high", "low", "close", "volume", ...EXPECTED_COLUMNS]);
      expect(getIndicatorColumns()).toEqual(EXPECTED_COLUMNS);
    });

    it("drops the warm-up rows of the longest lookback", () => {
      const bars = waveBars(300);
      const table = computeAll(bars);
      expect(table.droppedRows).toBe(49);
      expect(table.rowCount).toBe(251);
      expect(table.timestamps[0]).toBe(bars[49].timestamp);
      expect(table.missingValuePolicy).toBe("forward_fill");
    });

    it("leaves no NaN in any column", () => {
      const table = computeAll(waveBars(300));
      for (const values of Object.values(table.columns)) {
        expect(values.length).toBe(table.rowCount);
        expect(values.some(v => Number.isNaN(v))).toBe(false);
      }
    });

    it("is deterministic", () => {
      const bars = waveBars(300);
      expect(computeAll(bars)).toEqual(computeAll(bars));
    });

    it("records the drop policy", () => {
      const config = resolveConfig({ missingValuePolicy: "drop" });
      const table = computeAll(waveBars(300), config);
      expect(table.missingValuePolicy).toBe("drop");
      expect(table.droppedRows).toBe(49);
    });

    it("reports Directional-Trend when fewer than 14 bars are given", () => {
      let caught: unknown;
      try {
        computeAll(waveBars(10));
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InsufficientHistoryError);
      if (caught instanceof InsufficientHistoryError) {
        expect(caught.actualLength).toBe(10);
        expect(caught.shortfalls).toContainEqual({ indicator: "Directional-Trend", requiredLength: 14 });
        expect(caught.shortfallOf("Directional-Trend")).toEqual({ indicator: "Directional-Trend", requiredLength: 14 });
        expect(caught.indicator).toBe("Range-Volatility");
        expect(caught.shortfallOf("Unknown")).toBeUndefined();
        expect(caught.code).toBe("INSUFFICIENT_HISTORY");
      }
    });

    it("rejects a sequence shorter than the MACD signal warm-up", () => {
      const config = resolveConfig({ indicatorPeriods: { sma: [5] } });
      let caught: unknown;
      try {
        computeAll(waveBars(30), config);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InsufficientHistoryError);
      if (caught instanceof InsufficientHistoryError) {
        expect(caught.shortfalls).toEqual([{ indicator: "Convergence-Divergence", requiredLength: 34 }]);
      }
    });

    it("rejects a sequence shorter than the ADX warm-up", () => {
      const config = resolveConfig({
        indicatorPeriods: { sma: [5], macd: { fast: 3, slow: 5, signal: 3 } },
      });
      let caught: unknown;
      try {
        computeAll(waveBars(27), config);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InsufficientHistoryError);
      if (caught instanceof InsufficientHistoryError) {
        expect(caught.shortfalls).toEqual([{ indicator: "Directional-Trend", requiredLength: 28 }]);
      }
    });

    it("keeps the last row once every warm-up is covered", () => {
      const config = resolveConfig({ indicatorPeriods: { sma: [5] } });
      const table = computeAll(waveBars(34), config);
      expect(table.rowCount).toBe(1);
      expect(table.droppedRows).toBe(33);
    });

    it("rejects a column that is undefined on every row", () => {
      expect(() => computeAll(flatBars(60))).toThrow(/Stoch_K has no defined value over 60 bars/);
    });

    it("names only the calculators whose lookback is too long", () => {
      expect(findShortfalls(createCalculators(DEFAULT_CONFIG), 40)).toEqual([
        { indicator: "Moving-Average", requiredLength: 50 },
      ]);
    });

    it("wraps a failing calculator", () => {
      const failing: IndicatorCalculator = {
        name: "Broken",
        columns: ["X"],
        requiredLength: 1,
        warmUpLength: 1,
        compute: () => {
          throw new Error("boom");
        },
      };
      expect(() => computeAll(waveBars(20), DEFAULT_CONFIG, [failing])).toThrow(IndicatorComputationError);
    });

    it("rejects a column that is not aligned with the bars", () => {
      const short: IndicatorCalculator = {
        name: "Short",
        columns: ["X"],
        requiredLength: 1,
        warmUpLength: 1,
        compute: bars => ({ X: bars.slice(1).map(bar => bar.close) }),
      };
      expect(() => computeAll(waveBars(20), DEFAULT_CONFIG, [short])).toThrow(/not aligned with 20 bars/);
    });
  });

  describe("applyMissingValuePolicy", () => {
    const columns = {
      a: [NaN, 1, NaN, 3],
      b: [NaN, NaN, 2, 4],
    };

    it("forward fills before dropping incomplete rows", () => {
      const result = applyMissingValuePolicy(columns, 4, "forward_fill");
      expect(result.keptRows).toEqual([2, 3]);
      expect(result.columns).toEqual({ a: [1, 3], b: [2, 4] });
    });

    it("drops every row holding a NaN", () => {
      const result = applyMissingValuePolicy(columns, 4, "drop");
      expect(result.keptRows).toEqual([3]);
      expect(result.columns).toEqual({ a: [3], b: [4] });
    });
  });
});
