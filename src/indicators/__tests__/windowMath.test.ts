import { describe, it, expect } from "vitest";
import {
  emaStep,
  EMA_INITIAL_STATE,
  exponentialMovingAverage,
  isNegligibleSpread,
  rollingMax,
  rollingMean,
  rollingMeanDeviation,
  rollingMin,
  rollingStd,
  rollingSum,
  trueRange,
} from "../windowMath.js";
import { ohlc } from "../../__tests__/helpers/bars.js";

describe("windowMath", () => {
  describe("rolling windows", () => {
    it("leaves incomplete windows NaN", () => {
      const result = rollingMean([1, 2, 3, 4], 2);
      expect(result[0]).toBeNaN();
      expect(result.slice(1)).toEqual([1.5, 2.5, 3.5]);
    });

    it("propagates NaN inside a window", () => {
      const result = rollingSum([1, NaN, 3, 4], 2);
      expect(result[1]).toBeNaN();
      expect(result[2]).toBeNaN();
      expect(result[3]).toBe(7);
    });

    it("uses the sample standard deviation", () => {
      const result = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
      expect(result[7]).toBeCloseTo(Math.sqrt(32 / 7), 12);
    });

    it("tracks window extremes", () => {
      expect(rollingMin([5, 3, 4, 1], 2).slice(1)).toEqual([3, 3, 1]);
      expect(rollingMax([5, 3, 4, 1], 2).slice(1)).toEqual([5, 4, 4]);
    });

    it("computes mean absolute deviation", () => {
      expect(rollingMeanDeviation([1, 2, 3], 3)[2]).toBeCloseTo(2 / 3, 12);
    });

    it("treats a spread at rounding level as zero", () => {
      expect(isNegligibleSpread(1.39e-17, 0.1)).toBe(true);
      expect(isNegligibleSpread(1e-11, 100.1)).toBe(true);
      expect(isNegligibleSpread(1e-9, 100.1)).toBe(false);
      expect(isNegligibleSpread(1e-6, 0.001)).toBe(false);
    });
  });

  describe("exponentialMovingAverage", () => {
    it("seeds with the simple mean of the first full window", () => {
      const result = exponentialMovingAverage([1, 2, 3, 4, 5], 3);
      expect(result[0]).toBeNaN();
      expect(result[1]).toBeNaN();
      expect(result.slice(2)).toEqual([2, 3, 4]);
    });

    it("skips leading NaN before seeding", () => {
      const result = exponentialMovingAverage([NaN, 2, 4, 6], 2);
      expect(result[0]).toBeNaN();
      expect(result[1]).toBeNaN();
      expect(result[2]).toBe(3);
      expect(result[3]).toBeCloseTo(5, 12);
    });

    it("folds the same state as emaStep", () => {
      let state = EMA_INITIAL_STATE;
      for (const x of [10, 20, 30]) {
        state = emaStep(state, x, 2);
      }
      expect(state.seen).toBe(3);
      expect(state.value).toBeCloseTo(exponentialMovingAverage([10, 20, 30], 2)[2], 12);
    });
  });

  describe("trueRange", () => {
    it("uses high - low on the first bar and the previous close afterwards", () => {
      const bars = [ohlc(0, 10, 8, 9), ohlc(1, 11, 9, 10), ohlc(2, 15, 14, 14.5)];
      expect(trueRange(bars)).toEqual([2, 2, 5]);
    });
  });
});
