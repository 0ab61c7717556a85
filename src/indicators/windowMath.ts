import type { BarSequence } from "../utils/types.js";

/**
 * Windowed numeric helpers shared by the calculators.
 *
 * Every window is summed left to right from its first element, so a value
 * depends only on the inputs inside its window and re-running gives
 * bit-identical output. A window holding any NaN yields NaN.
 */

function windowValues(values: readonly number[], end: number, period: number): number[] | null {
  const start = end - period + 1;
  if (start < 0) {
    return null;
  }
  const slice = values.slice(start, end + 1);
  return slice.some(v => Number.isNaN(v)) ? null : slice;
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) {
    total += v;
  }
  return total;
}

/** Relative bound below which a deviation is rounding noise */
export const SPREAD_TOLERANCE = 1e-12;

/**
 * True when a standard or mean deviation is zero up to rounding, relative
 * to the magnitude of the values it was measured on
 */
export function isNegligibleSpread(spread: number, mean: number): boolean {
  return spread <= SPREAD_TOLERANCE * Math.max(Math.abs(mean), 1);
}

export function rollingMean(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    return window === null ? NaN : sum(window) / period;
  });
}

export function rollingSum(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    return window === null ? NaN : sum(window);
  });
}

/**
 * Sample standard deviation (n - 1) over the trailing window
 */
export function rollingStd(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    if (window === null || period < 2) {
      return NaN;
    }
    const mean = sum(window) / period;
    const squared = sum(window.map(v => (v - mean) * (v - mean)));
    return Math.sqrt(squared / (period - 1));
  });
}

export function rollingMin(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    return window === null ? NaN : Math.min(...window);
  });
}

export function rollingMax(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    return window === null ? NaN : Math.max(...window);
  });
}

/**
 * Mean absolute deviation from the window mean
 */
export function rollingMeanDeviation(values: readonly number[], period: number): number[] {
  return values.map((_, i) => {
    const window = windowValues(values, i, period);
    if (window === null) {
      return NaN;
    }
    const mean = sum(window) / period;
    return sum(window.map(v => Math.abs(v - mean))) / period;
  });
}

export interface EmaState {
  readonly value: number;
  readonly seen: number;
  readonly seedSum: number;
}

export const EMA_INITIAL_STATE: EmaState = { value: NaN, seen: 0, seedSum: 0 };

/**
 * One step of the EMA recurrence. The first `period` defined inputs are
 * accumulated into a simple-mean seed; after that
 * ema = prev + alpha * (x - prev) with alpha = 2 / (period + 1).
 */
export function emaStep(state: EmaState, x: number, period: number): EmaState {
  if (Number.isNaN(x)) {
    return state;
  }
  const seen = state.seen + 1;
  if (seen < period) {
    return { value: NaN, seen, seedSum: state.seedSum + x };
  }
  if (seen === period) {
    const seedSum = state.seedSum + x;
    return { value: seedSum / period, seen, seedSum };
  }
  const alpha = 2 / (period + 1);
  return { value: state.value + alpha * (x - state.value), seen, seedSum: state.seedSum };
}

/**
 * EMA over a series, as a fold carrying EmaState. Leading NaN inputs are
 * skipped, so the seed window starts at the first defined value.
 */
export function exponentialMovingAverage(values: readonly number[], period: number): number[] {
  const out: number[] = [];
  let state = EMA_INITIAL_STATE;
  for (const x of values) {
    state = emaStep(state, x, period);
    out.push(Number.isNaN(x) ? NaN : state.value);
  }
  return out;
}

/**
 * Per-bar true range; the first bar has no previous close and uses high - low
 */
export function trueRange(bars: BarSequence): number[] {
  return bars.map((bar, i) => {
    const highLow = bar.high - bar.low;
    if (i === 0) {
      return highLow;
    }
    const prevClose = bars[i - 1].close;
    return Math.max(highLow, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

export function closes(bars: BarSequence): number[] {
  return bars.map(bar => bar.close);
}
