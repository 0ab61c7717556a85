/**
 * Feature Normalizer
 *
 * Per-column z-score fit on a reference row range (the training segment) and
 * frozen. Columns whose variance over the reference rows is zero up to
 * rounding are degenerate: they transform to 0 and are reported, never
 * divided by.
 */

import { z } from "zod";
import { column } from "./tableOps.js";
import { isNegligibleSpread } from "../indicators/windowMath.js";
import { NormalizationRoundTripError, NotFittedError } from "../utils/errors.js";
import { logDegenerateColumns } from "../utils/logger.js";
import type {
  ColumnStats,
  DegenerateColumn,
  FeatureTable,
  NormalizationState,
  RowRange,
} from "../utils/types.js";

export const ROUND_TRIP_TOLERANCE = 1e-9;

function meanOf(values: readonly number[]): number {
  let total = 0;
  for (const v of values) {
    total += v;
  }
  return total / values.length;
}

/**
 * Population standard deviation, summed left to right
 */
function stdOf(values: readonly number[], mean: number): number {
  let squared = 0;
  for (const v of values) {
    squared += (v - mean) * (v - mean);
  }
  return Math.sqrt(squared / values.length);
}

/**
 * Fit mean and standard deviation of every feature column over the
 * reference rows only
 */
export function fit(table: FeatureTable, referenceRows: RowRange): NormalizationState {
  const start = Math.max(0, referenceRows.start);
  const end = Math.min(table.rowCount, referenceRows.end);
  if (end <= start) {
    throw new NotFittedError(`Normalizer (empty reference range ${referenceRows.start}..${referenceRows.end})`);
  }

  const stats: Record<string, ColumnStats> = {};
  for (const name of table.featureNames) {
    const reference = column(table, name).slice(start, end);
    const mean = meanOf(reference);
    const std = stdOf(reference, mean);
    stats[name] = { mean, std, degenerate: isNegligibleSpread(std, mean) };
  }

  const state: NormalizationState = {
    featureNames: [...table.featureNames],
    stats,
    referenceRows: end - start,
  };

  logDegenerateColumns(
    degenerateColumns(state).map(d => d.column),
    state.referenceRows
  );
  return state;
}

function statsFor(state: NormalizationState, name: string): ColumnStats {
  const stats = state.stats[name];
  if (stats === undefined) {
    throw new NotFittedError(`Normalizer column ${name}`);
  }
  return stats;
}

function mapFeatures(
  table: FeatureTable,
  state: NormalizationState,
  fn: (value: number, stats: ColumnStats) => number
): FeatureTable {
  const columns: Record<string, readonly number[]> = { ...table.columns };
  for (const name of state.featureNames) {
    const stats = statsFor(state, name);
    columns[name] = column(table, name).map(value => fn(value, stats));
  }
  return { ...table, columns };
}

/**
 * (x - mean) / std per feature column; degenerate columns become 0.
 * Non-feature columns (OHLCV, labels) pass through unchanged.
 */
export function transform<T extends FeatureTable>(table: T, state: NormalizationState): T {
  const mapped = mapFeatures(table, state, (value, stats) =>
    stats.degenerate ? 0 : (value - stats.mean) / stats.std
  );
  return { ...table, columns: mapped.columns };
}

/**
 * x * std + mean per feature column. A degenerate column restores its mean,
 * which is its only reference value.
 */
export function inverse<T extends FeatureTable>(table: T, state: NormalizationState): T {
  const mapped = mapFeatures(table, state, (value, stats) =>
    stats.degenerate ? stats.mean : value * stats.std + stats.mean
  );
  return { ...table, columns: mapped.columns };
}

export function degenerateColumns(state: NormalizationState): DegenerateColumn[] {
  return state.featureNames
    .filter(name => statsFor(state, name).degenerate)
    .map(name => ({
      column: name,
      value: statsFor(state, name).mean,
      referenceRows: state.referenceRows,
    }));
}

/**
 * Relative to the larger of the value and the column's mean and spread.
 * Absolute only for an all-zero scale.
 */
function withinTolerance(expected: number, actual: number, stats: ColumnStats, tolerance: number): boolean {
  const scale = Math.max(Math.abs(expected), Math.abs(stats.mean), stats.std);
  if (scale === 0) {
    return Math.abs(actual) <= tolerance;
  }
  return Math.abs(expected - actual) <= tolerance * scale;
}

/**
 * Check that inverse(normalized) recovers the original values of every
 * non-degenerate column. Throws on the first mismatch.
 */
export function verifyRoundTrip(
  original: FeatureTable,
  normalized: FeatureTable,
  state: NormalizationState,
  tolerance: number = ROUND_TRIP_TOLERANCE
): void {
  const restored = inverse(normalized, state);
  for (const name of state.featureNames) {
    const stats = statsFor(state, name);
    if (stats.degenerate) {
      continue;
    }
    const expected = column(original, name);
    const actual = column(restored, name);
    for (let row = 0; row < expected.length; row++) {
      if (!withinTolerance(expected[row], actual[row], stats, tolerance)) {
        throw new NormalizationRoundTripError(name, row, expected[row], actual[row]);
      }
    }
  }
}

const stateSchema = z.object({
  featureNames: z.array(z.string()),
  stats: z.record(
    z.object({
      mean: z.number(),
      std: z.number().min(0),
      degenerate: z.boolean(),
    })
  ),
  referenceRows: z.number().int().min(1),
});

export function serializeState(state: NormalizationState): string {
  return JSON.stringify(state);
}

/**
 * Parse a serialized state, requiring stats for every listed feature
 */
export function deserializeState(json: string): NormalizationState {
  const parsed = stateSchema.parse(JSON.parse(json));
  for (const name of parsed.featureNames) {
    if (parsed.stats[name] === undefined) {
      throw new NotFittedError(`Normalizer column ${name}`);
    }
  }
  return parsed;
}
