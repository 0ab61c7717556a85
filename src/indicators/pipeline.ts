/**
 * Indicator Pipeline
 *
 * Fans the bar sequence out to every calculator, joins their columns with
 * OHLCV by row index, then applies the run's missing-value policy.
 */

import type { IndicatorCalculator } from "./calculator.js";
import { createRangeVolatility } from "./averageTrueRange.js";
import { createMovingAverage } from "./movingAverage.js";
import { createBandedVolatility } from "./bollingerBands.js";
import { createMomentumOscillator } from "./relativeStrength.js";
import { createConvergenceDivergence } from "./macd.js";
import { createStochasticOscillator } from "./stochastic.js";
import { createDirectionalTrend } from "./directionalIndex.js";
import { createChannelIndex } from "./commodityChannel.js";
import { DEFAULT_CONFIG, type PipelineConfig } from "../config/pipelineConfig.js";
import {
  IndicatorComputationError,
  InsufficientHistoryError,
  type HistoryShortfall,
} from "../utils/errors.js";
import { debug, logPipelineRun } from "../utils/logger.js";
import {
  OHLCV_COLUMNS,
  type BarSequence,
  type FeatureTable,
  type MissingValuePolicy,
} from "../utils/types.js";

/**
 * Calculators in schema order
 */
export function createCalculators(config: PipelineConfig = DEFAULT_CONFIG): IndicatorCalculator[] {
  const p = config.indicatorPeriods;
  return [
    createRangeVolatility(p.atr),
    createMovingAverage(p.sma),
    createBandedVolatility(p.bollinger.period, p.bollinger.multiplier),
    createMomentumOscillator(p.rsi),
    createConvergenceDivergence(p.macd.fast, p.macd.slow, p.macd.signal),
    createStochasticOscillator(p.stochastic.period, p.stochastic.smoothing),
    createDirectionalTrend(p.adx),
    createChannelIndex(p.cci),
  ];
}

export function getIndicatorColumns(config: PipelineConfig = DEFAULT_CONFIG): string[] {
  return createCalculators(config).flatMap(calculator => [...calculator.columns]);
}

/**
 * Every calculator whose lookback exceeds the available bars
 */
export function findShortfalls(
  calculators: readonly IndicatorCalculator[],
  length: number
): HistoryShortfall[] {
  return calculators
    .filter(calculator => calculator.requiredLength > length)
    .map(calculator => ({ indicator: calculator.name, requiredLength: calculator.requiredLength }));
}

/**
 * Every calculator that would leave a column without a single defined row.
 * Its lookback fits, but the chained smoothing (MACD signal, ADX over DX)
 * needs more bars than that.
 */
export function findWarmUpShortfalls(
  calculators: readonly IndicatorCalculator[],
  length: number
): HistoryShortfall[] {
  return calculators
    .filter(calculator => calculator.warmUpLength > length)
    .map(calculator => ({ indicator: calculator.name, requiredLength: calculator.warmUpLength }));
}

function forwardFill(values: readonly number[]): number[] {
  const out: number[] = [];
  let last = NaN;
  for (const v of values) {
    if (!Number.isNaN(v)) {
      last = v;
    }
    out.push(last);
  }
  return out;
}

/**
 * Apply the missing-value policy uniformly to every column and keep only
 * rows that are fully defined afterwards.
 */
export function applyMissingValuePolicy(
  columns: Record<string, readonly number[]>,
  rowCount: number,
  policy: MissingValuePolicy
): { columns: Record<string, number[]>; keptRows: number[] } {
  const prepared: Record<string, readonly number[]> = {};
  for (const [name, values] of Object.entries(columns)) {
    switch (policy) {
      case "forward_fill":
        prepared[name] = forwardFill(values);
        break;
      case "drop":
        prepared[name] = values;
        break;
    }
  }

  const keptRows: number[] = [];
  for (let row = 0; row < rowCount; row++) {
    const complete = Object.values(prepared).every(values => !Number.isNaN(values[row]));
    if (complete) {
      keptRows.push(row);
    }
  }

  const filtered: Record<string, number[]> = {};
  for (const [name, values] of Object.entries(prepared)) {
    filtered[name] = keptRows.map(row => values[row]);
  }

  return { columns: filtered, keptRows };
}

/**
 * Compute every indicator and merge into one aligned, NaN-free table
 */
export function computeAll(
  bars: BarSequence,
  config: PipelineConfig = DEFAULT_CONFIG,
  calculators: readonly IndicatorCalculator[] = createCalculators(config)
): FeatureTable {
  const shortfalls = findShortfalls(calculators, bars.length);
  if (shortfalls.length > 0) {
    throw new InsufficientHistoryError(shortfalls, bars.length);
  }
  const warmUpShortfalls = findWarmUpShortfalls(calculators, bars.length);
  if (warmUpShortfalls.length > 0) {
    throw new InsufficientHistoryError(warmUpShortfalls, bars.length);
  }

  const merged: Record<string, number[]> = {};
  for (const column of OHLCV_COLUMNS) {
    merged[column] = bars.map(bar => bar[column]);
  }

  const featureNames: string[] = [];
  for (const calculator of calculators) {
    let output: Record<string, number[]>;
    try {
      output = calculator.compute(bars);
    } catch (err) {
      throw new IndicatorComputationError(calculator.name, err);
    }

    for (const column of calculator.columns) {
      const values = output[column];
      if (values === undefined || values.length !== bars.length) {
        throw new IndicatorComputationError(
          calculator.name,
          new Error(`column ${column} is missing or not aligned with ${bars.length} bars`)
        );
      }
      // a flat stretch can leave a ratio undefined on every row
      if (values.every(v => Number.isNaN(v))) {
        throw new IndicatorComputationError(
          calculator.name,
          new Error(`column ${column} has no defined value over ${bars.length} bars`)
        );
      }
      merged[column] = values;
      featureNames.push(column);
    }
    debug("IndicatorPipeline", `${calculator.name} -> ${calculator.columns.join(", ")}`);
  }

  const policy = config.missingValuePolicy;
  const { columns, keptRows } = applyMissingValuePolicy(merged, bars.length, policy);

  const table: FeatureTable = {
    timestamps: keptRows.map(row => bars[row].timestamp),
    columns,
    featureNames,
    rowCount: keptRows.length,
    missingValuePolicy: policy,
    droppedRows: bars.length - keptRows.length,
  };

  logPipelineRun(bars.length, table.rowCount, table.droppedRows, policy, featureNames.length);
  return table;
}
