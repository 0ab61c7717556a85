/**
 * Data Splitter
 *
 * Contiguous train / validation / test segments by row count, in time order.
 * No shuffling: segment boundaries are floor(n * ratio), the remainder goes
 * to test.
 */

import { sliceTable } from "./tableOps.js";
import { ConfigError, SplitUnderflowError, TemporalOrderingError } from "../utils/errors.js";
import { logSplitSummary } from "../utils/logger.js";
import type { DataSplits, LabeledTable, RowRange, SplitSegment } from "../utils/types.js";

export type SplitRatios = readonly [number, number, number];

export const DEFAULT_SPLIT_RATIOS: SplitRatios = [0.7, 0.15, 0.15];

export interface SplitPlan {
  readonly train: RowRange;
  readonly validation: RowRange;
  readonly test: RowRange;
}

function validateRatios(ratios: SplitRatios): void {
  if (!ratios.every(r => r > 0 && r < 1)) {
    throw new ConfigError(`All split ratios must lie in (0, 1), got ${ratios.join("/")}`, {
      splitRatios: ["every ratio must lie in (0, 1)"],
    });
  }
  if (Math.abs(ratios[0] + ratios[1] + ratios[2] - 1) > 0.001) {
    throw new ConfigError(`Split ratios must sum to 1.0, got ${ratios.join("/")}`, {
      splitRatios: ["ratios must sum to 1.0"],
    });
  }
}

/**
 * Row ranges for each segment; throws when any segment would be empty
 */
export function planSplit(rowCount: number, ratios: SplitRatios = DEFAULT_SPLIT_RATIOS): SplitPlan {
  validateRatios(ratios);

  const trainRows = Math.floor(rowCount * ratios[0]);
  const validationRows = Math.floor(rowCount * ratios[1]);
  const testRows = rowCount - trainRows - validationRows;

  if (trainRows === 0 || validationRows === 0 || testRows <= 0) {
    throw new SplitUnderflowError(ratios, rowCount, [trainRows, validationRows, Math.max(testRows, 0)]);
  }

  return {
    train: { start: 0, end: trainRows },
    validation: { start: trainRows, end: trainRows + validationRows },
    test: { start: trainRows + validationRows, end: rowCount },
  };
}

function lastTimestamp(segment: SplitSegment): number {
  return segment.table.timestamps[segment.table.rowCount - 1];
}

function firstTimestamp(segment: SplitSegment): number {
  return segment.table.timestamps[0];
}

/**
 * max(train) < min(validation) and max(validation) < min(test)
 */
export function verifyTemporalOrdering(splits: DataSplits): boolean {
  const { train, validation, test } = splits;
  if (train.table.rowCount === 0 || validation.table.rowCount === 0 || test.table.rowCount === 0) {
    return false;
  }
  return (
    lastTimestamp(train) < firstTimestamp(validation) &&
    lastTimestamp(validation) < firstTimestamp(test)
  );
}

export function split(table: LabeledTable, ratios: SplitRatios = DEFAULT_SPLIT_RATIOS): DataSplits {
  const plan = planSplit(table.rowCount, ratios);

  const splits: DataSplits = {
    train: { name: "train", range: plan.train, table: sliceTable(table, plan.train) },
    validation: { name: "validation", range: plan.validation, table: sliceTable(table, plan.validation) },
    test: { name: "test", range: plan.test, table: sliceTable(table, plan.test) },
    ratios: [ratios[0], ratios[1], ratios[2]],
  };

  if (!verifyTemporalOrdering(splits)) {
    throw new TemporalOrderingError(
      `Segments overlap in time: train ends ${lastTimestamp(splits.train)}, ` +
        `validation spans ${firstTimestamp(splits.validation)}..${lastTimestamp(splits.validation)}, ` +
        `test starts ${firstTimestamp(splits.test)}`
    );
  }

  logSplitSummary(
    table.rowCount,
    splits.train.table.rowCount,
    splits.validation.table.rowCount,
    splits.test.table.rowCount
  );
  return splits;
}
