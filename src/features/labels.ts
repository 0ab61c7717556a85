import { column, sliceTable } from "./tableOps.js";
import type { FeatureTable, Label, LabeledTable } from "../utils/types.js";

export const DEFAULT_LABEL_THRESHOLD = 0.005;

/**
 * "up" when the next close exceeds close * (1 + threshold), otherwise "down".
 * Returns one label per row except the last, which has no next close.
 */
export function createLabels(closes: readonly number[], threshold: number = DEFAULT_LABEL_THRESHOLD): Label[] {
  const labels: Label[] = [];
  for (let i = 0; i < closes.length - 1; i++) {
    labels.push(closes[i + 1] > closes[i] * (1 + threshold) ? "up" : "down");
  }
  return labels;
}

/**
 * Attach labels and drop the last row
 */
export function label(table: FeatureTable, threshold: number = DEFAULT_LABEL_THRESHOLD): LabeledTable {
  const labels = createLabels(column(table, "close"), threshold);
  const trimmed = sliceTable(table, { start: 0, end: labels.length });
  return { ...trimmed, labels, labelThreshold: threshold };
}

export function labelToNumber(value: Label): 0 | 1 {
  return value === "up" ? 1 : 0;
}

export function numberToLabel(value: number): Label {
  return value === 1 ? "up" : "down";
}
