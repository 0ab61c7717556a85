import { featureRows } from "./tableOps.js";
import type { LabeledTable, TrainingSet } from "../utils/types.js";

/**
 * Matrix form of a labeled table: real rows only, unit weights
 */
export function toTrainingSet(table: LabeledTable): TrainingSet {
  return {
    featureNames: [...table.featureNames],
    rows: featureRows(table),
    labels: [...table.labels],
    weights: table.labels.map(() => 1),
    synthetic: table.labels.map(() => false),
    timestamps: [...table.timestamps],
  };
}
