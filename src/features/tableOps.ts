import type { FeatureTable, LabeledTable, RowRange } from "../utils/types.js";

/**
 * Copy of a table restricted to [start, end); columns are new arrays
 */
export function sliceTable<T extends FeatureTable>(table: T, range: RowRange): T {
  const columns: Record<string, number[]> = {};
  for (const [name, values] of Object.entries(table.columns)) {
    columns[name] = values.slice(range.start, range.end);
  }

  const sliced: T = {
    ...table,
    timestamps: table.timestamps.slice(range.start, range.end),
    columns,
    rowCount: Math.max(0, range.end - range.start),
  };

  if (isLabeled(table)) {
    return { ...sliced, labels: table.labels.slice(range.start, range.end) };
  }
  return sliced;
}

export function isLabeled(table: FeatureTable): table is LabeledTable {
  return "labels" in table && Array.isArray(table.labels);
}

export function column(table: FeatureTable, name: string): readonly number[] {
  const values = table.columns[name];
  if (values === undefined) {
    throw new Error(`Column ${name} not present in table`);
  }
  return values;
}

/**
 * Feature vector of each row, in featureNames order
 */
export function featureRows(table: FeatureTable): number[][] {
  const columns = table.featureNames.map(name => column(table, name));
  const rows: number[][] = [];
  for (let row = 0; row < table.rowCount; row++) {
    rows.push(columns.map(values => values[row]));
  }
  return rows;
}
