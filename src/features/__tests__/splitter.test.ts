import { describe, it, expect } from "vitest";
import { planSplit, split, verifyTemporalOrdering } from "../splitter.js";
import { ConfigError, SplitUnderflowError, TemporalOrderingError } from "../../utils/errors.js";
import { labeledTable } from "../../__tests__/helpers/bars.js";
import type { Label } from "../../utils/types.js";

function rows(count: number) {
  const values = Array.from({ length: count }, (_, i) => i);
  const labels = values.map((i): Label => (i % 2 === 0 ? "up" : "down"));
  return labeledTable({ close: values.map(i => 100 + i), f: values }, ["f"], labels);
}

describe("data splitter", () => {
  it("splits 100 rows into 70 / 15 / 15", () => {
    expect(planSplit(100, [0.7, 0.15, 0.15])).toEqual({
      train: { start: 0, end: 70 },
      validation: { start: 70, end: 85 },
      test: { start: 85, end: 100 },
    });
  });

  it("partitions the table in time order without overlap", () => {
    const table = rows(100);
    const splits = split(table, [0.7, 0.15, 0.15]);

    expect(splits.train.table.rowCount).toBe(70);
    expect(splits.validation.table.rowCount).toBe(15);
    expect(splits.test.table.rowCount).toBe(15);
    expect(splits.train.table.columns.f[69]).toBe(69);
    expect(splits.validation.table.columns.f[0]).toBe(70);
    expect(splits.test.table.labels).toEqual(table.labels.slice(85));
    expect(verifyTemporalOrdering(splits)).toBe(true);
  });

  it("gives the rounding remainder to test", () => {
    const plan = planSplit(11, [0.5, 0.25, 0.25]);
    expect(plan.train).toEqual({ start: 0, end: 5 });
    expect(plan.validation).toEqual({ start: 5, end: 7 });
    expect(plan.test).toEqual({ start: 7, end: 11 });
  });

  it("rejects ratios that leave a segment empty", () => {
    let caught: unknown;
    try {
      planSplit(5, [0.7, 0.15, 0.15]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SplitUnderflowError);
    if (caught instanceof SplitUnderflowError) {
      expect(caught.totalRows).toBe(5);
      expect(caught.segmentSizes).toEqual([3, 0, 2]);
    }
  });

  it("rejects ratios that do not sum to 1", () => {
    expect(() => planSplit(100, [0.7, 0.2, 0.2])).toThrow(ConfigError);
    expect(() => planSplit(100, [1, 0, 0])).toThrow(ConfigError);
  });

  it("rejects segments that overlap in time", () => {
    const table = rows(20);
    const stalled = { ...table, timestamps: table.timestamps.map(() => table.timestamps[0]) };
    expect(() => split(stalled, [0.5, 0.25, 0.25])).toThrow(TemporalOrderingError);
  });
});
