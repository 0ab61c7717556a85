import { describe, it, expect } from "vitest";
import {
  assertTwoClasses,
  classWeights,
  inspect,
  nearestNeighbors,
  oversampleMinority,
  rebalance,
  seededRandom,
} from "../balancer.js";
import { toTrainingSet } from "../trainingSet.js";
import { SingleClassLabelsError } from "../../utils/errors.js";
import { labeledTable } from "../../__tests__/helpers/bars.js";
import type { Label, SplitSegment } from "../../utils/types.js";

/**
 * 8 "down" rows then 2 "up" rows, two features
 */
function imbalancedSegment(): SplitSegment<"train"> {
  const labels: Label[] = ["down", "down", "down", "down", "down", "down", "down", "down", "up", "up"];
  const table = labeledTable(
    {
      close: labels.map((_, i) => 100 + i),
      a: [0, 1, 2, 3, 4, 5, 6, 7, 10, 20],
      b: [1, 1, 1, 1, 1, 1, 1, 1, 2, 4],
    },
    ["a", "b"],
    labels
  );
  return { name: "train", range: { start: 0, end: 10 }, table };
}

function balancedSegment(): SplitSegment<"train"> {
  const labels: Label[] = ["up", "down", "up", "down"];
  const table = labeledTable({ close: [1, 2, 3, 4], a: [1, 2, 3, 4] }, ["a"], labels);
  return { name: "train", range: { start: 0, end: 4 }, table };
}

describe("class balancer", () => {
  describe("inspect", () => {
    it("reports minority share and imbalance ratio", () => {
      const report = inspect(["up", "down", "down", "down", "down"], 0.4);
      expect(report.counts).toEqual({ up: 1, down: 4 });
      expect(report.minorityClass).toBe("up");
      expect(report.minorityProportion).toBe(0.2);
      expect(report.imbalanceRatio).toBe(4);
      expect(report.isImbalanced).toBe(true);
    });

    it("names up as the minority on a tie", () => {
      const report = inspect(["up", "down"]);
      expect(report.minorityClass).toBe("up");
      expect(report.imbalanceRatio).toBe(1);
      expect(report.isImbalanced).toBe(false);
    });

    it("treats empty labels as balanced", () => {
      const report = inspect([]);
      expect(report.total).toBe(0);
      expect(report.imbalanceRatio).toBe(1);
      expect(report.isImbalanced).toBe(false);
    });
  });

  it("weights classes by inverse frequency", () => {
    const weights = classWeights(["up", "down", "down", "down"]);
    expect(weights.up).toBe(2);
    expect(weights.down).toBeCloseTo(4 / 6, 12);
  });

  it("rejects a single-class label vector", () => {
    let caught: unknown;
    try {
      assertTwoClasses(["up", "up"]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SingleClassLabelsError);
    if (caught instanceof SingleClassLabelsError) {
      expect(caught.label).toBe("up");
      expect(caught.rows).toBe(2);
    }
  });

  it("produces a repeatable sequence in [0, 1) per seed", () => {
    const first = seededRandom(42);
    const second = seededRandom(42);
    const a = Array.from({ length: 5 }, () => first());
    const b = Array.from({ length: 5 }, () => second());
    expect(a).toEqual(b);
    expect(a.every(v => v >= 0 && v < 1)).toBe(true);
  });

  describe("nearestNeighbors", () => {
    it("ranks by distance", () => {
      const neighbors = nearestNeighbors([[0], [1], [3], [10]], [0, 1, 2, 3], 2);
      expect(neighbors.get(0)).toEqual([1, 2]);
      expect(neighbors.get(3)).toEqual([2, 1]);
    });

    it("resolves ties to the earlier row", () => {
      const neighbors = nearestNeighbors([[0], [1], [-1]], [0, 1, 2], 1);
      expect(neighbors.get(0)).toEqual([1]);
    });
  });

  describe("oversampleMinority", () => {
    it("interpolates between minority rows until the classes match", () => {
      const base = toTrainingSet(imbalancedSegment().table);
      const result = oversampleMinority(base, "up", 5, 42);

      expect(result.rows.length).toBe(16);
      expect(result.rows.slice(0, 10)).toEqual(base.rows);
      const synthetic = result.rows.slice(10);
      expect(result.labels.slice(10).every(value => value === "up")).toBe(true);
      expect(result.synthetic.slice(10).every(Boolean)).toBe(true);
      for (const row of synthetic) {
        expect(row[0]).toBeGreaterThanOrEqual(10);
        expect(row[0]).toBeLessThanOrEqual(20);
        expect(row[1]).toBeGreaterThanOrEqual(2);
        expect(row[1]).toBeLessThanOrEqual(4);
      }
    });

    it("is reproducible for a fixed seed", () => {
      const base = toTrainingSet(imbalancedSegment().table);
      expect(oversampleMinority(base, "up", 5, 7)).toEqual(oversampleMinority(base, "up", 5, 7));
    });

    it("copies the base row when the minority has a single member", () => {
      const labels: Label[] = ["down", "down", "up"];
      const table = labeledTable({ close: [1, 2, 3], a: [1, 2, 9] }, ["a"], labels);
      const result = oversampleMinority(toTrainingSet(table), "up");
      expect(result.rows.slice(3)).toEqual([[9]]);
      expect(result.timestamps[3]).toBe(table.timestamps[2]);
    });
  });

  describe("rebalance", () => {
    it("oversamples an imbalanced segment", () => {
      const result = rebalance(imbalancedSegment(), { strategy: "oversample", randomSeed: 42 });
      expect(result.applied).toBe(true);
      expect(result.syntheticRows).toBe(6);
      expect(result.before.counts).toEqual({ up: 2, down: 8 });
      expect(result.after.counts).toEqual({ up: 8, down: 8 });
      expect(result.after.isImbalanced).toBe(false);
    });

    it("weights an imbalanced segment", () => {
      const result = rebalance(imbalancedSegment(), { strategy: "weight" });
      expect(result.applied).toBe(true);
      expect(result.rows.length).toBe(10);
      expect(result.weights.slice(0, 8).every(w => w === 0.625)).toBe(true);
      expect(result.weights.slice(8)).toEqual([2.5, 2.5]);
    });

    it("leaves an imbalanced segment alone under none", () => {
      const result = rebalance(imbalancedSegment(), { strategy: "none" });
      expect(result.applied).toBe(false);
      expect(result.weights.every(w => w === 1)).toBe(true);
    });

    it("leaves a balanced segment alone", () => {
      const result = rebalance(balancedSegment(), { strategy: "oversample" });
      expect(result.applied).toBe(false);
      expect(result.syntheticRows).toBe(0);
      expect(result.rows.length).toBe(4);
    });

    it("rejects a single-class segment", () => {
      const labels: Label[] = ["down", "down", "down"];
      const table = labeledTable({ close: [1, 2, 3], a: [1, 2, 3] }, ["a"], labels);
      expect(() => rebalance({ name: "train", range: { start: 0, end: 3 }, table }, { strategy: "weight" })).toThrow(
        SingleClassLabelsError
      );
    });
  });
});
