/**
 * Class Balancer
 *
 * Inspects the label distribution of the training segment and optionally
 * corrects it, either with synthetic minority rows interpolated towards
 * nearest minority neighbours or with inverse-frequency row weights.
 * Only a train segment is accepted, so validation and test rows can never
 * feed neighbour search or weighting.
 */

import { toTrainingSet } from "./trainingSet.js";
import { SingleClassLabelsError } from "../utils/errors.js";
import { logImbalance } from "../utils/logger.js";
import type {
  BalanceStrategy,
  ImbalanceReport,
  Label,
  SplitSegment,
  TrainingSet,
} from "../utils/types.js";

export const DEFAULT_IMBALANCE_THRESHOLD = 0.4;
export const DEFAULT_NEIGHBORS = 5;
export const DEFAULT_RANDOM_SEED = 42;

const CLASSES: readonly Label[] = ["up", "down"];

export interface RebalanceOptions {
  strategy: BalanceStrategy;
  imbalanceThreshold?: number;
  neighbors?: number;
  randomSeed?: number;
}

export interface BalancedTrainingSet extends TrainingSet {
  readonly strategy: BalanceStrategy;
  /** false when the segment was not imbalanced or the strategy is "none" */
  readonly applied: boolean;
  readonly syntheticRows: number;
  readonly classWeights: Readonly<Partial<Record<Label, number>>>;
  readonly before: ImbalanceReport;
  readonly after: ImbalanceReport;
}

function countLabels(labels: readonly Label[]): Record<Label, number> {
  const counts: Record<Label, number> = { up: 0, down: 0 };
  for (const value of labels) {
    counts[value] += 1;
  }
  return counts;
}

/**
 * Class counts, minority share and majority/minority ratio. Ties name "up"
 * as the minority. An empty label vector is reported as balanced.
 */
export function inspect(
  labels: readonly Label[],
  threshold: number = DEFAULT_IMBALANCE_THRESHOLD
): ImbalanceReport {
  const counts = countLabels(labels);
  const total = labels.length;
  const minorityClass: Label = counts.up <= counts.down ? "up" : "down";
  const majorityClass: Label = minorityClass === "up" ? "down" : "up";
  const minorityCount = counts[minorityClass];
  const majorityCount = counts[majorityClass];

  if (total === 0) {
    return {
      counts,
      total,
      minorityClass,
      minorityProportion: 0,
      imbalanceRatio: 1,
      isImbalanced: false,
      threshold,
    };
  }

  const minorityProportion = minorityCount / total;
  return {
    counts,
    total,
    minorityClass,
    minorityProportion,
    imbalanceRatio: minorityCount === 0 ? Infinity : majorityCount / minorityCount,
    isImbalanced: minorityProportion < threshold,
    threshold,
  };
}

/**
 * n / (classes * count) for every class present
 */
export function classWeights(labels: readonly Label[]): Partial<Record<Label, number>> {
  const counts = countLabels(labels);
  const present = CLASSES.filter(c => counts[c] > 0);
  const weights: Partial<Record<Label, number>> = {};
  for (const c of present) {
    weights[c] = labels.length / (present.length * counts[c]);
  }
  return weights;
}

/**
 * Fatal when the labels hold a single class
 */
export function assertTwoClasses(labels: readonly Label[]): void {
  const counts = countLabels(labels);
  const present = CLASSES.filter(c => counts[c] > 0);
  if (present.length === 1) {
    throw new SingleClassLabelsError(present[0], labels.length);
  }
}

/**
 * Deterministic generator in [0, 1) for a given seed
 */
export function seededRandom(seed: number): () => number {
  let x = seed || 1;
  return () => {
    x = Math.sin(x) * 10000;
    return x - Math.floor(x);
  };
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    total += d * d;
  }
  return total;
}

/**
 * For each listed row, the k nearest other listed rows by Euclidean
 * distance; ties resolve to the earlier row
 */
export function nearestNeighbors(
  rows: readonly (readonly number[])[],
  candidates: readonly number[],
  k: number
): Map<number, number[]> {
  const result = new Map<number, number[]>();
  for (const index of candidates) {
    const ranked = candidates
      .filter(other => other !== index)
      .map(other => ({ other, distance: squaredDistance(rows[index], rows[other]) }))
      .sort((a, b) => a.distance - b.distance || a.other - b.other)
      .slice(0, k)
      .map(entry => entry.other);
    result.set(index, ranked);
  }
  return result;
}

/**
 * Synthetic minority rows until both classes have the same count. Base rows
 * are taken round-robin in time order; each synthetic row lies on the
 * segment between its base and a random one of the base's k nearest
 * minority neighbours.
 */
export function oversampleMinority(
  set: TrainingSet,
  minorityClass: Label,
  neighbors: number = DEFAULT_NEIGHBORS,
  randomSeed: number = DEFAULT_RANDOM_SEED
): TrainingSet {
  const minorityIndices = set.labels
    .map((value, index) => (value === minorityClass ? index : -1))
    .filter(index => index >= 0);
  const majorityCount = set.labels.length - minorityIndices.length;
  const needed = majorityCount - minorityIndices.length;

  if (needed <= 0 || minorityIndices.length === 0) {
    return set;
  }

  const k = Math.min(neighbors, minorityIndices.length - 1);
  const neighborMap = nearestNeighbors(set.rows, minorityIndices, k);
  const rng = seededRandom(randomSeed);

  const rows: (readonly number[])[] = [...set.rows];
  const labels: Label[] = [...set.labels];
  const weights: number[] = [...set.weights];
  const synthetic: boolean[] = [...set.synthetic];
  const timestamps: number[] = [...set.timestamps];

  for (let s = 0; s < needed; s++) {
    const base = minorityIndices[s % minorityIndices.length];
    const baseRow = set.rows[base];
    const candidates = neighborMap.get(base) ?? [];

    let row: number[];
    if (candidates.length === 0) {
      row = [...baseRow];
    } else {
      const neighborRow = set.rows[candidates[Math.floor(rng() * candidates.length)]];
      const gap = rng();
      row = baseRow.map((value, f) => value + gap * (neighborRow[f] - value));
    }

    rows.push(row);
    labels.push(minorityClass);
    weights.push(1);
    synthetic.push(true);
    timestamps.push(set.timestamps[base]);
  }

  return { featureNames: set.featureNames, rows, labels, weights, synthetic, timestamps };
}

/**
 * Rebalance the training segment with the chosen strategy. Nothing changes
 * unless the segment is imbalanced.
 */
export function rebalance(train: SplitSegment<"train">, options: RebalanceOptions): BalancedTrainingSet {
  const threshold = options.imbalanceThreshold ?? DEFAULT_IMBALANCE_THRESHOLD;
  const base = toTrainingSet(train.table);
  assertTwoClasses(base.labels);

  const before = inspect(base.labels, threshold);
  logImbalance(before.minorityClass, before.minorityProportion, before.imbalanceRatio, before.isImbalanced);

  const weightsByClass = classWeights(base.labels);
  const unchanged: BalancedTrainingSet = {
    ...base,
    strategy: options.strategy,
    applied: false,
    syntheticRows: 0,
    classWeights: weightsByClass,
    before,
    after: before,
  };

  if (!before.isImbalanced) {
    return unchanged;
  }

  switch (options.strategy) {
    case "none":
      return unchanged;

    case "weight": {
      const weights = base.labels.map(value => weightsByClass[value] ?? 1);
      return { ...unchanged, weights, applied: true };
    }

    case "oversample": {
      const balanced = oversampleMinority(
        base,
        before.minorityClass,
        options.neighbors ?? DEFAULT_NEIGHBORS,
        options.randomSeed ?? DEFAULT_RANDOM_SEED
      );
      const after = inspect(balanced.labels, threshold);
      return {
        ...balanced,
        strategy: "oversample",
        applied: true,
        syntheticRows: balanced.rows.length - base.rows.length,
        classWeights: classWeights(balanced.labels),
        before,
        after,
      };
    }
  }
}
