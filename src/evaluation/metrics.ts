/**
 * Binary classification metrics over "up"/"down" labels, "up" as positive.
 */

import { labelToNumber } from "../features/labels.js";
import type { Label } from "../utils/types.js";

export interface ConfusionMatrix {
  /** rows are actual [down, up], columns predicted [down, up] */
  matrix: [[number, number], [number, number]];
  truePositives: number;
  trueNegatives: number;
  falsePositives: number;
  falseNegatives: number;
}

export interface ClassificationMetrics {
  accuracy: number;
  precision: number;
  recall: number;
  f1Score: number;
  confusionMatrix: ConfusionMatrix["matrix"];
  rocAuc?: number;
}

function assertAligned(actual: readonly Label[], other: readonly unknown[]): void {
  if (actual.length !== other.length) {
    throw new Error(`Label vectors differ in length: ${actual.length} vs ${other.length}`);
  }
}

export function confusionMatrix(actual: readonly Label[], predicted: readonly Label[]): ConfusionMatrix {
  assertAligned(actual, predicted);
  const matrix: [[number, number], [number, number]] = [
    [0, 0],
    [0, 0],
  ];
  actual.forEach((value, i) => {
    matrix[labelToNumber(value)][labelToNumber(predicted[i])] += 1;
  });

  return {
    matrix,
    trueNegatives: matrix[0][0],
    falsePositives: matrix[0][1],
    falseNegatives: matrix[1][0],
    truePositives: matrix[1][1],
  };
}

export function accuracy(actual: readonly Label[], predicted: readonly Label[]): number {
  assertAligned(actual, predicted);
  if (actual.length === 0) {
    return 0;
  }
  const correct = actual.filter((value, i) => value === predicted[i]).length;
  return correct / actual.length;
}

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

interface ClassScores {
  precision: number;
  recall: number;
  f1: number;
  support: number;
}

function scoresFor(cm: ConfusionMatrix, positive: Label): ClassScores {
  const tp = positive === "up" ? cm.truePositives : cm.trueNegatives;
  const fp = positive === "up" ? cm.falsePositives : cm.falseNegatives;
  const fn = positive === "up" ? cm.falseNegatives : cm.falsePositives;
  const precision = safeDivide(tp, tp + fp);
  const recall = safeDivide(tp, tp + fn);
  return {
    precision,
    recall,
    f1: safeDivide(2 * precision * recall, precision + recall),
    support: tp + fn,
  };
}

/**
 * Support-weighted precision, recall and F1 across both classes; an
 * undefined ratio counts as 0
 */
export function precisionRecallF1(
  actual: readonly Label[],
  predicted: readonly Label[]
): { precision: number; recall: number; f1Score: number } {
  const cm = confusionMatrix(actual, predicted);
  const classes = [scoresFor(cm, "up"), scoresFor(cm, "down")];
  const total = classes.reduce((sum, c) => sum + c.support, 0);
  const weighted = (pick: (c: ClassScores) => number) =>
    safeDivide(classes.reduce((sum, c) => sum + pick(c) * c.support, 0), total);

  return {
    precision: weighted(c => c.precision),
    recall: weighted(c => c.recall),
    f1Score: weighted(c => c.f1),
  };
}

/**
 * Area under the ROC curve from "up" probabilities, by the rank statistic
 * (ties share the average rank)
 */
export function rocAuc(actual: readonly Label[], upProbabilities: readonly number[]): number {
  assertAligned(actual, upProbabilities);
  const positives = actual.filter(value => value === "up").length;
  const negatives = actual.length - positives;
  if (positives === 0 || negatives === 0) {
    return NaN;
  }

  const order = upProbabilities
    .map((score, index) => ({ score, index }))
    .sort((a, b) => a.score - b.score);

  const ranks: number[] = order.map(() => 0);
  let i = 0;
  while (i < order.length) {
    let j = i;
    while (j + 1 < order.length && order[j + 1].score === order[i].score) {
      j++;
    }
    const averageRank = (i + j) / 2 + 1;
    for (let t = i; t <= j; t++) {
      ranks[order[t].index] = averageRank;
    }
    i = j + 1;
  }

  const positiveRankSum = actual.reduce((sum, value, index) => (value === "up" ? sum + ranks[index] : sum), 0);
  return (positiveRankSum - (positives * (positives + 1)) / 2) / (positives * negatives);
}

export function computeAllMetrics(
  actual: readonly Label[],
  predicted: readonly Label[],
  upProbabilities?: readonly number[]
): ClassificationMetrics {
  const metrics: ClassificationMetrics = {
    accuracy: accuracy(actual, predicted),
    ...precisionRecallF1(actual, predicted),
    confusionMatrix: confusionMatrix(actual, predicted).matrix,
  };

  if (upProbabilities !== undefined) {
    metrics.rocAuc = rocAuc(actual, upProbabilities);
  }
  return metrics;
}
