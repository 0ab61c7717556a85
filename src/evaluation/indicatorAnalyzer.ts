/**
 * Indicator Analyzer
 *
 * Consumes the classifier's feature-importance weights (non-negative,
 * summing to 1) and the labeled features to rank indicators.
 */

import { labelToNumber } from "../features/labels.js";
import { ImportanceContractError } from "../utils/errors.js";
import { warn } from "../utils/logger.js";
import type { FeatureImportance, Label, TrainingSet } from "../utils/types.js";

export const IMPORTANCE_SUM_TOLERANCE = 1e-6;

/**
 * Throws unless every weight is finite and non-negative and the weights
 * sum to 1 within tolerance
 */
export function validateImportance(
  importance: FeatureImportance,
  tolerance: number = IMPORTANCE_SUM_TOLERANCE
): void {
  const entries = Object.entries(importance);
  if (entries.length === 0) {
    throw new ImportanceContractError("Feature importance is empty");
  }
  for (const [name, weight] of entries) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ImportanceContractError(`Importance of ${name} must be a non-negative number, got ${weight}`);
    }
  }
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);
  if (Math.abs(total - 1) > tolerance) {
    throw new ImportanceContractError(`Importance weights sum to ${total}, expected 1`);
  }
}

/**
 * Scale raw non-negative weights to sum to 1; all-zero input becomes uniform
 */
export function normalizeImportance(raw: FeatureImportance): FeatureImportance {
  const entries = Object.entries(raw).map(([name, weight]): [string, number] => [
    name,
    Number.isFinite(weight) && weight > 0 ? weight : 0,
  ]);
  const total = entries.reduce((sum, [, weight]) => sum + weight, 0);

  if (total === 0) {
    if (entries.length > 0) {
      warn("IndicatorAnalyzer", "All importance weights are zero; using uniform weights");
    }
    return Object.fromEntries(entries.map(([name]) => [name, 1 / entries.length]));
  }
  return Object.fromEntries(entries.map(([name, weight]) => [name, weight / total]));
}

export function rankIndicators(importance: FeatureImportance): [string, number][] {
  return Object.entries(importance).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function topIndicators(importance: FeatureImportance, topN: number = 3): string[] {
  return rankIndicators(importance)
    .slice(0, topN)
    .map(([name]) => name);
}

/**
 * Nested prefixes of the top-ranked indicators: [a], [a, b], [a, b, c]
 */
export function topCombinations(importance: FeatureImportance, topN: number = 3): string[][] {
  const top = topIndicators(importance, topN);
  return top.map((_, i) => top.slice(0, i + 1));
}

function pearson(x: readonly number[], y: readonly number[]): number {
  const n = x.length;
  if (n === 0) {
    return NaN;
  }
  const meanX = x.reduce((s, v) => s + v, 0) / n;
  const meanY = y.reduce((s, v) => s + v, 0) / n;
  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (let i = 0; i < n; i++) {
    cov += (x[i] - meanX) * (y[i] - meanY);
    varX += (x[i] - meanX) ** 2;
    varY += (y[i] - meanY) ** 2;
  }
  return cov / Math.sqrt(varX * varY);
}

/**
 * |Pearson correlation| between each feature column and the 0/1 labels,
 * sorted descending. Undefined correlations count as 0.
 */
export function indicatorCorrelations(set: TrainingSet): Record<string, number> {
  const y = set.labels.map((value: Label) => labelToNumber(value));
  const correlations: [string, number][] = set.featureNames.map((name, f) => {
    const corr = pearson(set.rows.map(row => row[f]), y);
    return [name, Number.isNaN(corr) ? 0 : Math.abs(corr)];
  });
  correlations.sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  return Object.fromEntries(correlations);
}

export function generateInsights(
  importance: FeatureImportance,
  correlations: Record<string, number>,
  accuracy: number
): string[] {
  const insights: string[] = [];
  insights.push(`Top 3 most predictive indicators: ${topIndicators(importance, 3).join(", ")}`);

  const pct = `${(accuracy * 100).toFixed(1)}%`;
  if (accuracy > 0.6) {
    insights.push(`Model shows good predictive power with ${pct} accuracy`);
  } else if (accuracy > 0.55) {
    insights.push(`Model shows moderate predictive power with ${pct} accuracy`);
  } else {
    insights.push(`Model shows weak predictive power with ${pct} accuracy`);
  }

  const strong = Object.entries(correlations)
    .filter(([, corr]) => corr > 0.3)
    .map(([name]) => name);
  if (strong.length > 0) {
    insights.push(`Indicators with strong correlation to price movements: ${strong.join(", ")}`);
  }
  return insights;
}
