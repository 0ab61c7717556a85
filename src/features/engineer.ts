/**
 * Feature Engineer
 *
 * Orchestrates labeling, splitting, normalization and balancing. The
 * normalizer is fit on the train row range only, before any segment is
 * materialized, and balancing sees only the train segment.
 */

import { rebalance, classWeights, inspect, assertTwoClasses, type BalancedTrainingSet } from "./balancer.js";
import { label } from "./labels.js";
import { degenerateColumns, fit, transform, verifyRoundTrip } from "./normalizer.js";
import { planSplit, split } from "./splitter.js";
import { toTrainingSet } from "./trainingSet.js";
import { DEFAULT_CONFIG, type PipelineConfig } from "../config/pipelineConfig.js";
import { info } from "../utils/logger.js";
import type {
  BalanceStrategy,
  DegenerateColumn,
  FeatureTable,
  ImbalanceReport,
  Label,
  MissingValuePolicy,
  NormalizationState,
  TrainingSet,
} from "../utils/types.js";

export interface DatasetMetadata {
  nFeatures: number;
  featureNames: string[];
  nSamples: number;
  nTrain: number;
  nValidation: number;
  nTest: number;
  nSynthetic: number;
  classDistribution: Record<Label, number>;
  isImbalanced: boolean;
  classWeights: Partial<Record<Label, number>>;
  labelThreshold: number;
  splitRatios: [number, number, number];
  missingValuePolicy: MissingValuePolicy;
  balanceStrategy: BalanceStrategy;
  trainPeriod: { start: number; end: number };
  validationPeriod: { start: number; end: number };
  testPeriod: { start: number; end: number };
}

export interface PreparedDataset {
  train: BalancedTrainingSet;
  validation: TrainingSet;
  test: TrainingSet;
  normalization: NormalizationState;
  degenerateColumns: DegenerateColumn[];
  imbalance: ImbalanceReport;
  metadata: DatasetMetadata;
}

function period(set: TrainingSet): { start: number; end: number } {
  const real = set.timestamps.filter((_, i) => !set.synthetic[i]);
  return { start: real[0], end: real[real.length - 1] };
}

/**
 * Turn an indicator table into train / validation / test sets ready for a
 * binary classifier
 */
export function prepareFeatures(table: FeatureTable, config: PipelineConfig = DEFAULT_CONFIG): PreparedDataset {
  const labeled = label(table, config.labelThreshold);

  const plan = planSplit(labeled.rowCount, config.splitRatios);
  const normalization = fit(labeled, plan.train);
  const normalized = transform(labeled, normalization);
  verifyRoundTrip(labeled, normalized, normalization);

  const splits = split(normalized, config.splitRatios);
  assertTwoClasses(splits.train.table.labels);

  const train = rebalance(splits.train, {
    strategy: config.balanceStrategy,
    imbalanceThreshold: config.imbalanceThreshold,
    neighbors: config.oversampleNeighbors,
    randomSeed: config.randomSeed,
  });
  const validation = toTrainingSet(splits.validation.table);
  const test = toTrainingSet(splits.test.table);
  const imbalance = inspect(splits.train.table.labels, config.imbalanceThreshold);

  const metadata: DatasetMetadata = {
    nFeatures: table.featureNames.length,
    featureNames: [...table.featureNames],
    nSamples: labeled.rowCount,
    nTrain: splits.train.table.rowCount,
    nValidation: validation.rows.length,
    nTest: test.rows.length,
    nSynthetic: train.syntheticRows,
    classDistribution: { ...imbalance.counts },
    isImbalanced: imbalance.isImbalanced,
    classWeights: { ...classWeights(splits.train.table.labels) },
    labelThreshold: config.labelThreshold,
    splitRatios: [config.splitRatios[0], config.splitRatios[1], config.splitRatios[2]],
    missingValuePolicy: table.missingValuePolicy,
    balanceStrategy: config.balanceStrategy,
    trainPeriod: period(train),
    validationPeriod: period(validation),
    testPeriod: period(test),
  };

  info(
    "FeatureEngineer",
    `Prepared ${metadata.nFeatures} features: train=${train.rows.length} (${metadata.nSynthetic} synthetic) validation=${metadata.nValidation} test=${metadata.nTest}`
  );

  return {
    train,
    validation,
    test,
    normalization,
    degenerateColumns: degenerateColumns(normalization),
    imbalance,
    metadata,
  };
}
