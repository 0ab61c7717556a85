#!/usr/bin/env node
/**
 * Dataset Runner
 *
 * Fetches bar history for a ticker, computes indicators and writes a
 * train / validation / test dataset ready for a binary classifier.
 */

import "dotenv/config";
import fs from "fs";
import { z } from "zod";
import { loadConfigFromEnv, type PipelineConfig } from "./config/pipelineConfig.js";
import { computeAll } from "./indicators/pipeline.js";
import { prepareFeatures, type PreparedDataset } from "./features/engineer.js";
import { fetchBarsCached, type BarRequest, type BarStore } from "./ingestion/barCache.js";
import { fetchHistoricalBars, SUPPORTED_INTERVALS, type BarInterval } from "./ingestion/historicalBars.js";
import { validateBars } from "./ingestion/barValidator.js";
import { computeAllMetrics } from "./evaluation/metrics.js";
import {
  generateInsights,
  indicatorCorrelations,
  normalizeImportance,
  rankIndicators,
  validateImportance,
} from "./evaluation/indicatorAnalyzer.js";
import { writeDataset } from "./utils/datasetWriter.js";
import { MemoryRedis } from "./utils/memoryRedis.js";
import { info, error as logError, logDatasetRun } from "./utils/logger.js";
import { FeatureEngineError } from "./utils/errors.js";
import type { FeatureImportance, Label } from "./utils/types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const importanceFileSchema = z.record(z.number());

function parseDate(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const parsed = Date.parse(`${raw}T00:00:00Z`);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid date "${raw}", expected YYYY-MM-DD`);
  }
  return parsed;
}

function parseInterval(raw: string | undefined): BarInterval {
  const interval = SUPPORTED_INTERVALS.find(candidate => candidate === (raw || "1d"));
  if (interval === undefined) {
    throw new Error(`Unsupported interval "${raw}", expected one of ${SUPPORTED_INTERVALS.join(", ")}`);
  }
  return interval;
}

async function openBarStore(): Promise<{ store: BarStore; close: () => Promise<void> }> {
  if ((process.env.BAR_CACHE || "redis") === "memory") {
    return { store: new MemoryRedis(), close: async () => undefined };
  }
  const { createRedisClient } = await import("./utils/redisClient.js");
  const redis = createRedisClient();
  return {
    store: redis,
    close: async () => {
      await redis.quit();
    },
  };
}

/**
 * Majority-class baseline on the test segment, for scale
 */
function baselineAccuracy(dataset: PreparedDataset): number {
  const majority: Label = dataset.imbalance.counts.up > dataset.imbalance.counts.down ? "up" : "down";
  const predicted = dataset.test.labels.map((): Label => majority);
  return computeAllMetrics(dataset.test.labels, predicted).accuracy;
}

/**
 * Print dataset summary
 */
function printReport(ticker: string, dataset: PreparedDataset, directory: string): void {
  const { metadata } = dataset;
  const iso = (ms: number) => new Date(ms).toISOString().split("T")[0];

  console.log("\n" + "=".repeat(80));
  console.log(`DATASET: ${ticker}`);
  console.log("=".repeat(80));

  console.log("\n📊 SEGMENTS");
  console.log("─".repeat(80));
  console.log(`  Train:       ${metadata.nTrain} rows (+${metadata.nSynthetic} synthetic)  ${iso(metadata.trainPeriod.start)} → ${iso(metadata.trainPeriod.end)}`);
  console.log(`  Validation:  ${metadata.nValidation} rows  ${iso(metadata.validationPeriod.start)} → ${iso(metadata.validationPeriod.end)}`);
  console.log(`  Test:        ${metadata.nTest} rows  ${iso(metadata.testPeriod.start)} → ${iso(metadata.testPeriod.end)}`);

  console.log("\n⚖️  LABELS (train)");
  console.log("─".repeat(80));
  console.log(`  up:   ${metadata.classDistribution.up}`);
  console.log(`  down: ${metadata.classDistribution.down}`);
  console.log(`  Imbalanced: ${metadata.isImbalanced ? "yes" : "no"} (strategy: ${metadata.balanceStrategy})`);
  console.log(`  Majority baseline accuracy on test: ${(baselineAccuracy(dataset) * 100).toFixed(1)}%`);

  console.log("\n📈 INDICATOR CORRELATION WITH LABELS (train)");
  console.log("─".repeat(80));
  Object.entries(indicatorCorrelations(dataset.train)).forEach(([name, corr]) => {
    console.log(`  ${name.padEnd(16)} ${corr.toFixed(4)}`);
  });

  if (dataset.degenerateColumns.length > 0) {
    console.log("\n⚠️  DEGENERATE COLUMNS");
    console.log("─".repeat(80));
    dataset.degenerateColumns.forEach(d => console.log(`  ${d.column} (constant ${d.value})`));
  }

  console.log(`\nFiles: ${directory}\n`);
}

async function analyze(ticker: string, request: BarRequest, config: PipelineConfig): Promise<void> {
  const started = Date.now();
  const { store, close } = await openBarStore();

  try {
    info("Main", `Loading ${request.interval} bars for ${ticker}...`);
    const bars = await fetchBarsCached(store, request, fetchHistoricalBars);
    validateBars(bars, config.minBars);

    const table = computeAll(bars, config);
    const dataset = prepareFeatures(table, config);

    const name = `${ticker.toUpperCase()}-${request.interval}-${new Date(request.endTime).toISOString().split("T")[0]}`;
    const paths = writeDataset(dataset, process.env.OUTPUT_DIR || "output", name);

    logDatasetRun({
      ticker,
      inputBars: bars.length,
      tableRows: table.rowCount,
      droppedRows: table.droppedRows,
      missingValuePolicy: table.missingValuePolicy,
      trainRows: dataset.metadata.nTrain,
      validationRows: dataset.metadata.nValidation,
      testRows: dataset.metadata.nTest,
      syntheticRows: dataset.metadata.nSynthetic,
      degenerateColumns: dataset.degenerateColumns.map(d => d.column),
      imbalanceRatio: dataset.imbalance.imbalanceRatio,
      durationMs: Date.now() - started,
    });

    printReport(ticker, dataset, paths.directory);
  } finally {
    await close();
  }
}

/**
 * Rank indicators from a trainer's feature-importance JSON file
 */
function rank(importancePath: string, accuracyArg: string | undefined): void {
  const parsed = importanceFileSchema.safeParse(JSON.parse(fs.readFileSync(importancePath, "utf8")));
  if (!parsed.success) {
    throw new Error(`${importancePath} must hold an object of feature -> weight`);
  }

  const weights: FeatureImportance = parsed.data;
  const importance = normalizeImportance(weights);
  validateImportance(importance);

  console.log("\n🏆 INDICATOR RANKING");
  console.log("─".repeat(80));
  rankIndicators(importance).forEach(([name, weight], i) => {
    console.log(`  ${(i + 1).toString().padStart(2)}. ${name.padEnd(16)} ${(weight * 100).toFixed(2)}%`);
  });

  const accuracy = accuracyArg === undefined ? NaN : Number(accuracyArg);
  if (Number.isFinite(accuracy)) {
    console.log("\n💡 INSIGHTS");
    console.log("─".repeat(80));
    generateInsights(importance, {}, accuracy).forEach(line => console.log(`  ${line}`));
  }
  console.log("");
}

function printUsage(): void {
  console.log("\nUsage:");
  console.log("  node dist/index.js analyze <ticker> [start YYYY-MM-DD] [end YYYY-MM-DD] [interval]");
  console.log("  node dist/index.js rank <importance.json> [test accuracy]");
  console.log("\nExamples:");
  console.log("  node dist/index.js analyze AAPL                          # Last 3 years of daily bars");
  console.log("  node dist/index.js analyze MSFT 2020-01-01 2024-01-01 1d");
  console.log("  node dist/index.js rank importance.json 0.57");
}

async function main(): Promise<void> {
  try {
    const command = process.argv[2] || "help";

    if (command === "analyze") {
      const ticker = process.argv[3];
      if (!ticker) {
        printUsage();
        process.exit(1);
      }
      const endTime = parseDate(process.argv[5], Date.now());
      const startTime = parseDate(process.argv[4], endTime - 3 * 365 * DAY_MS);
      const interval = parseInterval(process.argv[6]);
      const config = loadConfigFromEnv();

      await analyze(ticker, { ticker, interval, startTime, endTime }, config);
      process.exit(0);
    } else if (command === "rank") {
      const importancePath = process.argv[3];
      if (!importancePath) {
        printUsage();
        process.exit(1);
      }
      rank(importancePath, process.argv[4]);
      process.exit(0);
    } else {
      printUsage();
      process.exit(command === "help" ? 0 : 1);
    }
  } catch (err) {
    if (err instanceof FeatureEngineError) {
      logError("Main", `${err.name} [${err.code}]: ${err.message}`);
    } else {
      logError("Main", "Run failed", err instanceof Error ? err.stack : err);
    }
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Run failed:", err);
  process.exit(1);
});
