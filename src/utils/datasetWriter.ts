import fs from "fs";
import path from "path";
import { serializeState } from "../features/normalizer.js";
import type { PreparedDataset } from "../features/engineer.js";
import { info } from "./logger.js";

export interface DatasetPaths {
  directory: string;
  train: string;
  validation: string;
  test: string;
  normalization: string;
  metadata: string;
}

/**
 * Write a prepared dataset as JSON files under outputDir/<name>
 */
export function writeDataset(dataset: PreparedDataset, outputDir: string, name: string): DatasetPaths {
  const directory = path.resolve(outputDir, name);
  fs.mkdirSync(directory, { recursive: true });

  const paths: DatasetPaths = {
    directory,
    train: path.join(directory, "train.json"),
    validation: path.join(directory, "validation.json"),
    test: path.join(directory, "test.json"),
    normalization: path.join(directory, "normalization.json"),
    metadata: path.join(directory, "metadata.json"),
  };

  fs.writeFileSync(paths.train, JSON.stringify(dataset.train), "utf8");
  fs.writeFileSync(paths.validation, JSON.stringify(dataset.validation), "utf8");
  fs.writeFileSync(paths.test, JSON.stringify(dataset.test), "utf8");
  fs.writeFileSync(paths.normalization, serializeState(dataset.normalization), "utf8");
  fs.writeFileSync(
    paths.metadata,
    JSON.stringify(
      {
        ...dataset.metadata,
        imbalance: dataset.imbalance,
        degenerateColumns: dataset.degenerateColumns,
      },
      null,
      2
    ),
    "utf8"
  );

  info("DatasetWriter", `Dataset written to ${directory}`);
  return paths;
}
