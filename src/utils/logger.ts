import fs from "fs";
import path from "path";

/**
 * Logging utility with file persistence
 */

type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const LOG_DIR = path.resolve(process.cwd(), process.env.LOG_DIR || "logs");
const DATE_STAMP = new Date().toISOString().split("T")[0];
const LOG_FILE = path.join(LOG_DIR, `app-${DATE_STAMP}.log`);
const RUNS_FILE = path.join(LOG_DIR, `runs-${DATE_STAMP}.jsonl`);

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

interface RunLogEntry {
  timestamp: string;
  ticker: string;
  inputBars: number;
  tableRows: number;
  droppedRows: number;
  missingValuePolicy: string;
  trainRows: number;
  validationRows: number;
  testRows: number;
  syntheticRows: number;
  degenerateColumns: string[];
  imbalanceRatio: number;
  durationMs: number;
}

/**
 * Minimum level from LOG_LEVEL; "silent" disables all output
 */
function minimumLevel(): number {
  const configured = (process.env.LOG_LEVEL || "INFO").toUpperCase();
  if (configured === "SILENT") {
    return Number.POSITIVE_INFINITY;
  }
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.INFO;
}

function isLogLevel(value: string): value is LogLevel {
  return value === "INFO" || value === "WARN" || value === "ERROR" || value === "DEBUG";
}

function isSilent(): boolean {
  return minimumLevel() === Number.POSITIVE_INFINITY;
}

/**
 * Write log entry to file
 */
function writeToFile(filePath: string, content: string): void {
  try {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
    fs.appendFileSync(filePath, content + "\n", "utf8");
  } catch (error) {
    console.error(`Failed to write to ${filePath}:`, error);
  }
}

/**
 * Format timestamp
 */
function getTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Main log function
 */
export function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < minimumLevel()) {
    return;
  }

  const entry: LogEntry = {
    timestamp: getTimestamp(),
    level,
    module,
    message,
    data,
  };

  // Console output with color
  const colors: Record<LogLevel, string> = {
    INFO: "\x1b[36m",    // Cyan
    WARN: "\x1b[33m",    // Yellow
    ERROR: "\x1b[31m",   // Red
    DEBUG: "\x1b[90m",   // Gray
  };
  const reset = "\x1b[0m";
  const color = colors[level];

  const consoleMsg = `${color}[${entry.timestamp}] [${level}] [${module}]${reset} ${message}`;
  console.log(consoleMsg);
  if (data !== undefined) {
    console.log(data);
  }

  writeToFile(LOG_FILE, JSON.stringify(entry));
}

/**
 * Log completed indicator pipeline run
 */
export function logPipelineRun(
  inputBars: number,
  tableRows: number,
  droppedRows: number,
  policy: string,
  columns: number
): void {
  log(
    "INFO",
    "IndicatorPipeline",
    `bars=${inputBars} rows=${tableRows} dropped=${droppedRows} policy=${policy} columns=${columns}`
  );
}

/**
 * Log zero-variance feature columns found while fitting the normalizer
 */
export function logDegenerateColumns(columns: string[], referenceRows: number): void {
  if (columns.length === 0) {
    return;
  }
  log(
    "WARN",
    "FeatureNormalizer",
    `${columns.length} degenerate column(s) over ${referenceRows} reference rows: ${columns.join(", ")}`
  );
}

/**
 * Log split boundaries
 */
export function logSplitSummary(
  totalRows: number,
  trainRows: number,
  validationRows: number,
  testRows: number
): void {
  const pct = (rows: number) => ((rows / Math.max(totalRows, 1)) * 100).toFixed(1);
  log(
    "INFO",
    "DataSplitter",
    `train=${trainRows} (${pct(trainRows)}%) validation=${validationRows} (${pct(validationRows)}%) test=${testRows} (${pct(testRows)}%)`
  );
}

/**
 * Log label distribution of the training segment
 */
export function logImbalance(
  minorityClass: string,
  minorityProportion: number,
  imbalanceRatio: number,
  isImbalanced: boolean
): void {
  log(
    isImbalanced ? "WARN" : "INFO",
    "ClassBalancer",
    `minority=${minorityClass} share=${(minorityProportion * 100).toFixed(1)}% ratio=${imbalanceRatio.toFixed(2)}${isImbalanced ? " (imbalanced)" : ""}`
  );
}

/**
 * Append a dataset run summary to the runs journal
 */
export function logDatasetRun(entry: Omit<RunLogEntry, "timestamp">): void {
  const record: RunLogEntry = { timestamp: getTimestamp(), ...entry };
  if (!isSilent()) {
    writeToFile(RUNS_FILE, JSON.stringify(record));
  }
  log(
    "INFO",
    "DatasetRun",
    `${entry.ticker} train=${entry.trainRows} val=${entry.validationRows} test=${entry.testRows} synthetic=${entry.syntheticRows} in ${entry.durationMs}ms`
  );
}

/**
 * Export shorthand functions
 */
export const info = (module: string, message: string, data?: unknown) => log("INFO", module, message, data);
export const warn = (module: string, message: string, data?: unknown) => log("WARN", module, message, data);
export const error = (module: string, message: string, data?: unknown) => log("ERROR", module, message, data);
export const debug = (module: string, message: string, data?: unknown) => log("DEBUG", module, message, data);
