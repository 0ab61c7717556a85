import { InvalidBarsError } from "../utils/errors.js";
import type { BarSequence } from "../utils/types.js";

export const DEFAULT_MIN_BARS = 500;

/**
 * Every precondition violation in the sequence: too few rows, timestamps
 * not strictly increasing, inconsistent OHLC, non-positive prices or
 * negative / fractional volume.
 */
export function findBarIssues(bars: BarSequence, minBars: number = DEFAULT_MIN_BARS): string[] {
  const issues: string[] = [];

  if (bars.length < minBars) {
    issues.push(`expected at least ${minBars} bars, got ${bars.length}`);
  }

  bars.forEach((bar, i) => {
    const prices = [bar.open, bar.high, bar.low, bar.close];
    const pricesValid = prices.every(p => Number.isFinite(p) && p > 0);
    if (!pricesValid) {
      issues.push(`row ${i}: prices must be positive`);
    } else if (bar.high < Math.max(bar.open, bar.close) || bar.low > Math.min(bar.open, bar.close)) {
      issues.push(`row ${i}: high/low do not bound open and close`);
    }
    if (!Number.isInteger(bar.volume) || bar.volume < 0) {
      issues.push(`row ${i}: volume must be a non-negative integer`);
    }
    if (i > 0 && bar.timestamp <= bars[i - 1].timestamp) {
      issues.push(`row ${i}: timestamp ${bar.timestamp} does not follow ${bars[i - 1].timestamp}`);
    }
  });

  return issues;
}

export function validateBars(bars: BarSequence, minBars: number = DEFAULT_MIN_BARS): void {
  const issues = findBarIssues(bars, minBars);
  if (issues.length > 0) {
    throw new InvalidBarsError(issues);
  }
}
