/**
 * Historical Bar Fetcher
 *
 * Fetches OHLCV history for a ticker from the Yahoo Finance chart API
 */

import axios from "axios";
import { z } from "zod";
import type { BarRequest } from "./barCache.js";
import { info, warn, error as logError } from "../utils/logger.js";
import type { Bar } from "../utils/types.js";

const YAHOO_CHART_URL = "https://query1.finance.yahoo.com/v8/finance/chart";

export const SUPPORTED_INTERVALS = ["1m", "5m", "15m", "1h", "1d"] as const;

export type BarInterval = (typeof SUPPORTED_INTERVALS)[number];

const nullableNumber = z.number().nullable().optional();

const chartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: z.array(nullableNumber).optional(),
                high: z.array(nullableNumber).optional(),
                low: z.array(nullableNumber).optional(),
                close: z.array(nullableNumber).optional(),
                volume: z.array(nullableNumber).optional(),
              })
            ),
          }),
        })
      )
      .nullable(),
  }),
});

/**
 * Sleep helper
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function toYahooInterval(interval: string): string {
  return interval === "1h" ? "60m" : interval;
}

/**
 * Convert a chart response into bars, skipping rows with any missing price
 */
export function parseChartResponse(data: unknown): Bar[] {
  const parsed = chartSchema.safeParse(data);
  if (!parsed.success) {
    return [];
  }

  const result = parsed.data.chart.result?.[0];
  const quote = result?.indicators.quote[0];
  if (!result || !result.timestamp || !quote) {
    return [];
  }

  const bars: Bar[] = [];
  result.timestamp.forEach((ts, idx) => {
    const open = quote.open?.[idx];
    const high = quote.high?.[idx];
    const low = quote.low?.[idx];
    const close = quote.close?.[idx];
    const volume = quote.volume?.[idx];

    if (
      open === null || open === undefined ||
      high === null || high === undefined ||
      low === null || low === undefined ||
      close === null || close === undefined
    ) {
      return;
    }

    bars.push({
      timestamp: ts * 1000,
      open,
      high,
      low,
      close,
      volume: Math.max(0, Math.round(volume ?? 0)),
    });
  });

  return bars;
}

function isTransient(err: unknown): boolean {
  if (!axios.isAxiosError(err)) {
    return false;
  }
  const status = err.response?.status;
  return (
    status === 429 ||
    (status !== undefined && status >= 500) ||
    err.code === "ECONNRESET" ||
    err.code === "ETIMEDOUT" ||
    err.code === "ECONNREFUSED" ||
    err.code === "ECONNABORTED"
  );
}

/**
 * Fetch bars for a ticker with retry on rate limits and network errors.
 * Returns an empty list when the provider has no data.
 */
export async function fetchHistoricalBars(
  request: BarRequest,
  maxRetries: number = 3
): Promise<Bar[]> {
  const url = `${YAHOO_CHART_URL}/${encodeURIComponent(request.ticker)}`;
  const params = {
    period1: Math.floor(request.startTime / 1000),
    period2: Math.floor(request.endTime / 1000),
    interval: toYahooInterval(request.interval),
    events: "history",
  };

  let lastError: unknown = null;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    try {
      if (attempt > 0) {
        const delay = 1000 * Math.pow(2, attempt);
        await sleep(delay);
      }

      const { data } = await axios.get<unknown>(url, {
        params,
        timeout: 15000,
        headers: { "User-Agent": "indicator-feature-engine/1.0" },
      });

      const bars = parseChartResponse(data);
      if (bars.length === 0) {
        warn("HistoricalBars", `No data returned for ${request.ticker}`);
      } else {
        info("HistoricalBars", `Fetched ${bars.length} ${request.interval} bars for ${request.ticker}`);
      }
      return bars;
    } catch (err) {
      lastError = err;

      if (isTransient(err) && attempt < maxRetries - 1) {
        warn("HistoricalBars", `Temporary error for ${request.ticker}, retrying...`);
        continue;
      }

      logError(
        "HistoricalBars",
        `Failed to fetch bars for ${request.ticker} after ${attempt + 1} attempts`,
        err instanceof Error ? err.message : err
      );
      throw err;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`Failed to fetch bars for ${request.ticker}`);
}

/**
 * Time range ending now covering the last N days
 */
export function getTimeRange(days: number, now: number = Date.now()): { startTime: number; endTime: number } {
  return { startTime: now - days * 24 * 60 * 60 * 1000, endTime: now };
}
