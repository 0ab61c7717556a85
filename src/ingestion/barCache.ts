/**
 * Bar Cache
 *
 * Redis storage for fetched bar sequences.
 * Key pattern: bars:{ticker}:{interval}:{startMs}:{endMs}
 */

import { z } from "zod";
import { info, warn } from "../utils/logger.js";
import type { Bar } from "../utils/types.js";

export const BAR_CACHE_TTL_SECONDS = 6 * 60 * 60;

/**
 * Subset of the ioredis client the cache needs
 */
export interface BarStore {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<"OK">;
  del(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}

export interface BarRequest {
  ticker: string;
  interval: string;
  startTime: number;
  endTime: number;
}

const cachedBarsSchema = z.array(
  z.object({
    timestamp: z.number(),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
  })
);

export function barCacheKey(request: BarRequest): string {
  return `bars:${request.ticker.toUpperCase()}:${request.interval}:${request.startTime}:${request.endTime}`;
}

/**
 * Cached bars for the request, or null on miss or unreadable entry
 */
export async function getCachedBars(store: BarStore, request: BarRequest): Promise<Bar[] | null> {
  const key = barCacheKey(request);
  try {
    const raw = await store.get(key);
    if (raw === null) {
      return null;
    }
    const parsed = cachedBarsSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      warn("BarCache", `Discarding malformed cache entry ${key}`);
      await store.del(key);
      return null;
    }
    return parsed.data;
  } catch (err) {
    warn("BarCache", `Failed to read ${key}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

export async function storeBars(
  store: BarStore,
  request: BarRequest,
  bars: readonly Bar[],
  ttlSeconds: number = BAR_CACHE_TTL_SECONDS
): Promise<void> {
  const key = barCacheKey(request);
  try {
    await store.setex(key, ttlSeconds, JSON.stringify(bars));
    info("BarCache", `Stored ${bars.length} bars under ${key}`);
  } catch (err) {
    warn("BarCache", `Failed to store ${key}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Remove every cached range for a ticker
 */
export async function invalidateTicker(store: BarStore, ticker: string): Promise<number> {
  const keys = await store.keys(`bars:${ticker.toUpperCase()}:*`);
  if (keys.length === 0) {
    return 0;
  }
  return store.del(...keys);
}

/**
 * Serve from cache, otherwise fetch and store non-empty results
 */
export async function fetchBarsCached(
  store: BarStore,
  request: BarRequest,
  fetcher: (request: BarRequest) => Promise<Bar[]>
): Promise<Bar[]> {
  const cached = await getCachedBars(store, request);
  if (cached !== null) {
    info("BarCache", `Cache hit for ${request.ticker} (${cached.length} bars)`);
    return cached;
  }

  const bars = await fetcher(request);
  if (bars.length > 0) {
    await storeBars(store, request, bars);
  }
  return bars;
}
