/**
 * In-Memory Redis Simulator
 *
 * Implements the subset of Redis the bar cache uses, so runs without a
 * Redis server (BAR_CACHE=memory) and tests share the cache code path.
 */

import type { BarStore } from "../ingestion/barCache.js";

export class MemoryRedis implements BarStore {
  private data: Map<string, string> = new Map();
  private expirations: Map<string, number> = new Map();

  /**
   * Simulate SETEX - set with expiration
   */
  async setex(key: string, seconds: number, value: string): Promise<"OK"> {
    this.data.set(key, value);
    this.expirations.set(key, Date.now() + seconds * 1000);
    return "OK";
  }

  /**
   * Simulate GET - get value, honouring expiry
   */
  async get(key: string): Promise<string | null> {
    const expiration = this.expirations.get(key);
    if (expiration !== undefined && Date.now() > expiration) {
      this.data.delete(key);
      this.expirations.delete(key);
      return null;
    }
    return this.data.get(key) ?? null;
  }

  /**
   * Simulate DEL - remove keys, returning how many existed
   */
  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) {
        removed++;
      }
      this.expirations.delete(key);
    }
    return removed;
  }

  /**
   * Simulate KEYS - get all keys matching pattern
   */
  async keys(pattern: string): Promise<string[]> {
    const regex = new RegExp(`^${pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*")}$`);
    return Array.from(this.data.keys()).filter(key => regex.test(key));
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.data.clear();
    this.expirations.clear();
  }
}
