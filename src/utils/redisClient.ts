/**
 * Redis connection for the bar cache (BAR_CACHE=redis)
 */

import { Redis, type RedisOptions } from "ioredis";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { info, warn } from "./logger.js";

const redisEnvSchema = z.object({
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_PASSWORD: z.string().min(1).optional(),
});

/**
 * Connection options from the environment. Connects lazily, on the first
 * cache command, and gives up on a command after two retries.
 */
export function redisOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RedisOptions {
  const parsed = redisEnvSchema.safeParse({
    REDIS_HOST: env.REDIS_HOST || undefined,
    REDIS_PORT: env.REDIS_PORT || undefined,
    REDIS_DB: env.REDIS_DB || undefined,
    REDIS_PASSWORD: env.REDIS_PASSWORD || undefined,
  });
  if (!parsed.success) {
    const details: Record<string, string[]> = {};
    for (const issue of parsed.error.issues) {
      const key = issue.path.join(".");
      details[key] = [...(details[key] ?? []), issue.message];
    }
    throw new ConfigError(`Invalid Redis settings (${Object.keys(details).join(", ")})`, details);
  }

  const { REDIS_HOST, REDIS_PORT, REDIS_DB, REDIS_PASSWORD } = parsed.data;
  return {
    host: REDIS_HOST,
    port: REDIS_PORT,
    db: REDIS_DB,
    ...(REDIS_PASSWORD === undefined ? {} : { password: REDIS_PASSWORD }),
    lazyConnect: true,
    maxRetriesPerRequest: 2,
  };
}

export function createRedisClient(env: NodeJS.ProcessEnv = process.env): Redis {
  const options = redisOptionsFromEnv(env);
  const client = new Redis(options);

  client.on("error", (err: Error) => {
    warn("Redis", `Bar cache connection error: ${err.message}`);
  });

  client.on("connect", () => {
    info("Redis", `Bar cache connected to ${options.host}:${options.port}/${options.db}`);
  });

  return client;
}
