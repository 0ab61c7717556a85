import { describe, it, expect } from "vitest";
import { createRedisClient, redisOptionsFromEnv } from "../redisClient.js";
import { ConfigError } from "../errors.js";

describe("redis client", () => {
  it("defaults to a lazy local connection", () => {
    expect(redisOptionsFromEnv({})).toEqual({
      host: "localhost",
      port: 6379,
      db: 0,
      lazyConnect: true,
      maxRetriesPerRequest: 2,
    });
  });

  it("reads host, port, db and password from the environment", () => {
    const options = redisOptionsFromEnv({
      REDIS_HOST: "cache.internal",
      REDIS_PORT: "6380",
      REDIS_DB: "3",
      REDIS_PASSWORD: "test-secret",
    });
    expect(options).toMatchObject({ host: "cache.internal", port: 6380, db: 3, password: "test-secret" });
  });

  it("treats empty values as unset", () => {
    expect(redisOptionsFromEnv({ REDIS_HOST: "", REDIS_PORT: "" })).toMatchObject({ host: "localhost", port: 6379 });
  });

  it("rejects a port that is not a number", () => {
    let caught: unknown;
    try {
      redisOptionsFromEnv({ REDIS_PORT: "six" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(Object.keys(caught.details)).toEqual(["REDIS_PORT"]);
    }
  });

  it("creates a client without connecting", () => {
    const client = createRedisClient({ REDIS_PORT: "6390" });
    expect(client.status).toBe("wait");
    expect(client.options.port).toBe(6390);
    client.disconnect();
  });
});
