import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfigFromEnv, resolveConfig } from "../pipelineConfig.js";
import { ConfigError } from "../../utils/errors.js";

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("pipeline configuration", () => {
  it("resolves to the defaults without overrides", () => {
    const config = resolveConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.splitRatios).toEqual([0.7, 0.15, 0.15]);
    expect(config.balanceStrategy).toBe("weight");
    expect(config.indicatorPeriods.adx).toBe(14);
  });

  it("freezes the resolved configuration", () => {
    const config = resolveConfig({ labelThreshold: 0.01 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.indicatorPeriods.macd)).toBe(true);
  });

  it("merges indicator period overrides onto the defaults", () => {
    const config = resolveConfig({ indicatorPeriods: { rsi: 7 } });
    expect(config.indicatorPeriods.rsi).toBe(7);
    expect(config.indicatorPeriods.cci).toBe(20);
  });

  it("rejects ratios that do not sum to 1", () => {
    const err = configErrorOf(() => resolveConfig({ splitRatios: [0.5, 0.3, 0.3] }));
    expect(err.details.splitRatios).toEqual(["ratios must sum to 1.0"]);
  });

  it("rejects a fast MACD period that is not shorter than the slow one", () => {
    const err = configErrorOf(() =>
      resolveConfig({ indicatorPeriods: { macd: { fast: 26, slow: 12, signal: 9 } } })
    );
    expect(err.details["indicatorPeriods.macd"]).toEqual(["fast period must be shorter than slow period"]);
  });

  it("rejects an imbalance threshold above one half", () => {
    expect(() => resolveConfig({ imbalanceThreshold: 0.6 })).toThrow(ConfigError);
  });

  describe("loadConfigFromEnv", () => {
    it("reads overrides from the environment", () => {
      const config = loadConfigFromEnv({
        LABEL_THRESHOLD: "0.01",
        SPLIT_RATIOS: "0.6, 0.2, 0.2",
        BALANCE_STRATEGY: "oversample",
        MISSING_VALUE_POLICY: "drop",
        MIN_BARS: "300",
      });
      expect(config.labelThreshold).toBe(0.01);
      expect(config.splitRatios).toEqual([0.6, 0.2, 0.2]);
      expect(config.balanceStrategy).toBe("oversample");
      expect(config.missingValuePolicy).toBe("drop");
      expect(config.minBars).toBe(300);
      expect(config.randomSeed).toBe(42);
    });

    it("ignores empty variables", () => {
      expect(loadConfigFromEnv({ LABEL_THRESHOLD: "" })).toEqual(DEFAULT_CONFIG);
    });

    it("rejects an unknown strategy", () => {
      const err = configErrorOf(() => loadConfigFromEnv({ BALANCE_STRATEGY: "smote" }));
      expect(Object.keys(err.details)).toEqual(["BALANCE_STRATEGY"]);
    });

    it("rejects malformed ratios", () => {
      expect(() => loadConfigFromEnv({ SPLIT_RATIOS: "0.7,0.3" })).toThrow(ConfigError);
      expect(() => loadConfigFromEnv({ LABEL_THRESHOLD: "abc" })).toThrow(/must be numeric/);
    });
  });
});
