import { describe, it, expect } from "vitest";
import { loadConfig } from "../utils/config.js";
import { ValidationError } from "../errors.js";
import {
  DEFAULT_COOLDOWN_MS,
  DEFAULT_UTILIZATION_THRESHOLD_BPS,
  MINIMUM_STRATEGY_INTERVAL_MS,
} from "../constants/defaults.js";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.detector.utilizationThresholdBps).toBe(DEFAULT_UTILIZATION_THRESHOLD_BPS);
    expect(config.rateLimit.cooldownMs).toBe(DEFAULT_COOLDOWN_MS);
    expect(config.strategy.minimumIntervalMs).toBe(MINIMUM_STRATEGY_INTERVAL_MS);
    expect(config.keeper.dryRun).toBe(true);
    expect(config.keeper.persistAudit).toBe(false);
    expect(config.redis.password).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      UTILIZATION_THRESHOLD_BPS: "6500",
      REALLOCATION_COOLDOWN_MS: "1000",
      STRATEGY_ADAPT_ALPHA: "0.5",
      KEEPER_DRY_RUN: "false",
      PERSIST_AUDIT: "true",
      ENGINE_CONFIG_PATH: "/etc/idleflow/engine.json",
    });
    expect(config.detector.utilizationThresholdBps).toBe(6_500);
    expect(config.rateLimit.cooldownMs).toBe(1_000);
    expect(config.strategy.adaptAlpha).toBe(0.5);
    expect(config.keeper.dryRun).toBe(false);
    expect(config.keeper.persistAudit).toBe(true);
    expect(config.keeper.engineConfigPath).toBe("/etc/idleflow/engine.json");
  });

  it("ignores unparseable numbers", () => {
    const config = loadConfig({ REDIS_PORT: "not-a-port" });
    expect(config.redis.port).toBe(6379);
  });

  it("keeps an explicit zero", () => {
    const config = loadConfig({ MIN_SCAN_INTERVAL_MS: "0", YIELD_THRESHOLD_BPS: "0" });
    expect(config.detector.minScanIntervalMs).toBe(0);
    expect(config.scorer.yieldThresholdBps).toBe(0);
  });

  it("rejects settings the engine cannot run with", () => {
    let caught: unknown;
    try {
      loadConfig({ REALLOCATION_COOLDOWN_MS: "-5", OPPORTUNITY_TTL_MS: "0", MAX_REALLOCATION_PCT_BPS: "12000" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.errors).toEqual([
      "OPPORTUNITY_TTL_MS must be positive",
      "REALLOCATION_COOLDOWN_MS must not be negative",
      "MAX_REALLOCATION_PCT_BPS must be within 1-10000",
    ]);
  });

  it("rejects an adapt rate outside 0-1", () => {
    expect(() => loadConfig({ STRATEGY_ADAPT_ALPHA: "1.5" })).toThrow(
      "Invalid configuration: STRATEGY_ADAPT_ALPHA must be within 0-1"
    );
  });
});
