// ============================================
// Centralized Configuration
// ============================================

import dotenv from "dotenv";
import { ValidationError } from "../errors.js";
import { isValidBps } from "./bps.js";
import {
  DEFAULT_ADAPT_ALPHA,
  DEFAULT_COOLDOWN_MS,
  DEFAULT_COST_BPS,
  DEFAULT_COST_FIXED_USD,
  DEFAULT_MAX_REALLOCATION_PCT_BPS,
  DEFAULT_MAX_RISK_INCREASE,
  DEFAULT_OPPORTUNITY_RETENTION_MS,
  DEFAULT_OPPORTUNITY_TTL_MS,
  DEFAULT_TIME_THRESHOLD_MS,
  DEFAULT_UTILIZATION_THRESHOLD_BPS,
  DEFAULT_YIELD_THRESHOLD_BPS,
  MINIMUM_STRATEGY_INTERVAL_MS,
} from "../constants/defaults.js";

dotenv.config();

export interface AppConfig {
  // Database
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  // Redis
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  // Idle capital detection
  detector: {
    utilizationThresholdBps: number;
    timeThresholdMs: number;
    minScanIntervalMs: number;
  };
  // Opportunity scoring
  scorer: {
    opportunityTtlMs: number;
    opportunityRetentionMs: number;
    yieldThresholdBps: number;
    maxRiskIncrease: number;
    costFixedUsd: number;
    costBps: number;
  };
  // Per-asset rate limit defaults
  rateLimit: {
    cooldownMs: number;
    maxReallocationPctBps: number;
  };
  // Strategies
  strategy: {
    minimumIntervalMs: number;
    adaptAlpha: number;
  };
  // Keeper service
  keeper: {
    scanIntervalMs: number;
    strategyIntervalMs: number;
    engineConfigPath: string;
    dryRun: boolean;
    persistAudit: boolean;
  };
}

type Env = Record<string, string | undefined>;

function int(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(env[key] || "");
  return Number.isNaN(parsed) ? fallback : parsed;
}

function float(env: Env, key: string, fallback: number): number {
  const parsed = parseFloat(env[key] || "");
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    postgres: {
      host: env.POSTGRES_HOST || "localhost",
      port: int(env, "POSTGRES_PORT", 5432),
      database: env.POSTGRES_DB || "idleflow",
      user: env.POSTGRES_USER || "idleflow",
      password: env.POSTGRES_PASSWORD || "change_me_in_production",
    },
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: int(env, "REDIS_PORT", 6379),
      password: env.REDIS_PASSWORD || undefined,
    },
    detector: {
      utilizationThresholdBps: int(env, "UTILIZATION_THRESHOLD_BPS", DEFAULT_UTILIZATION_THRESHOLD_BPS),
      timeThresholdMs: int(env, "IDLE_TIME_THRESHOLD_MS", DEFAULT_TIME_THRESHOLD_MS),
      minScanIntervalMs: int(env, "MIN_SCAN_INTERVAL_MS", 0),
    },
    scorer: {
      opportunityTtlMs: int(env, "OPPORTUNITY_TTL_MS", DEFAULT_OPPORTUNITY_TTL_MS),
      opportunityRetentionMs: int(env, "OPPORTUNITY_RETENTION_MS", DEFAULT_OPPORTUNITY_RETENTION_MS),
      yieldThresholdBps: int(env, "YIELD_THRESHOLD_BPS", DEFAULT_YIELD_THRESHOLD_BPS),
      maxRiskIncrease: float(env, "MAX_RISK_INCREASE", DEFAULT_MAX_RISK_INCREASE),
      costFixedUsd: float(env, "COST_FIXED_USD", DEFAULT_COST_FIXED_USD),
      costBps: int(env, "COST_BPS", DEFAULT_COST_BPS),
    },
    rateLimit: {
      cooldownMs: int(env, "REALLOCATION_COOLDOWN_MS", DEFAULT_COOLDOWN_MS),
      maxReallocationPctBps: int(env, "MAX_REALLOCATION_PCT_BPS", DEFAULT_MAX_REALLOCATION_PCT_BPS),
    },
    strategy: {
      minimumIntervalMs: int(env, "MIN_STRATEGY_INTERVAL_MS", MINIMUM_STRATEGY_INTERVAL_MS),
      adaptAlpha: float(env, "STRATEGY_ADAPT_ALPHA", DEFAULT_ADAPT_ALPHA),
    },
    keeper: {
      scanIntervalMs: int(env, "KEEPER_SCAN_INTERVAL_MS", 5 * 60_000),
      strategyIntervalMs: int(env, "KEEPER_STRATEGY_INTERVAL_MS", 15 * 60_000),
      engineConfigPath: env.ENGINE_CONFIG_PATH || "config/engine.json",
      dryRun: env.KEEPER_DRY_RUN !== "false",
      persistAudit: env.PERSIST_AUDIT === "true",
    },
  };
  validateConfig(config);
  return config;
}

/** Reject settings the engine cannot run with; lists every problem at once */
export function validateConfig(config: AppConfig): void {
  const errors: string[] = [];
  const check = (ok: boolean, message: string) => {
    if (!ok) errors.push(message);
  };
  const isPort = (port: number) => Number.isInteger(port) && port > 0 && port <= 65_535;

  check(isPort(config.postgres.port), "POSTGRES_PORT must be within 1-65535");
  check(isPort(config.redis.port), "REDIS_PORT must be within 1-65535");

  check(isValidBps(config.detector.utilizationThresholdBps), "UTILIZATION_THRESHOLD_BPS must be within 0-10000");
  check(config.detector.timeThresholdMs >= 0, "IDLE_TIME_THRESHOLD_MS must not be negative");
  check(config.detector.minScanIntervalMs >= 0, "MIN_SCAN_INTERVAL_MS must not be negative");

  check(config.scorer.opportunityTtlMs > 0, "OPPORTUNITY_TTL_MS must be positive");
  check(config.scorer.opportunityRetentionMs >= 0, "OPPORTUNITY_RETENTION_MS must not be negative");
  check(config.scorer.yieldThresholdBps >= 0, "YIELD_THRESHOLD_BPS must not be negative");
  check(
    config.scorer.maxRiskIncrease >= 0 && config.scorer.maxRiskIncrease <= 100,
    "MAX_RISK_INCREASE must be within 0-100"
  );
  check(config.scorer.costFixedUsd >= 0, "COST_FIXED_USD must not be negative");
  check(isValidBps(config.scorer.costBps), "COST_BPS must be within 0-10000");

  check(config.rateLimit.cooldownMs >= 0, "REALLOCATION_COOLDOWN_MS must not be negative");
  check(
    isValidBps(config.rateLimit.maxReallocationPctBps) && config.rateLimit.maxReallocationPctBps > 0,
    "MAX_REALLOCATION_PCT_BPS must be within 1-10000"
  );

  check(config.strategy.minimumIntervalMs >= 0, "MIN_STRATEGY_INTERVAL_MS must not be negative");
  check(
    config.strategy.adaptAlpha >= 0 && config.strategy.adaptAlpha <= 1,
    "STRATEGY_ADAPT_ALPHA must be within 0-1"
  );

  check(config.keeper.scanIntervalMs > 0, "KEEPER_SCAN_INTERVAL_MS must be positive");
  check(config.keeper.strategyIntervalMs > 0, "KEEPER_STRATEGY_INTERVAL_MS must be positive");

  if (errors.length > 0) {
    throw new ValidationError(`Invalid configuration: ${errors.join("; ")}`, errors);
  }
}
