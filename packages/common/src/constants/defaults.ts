/**
 * Engine defaults.
 * Each can be overridden through the environment (see utils/config.ts).
 */

export const BPS_DENOMINATOR = 10_000;

/** Utilization below this marks a venue as under-used */
export const DEFAULT_UTILIZATION_THRESHOLD_BPS = 7_000;

/** Capital must stay under-used this long before it counts as idle */
export const DEFAULT_TIME_THRESHOLD_MS = 60 * 60 * 1000;

export const DEFAULT_OPPORTUNITY_TTL_MS = 5 * 60 * 1000;

/** Finished opportunities stay queryable this long */
export const DEFAULT_OPPORTUNITY_RETENTION_MS = 60 * 60 * 1000;

/** Spread a target must beat the source by (0.5%) */
export const DEFAULT_YIELD_THRESHOLD_BPS = 50;

export const DEFAULT_MAX_RISK_INCREASE = 20;

export const DEFAULT_COOLDOWN_MS = 60 * 60 * 1000;

export const DEFAULT_MAX_REALLOCATION_PCT_BPS = 5_000;

/** Strategies cannot run more often than this */
export const MINIMUM_STRATEGY_INTERVAL_MS = 15 * 60 * 1000;

/** Smoothing factor for adaptive strategy weights */
export const DEFAULT_ADAPT_ALPHA = 0.2;

export const DEFAULT_COST_FIXED_USD = 5;
export const DEFAULT_COST_BPS = 5;
