// ============================================
// Common Package Entry
// ============================================

export * from "./types/asset.js";
export * from "./types/venue.js";
export * from "./types/ledger.js";
export * from "./types/detection.js";
export * from "./types/opportunity.js";
export * from "./types/strategy.js";
export * from "./types/events.js";
export * from "./types/audit.js";
export * from "./constants/defaults.js";
export * from "./errors.js";
export * from "./utils/bps.js";
export * from "./utils/logger.js";
export * from "./utils/config.js";
export * from "./utils/db.js";
export * from "./utils/redis.js";
