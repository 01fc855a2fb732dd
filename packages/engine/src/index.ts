// ============================================
// Engine Package Entry
// ============================================

export { AllocationEngine } from "./AllocationEngine.js";
export type {
  AllocationEngineOptions,
  DetectAndReallocateResult,
  EngineSettings,
  ProposalResult,
} from "./AllocationEngine.js";

export { systemClock, type Clock } from "./clock.js";
export { AssetLock } from "./lock/AssetLock.js";
export { AccessGuard, ROLES, type Role } from "./access/AccessGuard.js";
export { AuditTrail, type AuditSink, type AuditFilter, type AuditTrailOptions } from "./audit/AuditTrail.js";
export { PgAuditSink, AUDIT_LOG_DDL } from "./audit/PgAuditSink.js";

// Core components
export { CapitalLedger, type CapitalLedgerOptions } from "./ledger/CapitalLedger.js";
export { IdleCapitalDetector, type DetectorOptions } from "./detector/IdleCapitalDetector.js";
export {
  ReallocationScorer,
  bestPerSource,
  compareOpportunities,
  type ScorerOptions,
  type DiscardReason,
  type QuoteResult,
} from "./scorer/ReallocationScorer.js";
export { GasCostModel, type ExecutionCostModel, type CostQuoteInput } from "./scorer/CostModel.js";
export { collectMarketSnapshot, type MarketSnapshot, type MarketSources } from "./scorer/MarketSnapshot.js";
export { liquidityScore, costShare, riskScoreNormalized } from "./scorer/normalize.js";
export { RateLimiter, type CycleBudget, type RateLimitDefaults } from "./executor/RateLimiter.js";
export {
  ReallocationExecutor,
  type BatchResult,
  type ChunkFailure,
  type EmergencyResult,
  type ExecutorDeps,
  type ExecutorOptions,
  type StrategyRunResult,
} from "./executor/ReallocationExecutor.js";
export { StrategyBook, type StrategyBookOptions } from "./strategy/StrategyBook.js";
export { POLICY_WEIGHTS, buildPolicy, validateWeights } from "./strategy/policies.js";
export { EngineStats, type AssetStats, type EngineStatsReport } from "./stats/EngineStats.js";
