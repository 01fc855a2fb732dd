// ============================================
// Reallocation Opportunity Types
// ============================================

import type { AssetId } from "./asset.js";
import type { VenueId } from "./venue.js";

export interface ReallocationOpportunity {
  id: string;
  asset: AssetId;
  fromVenue: VenueId;
  toVenue: VenueId;
  amount: bigint;
  currentYield: number;             // bps
  targetYield: number;              // bps
  yieldImprovement: number;         // bps
  minSpreadBps: number;             // Spread required again at execution time
  estimatedCost: bigint;
  netBenefit: bigint;
  riskScore: number;
  confidence: number;               // 0-1
  score: number;
  strategyId?: string;
  createdAt: number;
  expiresAt: number;
}

export enum OpportunityStatus {
  PROPOSED = "proposed",
  VALIDATED = "validated",
  EXECUTING = "executing",
  COMPLETED = "completed",
  FAILED = "failed",
  EXPIRED = "expired",
}

export type ExecutionStep = "validate" | "rate_limit" | "withdraw" | "deposit" | "record";

export interface ExecutionFailure {
  step: ExecutionStep;
  reason: string;
}

export interface OpportunityRecord {
  opportunity: ReallocationOpportunity;
  status: OpportunityStatus;
  failure?: ExecutionFailure;
  movedAmount: bigint;
  actualYieldImprovement?: number;
  updatedAt: number;
}

export interface ExecutionReport {
  opportunityId: string;
  asset: AssetId;
  fromVenue: VenueId;
  toVenue: VenueId;
  amount: bigint;
  estimatedYieldImprovement: number;
  actualYieldImprovement: number;
  completedAt: number;
}

/** Forecast vs realized target yield, consumed by adaptive strategies */
export interface YieldOutcome {
  venue: VenueId;
  forecastYield: number;
  realizedYield: number;
  strategyId?: string;
  at: number;
}
