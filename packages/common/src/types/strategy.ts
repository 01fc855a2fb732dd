// ============================================
// Strategy Types
// ============================================

import type { AssetId } from "./asset.js";
import type { VenueId } from "./venue.js";

export enum OrchestrationKind {
  YIELD_MAXIMIZING = "yield_maximizing",
  RISK_MINIMIZING = "risk_minimizing",
  LIQUIDITY_OPTIMIZING = "liquidity_optimizing",
  BALANCED = "balanced",
}

/** Scorer weights in bps; the four components sum to 10 000 */
export interface ScoringWeights {
  yield: number;
  risk: number;
  liquidity: number;
  cost: number;
}

export interface ScoringPolicy {
  kind: OrchestrationKind;
  weights: ScoringWeights;
  yieldThresholdBps: number;        // Minimum target-minus-current spread
  maxRiskIncrease: number;          // Max target-minus-source risk (0-100 scale)
  opportunityTtlMs: number;
}

export interface ReallocationStrategy {
  id: string;
  name: string;
  asset: AssetId;
  sourceVenues: VenueId[];
  targetVenues: VenueId[];
  targetWeights: number[];          // bps, sum == 10 000
  minYieldImprovement: number;      // bps
  maxRiskIncrease: number;
  executionFrequencyMs: number;
  lastExecution: number | null;
  orchestration: OrchestrationKind;
  isAdaptive: boolean;
  active: boolean;
  createdAt: number;
}

export interface StrategyInput {
  name: string;
  asset: AssetId;
  sourceVenues: VenueId[];
  targetVenues: VenueId[];
  targetWeights: number[];
  minYieldImprovement: number;
  maxRiskIncrease: number;
  executionFrequencyMs: number;
  orchestration?: OrchestrationKind;
  isAdaptive?: boolean;
  active?: boolean;
}

export interface RateLimitState {
  lastReallocationAt: number | null;
  cooldownMs: number;
  maxReallocationPctBps: number;
}
