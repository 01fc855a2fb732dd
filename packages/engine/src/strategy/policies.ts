// ============================================
// Orchestration Policies
//
// Named weightings for the reallocation scorer. Each vector is in bps and
// sums to 10 000.
// ============================================

import {
  BPS_DENOMINATOR,
  DEFAULT_MAX_RISK_INCREASE,
  DEFAULT_OPPORTUNITY_TTL_MS,
  DEFAULT_YIELD_THRESHOLD_BPS,
  isValidBps,
  OrchestrationKind,
  ValidationError,
  type ScoringPolicy,
  type ScoringWeights,
} from "@idleflow/common";

export const POLICY_WEIGHTS: Record<OrchestrationKind, ScoringWeights> = {
  [OrchestrationKind.YIELD_MAXIMIZING]: { yield: 6_000, risk: 1_500, liquidity: 1_500, cost: 1_000 },
  [OrchestrationKind.RISK_MINIMIZING]: { yield: 2_000, risk: 5_000, liquidity: 2_000, cost: 1_000 },
  [OrchestrationKind.LIQUIDITY_OPTIMIZING]: { yield: 2_000, risk: 2_000, liquidity: 5_000, cost: 1_000 },
  [OrchestrationKind.BALANCED]: { yield: 4_000, risk: 3_000, liquidity: 2_000, cost: 1_000 },
};

export function validateWeights(weights: ScoringWeights): void {
  const values = [weights.yield, weights.risk, weights.liquidity, weights.cost];
  if (!values.every(isValidBps)) {
    throw new ValidationError("Scoring weights must be integers within 0-10000");
  }
  const total = values.reduce((a, b) => a + b, 0);
  if (total !== BPS_DENOMINATOR) {
    throw new ValidationError(`Scoring weights sum to ${total}, expected ${BPS_DENOMINATOR}`);
  }
}

export function buildPolicy(
  kind: OrchestrationKind = OrchestrationKind.BALANCED,
  overrides: Partial<Omit<ScoringPolicy, "kind">> = {}
): ScoringPolicy {
  const policy: ScoringPolicy = {
    kind,
    weights: { ...POLICY_WEIGHTS[kind] },
    yieldThresholdBps: DEFAULT_YIELD_THRESHOLD_BPS,
    maxRiskIncrease: DEFAULT_MAX_RISK_INCREASE,
    opportunityTtlMs: DEFAULT_OPPORTUNITY_TTL_MS,
    ...overrides,
  };
  validateWeights(policy.weights);
  if (policy.opportunityTtlMs <= 0) {
    throw new ValidationError("opportunityTtlMs must be positive");
  }
  return policy;
}
