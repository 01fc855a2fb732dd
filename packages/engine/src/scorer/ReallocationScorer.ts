// ============================================
// Reallocation Scorer
//
// Turns idle detections and a market snapshot into ranked, time-boxed
// opportunities. Pure apart from id generation and the injected clock.
//
//   score(v) = wYield * yield(v) / maxYield
//            + wRisk * (1 - risk(v) / 100)
//            + wLiquidity * liquidityScore(depth(v), amount)
//            - wCost * cost / grossBenefit
// ============================================

import { v4 as uuidv4 } from "uuid";
import {
  applyBps,
  BPS_DENOMINATOR,
  createLogger,
  minBigInt,
  UNALLOCATED_VENUE,
  type AssetId,
  type IdleDetection,
  type ReallocationOpportunity,
  type ScoringPolicy,
  type VenueId,
  type VenueMetrics,
} from "@idleflow/common";
import type { ExecutionCostModel } from "./CostModel.js";
import type { MarketSnapshot } from "./MarketSnapshot.js";
import { costShare, liquidityScore, riskScoreNormalized } from "./normalize.js";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:scorer");

export interface ScorerOptions {
  clock?: Clock;
  idGenerator?: () => string;
}

export type DiscardReason = "no_improvement" | "risk_increase" | "no_net_benefit" | "no_capacity";

interface Candidate {
  asset: AssetId;
  fromVenue: VenueId;
  sourceYield: number;
  target: VenueMetrics;
  amount: bigint;
  cost: bigint;
  gross: bigint;
}

export type QuoteResult = { opportunity: ReallocationOpportunity } | { discarded: DiscardReason };

export class ReallocationScorer {
  private readonly clock: Clock;
  private readonly nextId: () => string;

  constructor(private costs: ExecutionCostModel, opts: ScorerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.nextId = opts.idGenerator ?? uuidv4;
  }

  score(
    detections: readonly IdleDetection[],
    market: MarketSnapshot,
    policy: ScoringPolicy,
    strategyId?: string
  ): ReallocationOpportunity[] {
    const now = this.clock();
    const candidates: Candidate[] = [];
    const discarded: Record<DiscardReason, number> = {
      no_improvement: 0,
      risk_increase: 0,
      no_net_benefit: 0,
      no_capacity: 0,
    };

    for (const detection of detections) {
      if (detection.asset !== market.asset || !detection.isReallocatable) continue;
      const source = market.venues.get(detection.venue);
      if (!source) {
        logger.debug(`No metrics for source ${detection.venue}, skipping`, { asset: market.asset });
        continue;
      }

      for (const target of market.venues.values()) {
        if (target.venueId === detection.venue || target.venueId === UNALLOCATED_VENUE) continue;
        if (!target.isAvailable) continue;

        const result = this.evaluate(market, source, target, detection.idleAmount, policy);
        if (typeof result === "string") {
          discarded[result]++;
          continue;
        }
        candidates.push(result);
      }
    }

    const maxYield = Math.max(0, ...candidates.map((c) => c.target.yieldBps));
    const opportunities = candidates.map((c) => this.toOpportunity(c, maxYield, policy, now, strategyId));
    opportunities.sort(compareOpportunities);

    logger.info(`Scored ${opportunities.length} opportunities for ${market.asset}`, {
      policy: policy.kind,
      discarded,
    });
    return opportunities;
  }

  /**
   * Score one move whose venues and amount the caller has already chosen.
   * The yield term is normalized against the best available venue of the
   * snapshot, so quotes taken from one snapshot rank against each other.
   */
  quote(
    market: MarketSnapshot,
    source: VenueMetrics,
    target: VenueMetrics,
    amount: bigint,
    policy: ScoringPolicy,
    strategyId?: string
  ): QuoteResult {
    const result = this.evaluate(market, source, target, amount, policy);
    if (typeof result === "string") return { discarded: result };

    let maxYield = 0;
    for (const venue of market.venues.values()) {
      if (venue.isAvailable && venue.yieldBps > maxYield) maxYield = venue.yieldBps;
    }
    return { opportunity: this.toOpportunity(result, maxYield, policy, this.clock(), strategyId) };
  }

  /** Amount capped at the target's headroom, with cost and gross benefit, or why the move is out */
  private evaluate(
    market: MarketSnapshot,
    source: VenueMetrics,
    target: VenueMetrics,
    idleAmount: bigint,
    policy: ScoringPolicy
  ): Candidate | DiscardReason {
    const sourceYield = source.venueId === UNALLOCATED_VENUE ? 0 : source.yieldBps;
    if (target.yieldBps <= sourceYield + policy.yieldThresholdBps) return "no_improvement";
    if (target.riskScore - source.riskScore > policy.maxRiskIncrease) return "risk_increase";
    if (target.headroom !== null && target.headroom <= 0n) return "no_capacity";
    if (idleAmount <= 0n) return "no_net_benefit";

    const amount = target.headroom === null ? idleAmount : minBigInt(idleAmount, target.headroom);
    const cost = this.costs.estimate({
      asset: market.asset,
      fromVenue: source.venueId,
      toVenue: target.venueId,
      amount,
      decimals: market.decimals,
      priceUsd: market.priceUsd,
    });
    const gross = applyBps(amount, target.yieldBps - sourceYield);
    if (gross - cost <= 0n) return "no_net_benefit";
    return { asset: market.asset, fromVenue: source.venueId, sourceYield, target, amount, cost, gross };
  }

  private toOpportunity(
    c: Candidate,
    maxYield: number,
    policy: ScoringPolicy,
    now: number,
    strategyId?: string
  ): ReallocationOpportunity {
    const { weights } = policy;
    const yieldPart = maxYield > 0 ? c.target.yieldBps / maxYield : 0;
    const riskPart = 1 - riskScoreNormalized(c.target.riskScore);
    const liquidityPart = liquidityScore(c.target.liquidityDepth, c.amount);
    const costPart = costShare(c.cost, c.gross);

    const score =
      (weights.yield * yieldPart +
        weights.risk * riskPart +
        weights.liquidity * liquidityPart -
        weights.cost * costPart) /
      BPS_DENOMINATOR;

    return {
      id: this.nextId(),
      asset: c.asset,
      fromVenue: c.fromVenue,
      toVenue: c.target.venueId,
      amount: c.amount,
      currentYield: c.sourceYield,
      targetYield: c.target.yieldBps,
      yieldImprovement: c.target.yieldBps - c.sourceYield,
      minSpreadBps: policy.yieldThresholdBps,
      estimatedCost: c.cost,
      netBenefit: c.gross - c.cost,
      riskScore: c.target.riskScore,
      confidence: liquidityPart,
      score,
      strategyId,
      createdAt: now,
      expiresAt: now + policy.opportunityTtlMs,
    };
  }
}

/** Score desc, then net benefit desc, risk asc, target id, source id */
export function compareOpportunities(a: ReallocationOpportunity, b: ReallocationOpportunity): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.netBenefit !== b.netBenefit) return a.netBenefit > b.netBenefit ? -1 : 1;
  if (a.riskScore !== b.riskScore) return a.riskScore - b.riskScore;
  if (a.toVenue !== b.toVenue) return a.toVenue < b.toVenue ? -1 : 1;
  if (a.fromVenue !== b.fromVenue) return a.fromVenue < b.fromVenue ? -1 : 1;
  return 0;
}

/** Highest-ranked opportunity for each source venue, in rank order */
export function bestPerSource(opportunities: readonly ReallocationOpportunity[]): ReallocationOpportunity[] {
  const seen = new Set<VenueId>();
  const best: ReallocationOpportunity[] = [];
  for (const opp of [...opportunities].sort(compareOpportunities)) {
    if (seen.has(opp.fromVenue)) continue;
    seen.add(opp.fromVenue);
    best.push(opp);
  }
  return best;
}
