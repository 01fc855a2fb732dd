import { describe, it, expect } from "vitest";
import {
  DetectionState,
  OrchestrationKind,
  UNALLOCATED_VENUE,
  VenueKind,
  type IdleDetection,
  type ReallocationOpportunity,
  type VenueMetrics,
} from "@idleflow/common";
import { TablePriceOracle, TableRiskOracle, AdapterYieldOracle, VenueRegistry } from "@idleflow/adapters";
import { ReallocationScorer, bestPerSource, compareOpportunities } from "../scorer/ReallocationScorer.js";
import { GasCostModel, type ExecutionCostModel } from "../scorer/CostModel.js";
import { collectMarketSnapshot, type MarketSnapshot } from "../scorer/MarketSnapshot.js";
import { liquidityScore } from "../scorer/normalize.js";
import { buildPolicy } from "../strategy/policies.js";
import { CapitalLedger } from "../ledger/CapitalLedger.js";
import { ASSET, REGISTRATION, T0, manualClock, simulatedVenue } from "./fixtures.js";

const flatCost = (amount: bigint): ExecutionCostModel => ({ estimate: () => amount });

function detection(venue: string, idleAmount: bigint, patch: Partial<IdleDetection> = {}): IdleDetection {
  return {
    asset: ASSET,
    venue,
    totalCapital: idleAmount,
    activeCapital: 0n,
    idleAmount,
    utilizationRate: 0,
    currentYield: 500,
    bestAlternativeYield: 900,
    opportunityCost: 0n,
    detectedAt: T0,
    idleSince: T0,
    isIdle: true,
    isReallocatable: true,
    state: DetectionState.REALLOCATABLE,
    ...patch,
  };
}

function metrics(venueId: string, yieldBps: number, riskScore: number, patch: Partial<VenueMetrics> = {}): VenueMetrics {
  return {
    venueId,
    yieldBps,
    riskScore,
    liquidityDepth: 1_000_000n,
    headroom: null,
    isAvailable: true,
    ...patch,
  };
}

function market(...venues: VenueMetrics[]): MarketSnapshot {
  return {
    asset: ASSET,
    decimals: 0,
    priceUsd: 1,
    venues: new Map(venues.map((v) => [v.venueId, v])),
    unavailable: [],
    takenAt: T0,
  };
}

describe("ReallocationScorer", () => {
  const { clock } = manualClock();
  const policy = buildPolicy(OrchestrationKind.BALANCED);

  it("accepts a move whose net benefit is positive", () => {
    const scorer = new ReallocationScorer(flatCost(200n), { clock, idGenerator: () => "opp-1" });

    const [opp] = scorer.score([detection("L", 100_000n)], market(metrics("L", 500, 20), metrics("V", 900, 30)), policy);

    expect(opp).toMatchObject({
      id: "opp-1",
      fromVenue: "L",
      toVenue: "V",
      amount: 100_000n,
      currentYield: 500,
      targetYield: 900,
      yieldImprovement: 400,
      minSpreadBps: 50,
      estimatedCost: 200n,
      netBenefit: 3_800n,
      riskScore: 30,
      confidence: 1,
      createdAt: T0,
      expiresAt: T0 + 300_000,
    });
    // 0.4 * 1 + 0.3 * 0.7 + 0.2 * 1 - 0.1 * (200 / 4000)
    expect(opp.score).toBeCloseTo(0.805, 10);
  });

  it("discards targets without enough improvement, with too much risk or no net benefit", () => {
    const scorer = new ReallocationScorer(flatCost(200n), { clock });

    const opportunities = scorer.score(
      [detection("L", 100_000n)],
      market(
        metrics("L", 500, 20),
        metrics("flat", 550, 20),
        metrics("risky", 1_500, 41),
        metrics("thin", 700, 20),
        metrics("frozen", 1_200, 20, { isAvailable: false })
      ),
      policy
    );

    // "thin": 100 000 * 2% = 2 000 gross, still above the 200 cost
    expect(opportunities.map((o) => o.toVenue)).toEqual(["thin"]);

    const costly = new ReallocationScorer(flatCost(2_000n), { clock });
    expect(costly.score([detection("L", 100_000n)], market(metrics("L", 500, 20), metrics("thin", 700, 20)), policy)).toEqual([]);
  });

  it("caps the amount at the target's remaining capacity", () => {
    const scorer = new ReallocationScorer(flatCost(0n), { clock });

    const [opp] = scorer.score(
      [detection("L", 100_000n)],
      market(metrics("L", 500, 20), metrics("V", 900, 20, { headroom: 40_000n })),
      policy
    );
    expect(opp.amount).toBe(40_000n);
    expect(opp.netBenefit).toBe(1_600n);

    const full = scorer.score(
      [detection("L", 100_000n)],
      market(metrics("L", 500, 20), metrics("V", 900, 20, { headroom: 0n })),
      policy
    );
    expect(full).toEqual([]);
  });

  it("ignores detections that are not reallocatable", () => {
    const scorer = new ReallocationScorer(flatCost(0n), { clock });
    const result = scorer.score(
      [detection("L", 100_000n, { isReallocatable: false })],
      market(metrics("L", 500, 20), metrics("V", 900, 20)),
      policy
    );
    expect(result).toEqual([]);
  });

  it("treats the unallocated bucket as a zero-yield source", () => {
    const scorer = new ReallocationScorer(flatCost(0n), { clock });
    const [opp] = scorer.score(
      [detection(UNALLOCATED_VENUE, 10_000n)],
      market(metrics(UNALLOCATED_VENUE, 0, 0, { isAvailable: false }), metrics("V", 900, 15)),
      policy
    );
    expect(opp.fromVenue).toBe(UNALLOCATED_VENUE);
    expect(opp.yieldImprovement).toBe(900);
  });

  it("breaks exact ties by venue id", () => {
    const scorer = new ReallocationScorer(flatCost(0n), { clock });
    const result = scorer.score(
      [detection("L", 100_000n)],
      market(metrics("L", 500, 20), metrics("V2", 900, 20), metrics("V1", 900, 20)),
      policy
    );
    expect(result.map((o) => o.toVenue)).toEqual(["V1", "V2"]);
  });

  it("ranks higher-yield targets first under the yield-maximizing policy", () => {
    const scorer = new ReallocationScorer(flatCost(0n), { clock });
    const yieldFirst = buildPolicy(OrchestrationKind.YIELD_MAXIMIZING);
    const riskFirst = buildPolicy(OrchestrationKind.RISK_MINIMIZING);
    const venues = market(metrics("L", 500, 20), metrics("fast", 1_000, 35), metrics("safe", 700, 5));

    expect(scorer.score([detection("L", 100_000n)], venues, yieldFirst)[0].toVenue).toBe("fast");
    expect(scorer.score([detection("L", 100_000n)], venues, riskFirst)[0].toVenue).toBe("safe");
  });
});

describe("compareOpportunities", () => {
  const base: ReallocationOpportunity = {
    id: "a",
    asset: ASSET,
    fromVenue: "L",
    toVenue: "V",
    amount: 1n,
    currentYield: 0,
    targetYield: 0,
    yieldImprovement: 0,
    minSpreadBps: 0,
    estimatedCost: 0n,
    netBenefit: 100n,
    riskScore: 10,
    confidence: 1,
    score: 0.5,
    createdAt: T0,
    expiresAt: T0,
  };

  it("orders by score, net benefit, risk, then venue id", () => {
    const list = [
      { ...base, id: "low-score", score: 0.4 },
      { ...base, id: "riskier", riskScore: 20 },
      { ...base, id: "richer", netBenefit: 200n },
      { ...base, id: "z", toVenue: "Z" },
      { ...base, id: "a" },
    ];
    expect(list.sort(compareOpportunities).map((o) => o.id)).toEqual(["richer", "a", "z", "riskier", "low-score"]);
  });

  it("bestPerSource keeps the top entry of each source venue", () => {
    const best = bestPerSource([
      { ...base, id: "l-second", score: 0.3 },
      { ...base, id: "s-only", fromVenue: "S", score: 0.6 },
      { ...base, id: "l-first", score: 0.9 },
    ]);
    expect(best.map((o) => o.id)).toEqual(["l-first", "s-only"]);
  });
});

describe("liquidityScore", () => {
  it("steps down as depth approaches the amount", () => {
    expect(liquidityScore(220n, 100n)).toBe(1.0);
    expect(liquidityScore(219n, 100n)).toBe(0.9);
    expect(liquidityScore(110n, 100n)).toBe(0.9);
    expect(liquidityScore(109n, 100n)).toBe(0.7);
    expect(liquidityScore(100n, 100n)).toBe(0.7);
    expect(liquidityScore(99n, 100n)).toBe(0.3);
  });
});

describe("GasCostModel", () => {
  const model = new GasCostModel({ fixedUsdPerCall: 5, costBps: 5 });
  const input = { asset: ASSET, fromVenue: "L", toVenue: "V", amount: 100_000_000n, decimals: 6, priceUsd: 1 };

  it("charges two venue calls plus the proportional fee", () => {
    expect(model.estimate(input)).toBe(10_050_000n);
  });

  it("charges one call when the source is the unallocated bucket", () => {
    expect(model.estimate({ ...input, fromVenue: UNALLOCATED_VENUE })).toBe(5_050_000n);
  });

  it("converts the fixed fee with the asset price", () => {
    expect(model.estimate({ ...input, priceUsd: 2 })).toBe(5_050_000n);
  });

  it("falls back to the proportional fee without a price", () => {
    expect(model.estimate({ ...input, priceUsd: null })).toBe(50_000n);
  });
});

describe("collectMarketSnapshot", () => {
  it("gathers metrics and headroom and reports failing venues", async () => {
    const { clock } = manualClock();
    const registry = new VenueRegistry();
    const L = simulatedVenue("L", VenueKind.LENDING, { yieldBps: 500, liquidityDepth: 2_000_000n });
    const V = simulatedVenue("V", VenueKind.VAULT_STRATEGY, { yieldBps: 900 });
    registry.register(L, { maxCapacity: 800_000n });
    registry.register(V);
    const ledger = new CapitalLedger(registry, { clock });
    ledger.registerAsset(REGISTRATION);
    ledger.setTargetWeights(ASSET, { L: 10_000 });
    await ledger.deposit(ASSET, 500_000n);
    V.failOn("queryLiquidityDepth");

    const snapshot = await collectMarketSnapshot(
      {
        ledger,
        registry,
        yields: new AdapterYieldOracle(registry),
        risks: new TableRiskOracle([{ venue: "L", risk: 20 }, { venue: "V", risk: 30 }]),
        prices: new TablePriceOracle(),
      },
      ASSET,
      T0
    );

    expect(snapshot.venues.get("L")).toEqual({
      venueId: "L",
      yieldBps: 500,
      riskScore: 20,
      liquidityDepth: 2_000_000n,
      headroom: 300_000n,
      isAvailable: true,
    });
    expect(snapshot.venues.has("V")).toBe(false);
    expect(snapshot.unavailable).toEqual(["V"]);
    expect(snapshot.priceUsd).toBeNull();
    expect(snapshot.venues.get(UNALLOCATED_VENUE)?.yieldBps).toBe(0);
  });
});
