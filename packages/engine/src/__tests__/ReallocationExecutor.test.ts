import { describe, it, expect, beforeEach } from "vitest";
import {
  ErrorCode,
  InvariantViolationError,
  OpportunityExpiredError,
  OpportunityStatus,
  RateLimitedError,
  ReentrancyError,
  StaleOpportunityError,
  UNALLOCATED_VENUE,
  ValidationError,
  VenueUnavailableError,
  type ReallocationOpportunity,
} from "@idleflow/common";
import { AdapterYieldOracle } from "@idleflow/adapters";
import { ReallocationExecutor } from "../executor/ReallocationExecutor.js";
import { ADMIN, ASSET, T0, asError, buildEngine } from "./fixtures.js";

type Harness = Awaited<ReturnType<typeof buildEngine>>;

function opportunity(patch: Partial<ReallocationOpportunity> = {}): ReallocationOpportunity {
  return {
    id: "opp-b",
    asset: ASSET,
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
    score: 0.8,
    createdAt: T0,
    expiresAt: T0 + 300_000,
    ...patch,
  };
}

function withdrawCalls(h: Harness, venue: "L" | "V" | "S") {
  return h[venue].calls.filter((c) => c.op === "withdraw");
}

describe("ReallocationExecutor", () => {
  let h: Harness;

  beforeEach(async () => {
    h = await buildEngine();
    await h.engine.scan(ADMIN, ASSET);
  });

  describe("execute", () => {
    it("moves capital between venues without changing the total", async () => {
      const { executor, ledger, rateLimiter } = h.engine;
      executor.submit([opportunity()]);

      const report = await executor.execute("opp-b");

      expect(report).toEqual({
        opportunityId: "opp-b",
        asset: ASSET,
        fromVenue: "L",
        toVenue: "V",
        amount: 100_000n,
        estimatedYieldImprovement: 400,
        actualYieldImprovement: 400,
        completedAt: T0,
      });
      expect(ledger.balanceOf(ASSET, "L")).toBe(600_000n);
      expect(ledger.balanceOf(ASSET, "V")).toBe(400_000n);
      expect(ledger.totalDeposited(ASSET)).toBe(1_000_000n);
      expect(h.L.balanceOf(ASSET)).toBe(600_000n);
      expect(h.V.balanceOf(ASSET)).toBe(400_000n);
      expect(executor.get("opp-b")).toMatchObject({ status: OpportunityStatus.COMPLETED, movedAmount: 100_000n });
      expect(rateLimiter.state(ASSET).lastReallocationAt).toBe(T0);
      // Only strategy runs leave yields to settle later
      expect(executor.outcomes()).toEqual([]);
    });

    it("fails a short withdrawal without touching the target", async () => {
      const { executor, ledger, rateLimiter } = h.engine;
      h.L.setFillRatio("withdraw", 8_000);
      executor.submit([opportunity()]);

      const err: unknown = await executor.execute("opp-b").catch((e: unknown) => e);

      expect(asError(err, VenueUnavailableError).step).toBe("withdraw");
      expect(executor.get("opp-b")).toMatchObject({
        status: OpportunityStatus.FAILED,
        failure: { step: "withdraw" },
        movedAmount: 0n,
      });
      expect(h.V.balanceOf(ASSET)).toBe(300_000n);
      expect(h.L.balanceOf(ASSET)).toBe(700_000n);
      expect(ledger.snapshot(ASSET).balances).toEqual({ [UNALLOCATED_VENUE]: 0n, L: 700_000n, V: 300_000n });
      expect(rateLimiter.state(ASSET).lastReallocationAt).toBeNull();
    });

    it("returns funds to the source when the deposit fails", async () => {
      const { executor, ledger } = h.engine;
      h.V.failOn("deposit");
      executor.submit([opportunity()]);

      await expect(executor.execute("opp-b")).rejects.toThrow("Venue V unavailable during deposit");

      expect(executor.get("opp-b")?.failure?.step).toBe("deposit");
      expect(ledger.balanceOf(ASSET, "L")).toBe(700_000n);
      expect(h.L.balanceOf(ASSET)).toBe(700_000n);
    });

    it("records funds the source will not take back as unallocated", async () => {
      const { executor, ledger } = h.engine;
      h.V.failOn("deposit");
      h.L.failOn("deposit");
      executor.submit([opportunity()]);

      await expect(executor.execute("opp-b")).rejects.toBeInstanceOf(VenueUnavailableError);

      expect(ledger.balanceOf(ASSET, "L")).toBe(600_000n);
      expect(ledger.availableLiquidity(ASSET)).toBe(100_000n);
      expect(ledger.totalDeposited(ASSET)).toBe(1_000_000n);
    });

    it("records the accepted part of a partial deposit", async () => {
      const { executor, ledger, rateLimiter } = h.engine;
      h.V.setFillRatio("deposit", 6_000);
      executor.submit([opportunity()]);

      await expect(executor.execute("opp-b")).rejects.toBeInstanceOf(VenueUnavailableError);

      expect(ledger.balanceOf(ASSET, "V")).toBe(360_000n);
      expect(ledger.balanceOf(ASSET, "L")).toBe(640_000n);
      expect(executor.get("opp-b")).toMatchObject({ status: OpportunityStatus.FAILED, movedAmount: 60_000n });
      expect(rateLimiter.state(ASSET).lastReallocationAt).toBe(T0);
    });

    it("rejects an expired opportunity even when still profitable", async () => {
      const { executor } = h.engine;
      executor.submit([opportunity()]);
      h.time.advance(300_001);

      await expect(executor.execute("opp-b")).rejects.toBeInstanceOf(OpportunityExpiredError);

      expect(executor.get("opp-b")?.status).toBe(OpportunityStatus.EXPIRED);
      expect(withdrawCalls(h, "L")).toEqual([]);
    });

    it("fails as stale when the spread has closed", async () => {
      const { executor } = h.engine;
      executor.submit([opportunity()]);
      h.V.setMarket(ASSET, { yieldBps: 520 });

      await expect(executor.execute("opp-b")).rejects.toBeInstanceOf(StaleOpportunityError);

      expect(executor.get("opp-b")).toMatchObject({
        status: OpportunityStatus.FAILED,
        failure: { step: "validate" },
      });
      expect(withdrawCalls(h, "L")).toEqual([]);
    });

    it("enforces the cooldown between reallocations", async () => {
      const { executor } = h.engine;
      executor.submit([opportunity(), opportunity({ id: "opp-2" })]);
      await executor.execute("opp-b");

      const err: unknown = await executor.execute("opp-2").catch((e: unknown) => e);

      expect(asError(err, RateLimitedError).retryAt).toBe(T0 + 3_600_000);
      expect(executor.get("opp-2")?.status).toBe(OpportunityStatus.PROPOSED);
    });

    it("caps a single move at the configured share of idle capital", async () => {
      const { executor } = h.engine;
      h.engine.setRateLimit(ADMIN, ASSET, { maxReallocationPctBps: 5_000 });
      executor.submit([opportunity({ amount: 200_000n })]);

      const err: unknown = await executor.execute("opp-b").catch((e: unknown) => e);

      expect(asError(err, RateLimitedError).retryAt).toBeNull();
      expect(executor.get("opp-b")?.status).toBe(OpportunityStatus.PROPOSED);
      expect(withdrawCalls(h, "L")).toEqual([]);
    });

    it("refuses to run on a halted asset", async () => {
      const { executor, ledger } = h.engine;
      executor.submit([opportunity()]);
      ledger.halt(ASSET, "manual review");

      await expect(executor.execute("opp-b")).rejects.toBeInstanceOf(InvariantViolationError);
      expect(executor.get("opp-b")?.status).toBe(OpportunityStatus.FAILED);
    });

    it("rejects unknown and already finished opportunities", async () => {
      const { executor } = h.engine;
      await expect(executor.execute("missing")).rejects.toBeInstanceOf(ValidationError);

      executor.submit([opportunity()]);
      await executor.execute("opp-b");
      await expect(executor.execute("opp-b")).rejects.toThrow("Opportunity opp-b is completed");
    });

    it("rejects a reentrant execution from a venue callback", async () => {
      const { executor } = h.engine;
      executor.submit([opportunity(), opportunity({ id: "opp-2" })]);
      let inner: unknown;
      h.V.onDeposit(async () => {
        inner = await executor.execute("opp-2").catch((e: unknown) => e);
      });

      await executor.execute("opp-b");

      expect(inner).toBeInstanceOf(ReentrancyError);
      expect(executor.get("opp-2")?.status).toBe(OpportunityStatus.PROPOSED);
    });

    it("expires stale proposals in bulk", () => {
      const { executor } = h.engine;
      executor.submit([opportunity(), opportunity({ id: "later", expiresAt: T0 + 900_000 })]);
      h.time.advance(600_000);

      expect(executor.expireStale()).toBe(1);
      expect(executor.get("opp-b")?.status).toBe(OpportunityStatus.EXPIRED);
      expect(executor.get("later")?.status).toBe(OpportunityStatus.PROPOSED);
    });
  });

  describe("executeBatch", () => {
    it("re-checks target capacity before each move of a cycle", async () => {
      h = await buildEngine({}, { S: 150_000n });
      await h.engine.scan(ADMIN, ASSET);
      const { executor, ledger } = h.engine;
      const toStaking = { toVenue: "S", targetYield: 700, yieldImprovement: 200, riskScore: 10 };
      executor.submit([opportunity({ ...toStaking, id: "a" }), opportunity({ ...toStaking, id: "b" })]);

      const result = await executor.executeBatch(ASSET, ["a", "b"]);

      expect(result.executed.map((r) => r.opportunityId)).toEqual(["a"]);
      expect(result.failures).toEqual([
        {
          fromVenue: "L",
          toVenue: "S",
          amount: 100_000n,
          opportunityId: "b",
          code: ErrorCode.VALIDATION,
          reason: "Venue S can take 50000 more, 100000 requested",
        },
      ]);
      expect(executor.get("b")).toMatchObject({ status: OpportunityStatus.FAILED, failure: { step: "validate" } });
      expect(ledger.balanceOf(ASSET, "S")).toBe(100_000n);
      expect(ledger.balanceOf(ASSET, "L")).toBe(600_000n);
      expect(h.S.balanceOf(ASSET)).toBe(100_000n);
    });
  });

  describe("opportunity book", () => {
    it("drops finished opportunities after the retention window", async () => {
      const { engine } = h;
      for (let cycle = 0; cycle < 200; cycle++) {
        await engine.proposeReallocations(ADMIN, ASSET);
        h.time.advance(300_001);
        engine.executor.expireStale();
      }

      // Two proposals per cycle; the last twelve cycles fall inside the hour
      expect(engine.opportunities()).toHaveLength(24);
      expect(engine.stats().opportunities[OpportunityStatus.EXPIRED]).toBe(400);
      expect(engine.stats().opportunities[OpportunityStatus.PROPOSED]).toBe(0);
    });

    it("keeps at most the configured number of finished opportunities", () => {
      const { engine } = h;
      const executor = new ReallocationExecutor(
        {
          ledger: engine.ledger,
          registry: engine.registry,
          detector: engine.detector,
          yields: new AdapterYieldOracle(engine.registry),
          risks: h.risks,
          prices: h.prices,
          scorer: engine.scorer,
          rateLimiter: engine.rateLimiter,
          strategies: engine.strategies,
        },
        { recordLimit: 3, clock: h.time.clock }
      );
      executor.submit(Array.from({ length: 5 }, (_, i) => opportunity({ id: `old-${i}` })));
      h.time.advance(300_001);

      expect(executor.expireStale()).toBe(5);
      expect(executor.list().map((r) => r.opportunity.id)).toEqual(["old-2", "old-3", "old-4"]);
      expect(executor.statusCounts()[OpportunityStatus.EXPIRED]).toBe(5);
    });
  });

  describe("emergencyReallocate", () => {
    it("moves capital to the lowest-risk venue, ignoring the cooldown", async () => {
      const { executor, ledger, rateLimiter } = h.engine;
      executor.submit([opportunity()]);
      await executor.execute("opp-b");

      const result = await executor.emergencyReallocate(ASSET, "V", 200_000n);

      expect(result).toEqual({
        asset: ASSET,
        fromVenue: "V",
        requested: 200_000n,
        withdrawn: 200_000n,
        placements: [{ venueId: "S", amount: 200_000n }],
        unallocated: 0n,
      });
      expect(ledger.balanceOf(ASSET, "V")).toBe(200_000n);
      expect(ledger.balanceOf(ASSET, "S")).toBe(200_000n);
      expect(ledger.totalDeposited(ASSET)).toBe(1_000_000n);
      expect(rateLimiter.state(ASSET).lastReallocationAt).toBe(T0);
    });

    it("prefers the named safe venue among equally risky ones", async () => {
      h.risks.set({ venue: "L", risk: 10 });

      const result = await h.engine.executor.emergencyReallocate(ASSET, "V", 200_000n, "L");

      expect(result.placements).toEqual([{ venueId: "L", amount: 200_000n }]);
    });

    it("accepts a partial withdrawal", async () => {
      h.V.setFillRatio("withdraw", 5_000);

      const result = await h.engine.executor.emergencyReallocate(ASSET, "V", 200_000n);

      expect(result.withdrawn).toBe(100_000n);
      expect(h.engine.ledger.balanceOf(ASSET, "V")).toBe(200_000n);
      expect(h.engine.ledger.balanceOf(ASSET, "S")).toBe(100_000n);
    });

    it("holds the funds as unallocated when no venue accepts them", async () => {
      h.S.failOn("deposit");
      h.L.failOn("deposit");

      const result = await h.engine.executor.emergencyReallocate(ASSET, "V", 200_000n);

      expect(result.placements).toEqual([]);
      expect(result.unallocated).toBe(200_000n);
      expect(h.engine.ledger.availableLiquidity(ASSET)).toBe(200_000n);
      expect(h.engine.ledger.balanceOf(ASSET, "V")).toBe(100_000n);
    });

    it("rejects more than the venue holds", async () => {
      await expect(h.engine.executor.emergencyReallocate(ASSET, "V", 400_000n)).rejects.toThrow(
        "requested 400000, available 300000"
      );
    });
  });
});
