// ============================================
// Reallocation Executor
//
//   proposed → validated → executing → completed | failed
//   proposed → expired
//
// Every run holds the asset lock and moves funds in the order
// withdraw → deposit → ledger record. The ledger only ever records where
// funds physically ended up.
// ============================================

import {
  clampAmount,
  createLogger,
  DEFAULT_OPPORTUNITY_RETENTION_MS,
  errorMessage,
  InsufficientLiquidityError,
  isEngineError,
  minBigInt,
  OpportunityExpiredError,
  OpportunityStatus,
  RateLimitedError,
  splitByWeights,
  StaleOpportunityError,
  sumAmounts,
  UNALLOCATED_VENUE,
  ValidationError,
  VenueUnavailableError,
  DEFAULT_OPPORTUNITY_TTL_MS,
  type AssetId,
  type ExecutionReport,
  type ExecutionStep,
  type OpportunityRecord,
  type ReallocationOpportunity,
  type ScoringPolicy,
  type VenueDelta,
  type VenueId,
  type YieldOutcome,
} from "@idleflow/common";
import type { PriceOracle, RiskOracle, VenueRegistry, YieldOracle } from "@idleflow/adapters";
import type { CapitalLedger } from "../ledger/CapitalLedger.js";
import type { IdleCapitalDetector } from "../detector/IdleCapitalDetector.js";
import { collectMarketSnapshot, type MarketSnapshot } from "../scorer/MarketSnapshot.js";
import { compareOpportunities, type DiscardReason, type ReallocationScorer } from "../scorer/ReallocationScorer.js";
import { buildPolicy } from "../strategy/policies.js";
import type { StrategyBook } from "../strategy/StrategyBook.js";
import { RateLimiter, type CycleBudget } from "./RateLimiter.js";
import { AuditTrail } from "../audit/AuditTrail.js";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:executor");

export interface ExecutorDeps {
  ledger: CapitalLedger;
  registry: VenueRegistry;
  detector: IdleCapitalDetector;
  yields: YieldOracle;
  risks: RiskOracle;
  prices: PriceOracle;
  scorer: ReallocationScorer;
  rateLimiter: RateLimiter;
  strategies: StrategyBook;
}

export interface ExecutorOptions {
  /** Lifetime of opportunities built for strategy runs */
  opportunityTtlMs?: number;
  /** How long finished opportunities stay in the book */
  opportunityRetentionMs?: number;
  /** Finished opportunities kept at most, oldest dropped first */
  recordLimit?: number;
  outcomeLimit?: number;
  clock?: Clock;
  audit?: AuditTrail;
}

export interface ChunkFailure {
  fromVenue: VenueId;
  toVenue: VenueId;
  amount: bigint;
  opportunityId?: string;
  code?: string;
  reason: string;
}

export interface StrategyRunResult {
  strategyId: string;
  asset: AssetId;
  idleAvailable: bigint;
  planned: VenueDelta[];
  executed: ExecutionReport[];
  failures: ChunkFailure[];
  executedAt: number;
}

export interface BatchResult {
  asset: AssetId;
  executed: ExecutionReport[];
  failures: ChunkFailure[];
}

export interface EmergencyResult {
  asset: AssetId;
  fromVenue: VenueId;
  requested: bigint;
  withdrawn: bigint;
  placements: VenueDelta[];
  unallocated: bigint;
}

/** Target yield a strategy moved capital on, waiting to be compared with what the venue pays later */
interface YieldForecast {
  asset: AssetId;
  venue: VenueId;
  forecastYield: number;
  strategyId: string;
  at: number;
}

const TERMINAL = new Set([OpportunityStatus.COMPLETED, OpportunityStatus.FAILED, OpportunityStatus.EXPIRED]);

function emptyCounts(): Record<OpportunityStatus, number> {
  return {
    [OpportunityStatus.PROPOSED]: 0,
    [OpportunityStatus.VALIDATED]: 0,
    [OpportunityStatus.EXECUTING]: 0,
    [OpportunityStatus.COMPLETED]: 0,
    [OpportunityStatus.FAILED]: 0,
    [OpportunityStatus.EXPIRED]: 0,
  };
}

function discardMessage(reason: DiscardReason, source: VenueId, target: VenueId, policy: ScoringPolicy): string {
  switch (reason) {
    case "no_improvement":
      return `Yield gain from ${source} to ${target} is not above ${policy.yieldThresholdBps} bps`;
    case "risk_increase":
      return `Risk increase from ${source} to ${target} exceeds ${policy.maxRiskIncrease}`;
    case "no_capacity":
      return `Venue ${target} has no capacity left`;
    case "no_net_benefit":
      return `Moving from ${source} to ${target} does not cover its cost`;
  }
}

export class ReallocationExecutor {
  private records = new Map<string, OpportunityRecord>();
  private outcomeLog: YieldOutcome[] = [];
  private forecasts: YieldForecast[] = [];

  // Totals survive pruning of the book
  private finished = emptyCounts();
  private volume = new Map<AssetId, bigint>();

  private readonly opportunityTtlMs: number;
  private readonly retentionMs: number;
  private readonly recordLimit: number;
  private readonly outcomeLimit: number;
  private readonly clock: Clock;
  private readonly audit: AuditTrail;

  constructor(private deps: ExecutorDeps, opts: ExecutorOptions = {}) {
    this.opportunityTtlMs = opts.opportunityTtlMs ?? DEFAULT_OPPORTUNITY_TTL_MS;
    this.retentionMs = opts.opportunityRetentionMs ?? DEFAULT_OPPORTUNITY_RETENTION_MS;
    this.recordLimit = opts.recordLimit ?? 1_000;
    this.outcomeLimit = opts.outcomeLimit ?? 1_000;
    this.clock = opts.clock ?? systemClock;
    this.audit = opts.audit ?? new AuditTrail({ clock: this.clock });
  }

  // ---- Opportunity book ----

  submit(opportunities: readonly ReallocationOpportunity[]): OpportunityRecord[] {
    const now = this.clock();
    this.prune(now);
    const accepted: OpportunityRecord[] = [];
    for (const opportunity of opportunities) {
      if (this.records.has(opportunity.id)) continue;
      const record: OpportunityRecord = {
        opportunity,
        status: OpportunityStatus.PROPOSED,
        movedAmount: 0n,
        updatedAt: now,
      };
      this.records.set(opportunity.id, record);
      accepted.push(record);
      this.audit.record(
        "opportunity.proposed",
        {
          id: opportunity.id,
          fromVenue: opportunity.fromVenue,
          toVenue: opportunity.toVenue,
          amount: opportunity.amount,
          netBenefit: opportunity.netBenefit,
        },
        { asset: opportunity.asset }
      );
    }
    return accepted.map((r) => this.copy(r));
  }

  get(id: string): OpportunityRecord | undefined {
    const record = this.records.get(id);
    return record ? this.copy(record) : undefined;
  }

  list(asset?: AssetId): OpportunityRecord[] {
    return Array.from(this.records.values())
      .filter((r) => asset === undefined || r.opportunity.asset === asset)
      .map((r) => this.copy(r));
  }

  /** Mark every proposed opportunity past its expiry; returns how many */
  expireStale(): number {
    const now = this.clock();
    let expired = 0;
    for (const record of this.records.values()) {
      if (record.status === OpportunityStatus.PROPOSED && now > record.opportunity.expiresAt) {
        this.expire(record, now);
        expired++;
      }
    }
    this.prune(now);
    return expired;
  }

  /** Open opportunities from the book; finished ones counted since start */
  statusCounts(): Record<OpportunityStatus, number> {
    const counts = { ...this.finished };
    for (const record of this.records.values()) {
      if (!TERMINAL.has(record.status)) counts[record.status]++;
    }
    return counts;
  }

  /** Capital that landed in a target venue since start */
  reallocatedVolume(asset: AssetId): bigint {
    return this.volume.get(asset) ?? 0n;
  }

  /** Settled realized-vs-forecast yields, most recent last */
  outcomes(strategyId?: string): YieldOutcome[] {
    return this.outcomeLog.filter((o) => strategyId === undefined || o.strategyId === strategyId);
  }

  /**
   * Compare the yield each venue pays now with the yield a strategy moved
   * capital on in earlier runs. Every forecast is settled once; one whose
   * venue cannot be quoted stays pending.
   */
  async settleOutcomes(strategyId: string): Promise<YieldOutcome[]> {
    const now = this.clock();
    const settled: YieldOutcome[] = [];
    const done = new Set<YieldForecast>();
    for (const forecast of this.forecasts) {
      if (forecast.strategyId !== strategyId || forecast.at >= now) continue;
      try {
        const realizedYield = await this.deps.yields.get(forecast.asset, forecast.venue);
        settled.push({ venue: forecast.venue, forecastYield: forecast.forecastYield, realizedYield, strategyId, at: now });
        done.add(forecast);
      } catch (err) {
        logger.warn(`Could not settle yield of ${forecast.venue}`, { strategyId, error: errorMessage(err) });
      }
    }
    this.forecasts = this.forecasts.filter((f) => !done.has(f));

    for (const outcome of settled) {
      this.outcomeLog.push(outcome);
      if (this.outcomeLog.length > this.outcomeLimit) this.outcomeLog.shift();
    }
    return settled;
  }

  // ---- Execution ----

  async execute(opportunityId: string): Promise<ExecutionReport> {
    const record = this.require(opportunityId);
    return this.deps.ledger.lock.run(record.opportunity.asset, "execute", () => this.run(record, null));
  }

  /**
   * Execute several opportunities of one asset as a single cycle: one lock,
   * one cooldown check and one shared cap. Failures are collected.
   */
  async executeBatch(asset: AssetId, opportunityIds: readonly string[]): Promise<BatchResult> {
    const { ledger, detector, rateLimiter } = this.deps;
    const records = opportunityIds.map((id) => {
      const record = this.require(id);
      if (record.opportunity.asset !== asset) {
        throw new ValidationError(`Opportunity ${id} belongs to ${record.opportunity.asset}, not ${asset}`);
      }
      return record;
    });

    return ledger.lock.run(asset, "executeBatch", async () => {
      const budget = rateLimiter.beginCycle(asset, detector.idleCapital(asset), this.clock());
      const executed: ExecutionReport[] = [];
      const failures: ChunkFailure[] = [];
      for (const record of records) {
        const opp = record.opportunity;
        try {
          executed.push(await this.run(record, budget));
        } catch (err) {
          failures.push(this.chunkFailure(opp.fromVenue, opp.toVenue, opp.amount, opp.id, err));
        }
      }
      return { asset, executed, failures };
    });
  }

  /**
   * Distribute the reallocatable idle capital of the strategy's source
   * venues across its targets by weight. Each (source, target) chunk is
   * priced under the strategy's orchestration policy and executed on its
   * own, best score first; failures are collected, not thrown.
   */
  async executeStrategy(strategyId: string): Promise<StrategyRunResult> {
    const { strategies, ledger, registry, detector, yields, risks, prices, rateLimiter } = this.deps;
    const strategy = strategies.require(strategyId);
    if (!strategy.active) throw new ValidationError(`Strategy ${strategyId} is inactive`);

    const now = this.clock();
    if (strategy.lastExecution !== null && now - strategy.lastExecution < strategy.executionFrequencyMs) {
      const retryAt = strategy.lastExecution + strategy.executionFrequencyMs;
      throw new RateLimitedError(`Strategy ${strategyId} may not run again before ${retryAt}`, retryAt, {
        strategyId,
      });
    }
    const policy = buildPolicy(strategy.orchestration, {
      yieldThresholdBps: strategy.minYieldImprovement,
      maxRiskIncrease: strategy.maxRiskIncrease,
      opportunityTtlMs: this.opportunityTtlMs,
    });

    return ledger.lock.run(strategy.asset, "executeStrategy", async () => {
      const { asset } = strategy;
      ledger.assertMutable(asset);

      const remaining = new Map<VenueId, bigint>();
      for (const venue of strategy.sourceVenues) {
        const idle = minBigInt(detector.reallocatableAmount(asset, venue), ledger.balanceOf(asset, venue));
        if (idle > 0n) remaining.set(venue, idle);
      }
      const sourceIdle = sumAmounts(remaining.values());

      const budget = rateLimiter.beginCycle(asset, detector.idleCapital(asset), now);
      const idleAvailable = minBigInt(sourceIdle, budget.cap);
      this.trimSources(remaining, idleAvailable);

      const shares = splitByWeights(idleAvailable, strategy.targetWeights);
      const planned = strategy.targetVenues.map((venueId, i) => ({ venueId, amount: shares[i] }));
      const market = await collectMarketSnapshot({ ledger, registry, yields, risks, prices }, asset, now);

      const quoted: ReallocationOpportunity[] = [];
      const failures: ChunkFailure[] = [];
      for (const { venueId: target, amount } of planned) {
        let wanted = amount;

        // Capital already sitting in a target that is also a source stays put
        const inPlace = minBigInt(remaining.get(target) ?? 0n, wanted);
        if (inPlace > 0n) {
          remaining.set(target, (remaining.get(target) ?? 0n) - inPlace);
          wanted -= inPlace;
        }

        for (const [source, available] of remaining) {
          if (wanted === 0n) break;
          if (source === target || available === 0n) continue;
          const chunk = minBigInt(available, wanted);
          remaining.set(source, available - chunk);
          wanted -= chunk;

          try {
            quoted.push(this.quoteChunk(market, policy, strategyId, source, target, chunk));
          } catch (err) {
            failures.push(this.chunkFailure(source, target, chunk, undefined, err));
          }
        }
      }

      quoted.sort(compareOpportunities);
      this.submit(quoted);
      const executed: ExecutionReport[] = [];
      for (const opportunity of quoted) {
        try {
          executed.push(await this.run(this.require(opportunity.id), budget));
        } catch (err) {
          failures.push(this.chunkFailure(opportunity.fromVenue, opportunity.toVenue, opportunity.amount, opportunity.id, err));
        }
      }

      strategies.markExecuted(strategyId, now);
      logger.info(`Strategy executed: ${strategy.name}`, {
        strategyId,
        policy: policy.kind,
        idleAvailable,
        executed: executed.length,
        failed: failures.length,
      });
      this.audit.record(
        "strategy.executed",
        { strategyId, idleAvailable, planned, executed: executed.length, failures },
        { asset, severity: failures.length > 0 ? "warning" : "info" }
      );
      return { strategyId, asset, idleAvailable, planned, executed, failures, executedAt: now };
    });
  }

  /**
   * Evacuate `amount` from a venue without cooldown or yield checks.
   * Destinations are tried from lowest risk; `toSafeVenue` wins ties.
   * Whatever no destination accepts is recorded as unallocated.
   */
  async emergencyReallocate(
    asset: AssetId,
    fromVenue: VenueId,
    amount: bigint,
    toSafeVenue?: VenueId
  ): Promise<EmergencyResult> {
    const { ledger, registry } = this.deps;
    if (amount <= 0n) throw new ValidationError("Emergency amount must be positive");
    registry.require(fromVenue);
    if (toSafeVenue !== undefined) {
      registry.require(toSafeVenue);
      if (toSafeVenue === fromVenue) throw new ValidationError("Safe venue must differ from the source venue");
    }

    return ledger.lock.run(asset, "emergencyReallocate", async () => {
      ledger.assertMutable(asset);
      const balance = ledger.balanceOf(asset, fromVenue);
      if (amount > balance) throw new InsufficientLiquidityError(asset, amount, balance);

      let withdrawn: bigint;
      try {
        withdrawn = clampAmount(await registry.require(fromVenue).withdraw(asset, amount), amount);
      } catch (err) {
        throw new VenueUnavailableError(fromVenue, "withdraw", errorMessage(err), { asset, amount });
      }
      if (withdrawn === 0n) {
        throw new VenueUnavailableError(fromVenue, "withdraw", "venue released nothing", { asset, amount });
      }

      const placements: VenueDelta[] = [];
      let remaining = withdrawn;
      for (const venue of await this.safeDestinations(asset, fromVenue, toSafeVenue)) {
        if (remaining === 0n) break;
        const capacity = registry.maxCapacity(venue);
        const headroom = capacity === undefined ? remaining : capacity - ledger.balanceOf(asset, venue);
        const want = minBigInt(remaining, headroom);
        if (want <= 0n) continue;

        let placed = 0n;
        try {
          placed = clampAmount(await registry.require(venue).deposit(asset, want), want);
        } catch (err) {
          logger.warn(`Emergency deposit into ${venue} failed`, { asset, want, error: errorMessage(err) });
          continue;
        }
        if (placed > 0n) {
          ledger.rebalanceRecord(asset, fromVenue, venue, placed);
          placements.push({ venueId: venue, amount: placed });
          remaining -= placed;
        }
      }

      if (remaining > 0n) ledger.rebalanceRecord(asset, fromVenue, UNALLOCATED_VENUE, remaining);

      logger.warn(`Emergency reallocation from ${fromVenue}`, { asset, withdrawn, placements, unallocated: remaining });
      this.audit.record(
        "emergency.reallocated",
        { fromVenue, requested: amount, withdrawn, placements, unallocated: remaining },
        { asset, severity: "warning" }
      );
      return { asset, fromVenue, requested: amount, withdrawn, placements, unallocated: remaining };
    });
  }

  // ---- Internals ----

  /** Single execution; the caller holds the asset lock */
  private async run(record: OpportunityRecord, budget: CycleBudget | null): Promise<ExecutionReport> {
    const { ledger, registry, rateLimiter } = this.deps;
    const opp = record.opportunity;
    const now = this.clock();

    if (record.status !== OpportunityStatus.PROPOSED) {
      throw new ValidationError(`Opportunity ${opp.id} is ${record.status}`);
    }
    if (now > opp.expiresAt) {
      this.expire(record, now);
      throw new OpportunityExpiredError(opp.id, opp.expiresAt);
    }

    let step: ExecutionStep = "validate";
    try {
      ledger.assertMutable(opp.asset);
      if (!registry.isAvailable(opp.toVenue)) {
        throw new VenueUnavailableError(opp.toVenue, "validate", "venue is inactive or frozen");
      }

      const currentYield = await this.quoteYield(opp.asset, opp.fromVenue);
      const targetYield = await this.quoteYield(opp.asset, opp.toVenue);
      const spread = targetYield - currentYield;
      if (spread <= opp.minSpreadBps) {
        throw new StaleOpportunityError(opp.id, { currentYield, targetYield, minSpreadBps: opp.minSpreadBps });
      }

      const balance = ledger.balanceOf(opp.asset, opp.fromVenue);
      if (balance < opp.amount) throw new InsufficientLiquidityError(opp.asset, opp.amount, balance);

      // Earlier moves in the same cycle may have used up a capped target
      const capacity = registry.maxCapacity(opp.toVenue);
      if (capacity !== undefined) {
        const headroom = capacity - ledger.balanceOf(opp.asset, opp.toVenue);
        if (opp.amount > headroom) {
          throw new ValidationError(
            `Venue ${opp.toVenue} can take ${headroom > 0n ? headroom : 0n} more, ${opp.amount} requested`
          );
        }
      }
      this.transition(record, OpportunityStatus.VALIDATED, now);

      step = "rate_limit";
      const cycle = budget ?? rateLimiter.beginCycle(opp.asset, this.deps.detector.idleCapital(opp.asset), now);
      rateLimiter.consume(cycle, opp.amount);
      this.transition(record, OpportunityStatus.EXECUTING, now);

      step = "withdraw";
      await this.withdrawExact(opp);

      step = "deposit";
      await this.depositOrReturn(record);

      step = "record";
      rateLimiter.record(opp.asset, now);
      record.actualYieldImprovement = spread;
      this.transition(record, OpportunityStatus.COMPLETED, now);
      if (opp.strategyId !== undefined) {
        this.forecasts.push({ asset: opp.asset, venue: opp.toVenue, forecastYield: targetYield, strategyId: opp.strategyId, at: now });
        if (this.forecasts.length > this.outcomeLimit) this.forecasts.shift();
      }

      const report: ExecutionReport = {
        opportunityId: opp.id,
        asset: opp.asset,
        fromVenue: opp.fromVenue,
        toVenue: opp.toVenue,
        amount: opp.amount,
        estimatedYieldImprovement: opp.yieldImprovement,
        actualYieldImprovement: spread,
        completedAt: now,
      };
      logger.info(`Reallocation completed`, { ...report });
      this.audit.record("opportunity.completed", { ...report }, { asset: opp.asset });
      return report;
    } catch (err) {
      if (err instanceof RateLimitedError) {
        // Still a valid proposal; may be retried until it expires
        this.transition(record, OpportunityStatus.PROPOSED, now);
      } else {
        if (record.movedAmount > 0n) rateLimiter.record(opp.asset, now);
        this.fail(record, step, errorMessage(err), now);
      }
      throw err;
    }
  }

  /** Withdraw the full amount or put back what came out and throw */
  private async withdrawExact(opp: ReallocationOpportunity): Promise<void> {
    if (opp.fromVenue === UNALLOCATED_VENUE) return;

    let withdrawn: bigint;
    try {
      withdrawn = clampAmount(await this.deps.registry.require(opp.fromVenue).withdraw(opp.asset, opp.amount), opp.amount);
    } catch (err) {
      throw new VenueUnavailableError(opp.fromVenue, "withdraw", errorMessage(err), { amount: opp.amount });
    }
    if (withdrawn === opp.amount) return;

    const stranded = withdrawn > 0n ? withdrawn - (await this.returnFunds(opp.asset, opp.fromVenue, withdrawn)) : 0n;
    if (stranded > 0n) this.deps.ledger.rebalanceRecord(opp.asset, opp.fromVenue, UNALLOCATED_VENUE, stranded);
    throw new VenueUnavailableError(opp.fromVenue, "withdraw", `short withdrawal: ${withdrawn} of ${opp.amount}`, {
      requested: opp.amount,
      withdrawn,
      stranded,
    });
  }

  /**
   * Deposit into the target and record what landed. A shortfall goes back
   * to the source, or to the unallocated bucket when the source refuses it;
   * the opportunity then fails.
   */
  private async depositOrReturn(record: OpportunityRecord): Promise<void> {
    const { ledger, registry } = this.deps;
    const opp = record.opportunity;
    let deposited = 0n;
    let reason = "";
    try {
      deposited = clampAmount(await registry.require(opp.toVenue).deposit(opp.asset, opp.amount), opp.amount);
      if (deposited < opp.amount) reason = `partial deposit: ${deposited} of ${opp.amount}`;
    } catch (err) {
      reason = errorMessage(err);
    }

    if (deposited > 0n) {
      ledger.rebalanceRecord(opp.asset, opp.fromVenue, opp.toVenue, deposited);
      record.movedAmount = deposited;
      this.volume.set(opp.asset, this.reallocatedVolume(opp.asset) + deposited);
    }
    const leftover = opp.amount - deposited;
    if (leftover === 0n) return;

    let stranded = 0n;
    if (opp.fromVenue !== UNALLOCATED_VENUE) {
      stranded = leftover - (await this.returnFunds(opp.asset, opp.fromVenue, leftover));
      if (stranded > 0n) ledger.rebalanceRecord(opp.asset, opp.fromVenue, UNALLOCATED_VENUE, stranded);
    }
    throw new VenueUnavailableError(opp.toVenue, "deposit", reason, {
      deposited,
      returned: leftover - stranded,
      stranded,
    });
  }

  /** Best-effort redeposit into the source; returns how much it took */
  private async returnFunds(asset: AssetId, venue: VenueId, amount: bigint): Promise<bigint> {
    try {
      return clampAmount(await this.deps.registry.require(venue).deposit(asset, amount), amount);
    } catch (err) {
      logger.error(`Could not return funds to ${venue}`, { asset, amount, error: errorMessage(err) });
      return 0n;
    }
  }

  private async quoteYield(asset: AssetId, venue: VenueId): Promise<number> {
    if (venue === UNALLOCATED_VENUE) return 0;
    try {
      return await this.deps.yields.get(asset, venue);
    } catch (err) {
      throw new VenueUnavailableError(venue, "validate", errorMessage(err));
    }
  }

  /** Price a strategy chunk; throws when the policy rules it out */
  private quoteChunk(
    market: MarketSnapshot,
    policy: ScoringPolicy,
    strategyId: string,
    source: VenueId,
    target: VenueId,
    amount: bigint
  ): ReallocationOpportunity {
    const from = market.venues.get(source);
    if (!from) throw new VenueUnavailableError(source, "validate", "no market data");
    const to = market.venues.get(target);
    if (!to) throw new VenueUnavailableError(target, "validate", "no market data");
    if (!to.isAvailable) throw new VenueUnavailableError(target, "validate", "venue is inactive or frozen");

    const result = this.deps.scorer.quote(market, from, to, amount, policy, strategyId);
    if ("discarded" in result) {
      throw new ValidationError(discardMessage(result.discarded, source, target, policy), [result.discarded]);
    }
    return result.opportunity;
  }

  private chunkFailure(
    fromVenue: VenueId,
    toVenue: VenueId,
    amount: bigint,
    opportunityId: string | undefined,
    err: unknown
  ): ChunkFailure {
    logger.warn(`Reallocation chunk failed`, { fromVenue, toVenue, amount, error: errorMessage(err) });
    return {
      fromVenue,
      toVenue,
      amount,
      opportunityId,
      code: isEngineError(err) ? err.code : undefined,
      reason: errorMessage(err),
    };
  }

  /** Reduce per-source amounts, in order, until they sum to `limit` */
  private trimSources(remaining: Map<VenueId, bigint>, limit: bigint): void {
    let left = limit;
    for (const [venue, amount] of remaining) {
      const keep = minBigInt(amount, left);
      remaining.set(venue, keep);
      left -= keep;
    }
  }

  private async safeDestinations(asset: AssetId, fromVenue: VenueId, preferred?: VenueId): Promise<VenueId[]> {
    const { registry, risks } = this.deps;
    const scored: Array<{ venue: VenueId; risk: number }> = [];
    for (const adapter of registry.getAll()) {
      const venue = adapter.venueId;
      if (venue === fromVenue || !registry.isAvailable(venue)) continue;
      try {
        scored.push({ venue, risk: await risks.get(asset, venue) });
      } catch (err) {
        logger.warn(`No risk score for ${venue}, excluded from emergency routing`, { asset, error: errorMessage(err) });
      }
    }
    scored.sort((a, b) => {
      if (a.risk !== b.risk) return a.risk - b.risk;
      if (a.venue === preferred) return -1;
      if (b.venue === preferred) return 1;
      return a.venue < b.venue ? -1 : a.venue > b.venue ? 1 : 0;
    });
    return scored.map((s) => s.venue);
  }

  private transition(record: OpportunityRecord, status: OpportunityStatus, now: number): void {
    record.status = status;
    record.updatedAt = now;
    if (TERMINAL.has(status)) this.finished[status]++;
  }

  private require(id: string): OpportunityRecord {
    const record = this.records.get(id);
    if (!record) throw new ValidationError(`Unknown opportunity: ${id}`);
    return record;
  }

  /** Drop finished records past the retention window, and the oldest beyond the limit */
  private prune(now: number): void {
    let finished = 0;
    for (const record of this.records.values()) {
      if (TERMINAL.has(record.status)) finished++;
    }
    for (const [id, record] of this.records) {
      if (!TERMINAL.has(record.status)) continue;
      if (finished > this.recordLimit || now - record.updatedAt > this.retentionMs) {
        this.records.delete(id);
        finished--;
      }
    }
  }

  private expire(record: OpportunityRecord, now: number): void {
    this.transition(record, OpportunityStatus.EXPIRED, now);
    this.audit.record("opportunity.expired", { id: record.opportunity.id }, { asset: record.opportunity.asset });
  }

  private fail(record: OpportunityRecord, step: ExecutionStep, reason: string, now: number): void {
    if (TERMINAL.has(record.status)) return;
    record.failure = { step, reason };
    this.transition(record, OpportunityStatus.FAILED, now);
    const opp = record.opportunity;
    logger.warn(`Reallocation failed at ${step}`, { id: opp.id, fromVenue: opp.fromVenue, toVenue: opp.toVenue, reason });
    this.audit.record(
      "opportunity.failed",
      { id: opp.id, step, reason, fromVenue: opp.fromVenue, toVenue: opp.toVenue, amount: opp.amount, moved: record.movedAmount },
      { asset: opp.asset, severity: "warning" }
    );
  }

  private copy(record: OpportunityRecord): OpportunityRecord {
    return { ...record, opportunity: { ...record.opportunity }, failure: record.failure && { ...record.failure } };
  }
}
