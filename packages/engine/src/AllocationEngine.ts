// ============================================
// Allocation Engine
//
// Wires ledger, detector, scorer, executor and strategies together and
// checks the caller's role before each public operation.
// ============================================

import {
  createLogger,
  loadConfig,
  OrchestrationKind,
  type AppConfig,
  type AssetId,
  type AssetRegistration,
  type DepositResult,
  type ExecutionReport,
  type LedgerSnapshot,
  type OpportunityRecord,
  type RateLimitState,
  type ReallocationOpportunity,
  type ReallocationStrategy,
  type ScanReport,
  type StrategyInput,
  type VenueId,
  type WithdrawResult,
} from "@idleflow/common";
import {
  AdapterYieldOracle,
  VenueRegistry,
  type PriceOracle,
  type RegisterVenueOptions,
  type RiskOracle,
  type VenueAdapter,
  type YieldOracle,
} from "@idleflow/adapters";
import { AccessGuard, type Role } from "./access/AccessGuard.js";
import { AuditTrail, type AuditSink } from "./audit/AuditTrail.js";
import { systemClock, type Clock } from "./clock.js";
import { IdleCapitalDetector } from "./detector/IdleCapitalDetector.js";
import { RateLimiter, type RateLimitDefaults } from "./executor/RateLimiter.js";
import {
  ReallocationExecutor,
  type BatchResult,
  type EmergencyResult,
  type StrategyRunResult,
} from "./executor/ReallocationExecutor.js";
import { CapitalLedger } from "./ledger/CapitalLedger.js";
import { GasCostModel, type ExecutionCostModel } from "./scorer/CostModel.js";
import { collectMarketSnapshot } from "./scorer/MarketSnapshot.js";
import { bestPerSource, ReallocationScorer } from "./scorer/ReallocationScorer.js";
import { EngineStats, type EngineStatsReport } from "./stats/EngineStats.js";
import { buildPolicy } from "./strategy/policies.js";
import { StrategyBook } from "./strategy/StrategyBook.js";

const logger = createLogger("engine");

export type EngineSettings = Pick<AppConfig, "detector" | "scorer" | "rateLimit" | "strategy">;

export interface AllocationEngineOptions {
  risks: RiskOracle;
  prices: PriceOracle;
  registry?: VenueRegistry;
  /** Defaults to reading yields from the venue adapters */
  yields?: YieldOracle;
  costModel?: ExecutionCostModel;
  settings?: EngineSettings;
  admins?: readonly string[];
  auditSink?: AuditSink | null;
  clock?: Clock;
  idGenerator?: () => string;
}

export interface ProposalResult {
  scan: ScanReport;
  opportunities: ReallocationOpportunity[];
}

export interface DetectAndReallocateResult extends BatchResult {
  scan: ScanReport;
  proposed: number;
}

export class AllocationEngine {
  readonly registry: VenueRegistry;
  readonly ledger: CapitalLedger;
  readonly detector: IdleCapitalDetector;
  readonly scorer: ReallocationScorer;
  readonly rateLimiter: RateLimiter;
  readonly strategies: StrategyBook;
  readonly executor: ReallocationExecutor;
  readonly access: AccessGuard;
  readonly audit: AuditTrail;
  readonly settings: EngineSettings;

  private readonly yields: YieldOracle;
  private readonly risks: RiskOracle;
  private readonly prices: PriceOracle;
  private readonly clock: Clock;
  private readonly statsView: EngineStats;

  constructor(opts: AllocationEngineOptions) {
    this.clock = opts.clock ?? systemClock;
    this.settings = opts.settings ?? loadConfig({});
    this.registry = opts.registry ?? new VenueRegistry();
    this.yields = opts.yields ?? new AdapterYieldOracle(this.registry);
    this.risks = opts.risks;
    this.prices = opts.prices;
    this.audit = new AuditTrail({ sink: opts.auditSink, clock: this.clock });
    this.access = new AccessGuard(opts.admins);

    const { detector, scorer, rateLimit, strategy } = this.settings;
    this.ledger = new CapitalLedger(this.registry, { clock: this.clock, audit: this.audit });
    this.detector = new IdleCapitalDetector(this.ledger, this.registry, this.yields, {
      ...detector,
      clock: this.clock,
      audit: this.audit,
    });
    this.scorer = new ReallocationScorer(
      opts.costModel ?? new GasCostModel({ fixedUsdPerCall: scorer.costFixedUsd, costBps: scorer.costBps }),
      { clock: this.clock, idGenerator: opts.idGenerator }
    );
    this.rateLimiter = new RateLimiter(rateLimit);
    this.strategies = new StrategyBook(this.ledger, this.registry, {
      minIntervalMs: strategy.minimumIntervalMs,
      adaptAlpha: strategy.adaptAlpha,
      clock: this.clock,
      audit: this.audit,
      idGenerator: opts.idGenerator,
    });
    this.executor = new ReallocationExecutor(
      {
        ledger: this.ledger,
        registry: this.registry,
        detector: this.detector,
        yields: this.yields,
        risks: this.risks,
        prices: this.prices,
        scorer: this.scorer,
        rateLimiter: this.rateLimiter,
        strategies: this.strategies,
      },
      {
        opportunityTtlMs: scorer.opportunityTtlMs,
        opportunityRetentionMs: scorer.opportunityRetentionMs,
        clock: this.clock,
        audit: this.audit,
      }
    );
    this.statsView = new EngineStats(this.ledger, this.detector, this.executor);
  }

  // ---- Access ----

  grantRole(caller: string, principal: string, role: Role): void {
    this.access.require(caller, "admin");
    this.access.grant(principal, role);
  }

  revokeRole(caller: string, principal: string, role: Role): void {
    this.access.require(caller, "admin");
    this.access.revoke(principal, role);
  }

  // ---- Configuration ----

  registerAsset(caller: string, registration: AssetRegistration): void {
    this.access.require(caller, "operator");
    this.ledger.registerAsset(registration);
  }

  registerVenue(caller: string, adapter: VenueAdapter, opts: RegisterVenueOptions = {}): void {
    this.access.require(caller, "operator");
    this.registry.register(adapter, opts);
    this.audit.record("venue.registered", { venueId: adapter.venueId, kind: adapter.kind, maxCapacity: opts.maxCapacity });
  }

  setTargetWeights(caller: string, asset: AssetId, weights: Record<VenueId, number>): void {
    this.access.require(caller, "operator");
    this.ledger.setTargetWeights(asset, weights);
  }

  setRateLimit(caller: string, asset: AssetId, params: RateLimitDefaults): RateLimitState {
    this.access.require(caller, "operator");
    this.ledger.registration(asset);
    return this.rateLimiter.configure(asset, params);
  }

  // ---- Capital ----

  async deposit(caller: string, asset: AssetId, amount: bigint): Promise<DepositResult> {
    this.access.require(caller, "depositor");
    return this.ledger.deposit(asset, amount);
  }

  async withdraw(caller: string, asset: AssetId, amount: bigint, preferredVenueOrder?: VenueId[]): Promise<WithdrawResult> {
    this.access.require(caller, "depositor");
    return this.ledger.withdraw(asset, amount, preferredVenueOrder);
  }

  // ---- Detection & scoring ----

  async scan(caller: string, asset: AssetId): Promise<ScanReport> {
    this.access.require(caller, "keeper");
    return this.detector.scan(asset);
  }

  /** Scan, score against the named policy and submit the results for execution */
  async proposeReallocations(
    caller: string,
    asset: AssetId,
    kind: OrchestrationKind = OrchestrationKind.BALANCED
  ): Promise<ProposalResult> {
    this.access.require(caller, "keeper");
    const scan = await this.detector.scan(asset);
    const market = await collectMarketSnapshot(
      { ledger: this.ledger, registry: this.registry, yields: this.yields, risks: this.risks, prices: this.prices },
      asset,
      this.clock()
    );
    const policy = buildPolicy(kind, {
      yieldThresholdBps: this.settings.scorer.yieldThresholdBps,
      maxRiskIncrease: this.settings.scorer.maxRiskIncrease,
      opportunityTtlMs: this.settings.scorer.opportunityTtlMs,
    });
    const opportunities = this.scorer.score(scan.detections, market, policy);
    this.executor.submit(opportunities);
    return { scan, opportunities };
  }

  async execute(caller: string, opportunityId: string): Promise<ExecutionReport> {
    this.access.require(caller, "keeper");
    return this.executor.execute(opportunityId);
  }

  /** Scan, score and execute the best opportunity of each idle source as one cycle */
  async detectAndReallocate(
    caller: string,
    asset: AssetId,
    kind: OrchestrationKind = OrchestrationKind.BALANCED
  ): Promise<DetectAndReallocateResult> {
    const { scan, opportunities } = await this.proposeReallocations(caller, asset, kind);
    const best = bestPerSource(opportunities);
    if (best.length === 0) {
      logger.info(`No reallocation opportunities for ${asset}`);
      return { asset, scan, proposed: opportunities.length, executed: [], failures: [] };
    }
    const batch = await this.executor.executeBatch(
      asset,
      best.map((o) => o.id)
    );
    return { ...batch, scan, proposed: opportunities.length };
  }

  opportunities(asset?: AssetId): OpportunityRecord[] {
    return this.executor.list(asset);
  }

  // ---- Strategies ----

  createStrategy(caller: string, input: StrategyInput): ReallocationStrategy {
    this.access.require(caller, "operator");
    return this.strategies.create(input);
  }

  updateStrategy(caller: string, id: string, patch: Partial<StrategyInput>): ReallocationStrategy {
    this.access.require(caller, "operator");
    return this.strategies.update(id, patch);
  }

  activateStrategy(caller: string, id: string): void {
    this.access.require(caller, "operator");
    this.strategies.activate(id);
  }

  deactivateStrategy(caller: string, id: string): void {
    this.access.require(caller, "operator");
    this.strategies.deactivate(id);
  }

  async executeStrategy(caller: string, id: string): Promise<StrategyRunResult> {
    this.access.require(caller, "keeper");
    return this.executor.executeStrategy(id);
  }

  /**
   * Fold yields realized since earlier runs into an adaptive strategy's
   * weights. Each run's outcomes are applied once.
   */
  async adaptStrategy(caller: string, id: string): Promise<ReallocationStrategy> {
    this.access.require(caller, "keeper");
    const strategy = this.strategies.require(id);
    const outcomes = strategy.isAdaptive ? await this.executor.settleOutcomes(id) : [];
    return this.strategies.adapt(id, outcomes);
  }

  // ---- Guardian ----

  async emergencyReallocate(
    caller: string,
    asset: AssetId,
    fromVenue: VenueId,
    amount: bigint,
    toSafeVenue?: VenueId
  ): Promise<EmergencyResult> {
    this.access.require(caller, "guardian");
    return this.executor.emergencyReallocate(asset, fromVenue, amount, toSafeVenue);
  }

  freezeVenue(caller: string, venueId: VenueId, reason: string): void {
    this.access.require(caller, "guardian");
    this.registry.freeze(venueId, reason);
    this.audit.record("venue.frozen", { venueId, reason }, { severity: "warning" });
  }

  unfreezeVenue(caller: string, venueId: VenueId): void {
    this.access.require(caller, "guardian");
    this.registry.unfreeze(venueId);
    this.audit.record("venue.unfrozen", { venueId });
  }

  async reconcile(caller: string, asset: AssetId, balances: Record<VenueId, bigint>): Promise<LedgerSnapshot> {
    this.access.require(caller, "guardian");
    return this.ledger.reconcile(asset, balances);
  }

  // ---- Read model ----

  snapshot(asset: AssetId): LedgerSnapshot {
    return this.ledger.snapshot(asset);
  }

  stats(): EngineStatsReport {
    return this.statsView.compute();
  }
}
