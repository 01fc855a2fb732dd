// ============================================
// Strategy Book
//
// Named reallocation strategies: source venues to drain, target venues and
// their weights, and the gates applied when a keeper runs them.
// ============================================

import { v4 as uuidv4 } from "uuid";
import {
  BPS_DENOMINATOR,
  createLogger,
  DEFAULT_ADAPT_ALPHA,
  isValidBps,
  MINIMUM_STRATEGY_INTERVAL_MS,
  OrchestrationKind,
  ValidationError,
  type ReallocationStrategy,
  type StrategyInput,
  type YieldOutcome,
} from "@idleflow/common";
import type { VenueRegistry } from "@idleflow/adapters";
import type { CapitalLedger } from "../ledger/CapitalLedger.js";
import { AuditTrail } from "../audit/AuditTrail.js";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:strategy");

export interface StrategyBookOptions {
  minIntervalMs?: number;
  adaptAlpha?: number;
  clock?: Clock;
  audit?: AuditTrail;
  idGenerator?: () => string;
}

export class StrategyBook {
  private strategies = new Map<string, ReallocationStrategy>();
  private readonly minIntervalMs: number;
  private readonly adaptAlpha: number;
  private readonly clock: Clock;
  private readonly audit: AuditTrail;
  private readonly nextId: () => string;

  constructor(
    private ledger: CapitalLedger,
    private registry: VenueRegistry,
    opts: StrategyBookOptions = {}
  ) {
    this.minIntervalMs = opts.minIntervalMs ?? MINIMUM_STRATEGY_INTERVAL_MS;
    this.adaptAlpha = opts.adaptAlpha ?? DEFAULT_ADAPT_ALPHA;
    this.clock = opts.clock ?? systemClock;
    this.audit = opts.audit ?? new AuditTrail({ clock: this.clock });
    this.nextId = opts.idGenerator ?? uuidv4;

    if (!(this.adaptAlpha >= 0 && this.adaptAlpha <= 1)) {
      throw new ValidationError("adaptAlpha must be within 0-1");
    }
  }

  create(input: StrategyInput): ReallocationStrategy {
    this.validate(input);
    const strategy: ReallocationStrategy = {
      id: this.nextId(),
      name: input.name,
      asset: input.asset,
      sourceVenues: [...input.sourceVenues],
      targetVenues: [...input.targetVenues],
      targetWeights: [...input.targetWeights],
      minYieldImprovement: input.minYieldImprovement,
      maxRiskIncrease: input.maxRiskIncrease,
      executionFrequencyMs: input.executionFrequencyMs,
      lastExecution: null,
      orchestration: input.orchestration ?? OrchestrationKind.BALANCED,
      isAdaptive: input.isAdaptive ?? false,
      active: input.active ?? true,
      createdAt: this.clock(),
    };
    this.strategies.set(strategy.id, strategy);

    logger.info(`Strategy created: ${strategy.name}`, { id: strategy.id, asset: strategy.asset });
    this.audit.record("strategy.created", { id: strategy.id, name: strategy.name }, { asset: strategy.asset });
    return this.copy(strategy);
  }

  update(id: string, patch: Partial<StrategyInput>): ReallocationStrategy {
    const current = this.entry(id);
    const merged: StrategyInput = {
      name: patch.name ?? current.name,
      asset: patch.asset ?? current.asset,
      sourceVenues: patch.sourceVenues ?? current.sourceVenues,
      targetVenues: patch.targetVenues ?? current.targetVenues,
      targetWeights: patch.targetWeights ?? current.targetWeights,
      minYieldImprovement: patch.minYieldImprovement ?? current.minYieldImprovement,
      maxRiskIncrease: patch.maxRiskIncrease ?? current.maxRiskIncrease,
      executionFrequencyMs: patch.executionFrequencyMs ?? current.executionFrequencyMs,
      orchestration: patch.orchestration ?? current.orchestration,
      isAdaptive: patch.isAdaptive ?? current.isAdaptive,
      active: patch.active ?? current.active,
    };
    this.validate(merged);

    const next: ReallocationStrategy = {
      ...current,
      ...merged,
      sourceVenues: [...merged.sourceVenues],
      targetVenues: [...merged.targetVenues],
      targetWeights: [...merged.targetWeights],
      orchestration: merged.orchestration ?? current.orchestration,
      isAdaptive: merged.isAdaptive ?? current.isAdaptive,
      active: merged.active ?? current.active,
    };
    this.strategies.set(id, next);
    this.audit.record("strategy.updated", { id, fields: Object.keys(patch) }, { asset: next.asset });
    return this.copy(next);
  }

  activate(id: string): void {
    this.entry(id).active = true;
    logger.info(`Strategy activated: ${id}`);
  }

  deactivate(id: string): void {
    this.entry(id).active = false;
    logger.info(`Strategy deactivated: ${id}`);
  }

  get(id: string): ReallocationStrategy | undefined {
    const strategy = this.strategies.get(id);
    return strategy ? this.copy(strategy) : undefined;
  }

  require(id: string): ReallocationStrategy {
    return this.copy(this.entry(id));
  }

  list(asset?: string): ReallocationStrategy[] {
    return Array.from(this.strategies.values())
      .filter((s) => asset === undefined || s.asset === asset)
      .map((s) => this.copy(s));
  }

  /** Active strategies whose execution frequency has elapsed at `now` */
  due(now: number): ReallocationStrategy[] {
    return this.list().filter(
      (s) => s.active && (s.lastExecution === null || now - s.lastExecution >= s.executionFrequencyMs)
    );
  }

  markExecuted(id: string, at: number): void {
    this.entry(id).lastExecution = at;
  }

  /**
   * Shift target weights toward venues whose realized yield beat the
   * forecast: w' = w * (1 + alpha * (r - 1)) with r = realized / forecast
   * clamped to [0, 2], renormalized to 10 000 bps. Targets without
   * outcomes keep r = 1.
   */
  adapt(id: string, outcomes: readonly YieldOutcome[]): ReallocationStrategy {
    const strategy = this.entry(id);
    if (!strategy.isAdaptive) {
      throw new ValidationError(`Strategy ${id} is not adaptive`);
    }

    const factors = strategy.targetVenues.map((venue) => {
      const relevant = outcomes.filter(
        (o) => o.venue === venue && o.forecastYield > 0 && (o.strategyId === undefined || o.strategyId === id)
      );
      if (relevant.length === 0) return BPS_DENOMINATOR;
      const mean = relevant.reduce((acc, o) => acc + o.realizedYield / o.forecastYield, 0) / relevant.length;
      const r = Math.min(Math.max(mean, 0), 2);
      return Math.max(BPS_DENOMINATOR + Math.round(this.adaptAlpha * (r - 1) * BPS_DENOMINATOR), 0);
    });

    const scaled = strategy.targetWeights.map((w, i) => w * factors[i]);
    const total = scaled.reduce((a, b) => a + b, 0);
    if (total === 0) {
      logger.warn(`Adaptation for ${id} would zero every weight, keeping current weights`);
      return this.copy(strategy);
    }

    const next = scaled.map((w) => Math.floor((w * BPS_DENOMINATOR) / total));
    next[0] += BPS_DENOMINATOR - next.reduce((a, b) => a + b, 0);

    const previous = strategy.targetWeights;
    strategy.targetWeights = next;
    logger.info(`Strategy adapted: ${id}`, { previous, next });
    this.audit.record("strategy.adapted", { id, previous, next }, { asset: strategy.asset });
    return this.copy(strategy);
  }

  // ---- Validation ----

  private validate(input: StrategyInput): void {
    const errors: string[] = [];
    if (!input.name.trim()) errors.push("name is required");
    if (!this.ledger.isRegistered(input.asset)) errors.push(`asset ${input.asset} is not registered`);

    if (input.sourceVenues.length === 0) errors.push("at least one source venue is required");
    if (input.targetVenues.length === 0) errors.push("at least one target venue is required");
    for (const venue of [...input.sourceVenues, ...input.targetVenues]) {
      if (!this.registry.has(venue)) errors.push(`unknown venue ${venue}`);
    }
    if (new Set(input.targetVenues).size !== input.targetVenues.length) {
      errors.push("target venues must be unique");
    }

    if (input.targetWeights.length !== input.targetVenues.length) {
      errors.push("targetWeights must have one entry per target venue");
    }
    if (!input.targetWeights.every(isValidBps)) {
      errors.push("target weights must be integers within 0-10000");
    }
    const total = input.targetWeights.reduce((a, b) => a + b, 0);
    if (total !== BPS_DENOMINATOR) errors.push(`target weights sum to ${total}, expected ${BPS_DENOMINATOR}`);

    if (input.executionFrequencyMs < this.minIntervalMs) {
      errors.push(`executionFrequencyMs must be at least ${this.minIntervalMs}`);
    }
    if (!Number.isInteger(input.minYieldImprovement) || input.minYieldImprovement < 0) {
      errors.push("minYieldImprovement must be a non-negative integer (bps)");
    }
    if (!(input.maxRiskIncrease >= 0 && input.maxRiskIncrease <= 100)) {
      errors.push("maxRiskIncrease must be within 0-100");
    }

    if (errors.length > 0) {
      throw new ValidationError(`Invalid strategy: ${errors.join("; ")}`, errors);
    }
  }

  private entry(id: string): ReallocationStrategy {
    const strategy = this.strategies.get(id);
    if (!strategy) throw new ValidationError(`Unknown strategy: ${id}`);
    return strategy;
  }

  private copy(strategy: ReallocationStrategy): ReallocationStrategy {
    return {
      ...strategy,
      sourceVenues: [...strategy.sourceVenues],
      targetVenues: [...strategy.targetVenues],
      targetWeights: [...strategy.targetWeights],
    };
  }
}
