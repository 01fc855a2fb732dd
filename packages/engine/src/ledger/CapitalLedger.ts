// ============================================
// Capital Ledger
//
// Single writer of per-asset, per-venue balances. After every mutating
// call sum(balances) == totalDeposited, with the unallocated bucket
// counted as a venue. Venue calls are made first and the bookkeeping is
// applied in one synchronous step afterwards, so no caller (reentrant or
// not) can observe a half-applied entry.
// ============================================

import {
  clampAmount,
  createLogger,
  errorMessage,
  InsufficientLiquidityError,
  InvariantViolationError,
  isValidBps,
  minBigInt,
  splitByWeights,
  sumAmounts,
  sumBps,
  UNALLOCATED_VENUE,
  ValidationError,
  BPS_DENOMINATOR,
  type AssetId,
  type AssetRegistration,
  type AssetState,
  type DepositResult,
  type LedgerSnapshot,
  type VenueDelta,
  type VenueId,
  type WithdrawResult,
} from "@idleflow/common";
import type { VenueRegistry } from "@idleflow/adapters";
import { AssetLock } from "../lock/AssetLock.js";
import { AuditTrail } from "../audit/AuditTrail.js";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:ledger");

interface LedgerEntry {
  registration: AssetRegistration;
  totalDeposited: bigint;
  balances: Map<VenueId, bigint>;
  targets: Map<VenueId, number>;
  lastUpdate: number;
  lastRebalanceAt: number;
  halted: boolean;
  haltReason?: string;
}

export interface CapitalLedgerOptions {
  lock?: AssetLock;
  clock?: Clock;
  audit?: AuditTrail;
}

export class CapitalLedger {
  readonly lock: AssetLock;
  private entries = new Map<AssetId, LedgerEntry>();
  private readonly clock: Clock;
  private readonly audit: AuditTrail;

  constructor(private registry: VenueRegistry, opts: CapitalLedgerOptions = {}) {
    this.lock = opts.lock ?? new AssetLock();
    this.clock = opts.clock ?? systemClock;
    this.audit = opts.audit ?? new AuditTrail({ clock: this.clock });
  }

  // ---- Assets ----

  registerAsset(registration: AssetRegistration): void {
    const errors: string[] = [];
    if (!registration.assetId) errors.push("assetId is required");
    if (this.entries.has(registration.assetId)) {
      errors.push(`asset ${registration.assetId} is already registered`);
    }
    if (!Number.isInteger(registration.decimals) || registration.decimals < 0 || registration.decimals > 36) {
      errors.push("decimals must be an integer within 0-36");
    }
    if (registration.idleThreshold < 0n) errors.push("idleThreshold must not be negative");
    if (registration.minReallocationAmount < 0n) {
      errors.push("minReallocationAmount must not be negative");
    }
    if (
      registration.utilizationThresholdBps !== undefined &&
      !isValidBps(registration.utilizationThresholdBps)
    ) {
      errors.push("utilizationThresholdBps must be within 0-10000");
    }
    if (registration.timeThresholdMs !== undefined && registration.timeThresholdMs < 0) {
      errors.push("timeThresholdMs must not be negative");
    }
    if (errors.length > 0) {
      throw new ValidationError(`Invalid asset registration: ${errors.join("; ")}`, errors);
    }

    const now = this.clock();
    this.entries.set(registration.assetId, {
      registration: { ...registration },
      totalDeposited: 0n,
      balances: new Map([[UNALLOCATED_VENUE, 0n]]),
      targets: new Map(),
      lastUpdate: now,
      lastRebalanceAt: 0,
      halted: false,
    });

    logger.info(`Asset registered: ${registration.symbol}`, {
      asset: registration.assetId,
      idleThreshold: registration.idleThreshold,
    });
    this.audit.record("asset.registered", { symbol: registration.symbol }, { asset: registration.assetId });
  }

  isRegistered(asset: AssetId): boolean {
    return this.entries.has(asset);
  }

  registration(asset: AssetId): AssetRegistration {
    return { ...this.entry(asset).registration };
  }

  listAssets(): AssetId[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Target split for new deposits, in bps per venue. Iteration order of
   * `weights` is the split order; the rounding remainder goes to the first
   * venue with a nonzero weight.
   */
  setTargetWeights(asset: AssetId, weights: Record<VenueId, number>): void {
    const entry = this.entry(asset);
    const pairs = Object.entries(weights);
    const errors: string[] = [];

    if (pairs.length === 0) errors.push("at least one venue weight is required");
    for (const [venue, bps] of pairs) {
      if (!this.registry.has(venue)) errors.push(`unknown venue ${venue}`);
      if (!isValidBps(bps)) errors.push(`weight for ${venue} must be an integer within 0-10000`);
    }
    const total = sumBps(pairs.map(([, bps]) => bps));
    if (total !== BPS_DENOMINATOR) errors.push(`weights sum to ${total}, expected ${BPS_DENOMINATOR}`);
    if (errors.length > 0) {
      throw new ValidationError(`Invalid target weights for ${asset}: ${errors.join("; ")}`, errors);
    }

    entry.targets = new Map(pairs);
    for (const [venue] of pairs) {
      if (!entry.balances.has(venue)) entry.balances.set(venue, 0n);
    }
    logger.info(`Target weights set for ${asset}`, { weights });
  }

  targetWeights(asset: AssetId): Record<VenueId, number> {
    return Object.fromEntries(this.entry(asset).targets);
  }

  // ---- Mutations ----

  /**
   * Credit `amount` and place it across venues by target weight. A venue
   * that rejects (or only partly accepts) its share leaves the rest in the
   * unallocated bucket; a downstream outage never fails the deposit.
   */
  async deposit(asset: AssetId, amount: bigint): Promise<DepositResult> {
    this.assertMutable(asset);
    if (amount <= 0n) throw new ValidationError("Deposit amount must be positive");

    return this.lock.run(asset, "deposit", async () => {
      const entry = this.entry(asset);
      const targets = Array.from(entry.targets).filter(([, bps]) => bps > 0);
      const shares = splitByWeights(amount, targets.map(([, bps]) => bps));

      const deltas: VenueDelta[] = [];
      let unallocated = targets.length === 0 ? amount : 0n;

      for (let i = 0; i < targets.length; i++) {
        const venue = targets[i][0];
        const share = shares[i];
        if (share === 0n) continue;

        if (!this.registry.isAvailable(venue)) {
          logger.warn(`Venue ${venue} unavailable, holding share as unallocated`, { asset, share });
          unallocated += share;
          continue;
        }

        try {
          const placed = clampAmount(await this.registry.require(venue).deposit(asset, share), share);
          if (placed > 0n) deltas.push({ venueId: venue, amount: placed });
          if (placed < share) {
            logger.warn(`Venue ${venue} accepted a partial deposit`, { asset, share, placed });
            unallocated += share - placed;
          }
        } catch (err) {
          logger.warn(`Venue deposit failed, holding share as unallocated`, {
            asset,
            venue,
            share,
            error: errorMessage(err),
          });
          unallocated += share;
        }
      }

      this.assertMutable(asset);
      entry.totalDeposited += amount;
      for (const delta of deltas) this.credit(entry, delta.venueId, delta.amount);
      this.credit(entry, UNALLOCATED_VENUE, unallocated);
      entry.lastUpdate = this.clock();
      this.verify(asset, entry);

      logger.info(`Deposit recorded for ${asset}`, { amount, venues: deltas.length, unallocated });
      this.audit.record("ledger.deposit", { amount, deltas, unallocated }, { asset });
      return { asset, amount, deltas, unallocated };
    });
  }

  /**
   * Pull `amount` out of the pool: unallocated bucket first, then venues in
   * `preferredVenueOrder` (default: ledger order). Either the full amount is
   * sourced or nothing is withdrawn.
   */
  async withdraw(asset: AssetId, amount: bigint, preferredVenueOrder?: VenueId[]): Promise<WithdrawResult> {
    this.assertMutable(asset);
    if (amount <= 0n) throw new ValidationError("Withdraw amount must be positive");
    for (const venue of preferredVenueOrder ?? []) {
      if (venue !== UNALLOCATED_VENUE && !this.registry.has(venue)) {
        throw new ValidationError(`Unknown venue in withdraw order: ${venue}`);
      }
    }

    return this.lock.run(asset, "withdraw", async () => {
      const entry = this.entry(asset);
      const order = this.withdrawOrder(entry, preferredVenueOrder);

      const recorded = sumAmounts(order.map((v) => entry.balances.get(v) ?? 0n));
      if (recorded < amount) {
        throw new InsufficientLiquidityError(asset, amount, recorded);
      }

      const pulled: VenueDelta[] = [];
      let remaining = amount;
      for (const venue of order) {
        if (remaining === 0n) break;
        const want = minBigInt(entry.balances.get(venue) ?? 0n, remaining);
        if (want === 0n) continue;

        let got = want;
        if (venue !== UNALLOCATED_VENUE) {
          try {
            got = clampAmount(await this.registry.require(venue).withdraw(asset, want), want);
          } catch (err) {
            logger.warn(`Venue withdraw failed, trying next venue`, {
              asset,
              venue,
              want,
              error: errorMessage(err),
            });
            continue;
          }
        }
        if (got > 0n) pulled.push({ venueId: venue, amount: got });
        remaining -= got;
      }

      if (remaining > 0n) {
        await this.returnPulled(asset, entry, pulled);
        throw new InsufficientLiquidityError(asset, amount, amount - remaining);
      }

      this.assertMutable(asset);
      for (const source of pulled) this.debit(asset, entry, source.venueId, source.amount);
      entry.totalDeposited -= amount;
      entry.lastUpdate = this.clock();
      this.verify(asset, entry);

      logger.info(`Withdraw recorded for ${asset}`, { amount, sources: pulled.length });
      this.audit.record("ledger.withdraw", { amount, sources: pulled }, { asset });
      return { asset, amount, sources: pulled };
    });
  }

  /**
   * Record that `amount` now sits in `to` instead of `from`. Synchronous
   * bookkeeping only; the caller has already moved the funds and holds the
   * asset lock.
   */
  rebalanceRecord(asset: AssetId, from: VenueId, to: VenueId, amount: bigint): void {
    this.assertMutable(asset);
    if (amount <= 0n) throw new ValidationError("Rebalance amount must be positive");
    if (from === to) throw new ValidationError("Rebalance source and target must differ");
    if (to !== UNALLOCATED_VENUE && !this.registry.has(to)) {
      throw new ValidationError(`Unknown venue: ${to}`);
    }

    const entry = this.entry(asset);
    const available = entry.balances.get(from) ?? 0n;
    if (available < amount) {
      const reason = `rebalance of ${amount} from ${from} exceeds its balance ${available}`;
      this.halt(asset, reason);
      throw new InvariantViolationError(asset, reason, { from, to, amount, available });
    }

    this.debit(asset, entry, from, amount);
    this.credit(entry, to, amount);
    const now = this.clock();
    entry.lastUpdate = now;
    entry.lastRebalanceAt = now;
    this.verify(asset, entry);

    this.audit.record("ledger.rebalance", { from, to, amount }, { asset });
  }

  // ---- Halt & reconciliation ----

  halt(asset: AssetId, reason: string): void {
    const entry = this.entry(asset);
    entry.halted = true;
    entry.haltReason = reason;
    logger.error(`Ledger halted for ${asset}`, { reason });
    this.audit.record("ledger.halted", { reason }, { asset, severity: "critical" });
  }

  isHalted(asset: AssetId): boolean {
    return this.entry(asset).halted;
  }

  /**
   * Manual reconciliation: replace recorded balances with observed ones,
   * set the total to their sum and lift the halt.
   */
  async reconcile(asset: AssetId, balances: Record<VenueId, bigint>): Promise<LedgerSnapshot> {
    const entry = this.entry(asset);
    const errors: string[] = [];
    for (const [venue, amount] of Object.entries(balances)) {
      if (venue !== UNALLOCATED_VENUE && !this.registry.has(venue)) errors.push(`unknown venue ${venue}`);
      if (amount < 0n) errors.push(`balance for ${venue} must not be negative`);
    }
    if (errors.length > 0) {
      throw new ValidationError(`Invalid reconciliation for ${asset}: ${errors.join("; ")}`, errors);
    }

    return this.lock.run(asset, "reconcile", async () => {
      const next = new Map<VenueId, bigint>([[UNALLOCATED_VENUE, 0n]]);
      for (const venue of entry.targets.keys()) next.set(venue, 0n);
      for (const [venue, amount] of Object.entries(balances)) next.set(venue, amount);

      const previousTotal = entry.totalDeposited;
      entry.balances = next;
      entry.totalDeposited = sumAmounts(next.values());
      entry.halted = false;
      entry.haltReason = undefined;
      entry.lastUpdate = this.clock();

      logger.warn(`Ledger reconciled for ${asset}`, { previousTotal, total: entry.totalDeposited });
      this.audit.record(
        "ledger.reconciled",
        { previousTotal, total: entry.totalDeposited },
        { asset, severity: "warning" }
      );
      return this.snapshot(asset);
    });
  }

  // ---- Queries ----

  /** Share of a venue's capital in active use (bps), as the venue reports it */
  async utilization(asset: AssetId, venue: VenueId): Promise<number> {
    this.entry(asset);
    if (venue === UNALLOCATED_VENUE) return 0;
    return this.registry.require(venue).queryUtilization(asset);
  }

  balanceOf(asset: AssetId, venue: VenueId): bigint {
    return this.entry(asset).balances.get(venue) ?? 0n;
  }

  totalDeposited(asset: AssetId): bigint {
    return this.entry(asset).totalDeposited;
  }

  /** Capital held by the engine itself, immediately deployable */
  availableLiquidity(asset: AssetId): bigint {
    return this.balanceOf(asset, UNALLOCATED_VENUE);
  }

  /** Venues (and the unallocated bucket) holding a nonzero balance, in ledger order */
  venuesWithBalance(asset: AssetId): VenueId[] {
    return Array.from(this.entry(asset).balances)
      .filter(([, amount]) => amount > 0n)
      .map(([venue]) => venue);
  }

  snapshot(asset: AssetId): LedgerSnapshot {
    const entry = this.entry(asset);
    return {
      asset,
      totalDeposited: entry.totalDeposited,
      balances: Object.fromEntries(entry.balances),
      targets: Object.fromEntries(entry.targets),
      lastUpdate: entry.lastUpdate,
      halted: entry.halted,
      haltReason: entry.haltReason,
    };
  }

  getAssetState(asset: AssetId): AssetState {
    const entry = this.entry(asset);
    return {
      assetId: asset,
      totalDeposited: entry.totalDeposited,
      totalUtilized: entry.totalDeposited - (entry.balances.get(UNALLOCATED_VENUE) ?? 0n),
      idleThreshold: entry.registration.idleThreshold,
      lastRebalanceTimestamp: entry.lastRebalanceAt,
    };
  }

  /** Registered and not halted; otherwise throws */
  assertMutable(asset: AssetId): void {
    const entry = this.entry(asset);
    if (entry.halted) {
      throw new InvariantViolationError(asset, `Ledger for ${asset} is halted: ${entry.haltReason ?? "unknown"}`);
    }
  }

  // ---- Internals ----

  private entry(asset: AssetId): LedgerEntry {
    const entry = this.entries.get(asset);
    if (!entry) {
      throw new ValidationError(`Asset not registered: ${asset}`);
    }
    return entry;
  }

  private withdrawOrder(entry: LedgerEntry, preferred?: VenueId[]): VenueId[] {
    const base = preferred ?? Array.from(entry.balances.keys());
    return Array.from(new Set([UNALLOCATED_VENUE, ...base]));
  }

  /**
   * Undo a partially sourced withdrawal. Funds a venue will not take back
   * are recorded in the unallocated bucket, where they physically are.
   */
  private async returnPulled(asset: AssetId, entry: LedgerEntry, pulled: VenueDelta[]): Promise<void> {
    const stranded: VenueDelta[] = [];
    for (const { venueId, amount } of pulled) {
      if (venueId === UNALLOCATED_VENUE) continue;
      let returned = 0n;
      try {
        returned = clampAmount(await this.registry.require(venueId).deposit(asset, amount), amount);
      } catch (err) {
        logger.error(`Could not return withdrawn funds to ${venueId}`, {
          asset,
          amount,
          error: errorMessage(err),
        });
      }
      if (returned < amount) stranded.push({ venueId, amount: amount - returned });
    }

    for (const { venueId, amount } of stranded) {
      this.debit(asset, entry, venueId, amount);
      this.credit(entry, UNALLOCATED_VENUE, amount);
    }
    if (stranded.length > 0) {
      entry.lastUpdate = this.clock();
      this.verify(asset, entry);
      this.audit.record("ledger.rebalance", { stranded }, { asset, severity: "warning" });
    }
  }

  private credit(entry: LedgerEntry, venue: VenueId, amount: bigint): void {
    if (amount === 0n) return;
    entry.balances.set(venue, (entry.balances.get(venue) ?? 0n) + amount);
  }

  private debit(asset: AssetId, entry: LedgerEntry, venue: VenueId, amount: bigint): void {
    const current = entry.balances.get(venue) ?? 0n;
    if (current < amount) {
      const reason = `debit of ${amount} from ${venue} exceeds its balance ${current}`;
      this.halt(asset, reason);
      throw new InvariantViolationError(asset, reason, { venue, amount, current });
    }
    entry.balances.set(venue, current - amount);
  }

  private verify(asset: AssetId, entry: LedgerEntry): void {
    const sum = sumAmounts(entry.balances.values());
    if (sum !== entry.totalDeposited) {
      const reason = `venue balances sum to ${sum} but totalDeposited is ${entry.totalDeposited}`;
      this.halt(asset, reason);
      throw new InvariantViolationError(asset, reason, { sum, totalDeposited: entry.totalDeposited });
    }
  }
}
