// ============================================
// Simulated Venue (dry-run mode)
//
// Keeps balances in memory instead of moving funds. Used by the keeper
// when KEEPER_DRY_RUN is on and by the test suites. Supports fault
// injection: hard failures per operation and partial fills.
// ============================================

import {
  applyBps,
  BPS_DENOMINATOR,
  createLogger,
  minBigInt,
  VenueKind,
  type AssetId,
  type VenueId,
} from "@idleflow/common";
import type { VenueAdapter } from "../base/IVenueAdapter.js";

const logger = createLogger("adapters:simulated");

export type SimulatedOperation =
  | "deposit"
  | "withdraw"
  | "queryUtilization"
  | "queryYield"
  | "queryLiquidityDepth";

export interface SimulatedMarket {
  balance: bigint;
  utilizationBps: number;
  yieldBps: number;
  liquidityDepth: bigint;
}

export interface SimulatedCall {
  op: SimulatedOperation;
  asset: AssetId;
  amount?: bigint;
}

export type TransferHook = (asset: AssetId, amount: bigint) => Promise<void>;

export interface SimulatedVenueOptions {
  venueId: VenueId;
  kind: VenueKind;
  name?: string;
  markets?: Record<AssetId, Partial<SimulatedMarket>>;
}

const DEFAULT_MARKET: SimulatedMarket = {
  balance: 0n,
  utilizationBps: BPS_DENOMINATOR,
  yieldBps: 0,
  liquidityDepth: 0n,
};

export class SimulatedVenueAdapter implements VenueAdapter {
  readonly venueId: VenueId;
  readonly name: string;
  readonly kind: VenueKind;

  readonly calls: SimulatedCall[] = [];

  private markets = new Map<AssetId, SimulatedMarket>();
  private failures = new Map<SimulatedOperation, string>();
  private fillRatios = new Map<"deposit" | "withdraw", number>();
  private depositHook: TransferHook | null = null;
  private withdrawHook: TransferHook | null = null;

  constructor(opts: SimulatedVenueOptions) {
    this.venueId = opts.venueId;
    this.kind = opts.kind;
    this.name = opts.name ?? opts.venueId;
    for (const [asset, market] of Object.entries(opts.markets ?? {})) {
      this.setMarket(asset, market);
    }
  }

  // ---- Simulation controls ----

  setMarket(asset: AssetId, patch: Partial<SimulatedMarket>): void {
    this.markets.set(asset, { ...this.market(asset), ...patch });
  }

  /** Every call to `op` rejects until cleared */
  failOn(op: SimulatedOperation, message = "simulated outage"): void {
    this.failures.set(op, message);
  }

  clearFailure(op: SimulatedOperation): void {
    this.failures.delete(op);
  }

  /** Honor only `bps` of each deposit/withdraw request */
  setFillRatio(op: "deposit" | "withdraw", bps: number): void {
    this.fillRatios.set(op, bps);
  }

  /** Runs inside deposit(), before funds move (models venue callbacks) */
  onDeposit(hook: TransferHook | null): void {
    this.depositHook = hook;
  }

  onWithdraw(hook: TransferHook | null): void {
    this.withdrawHook = hook;
  }

  balanceOf(asset: AssetId): bigint {
    return this.market(asset).balance;
  }

  // ---- VenueAdapter ----

  async deposit(asset: AssetId, amount: bigint): Promise<bigint> {
    this.calls.push({ op: "deposit", asset, amount });
    if (this.depositHook) await this.depositHook(asset, amount);
    this.throwIfFailing("deposit");

    const market = this.market(asset);
    const placed = applyBps(amount, this.fillRatios.get("deposit") ?? BPS_DENOMINATOR);
    this.markets.set(asset, { ...market, balance: market.balance + placed });
    logger.debug(`Simulated deposit into ${this.venueId}`, { asset, amount, placed });
    return placed;
  }

  async withdraw(asset: AssetId, amount: bigint): Promise<bigint> {
    this.calls.push({ op: "withdraw", asset, amount });
    if (this.withdrawHook) await this.withdrawHook(asset, amount);
    this.throwIfFailing("withdraw");

    const market = this.market(asset);
    const requested = applyBps(amount, this.fillRatios.get("withdraw") ?? BPS_DENOMINATOR);
    const released = minBigInt(requested, market.balance);
    this.markets.set(asset, { ...market, balance: market.balance - released });
    logger.debug(`Simulated withdraw from ${this.venueId}`, { asset, amount, released });
    return released;
  }

  async queryUtilization(asset: AssetId): Promise<number> {
    this.calls.push({ op: "queryUtilization", asset });
    this.throwIfFailing("queryUtilization");
    return this.market(asset).utilizationBps;
  }

  async queryYield(asset: AssetId): Promise<number> {
    this.calls.push({ op: "queryYield", asset });
    this.throwIfFailing("queryYield");
    return this.market(asset).yieldBps;
  }

  async queryLiquidityDepth(asset: AssetId): Promise<bigint> {
    this.calls.push({ op: "queryLiquidityDepth", asset });
    this.throwIfFailing("queryLiquidityDepth");
    return this.market(asset).liquidityDepth;
  }

  private market(asset: AssetId): SimulatedMarket {
    return this.markets.get(asset) ?? { ...DEFAULT_MARKET };
  }

  private throwIfFailing(op: SimulatedOperation): void {
    const message = this.failures.get(op);
    if (message !== undefined) {
      throw new Error(`${this.venueId}.${op}: ${message}`);
    }
  }
}
