// ============================================
// Execution Cost Models
// ============================================

import { applyBps, UNALLOCATED_VENUE, type AssetId, type VenueId } from "@idleflow/common";

export interface CostQuoteInput {
  asset: AssetId;
  fromVenue: VenueId;
  toVenue: VenueId;
  amount: bigint;
  decimals: number;
  priceUsd: number | null;
}

/** Estimated cost of moving capital, in base units of the asset */
export interface ExecutionCostModel {
  estimate(input: CostQuoteInput): bigint;
}

export interface GasCostModelOptions {
  fixedUsdPerCall: number;
  costBps: number;
}

/**
 * Fixed USD fee per venue call (converted with the asset price) plus a
 * proportional fee. Without a price only the proportional part applies.
 */
export class GasCostModel implements ExecutionCostModel {
  constructor(private opts: GasCostModelOptions) {}

  estimate(input: CostQuoteInput): bigint {
    const calls = input.fromVenue === UNALLOCATED_VENUE ? 1 : 2;
    const proportional = applyBps(input.amount, this.opts.costBps);
    if (input.priceUsd === null || input.priceUsd <= 0) return proportional;

    const units = (this.opts.fixedUsdPerCall * calls) / input.priceUsd;
    const fixed = (BigInt(Math.round(units * 1_000_000)) * 10n ** BigInt(input.decimals)) / 1_000_000n;
    return fixed + proportional;
  }
}
