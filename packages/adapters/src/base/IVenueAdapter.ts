// ============================================
// Venue Adapter Base Interface
// ============================================

import type { AssetId, VenueId, VenueKind } from "@idleflow/common";

/**
 * Narrow interface every capital venue (lending market, AMM, vault,
 * staking) exposes to the engine.
 *
 * Adding a new venue:
 * 1. Implement this interface
 * 2. Register the adapter via VenueRegistry.register()
 *
 * Calls must be safe to repeat with the same logical request during retry.
 * Amounts are base units of the asset.
 */
export interface VenueAdapter {
  /** Stable identifier, e.g. "aave-usdc" */
  readonly venueId: VenueId;

  /** Display name */
  readonly name: string;

  readonly kind: VenueKind;

  /** Deposit `amount`; resolves to the amount actually placed (never more than requested) */
  deposit(asset: AssetId, amount: bigint): Promise<bigint>;

  /** Withdraw `amount`; resolves to the amount actually released (never more than requested) */
  withdraw(asset: AssetId, amount: bigint): Promise<bigint>;

  /** Share of the venue's capital in active use, in bps */
  queryUtilization(asset: AssetId): Promise<number>;

  /** Current annualized yield, in bps */
  queryYield(asset: AssetId): Promise<number>;

  /** Amount the venue can absorb without material price impact */
  queryLiquidityDepth(asset: AssetId): Promise<bigint>;
}
