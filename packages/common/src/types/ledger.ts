// ============================================
// Ledger Types
// ============================================

import type { AssetId } from "./asset.js";
import type { VenueId } from "./venue.js";

export interface LedgerSnapshot {
  asset: AssetId;
  totalDeposited: bigint;
  balances: Record<VenueId, bigint>;
  targets: Record<VenueId, number>; // bps
  lastUpdate: number;
  halted: boolean;
  haltReason?: string;
}

export interface VenueDelta {
  venueId: VenueId;
  amount: bigint;
}

export interface DepositResult {
  asset: AssetId;
  amount: bigint;
  deltas: VenueDelta[];
  unallocated: bigint;
}

export interface WithdrawResult {
  asset: AssetId;
  amount: bigint;
  sources: VenueDelta[];
}
