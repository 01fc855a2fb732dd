// ============================================
// Asset Types
// ============================================

/** Fungible token identifier, e.g. a token address or ticker */
export type AssetId = string;

export interface AssetRegistration {
  assetId: AssetId;
  symbol: string;
  decimals: number;
  idleThreshold: bigint;            // Minimum idle amount worth reporting (base units)
  minReallocationAmount: bigint;    // Below this an idle position is not moved
  utilizationThresholdBps?: number; // Overrides the detector default
  timeThresholdMs?: number;         // Overrides the detector default
}

export interface AssetState {
  assetId: AssetId;
  totalDeposited: bigint;
  totalUtilized: bigint;            // Deposited minus the unallocated bucket
  idleThreshold: bigint;
  lastRebalanceTimestamp: number;
}
