// ============================================
// Venue Types
// ============================================

export type VenueId = string;

export enum VenueKind {
  LENDING = "lending",
  TRADING = "trading",
  VAULT_STRATEGY = "vault_strategy",
  STAKING = "staking",
}

/**
 * Ledger bucket for capital the engine holds itself: venue deposits that
 * failed at deposit time and funds that could not be returned to a venue.
 */
export const UNALLOCATED_VENUE: VenueId = "unallocated";

export interface VenueDescriptor {
  venueId: VenueId;
  kind: VenueKind;
  name: string;
  maxCapacity?: bigint;
  isActive: boolean;
  frozen: boolean;
  frozenReason?: string;
}

export interface VenueMetrics {
  venueId: VenueId;
  yieldBps: number;
  riskScore: number;                // 0-100
  liquidityDepth: bigint;
  headroom: bigint | null;          // Remaining capacity, null when uncapped
  isAvailable: boolean;             // Active and not frozen
}
