// ============================================
// Oracle Interfaces
// ============================================

import type { AssetId, VenueId } from "@idleflow/common";

/**
 * Point-in-time query interfaces. Implementations return a best-effort
 * current value; staleness is handled by the caller re-validating before
 * acting. A rejected promise means the value is unavailable.
 */

/** Annualized yield of an asset at a venue, in bps */
export interface YieldOracle {
  get(asset: AssetId, venue: VenueId): Promise<number>;
}

/** Risk of holding an asset at a venue, 0 (safest) to 100 */
export interface RiskOracle {
  get(asset: AssetId, venue: VenueId): Promise<number>;
}

/** USD price of one whole unit of an asset */
export interface PriceOracle {
  get(asset: AssetId): Promise<number>;
}
