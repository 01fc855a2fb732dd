// ============================================
// Yield Oracle backed by venue adapters
// ============================================

import { UNALLOCATED_VENUE, type AssetId, type VenueId } from "@idleflow/common";
import type { YieldOracle } from "../base/IOracle.js";
import type { VenueRegistry } from "../base/VenueRegistry.js";

/**
 * Reads the yield each venue reports about itself.
 * The unallocated bucket earns nothing.
 */
export class AdapterYieldOracle implements YieldOracle {
  constructor(private registry: VenueRegistry) {}

  async get(asset: AssetId, venue: VenueId): Promise<number> {
    if (venue === UNALLOCATED_VENUE) return 0;
    return this.registry.require(venue).queryYield(asset);
  }
}
