// ============================================
// Table-backed Risk & Price Oracles
//
// Serve operator-maintained tables (loaded from the engine file or an
// external feed). Values can be replaced at run time with set().
// ============================================

import { UNALLOCATED_VENUE, type AssetId, type VenueId } from "@idleflow/common";
import type { PriceOracle, RiskOracle } from "../base/IOracle.js";

export interface RiskEntry {
  venue: VenueId;
  asset?: AssetId;                  // Omit for a venue-wide score
  risk: number;                     // 0-100
}

export class TableRiskOracle implements RiskOracle {
  private scores = new Map<string, number>();

  constructor(entries: RiskEntry[] = []) {
    for (const entry of entries) this.set(entry);
  }

  set(entry: RiskEntry): void {
    if (!Number.isFinite(entry.risk) || entry.risk < 0 || entry.risk > 100) {
      throw new RangeError(`Risk score for ${entry.venue} must be within 0-100`);
    }
    this.scores.set(this.key(entry.venue, entry.asset), entry.risk);
  }

  async get(asset: AssetId, venue: VenueId): Promise<number> {
    if (venue === UNALLOCATED_VENUE) return 0;
    const score = this.scores.get(this.key(venue, asset)) ?? this.scores.get(this.key(venue));
    if (score === undefined) {
      throw new Error(`No risk score for ${asset}@${venue}`);
    }
    return score;
  }

  private key(venue: VenueId, asset?: AssetId): string {
    return asset === undefined ? venue : `${venue}:${asset}`;
  }
}

export class TablePriceOracle implements PriceOracle {
  private prices = new Map<AssetId, number>();

  constructor(prices: Record<AssetId, number> = {}) {
    for (const [asset, price] of Object.entries(prices)) this.set(asset, price);
  }

  set(asset: AssetId, priceUsd: number): void {
    if (!Number.isFinite(priceUsd) || priceUsd <= 0) {
      throw new RangeError(`Price for ${asset} must be positive`);
    }
    this.prices.set(asset, priceUsd);
  }

  async get(asset: AssetId): Promise<number> {
    const price = this.prices.get(asset);
    if (price === undefined) {
      throw new Error(`No price for ${asset}`);
    }
    return price;
  }
}
