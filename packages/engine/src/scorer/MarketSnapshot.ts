// ============================================
// Market Snapshot
//
// Point-in-time venue metrics for one asset. Venues whose queries fail
// are left out and reported in `unavailable`.
// ============================================

import {
  createLogger,
  errorMessage,
  UNALLOCATED_VENUE,
  type AssetId,
  type VenueId,
  type VenueMetrics,
} from "@idleflow/common";
import type { PriceOracle, RiskOracle, VenueRegistry, YieldOracle } from "@idleflow/adapters";
import type { CapitalLedger } from "../ledger/CapitalLedger.js";

const logger = createLogger("engine:market");

export interface MarketSnapshot {
  asset: AssetId;
  decimals: number;
  priceUsd: number | null;
  venues: Map<VenueId, VenueMetrics>;
  unavailable: VenueId[];
  takenAt: number;
}

export interface MarketSources {
  ledger: CapitalLedger;
  registry: VenueRegistry;
  yields: YieldOracle;
  risks: RiskOracle;
  prices: PriceOracle;
}

export async function collectMarketSnapshot(
  sources: MarketSources,
  asset: AssetId,
  now: number
): Promise<MarketSnapshot> {
  const { ledger, registry, yields, risks, prices } = sources;
  const { decimals } = ledger.registration(asset);

  const venues = new Map<VenueId, VenueMetrics>();
  venues.set(UNALLOCATED_VENUE, {
    venueId: UNALLOCATED_VENUE,
    yieldBps: 0,
    riskScore: 0,
    liquidityDepth: 0n,
    headroom: null,
    isAvailable: false,
  });

  const unavailable: VenueId[] = [];
  for (const descriptor of registry.listVenues()) {
    const { venueId } = descriptor;
    try {
      const adapter = registry.require(venueId);
      const yieldBps = await yields.get(asset, venueId);
      const riskScore = await risks.get(asset, venueId);
      const liquidityDepth = await adapter.queryLiquidityDepth(asset);
      const headroom =
        descriptor.maxCapacity === undefined
          ? null
          : descriptor.maxCapacity - ledger.balanceOf(asset, venueId);
      venues.set(venueId, {
        venueId,
        yieldBps,
        riskScore,
        liquidityDepth,
        headroom: headroom === null ? null : headroom > 0n ? headroom : 0n,
        isAvailable: descriptor.isActive && !descriptor.frozen,
      });
    } catch (err) {
      unavailable.push(venueId);
      logger.warn(`Metrics unavailable for ${venueId}`, { asset, error: errorMessage(err) });
    }
  }

  let priceUsd: number | null = null;
  try {
    priceUsd = await prices.get(asset);
  } catch (err) {
    logger.warn(`Price unavailable for ${asset}, fixed costs omitted`, { error: errorMessage(err) });
  }

  return { asset, decimals, priceUsd, venues, unavailable, takenAt: now };
}
