// ============================================
// Engine Bootstrap
//
// Builds an AllocationEngine from the engine file. Venues are simulated:
// the keeper ships no live venue adapters, so it only runs in dry-run mode.
// ============================================

import { parseUnits } from "viem";
import { createLogger, ValidationError, type AppConfig, type AssetId } from "@idleflow/common";
import {
  SimulatedVenueAdapter,
  TablePriceOracle,
  TableRiskOracle,
  type SimulatedMarket,
} from "@idleflow/adapters";
import { AllocationEngine, type AuditSink, type Clock } from "@idleflow/engine";
import type { EngineFile, EngineFileVenue } from "./config/engineFile.js";

const logger = createLogger("keeper:bootstrap");

/** Principal the keeper acts as; holds admin so it can apply the engine file */
export const KEEPER_PRINCIPAL = "keeper-service";

export interface BootstrapOptions {
  config: AppConfig;
  auditSink?: AuditSink | null;
  clock?: Clock;
}

export interface BootstrappedEngine {
  engine: AllocationEngine;
  principal: string;
  venues: SimulatedVenueAdapter[];
  strategyIds: string[];
}

export async function bootstrapEngine(file: EngineFile, opts: BootstrapOptions): Promise<BootstrappedEngine> {
  const { config } = opts;
  if (!config.keeper.dryRun) {
    throw new ValidationError("No live venue adapters are configured; run the keeper with KEEPER_DRY_RUN=true");
  }

  const decimals = new Map<AssetId, number>(file.assets.map((a) => [a.assetId, a.decimals]));
  const prices: Record<AssetId, number> = {};
  for (const asset of file.assets) {
    if (asset.priceUsd !== undefined) prices[asset.assetId] = asset.priceUsd;
  }

  const engine = new AllocationEngine({
    risks: new TableRiskOracle(file.risks),
    prices: new TablePriceOracle(prices),
    settings: config,
    admins: [KEEPER_PRINCIPAL],
    auditSink: opts.auditSink,
    clock: opts.clock,
  });
  const principal = KEEPER_PRINCIPAL;

  const venues = file.venues.map((venue) => simulatedVenue(venue, decimals));
  for (const [i, adapter] of venues.entries()) {
    const capacity = file.venues[i].maxCapacity;
    engine.registerVenue(principal, adapter, capacity === undefined ? {} : { maxCapacity: BigInt(capacity) });
  }

  for (const asset of file.assets) {
    engine.registerAsset(principal, {
      assetId: asset.assetId,
      symbol: asset.symbol,
      decimals: asset.decimals,
      idleThreshold: parseUnits(asset.idleThreshold, asset.decimals),
      minReallocationAmount: parseUnits(asset.minReallocationAmount, asset.decimals),
      utilizationThresholdBps: asset.utilizationThresholdBps,
      timeThresholdMs: asset.timeThresholdMs,
    });
    engine.setTargetWeights(principal, asset.assetId, asset.targetWeights);
    if (asset.rateLimit) engine.setRateLimit(principal, asset.assetId, asset.rateLimit);
  }

  for (const asset of file.assets) {
    if (asset.seedDeposit === undefined) continue;
    const amount = parseUnits(asset.seedDeposit, asset.decimals);
    if (amount === 0n) continue;
    const result = await engine.deposit(principal, asset.assetId, amount);
    logger.info(`Seeded ${asset.symbol}`, { amount, deltas: result.deltas, unallocated: result.unallocated });
  }

  const strategyIds = file.strategies.map((input) => engine.createStrategy(principal, input).id);

  logger.info("Engine bootstrapped", {
    assets: file.assets.length,
    venues: venues.length,
    strategies: strategyIds.length,
  });
  return { engine, principal, venues, strategyIds };
}

function simulatedVenue(venue: EngineFileVenue, decimals: Map<AssetId, number>): SimulatedVenueAdapter {
  const markets: Record<AssetId, Partial<SimulatedMarket>> = {};
  for (const [asset, market] of Object.entries(venue.markets)) {
    const assetDecimals = decimals.get(asset);
    if (assetDecimals === undefined) throw new ValidationError(`Venue ${venue.venueId} quotes unknown asset ${asset}`);
    markets[asset] = {
      utilizationBps: market.utilizationBps,
      yieldBps: market.yieldBps,
      liquidityDepth: parseUnits(market.liquidityDepth, assetDecimals),
    };
  }
  return new SimulatedVenueAdapter({ venueId: venue.venueId, kind: venue.kind, name: venue.name, markets });
}
