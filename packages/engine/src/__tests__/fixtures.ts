import {
  SimulatedVenueAdapter,
  TablePriceOracle,
  TableRiskOracle,
  type SimulatedMarket,
} from "@idleflow/adapters";
import { VenueKind, type AssetRegistration } from "@idleflow/common";
import { AllocationEngine, type EngineSettings } from "../AllocationEngine.js";
import type { Clock } from "../clock.js";

export const ASSET = "USDC";
export const T0 = 1_700_000_000_000;
export const ADMIN = "admin";

export interface ManualClock {
  clock: Clock;
  advance(ms: number): void;
}

export function manualClock(start = T0): ManualClock {
  let now = start;
  return {
    clock: () => now,
    advance: (ms) => {
      now += ms;
    },
  };
}

export function settings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    detector: { utilizationThresholdBps: 7_000, timeThresholdMs: 0, minScanIntervalMs: 0 },
    scorer: {
      opportunityTtlMs: 300_000,
      opportunityRetentionMs: 3_600_000,
      yieldThresholdBps: 50,
      maxRiskIncrease: 20,
      costFixedUsd: 5,
      costBps: 5,
    },
    rateLimit: { cooldownMs: 3_600_000, maxReallocationPctBps: 10_000 },
    strategy: { minimumIntervalMs: 900_000, adaptAlpha: 0.2 },
    ...overrides,
  };
}

export const REGISTRATION: AssetRegistration = {
  assetId: ASSET,
  symbol: "USDC",
  decimals: 0,
  idleThreshold: 50_000n,
  minReallocationAmount: 10_000n,
};

export function simulatedVenue(venueId: string, kind: VenueKind, market: Partial<SimulatedMarket>) {
  return new SimulatedVenueAdapter({ venueId, kind, markets: { [ASSET]: market } });
}

/**
 * Three venues: L (lending, 60% utilized, 5%), V (vault, 90% utilized, 9%)
 * and S (staking, 95% utilized, 7%). 1 000 000 USDC deposited 70/30 into
 * L and V, so L holds 280 000 idle. `capacities` caps venues by id.
 */
export async function buildEngine(
  overrides: Partial<EngineSettings> = {},
  capacities: Record<string, bigint> = {}
) {
  const time = manualClock();
  const L = simulatedVenue("L", VenueKind.LENDING, { utilizationBps: 6_000, yieldBps: 500, liquidityDepth: 5_000_000n });
  const V = simulatedVenue("V", VenueKind.VAULT_STRATEGY, { utilizationBps: 9_000, yieldBps: 900, liquidityDepth: 5_000_000n });
  const S = simulatedVenue("S", VenueKind.STAKING, { utilizationBps: 9_500, yieldBps: 700, liquidityDepth: 5_000_000n });
  const risks = new TableRiskOracle([
    { venue: "L", risk: 20 },
    { venue: "V", risk: 30 },
    { venue: "S", risk: 10 },
  ]);
  const prices = new TablePriceOracle({ [ASSET]: 1 });

  const engine = new AllocationEngine({
    risks,
    prices,
    settings: settings(overrides),
    admins: [ADMIN],
    clock: time.clock,
  });
  for (const venue of [L, V, S]) {
    const maxCapacity = capacities[venue.venueId];
    engine.registerVenue(ADMIN, venue, maxCapacity === undefined ? {} : { maxCapacity });
  }
  engine.registerAsset(ADMIN, REGISTRATION);
  engine.setTargetWeights(ADMIN, ASSET, { L: 7_000, V: 3_000 });
  await engine.deposit(ADMIN, ASSET, 1_000_000n);

  return { engine, time, L, V, S, risks, prices };
}

/** Narrow a caught value to the expected error class */
export function asError<T extends Error>(value: unknown, type: new (...args: never[]) => T): T {
  if (!(value instanceof type)) {
    throw new Error(`Expected ${type.name}, got ${String(value)}`);
  }
  return value;
}
