import { describe, it, expect, beforeEach } from "vitest";
import { AdapterYieldOracle, VenueRegistry, type SimulatedVenueAdapter } from "@idleflow/adapters";
import { DetectionState, VenueKind } from "@idleflow/common";
import { CapitalLedger } from "../ledger/CapitalLedger.js";
import { IdleCapitalDetector, type DetectorOptions } from "../detector/IdleCapitalDetector.js";
import { ASSET, REGISTRATION, T0, manualClock, simulatedVenue, type ManualClock } from "./fixtures.js";

describe("IdleCapitalDetector", () => {
  let time: ManualClock;
  let registry: VenueRegistry;
  let ledger: CapitalLedger;
  let L: SimulatedVenueAdapter;
  let V: SimulatedVenueAdapter;

  function detector(opts: DetectorOptions = {}): IdleCapitalDetector {
    return new IdleCapitalDetector(ledger, registry, new AdapterYieldOracle(registry), {
      utilizationThresholdBps: 7_000,
      timeThresholdMs: 0,
      clock: time.clock,
      ...opts,
    });
  }

  beforeEach(async () => {
    time = manualClock();
    registry = new VenueRegistry();
    L = simulatedVenue("L", VenueKind.LENDING, { utilizationBps: 6_000, yieldBps: 500 });
    V = simulatedVenue("V", VenueKind.VAULT_STRATEGY, { utilizationBps: 9_000, yieldBps: 900 });
    registry.register(L);
    registry.register(V);
    ledger = new CapitalLedger(registry, { clock: time.clock });
    ledger.registerAsset(REGISTRATION);
    ledger.setTargetWeights(ASSET, { L: 7_000, V: 3_000 });
    await ledger.deposit(ASSET, 1_000_000n);
  });

  it("reports the idle share of a venue under the utilization threshold", async () => {
    const report = await detector().scan(ASSET);
    const lending = report.detections.find((d) => d.venue === "L");

    expect(lending).toMatchObject({
      totalCapital: 700_000n,
      activeCapital: 420_000n,
      idleAmount: 280_000n,
      utilizationRate: 6_000,
      currentYield: 500,
      bestAlternativeYield: 900,
      opportunityCost: 11_200n,
      idleSince: T0,
      isIdle: true,
      isReallocatable: true,
      state: DetectionState.REALLOCATABLE,
    });
  });

  it("leaves well-utilized venues monitored", async () => {
    const d = detector();
    const report = await d.scan(ASSET);
    const vault = report.detections.find((x) => x.venue === "V");

    expect(vault?.isIdle).toBe(false);
    expect(vault?.idleAmount).toBe(30_000n);
    expect(d.state(ASSET, "V")).toBe(DetectionState.MONITORED);
    expect(d.idleCapital(ASSET)).toBe(280_000n);
  });

  it("produces identical detections for repeated scans", async () => {
    const d = detector();
    const first = await d.scan(ASSET);
    const second = await d.scan(ASSET);

    expect(second.detections).toEqual(first.detections);
  });

  it("waits for the time threshold from the first idle scan", async () => {
    const d = detector({ timeThresholdMs: 3_600_000 });

    const early = await d.scan(ASSET);
    expect(early.detections.find((x) => x.venue === "L")?.isIdle).toBe(false);
    expect(d.state(ASSET, "L")).toBe(DetectionState.MONITORED);

    time.advance(1_800_000);
    await d.scan(ASSET);
    time.advance(1_800_000);
    const late = await d.scan(ASSET);
    const lending = late.detections.find((x) => x.venue === "L");

    expect(lending?.isIdle).toBe(true);
    expect(lending?.idleSince).toBe(T0);
  });

  it("clears the idle clock when utilization recovers", async () => {
    const d = detector({ timeThresholdMs: 3_600_000 });
    await d.scan(ASSET);

    L.setMarket(ASSET, { utilizationBps: 8_000 });
    time.advance(1_000);
    const recovered = await d.scan(ASSET);
    expect(recovered.detections.find((x) => x.venue === "L")?.idleSince).toBeNull();

    L.setMarket(ASSET, { utilizationBps: 6_000 });
    time.advance(1_000);
    const again = await d.scan(ASSET);
    expect(again.detections.find((x) => x.venue === "L")?.idleSince).toBe(T0 + 2_000);
  });

  it("skips a failing venue and keeps the others", async () => {
    V.failOn("queryUtilization");
    const d = detector();

    const report = await d.scan(ASSET);

    expect(report.skipped).toEqual([{ venue: "V", reason: "V.queryUtilization: simulated outage" }]);
    expect(report.detections.map((x) => x.venue)).toEqual(["L"]);
    expect(d.state(ASSET, "V")).toBe(DetectionState.UNKNOWN);
  });

  it("marks idle capital in a frozen venue as not reallocatable", async () => {
    registry.freeze("L", "incident");
    const d = detector();

    const report = await d.scan(ASSET);
    const lending = report.detections.find((x) => x.venue === "L");

    expect(lending?.isIdle).toBe(true);
    expect(lending?.isReallocatable).toBe(false);
    expect(lending?.state).toBe(DetectionState.NOT_REALLOCATABLE);
    expect(d.reallocatableAmount(ASSET, "L")).toBe(0n);
  });

  it("reuses the previous report inside the minimum scan interval", async () => {
    const d = detector({ minScanIntervalMs: 60_000 });
    const first = await d.scan(ASSET);

    L.setMarket(ASSET, { utilizationBps: 9_000 });
    time.advance(30_000);
    expect(await d.scan(ASSET)).toBe(first);

    time.advance(30_000);
    const fresh = await d.scan(ASSET);
    expect(fresh).not.toBe(first);
    expect(fresh.detections.find((x) => x.venue === "L")?.isIdle).toBe(false);
  });

  it("keeps per-venue history", async () => {
    const d = detector();
    await d.scan(ASSET);
    time.advance(1_000);
    await d.scan(ASSET);

    expect(d.history(ASSET, "L").map((x) => x.detectedAt)).toEqual([T0, T0 + 1_000]);
  });
});
