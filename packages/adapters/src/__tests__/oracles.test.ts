import { describe, it, expect } from "vitest";
import { UNALLOCATED_VENUE, VenueKind } from "@idleflow/common";
import { VenueRegistry } from "../base/VenueRegistry.js";
import { SimulatedVenueAdapter } from "../simulated/SimulatedVenueAdapter.js";
import { AdapterYieldOracle } from "../oracles/AdapterYieldOracle.js";
import { TablePriceOracle, TableRiskOracle } from "../oracles/TableOracles.js";

describe("AdapterYieldOracle", () => {
  it("reads yield from the venue adapter", async () => {
    const registry = new VenueRegistry();
    registry.register(
      new SimulatedVenueAdapter({
        venueId: "vault",
        kind: VenueKind.VAULT_STRATEGY,
        markets: { USDC: { yieldBps: 900 } },
      })
    );
    const oracle = new AdapterYieldOracle(registry);
    expect(await oracle.get("USDC", "vault")).toBe(900);
    expect(await oracle.get("USDC", UNALLOCATED_VENUE)).toBe(0);
  });

  it("rejects unknown venues", async () => {
    const oracle = new AdapterYieldOracle(new VenueRegistry());
    await expect(oracle.get("USDC", "ghost")).rejects.toThrow("Unknown venue: ghost");
  });
});

describe("TableRiskOracle", () => {
  it("prefers asset-specific scores over venue-wide ones", async () => {
    const oracle = new TableRiskOracle([
      { venue: "amm", risk: 40 },
      { venue: "amm", asset: "USDC", risk: 25 },
    ]);
    expect(await oracle.get("USDC", "amm")).toBe(25);
    expect(await oracle.get("WETH", "amm")).toBe(40);
  });

  it("treats the unallocated bucket as riskless", async () => {
    expect(await new TableRiskOracle().get("USDC", UNALLOCATED_VENUE)).toBe(0);
  });

  it("rejects missing entries and out-of-range scores", async () => {
    const oracle = new TableRiskOracle();
    await expect(oracle.get("USDC", "amm")).rejects.toThrow("No risk score for USDC@amm");
    expect(() => oracle.set({ venue: "amm", risk: 101 })).toThrow(RangeError);
  });
});

describe("TablePriceOracle", () => {
  it("serves configured prices", async () => {
    const oracle = new TablePriceOracle({ USDC: 1 });
    expect(await oracle.get("USDC")).toBe(1);
    await expect(oracle.get("WETH")).rejects.toThrow("No price for WETH");
    expect(() => oracle.set("WETH", 0)).toThrow(RangeError);
  });
});
