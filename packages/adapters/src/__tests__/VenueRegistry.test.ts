import { describe, it, expect } from "vitest";
import { UNALLOCATED_VENUE, ValidationError, VenueKind } from "@idleflow/common";
import { VenueRegistry } from "../base/VenueRegistry.js";
import { SimulatedVenueAdapter } from "../simulated/SimulatedVenueAdapter.js";

function venue(venueId: string, kind = VenueKind.LENDING) {
  return new SimulatedVenueAdapter({ venueId, kind });
}

describe("VenueRegistry", () => {
  it("looks venues up by id and kind", () => {
    const registry = new VenueRegistry();
    registry.register(venue("lend"));
    registry.register(venue("vault", VenueKind.VAULT_STRATEGY));

    expect(registry.size).toBe(2);
    expect(registry.get("lend")?.venueId).toBe("lend");
    expect(registry.get("missing")).toBeUndefined();
    expect(registry.getByKind(VenueKind.VAULT_STRATEGY).map((a) => a.venueId)).toEqual(["vault"]);
  });

  it("rejects unknown venues in require()", () => {
    const registry = new VenueRegistry();
    expect(() => registry.require("nowhere")).toThrow(ValidationError);
  });

  it("reserves the unallocated bucket id", () => {
    const registry = new VenueRegistry();
    expect(() => registry.register(venue(UNALLOCATED_VENUE))).toThrow(ValidationError);
  });

  it("rejects a non-positive capacity", () => {
    const registry = new VenueRegistry();
    expect(() => registry.register(venue("lend"), { maxCapacity: 0n })).toThrow(ValidationError);
  });

  it("tracks freeze and activation independently", () => {
    const registry = new VenueRegistry();
    registry.register(venue("lend"), { maxCapacity: 500n });

    expect(registry.isAvailable("lend")).toBe(true);
    registry.freeze("lend", "oracle manipulation");
    expect(registry.isFrozen("lend")).toBe(true);
    expect(registry.isActive("lend")).toBe(true);
    expect(registry.isAvailable("lend")).toBe(false);

    const [descriptor] = registry.listVenues();
    expect(descriptor).toEqual({
      venueId: "lend",
      kind: VenueKind.LENDING,
      name: "lend",
      maxCapacity: 500n,
      isActive: true,
      frozen: true,
      frozenReason: "oracle manipulation",
    });

    registry.unfreeze("lend");
    registry.deactivate("lend");
    expect(registry.isFrozen("lend")).toBe(false);
    expect(registry.isAvailable("lend")).toBe(false);
    registry.activate("lend");
    expect(registry.isAvailable("lend")).toBe(true);
  });
});
