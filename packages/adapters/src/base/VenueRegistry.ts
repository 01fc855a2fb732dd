// ============================================
// Venue Registry
// ============================================

import {
  createLogger,
  UNALLOCATED_VENUE,
  ValidationError,
  type VenueDescriptor,
  type VenueId,
  type VenueKind,
} from "@idleflow/common";
import type { VenueAdapter } from "./IVenueAdapter.js";

const logger = createLogger("adapters:registry");

interface VenueEntry {
  adapter: VenueAdapter;
  maxCapacity?: bigint;
  isActive: boolean;
  frozen: boolean;
  frozenReason?: string;
}

export interface RegisterVenueOptions {
  maxCapacity?: bigint;
}

/**
 * Central registry of venue adapters with their operational flags.
 * Lookup by venue ID or kind.
 */
export class VenueRegistry {
  private venues = new Map<VenueId, VenueEntry>();

  /** Register an adapter */
  register(adapter: VenueAdapter, opts: RegisterVenueOptions = {}): void {
    if (adapter.venueId === UNALLOCATED_VENUE) {
      throw new ValidationError(`Venue ID "${UNALLOCATED_VENUE}" is reserved`);
    }
    if (opts.maxCapacity !== undefined && opts.maxCapacity <= 0n) {
      throw new ValidationError(`maxCapacity for ${adapter.venueId} must be positive`);
    }

    if (this.venues.has(adapter.venueId)) {
      logger.warn(`Venue already registered: ${adapter.venueId}, replacing`);
    }

    this.venues.set(adapter.venueId, {
      adapter,
      maxCapacity: opts.maxCapacity,
      isActive: true,
      frozen: false,
    });
    logger.info(`Registered venue: ${adapter.name}`, {
      venueId: adapter.venueId,
      kind: adapter.kind,
      maxCapacity: opts.maxCapacity,
    });
  }

  has(venueId: VenueId): boolean {
    return this.venues.has(venueId);
  }

  get(venueId: VenueId): VenueAdapter | undefined {
    return this.venues.get(venueId)?.adapter;
  }

  /** Get an adapter or fail with a ValidationError */
  require(venueId: VenueId): VenueAdapter {
    return this.entry(venueId).adapter;
  }

  getAll(): VenueAdapter[] {
    return Array.from(this.venues.values()).map((e) => e.adapter);
  }

  getByKind(kind: VenueKind): VenueAdapter[] {
    return this.getAll().filter((a) => a.kind === kind);
  }

  listVenues(): VenueDescriptor[] {
    return Array.from(this.venues.values()).map((e) => ({
      venueId: e.adapter.venueId,
      kind: e.adapter.kind,
      name: e.adapter.name,
      maxCapacity: e.maxCapacity,
      isActive: e.isActive,
      frozen: e.frozen,
      frozenReason: e.frozenReason,
    }));
  }

  // ---- Operational flags ----

  deactivate(venueId: VenueId): void {
    this.entry(venueId).isActive = false;
    logger.info(`Venue deactivated: ${venueId}`);
  }

  activate(venueId: VenueId): void {
    this.entry(venueId).isActive = true;
    logger.info(`Venue activated: ${venueId}`);
  }

  isActive(venueId: VenueId): boolean {
    return this.venues.get(venueId)?.isActive ?? false;
  }

  /** Emergency flag: frozen venues receive no capital and are evacuated */
  freeze(venueId: VenueId, reason: string): void {
    const entry = this.entry(venueId);
    entry.frozen = true;
    entry.frozenReason = reason;
    logger.warn(`Venue frozen: ${venueId}`, { reason });
  }

  unfreeze(venueId: VenueId): void {
    const entry = this.entry(venueId);
    entry.frozen = false;
    entry.frozenReason = undefined;
    logger.info(`Venue unfrozen: ${venueId}`);
  }

  isFrozen(venueId: VenueId): boolean {
    return this.venues.get(venueId)?.frozen ?? false;
  }

  /** Active and not frozen */
  isAvailable(venueId: VenueId): boolean {
    const entry = this.venues.get(venueId);
    return entry !== undefined && entry.isActive && !entry.frozen;
  }

  maxCapacity(venueId: VenueId): bigint | undefined {
    return this.venues.get(venueId)?.maxCapacity;
  }

  get size(): number {
    return this.venues.size;
  }

  private entry(venueId: VenueId): VenueEntry {
    const entry = this.venues.get(venueId);
    if (!entry) {
      throw new ValidationError(`Unknown venue: ${venueId}`);
    }
    return entry;
  }
}
