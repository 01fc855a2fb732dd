// ============================================
// Idle Capital Detection Types
// ============================================

import type { AssetId } from "./asset.js";
import type { VenueId } from "./venue.js";

export enum DetectionState {
  UNKNOWN = "unknown",
  MONITORED = "monitored",
  IDLE = "idle",
  REALLOCATABLE = "reallocatable",
  NOT_REALLOCATABLE = "not_reallocatable",
}

/** Immutable point-in-time fact about one (asset, venue) pair */
export interface IdleDetection {
  asset: AssetId;
  venue: VenueId;
  totalCapital: bigint;
  activeCapital: bigint;
  idleAmount: bigint;
  utilizationRate: number;          // bps
  currentYield: number;             // bps
  bestAlternativeYield: number;     // bps
  opportunityCost: bigint;          // Annualized, base units
  detectedAt: number;
  idleSince: number | null;
  isIdle: boolean;
  isReallocatable: boolean;
  state: DetectionState;
}

export interface SkippedVenue {
  venue: VenueId;
  reason: string;
}

export interface ScanReport {
  asset: AssetId;
  scannedAt: number;
  detections: IdleDetection[];
  skipped: SkippedVenue[];
}
