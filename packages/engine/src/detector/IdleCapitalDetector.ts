// ============================================
// Idle Capital Detector
//
// Per (asset, venue):
//   unknown → monitored → idle → reallocatable | not_reallocatable
//
// A venue is idle when its utilization stays under the threshold for at
// least `timeThresholdMs` (measured from the first scan that saw it under)
// and the idle amount reaches the asset's idle threshold.
// ============================================

import {
  applyBps,
  BPS_DENOMINATOR,
  createLogger,
  DEFAULT_TIME_THRESHOLD_MS,
  DEFAULT_UTILIZATION_THRESHOLD_BPS,
  DetectionState,
  errorMessage,
  sumAmounts,
  UNALLOCATED_VENUE,
  type AssetId,
  type IdleDetection,
  type ScanReport,
  type SkippedVenue,
  type VenueId,
} from "@idleflow/common";
import type { VenueRegistry, YieldOracle } from "@idleflow/adapters";
import type { CapitalLedger } from "../ledger/CapitalLedger.js";
import { AuditTrail } from "../audit/AuditTrail.js";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:detector");

export interface DetectorOptions {
  utilizationThresholdBps?: number;
  timeThresholdMs?: number;
  /** Scans closer together than this return the previous report */
  minScanIntervalMs?: number;
  historyLimit?: number;
  clock?: Clock;
  audit?: AuditTrail;
}

interface PairState {
  state: DetectionState;
  idleSince: number | null;
}

export class IdleCapitalDetector {
  private pairs = new Map<string, PairState>();
  private reports = new Map<AssetId, ScanReport>();
  private histories = new Map<string, IdleDetection[]>();

  private readonly utilizationThresholdBps: number;
  private readonly timeThresholdMs: number;
  private readonly minScanIntervalMs: number;
  private readonly historyLimit: number;
  private readonly clock: Clock;
  private readonly audit: AuditTrail;

  constructor(
    private ledger: CapitalLedger,
    private registry: VenueRegistry,
    private yields: YieldOracle,
    opts: DetectorOptions = {}
  ) {
    this.utilizationThresholdBps = opts.utilizationThresholdBps ?? DEFAULT_UTILIZATION_THRESHOLD_BPS;
    this.timeThresholdMs = opts.timeThresholdMs ?? DEFAULT_TIME_THRESHOLD_MS;
    this.minScanIntervalMs = opts.minScanIntervalMs ?? 0;
    this.historyLimit = opts.historyLimit ?? 500;
    this.clock = opts.clock ?? systemClock;
    this.audit = opts.audit ?? new AuditTrail({ clock: this.clock });
  }

  /**
   * Evaluate every venue holding capital for `asset`. A venue whose adapter
   * or yield query fails is skipped and marked unknown; the rest of the
   * scan proceeds.
   */
  async scan(asset: AssetId): Promise<ScanReport> {
    const registration = this.ledger.registration(asset);
    const now = this.clock();

    const previous = this.reports.get(asset);
    if (previous && now - previous.scannedAt < this.minScanIntervalMs) {
      logger.debug(`Scan for ${asset} within minimum interval, reusing previous report`);
      return previous;
    }

    const utilizationThreshold = registration.utilizationThresholdBps ?? this.utilizationThresholdBps;
    const timeThreshold = registration.timeThresholdMs ?? this.timeThresholdMs;

    const venues = this.ledger.venuesWithBalance(asset);
    const yields = await this.fetchYields(asset, venues);

    const detections: IdleDetection[] = [];
    const skipped: SkippedVenue[] = [];

    for (const venue of venues) {
      let utilizationRate: number;
      let currentYield: number;
      try {
        utilizationRate = await this.ledger.utilization(asset, venue);
        currentYield = await this.yieldOf(asset, venue, yields);
      } catch (err) {
        const reason = errorMessage(err);
        this.setPair(asset, venue, { state: DetectionState.UNKNOWN, idleSince: null });
        skipped.push({ venue, reason });
        logger.warn(`Skipping ${venue} in scan of ${asset}`, { reason });
        continue;
      }

      const totalCapital = this.ledger.balanceOf(asset, venue);
      const activeCapital = applyBps(totalCapital, Math.min(Math.max(utilizationRate, 0), BPS_DENOMINATOR));
      const idleAmount = totalCapital - activeCapital;

      const pair = this.pairs.get(this.key(asset, venue));
      const below = utilizationRate < utilizationThreshold;
      const idleSince = below ? pair?.idleSince ?? now : null;

      const isIdle =
        below &&
        idleAmount >= registration.idleThreshold &&
        idleSince !== null &&
        now - idleSince >= timeThreshold;

      const bestAlternativeYield = this.bestAlternative(asset, venue, yields);
      const draft: IdleDetection = {
        asset,
        venue,
        totalCapital,
        activeCapital,
        idleAmount,
        utilizationRate,
        currentYield,
        bestAlternativeYield,
        opportunityCost: 0n,
        detectedAt: now,
        idleSince,
        isIdle,
        isReallocatable: false,
        state: isIdle ? DetectionState.IDLE : DetectionState.MONITORED,
      };
      draft.opportunityCost = this.opportunityCost(draft);
      draft.isReallocatable = this.isReallocatable(draft);
      if (isIdle) {
        draft.state = draft.isReallocatable ? DetectionState.REALLOCATABLE : DetectionState.NOT_REALLOCATABLE;
      }

      const detection = Object.freeze(draft);
      this.setPair(asset, venue, { state: detection.state, idleSince });
      this.remember(detection);
      detections.push(detection);
    }

    const report: ScanReport = { asset, scannedAt: now, detections, skipped };
    this.reports.set(asset, report);

    const idle = detections.filter((d) => d.isIdle);
    logger.info(`Scan complete for ${asset}`, {
      venues: venues.length,
      idle: idle.length,
      skipped: skipped.length,
      idleAmount: sumAmounts(idle.map((d) => d.idleAmount)),
    });
    this.audit.record(
      "scan.completed",
      {
        idle: idle.map((d) => ({ venue: d.venue, idleAmount: d.idleAmount, reallocatable: d.isReallocatable })),
        skipped,
      },
      { asset }
    );
    return report;
  }

  /** Annualized yield forgone by leaving the idle amount where it is */
  opportunityCost(detection: IdleDetection): bigint {
    const spread = detection.bestAlternativeYield - detection.currentYield;
    return spread > 0 ? applyBps(detection.idleAmount, spread) : 0n;
  }

  isReallocatable(detection: IdleDetection): boolean {
    const { minReallocationAmount } = this.ledger.registration(detection.asset);
    return (
      detection.isIdle &&
      detection.idleAmount >= minReallocationAmount &&
      !this.registry.isFrozen(detection.venue)
    );
  }

  // ---- Read model ----

  latest(asset: AssetId): ScanReport | undefined {
    return this.reports.get(asset);
  }

  /** Idle capital across the latest detections for `asset` */
  idleCapital(asset: AssetId): bigint {
    const report = this.reports.get(asset);
    if (!report) return 0n;
    return sumAmounts(report.detections.filter((d) => d.isIdle).map((d) => d.idleAmount));
  }

  /** Latest reallocatable idle amount for one venue */
  reallocatableAmount(asset: AssetId, venue: VenueId): bigint {
    const detection = this.reports.get(asset)?.detections.find((d) => d.venue === venue);
    return detection?.isReallocatable ? detection.idleAmount : 0n;
  }

  state(asset: AssetId, venue: VenueId): DetectionState {
    return this.pairs.get(this.key(asset, venue))?.state ?? DetectionState.UNKNOWN;
  }

  history(asset: AssetId, venue: VenueId): IdleDetection[] {
    return [...(this.histories.get(this.key(asset, venue)) ?? [])];
  }

  // ---- Internals ----

  /** Yields of every available venue plus the ones being scanned; failures are left out */
  private async fetchYields(asset: AssetId, scanned: VenueId[]): Promise<Map<VenueId, number>> {
    const candidates = new Set<VenueId>(scanned.filter((v) => v !== UNALLOCATED_VENUE));
    for (const adapter of this.registry.getAll()) {
      if (this.registry.isAvailable(adapter.venueId)) candidates.add(adapter.venueId);
    }

    const result = new Map<VenueId, number>();
    for (const venue of candidates) {
      try {
        result.set(venue, await this.yields.get(asset, venue));
      } catch (err) {
        logger.debug(`Yield unavailable for ${venue}`, { asset, error: errorMessage(err) });
      }
    }
    return result;
  }

  private async yieldOf(asset: AssetId, venue: VenueId, yields: Map<VenueId, number>): Promise<number> {
    if (venue === UNALLOCATED_VENUE) return 0;
    const cached = yields.get(venue);
    if (cached !== undefined) return cached;
    return this.yields.get(asset, venue);
  }

  private bestAlternative(asset: AssetId, venue: VenueId, yields: Map<VenueId, number>): number {
    let best = 0;
    for (const [other, bps] of yields) {
      if (other === venue || other === UNALLOCATED_VENUE) continue;
      if (!this.registry.isAvailable(other)) continue;
      if (bps > best) best = bps;
    }
    return best;
  }

  private setPair(asset: AssetId, venue: VenueId, state: PairState): void {
    this.pairs.set(this.key(asset, venue), state);
  }

  private remember(detection: IdleDetection): void {
    const key = this.key(detection.asset, detection.venue);
    const list = this.histories.get(key) ?? [];
    list.push(detection);
    if (list.length > this.historyLimit) list.shift();
    this.histories.set(key, list);
  }

  private key(asset: AssetId, venue: VenueId): string {
    return `${asset}:${venue}`;
  }
}
