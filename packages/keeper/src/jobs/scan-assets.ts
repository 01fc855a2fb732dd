// ============================================
// Idle Scan Job
// ============================================

import { createLogger, OpportunityStatus, RateLimitedError, type AssetId, type IdleScanJob } from "@idleflow/common";
import type { AllocationEngine } from "@idleflow/engine";

const logger = createLogger("keeper:scan-assets");

export interface IdleScanSummary {
  asset: AssetId;
  idle: bigint;
  skippedVenues: number;
  expired: number;
  proposed: number;
  executed: number;
  failed: number;
  /** Set when the asset's cooldown deferred execution */
  deferredUntil: number | null;
}

/**
 * Scan one asset for idle capital. With `reallocate` set, the best
 * opportunity of each idle source is scored and executed in one cycle.
 * A cooldown is not a job failure; the next run picks it up.
 */
export async function runIdleScan(
  engine: AllocationEngine,
  principal: string,
  job: IdleScanJob
): Promise<IdleScanSummary> {
  const { asset } = job;
  const expired = engine.executor.expireStale();

  if (!job.reallocate) {
    const scan = await engine.scan(principal, asset);
    const summary: IdleScanSummary = {
      asset,
      idle: engine.detector.idleCapital(asset),
      skippedVenues: scan.skipped.length,
      expired,
      proposed: 0,
      executed: 0,
      failed: 0,
      deferredUntil: null,
    };
    logger.info(`Scanned ${asset}`, { ...summary });
    return summary;
  }

  try {
    const result = await engine.detectAndReallocate(principal, asset);
    const summary: IdleScanSummary = {
      asset,
      idle: engine.detector.idleCapital(asset),
      skippedVenues: result.scan.skipped.length,
      expired,
      proposed: result.proposed,
      executed: result.executed.length,
      failed: result.failures.length,
      deferredUntil: null,
    };
    if (result.failures.length > 0) {
      logger.warn(`Reallocation cycle for ${asset} had failures`, { failures: result.failures });
    }
    logger.info(`Reallocation cycle for ${asset} complete`, { ...summary });
    return summary;
  } catch (err) {
    if (!(err instanceof RateLimitedError)) throw err;
    logger.info(`Reallocation for ${asset} deferred`, { retryAt: err.retryAt, reason: err.message });
    return {
      asset,
      idle: engine.detector.idleCapital(asset),
      skippedVenues: 0,
      expired,
      proposed: engine.opportunities(asset).filter((r) => r.status === OpportunityStatus.PROPOSED).length,
      executed: 0,
      failed: 0,
      deferredUntil: err.retryAt,
    };
  }
}
