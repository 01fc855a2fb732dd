// ============================================
// Engine Stats
//
// Read model recomputed from the ledger, the detector and the executor's
// running totals on every call. Nothing here is stored.
// ============================================

import {
  sumAmounts,
  UNALLOCATED_VENUE,
  type AssetId,
  type OpportunityStatus,
} from "@idleflow/common";
import type { CapitalLedger } from "../ledger/CapitalLedger.js";
import type { IdleCapitalDetector } from "../detector/IdleCapitalDetector.js";
import type { ReallocationExecutor } from "../executor/ReallocationExecutor.js";

export interface AssetStats {
  asset: AssetId;
  totalDeposited: bigint;
  unallocated: bigint;
  idle: bigint;
  reallocatedVolume: bigint;
  halted: boolean;
}

export interface EngineStatsReport {
  assets: AssetStats[];
  totalReallocatedVolume: bigint;
  opportunities: Record<OpportunityStatus, number>;
}

export class EngineStats {
  constructor(
    private ledger: CapitalLedger,
    private detector: IdleCapitalDetector,
    private executor: ReallocationExecutor
  ) {}

  compute(): EngineStatsReport {
    const assets = this.ledger.listAssets().map((asset): AssetStats => {
      const snapshot = this.ledger.snapshot(asset);
      return {
        asset,
        totalDeposited: snapshot.totalDeposited,
        unallocated: snapshot.balances[UNALLOCATED_VENUE] ?? 0n,
        idle: this.detector.idleCapital(asset),
        reallocatedVolume: this.executor.reallocatedVolume(asset),
        halted: snapshot.halted,
      };
    });

    return {
      assets,
      totalReallocatedVolume: sumAmounts(assets.map((a) => a.reallocatedVolume)),
      opportunities: this.executor.statusCounts(),
    };
  }
}
