// ============================================
// BullMQ Queue & Job Types
// ============================================

export const QUEUES = {
  IDLE_SCAN: "idle-scan",
  STRATEGY_EXECUTE: "strategy-execute",
} as const;

export interface IdleScanJob {
  asset: string;
  reallocate: boolean;              // Follow the scan with score + execute
  timestamp: string;
}

export interface StrategyExecuteJob {
  strategyId: string;
  timestamp: string;
}
