// ============================================
// Strategy Execution Job
// ============================================

import { createLogger, RateLimitedError, type StrategyExecuteJob } from "@idleflow/common";
import type { AllocationEngine, StrategyRunResult } from "@idleflow/engine";

const logger = createLogger("keeper:execute-strategies");

export interface StrategyRunSummary {
  strategyId: string;
  executed: number;
  failed: number;
  /** Target weights after adaptation, for adaptive strategies */
  adaptedWeights: number[] | null;
}

/**
 * Refresh the strategy's asset scan, run the strategy and, when it is
 * adaptive, fold in the yields its earlier runs have realized since. The
 * next run uses the adapted weights. Returns null when the strategy is
 * gone, inactive or not yet due.
 */
export async function runStrategyExecution(
  engine: AllocationEngine,
  principal: string,
  job: StrategyExecuteJob
): Promise<StrategyRunSummary | null> {
  const strategy = engine.strategies.get(job.strategyId);
  if (!strategy) {
    // Repeatable jobs can outlive the process that created the strategy
    logger.warn(`Strategy ${job.strategyId} no longer exists, skipping`);
    return null;
  }
  if (!strategy.active) {
    logger.debug(`Strategy ${strategy.name} is inactive, skipping`);
    return null;
  }

  await engine.scan(principal, strategy.asset);

  let run: StrategyRunResult;
  try {
    run = await engine.executeStrategy(principal, strategy.id);
  } catch (err) {
    if (!(err instanceof RateLimitedError)) throw err;
    logger.info(`Strategy ${strategy.name} deferred`, { retryAt: err.retryAt, reason: err.message });
    return null;
  }

  if (run.failures.length > 0) {
    logger.warn(`Strategy ${strategy.name} had failed chunks`, { failures: run.failures });
  }

  let adaptedWeights: number[] | null = null;
  if (strategy.isAdaptive) {
    adaptedWeights = (await engine.adaptStrategy(principal, strategy.id)).targetWeights;
  }

  return {
    strategyId: strategy.id,
    executed: run.executed.length,
    failed: run.failures.length,
    adaptedWeights,
  };
}
