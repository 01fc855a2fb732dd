// ============================================
// Keeper Service Entry Point
// ============================================

import type { Job, Queue, Worker } from "bullmq";
import {
  closeDbPool,
  closeRedis,
  createLogger,
  createQueue,
  createWorker,
  errorMessage,
  getDbPool,
  getRedisConnection,
  loadConfig,
  QUEUES,
  type IdleScanJob,
  type StrategyExecuteJob,
} from "@idleflow/common";
import { PgAuditSink } from "@idleflow/engine";
import { loadEngineFile } from "./config/engineFile.js";
import { bootstrapEngine } from "./bootstrap.js";
import { runIdleScan } from "./jobs/scan-assets.js";
import { runStrategyExecution } from "./jobs/execute-strategies.js";

const logger = createLogger("keeper");

/** Drop repeatable jobs left by a previous run; strategy ids do not survive restarts */
async function clearRepeatables<T>(queue: Queue<T>): Promise<void> {
  for (const repeatable of await queue.getRepeatableJobs()) {
    await queue.removeRepeatableByKey(repeatable.key);
  }
}

function logFailures<T>(worker: Worker<T>): void {
  worker.on("failed", (job, err) => {
    logger.error(`Job ${job?.name ?? "unknown"} failed`, { queue: worker.name, error: err.message });
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info("Keeper service starting", {
    engineConfigPath: config.keeper.engineConfigPath,
    scanIntervalMs: config.keeper.scanIntervalMs,
    strategyIntervalMs: config.keeper.strategyIntervalMs,
    dryRun: config.keeper.dryRun,
  });

  const file = await loadEngineFile(config.keeper.engineConfigPath);

  // Verify connections
  let auditSink: PgAuditSink | null = null;
  if (config.keeper.persistAudit) {
    await getDbPool().query("SELECT 1");
    auditSink = new PgAuditSink(undefined, "keeper");
    await auditSink.ensureSchema();
    logger.info("Database connection established");
  }

  const redis = getRedisConnection();
  await redis.ping();
  logger.info("Redis connection established");

  const { engine, principal, strategyIds } = await bootstrapEngine(file, { config, auditSink });

  const scanQueue = createQueue<IdleScanJob>(QUEUES.IDLE_SCAN);
  const strategyQueue = createQueue<StrategyExecuteJob>(QUEUES.STRATEGY_EXECUTE);
  await clearRepeatables(scanQueue);
  await clearRepeatables(strategyQueue);

  const jobOptions = { removeOnComplete: 100, removeOnFail: 500 };
  for (const asset of engine.ledger.listAssets()) {
    await scanQueue.add(
      `scan:${asset}`,
      { asset, reallocate: true, timestamp: new Date().toISOString() },
      { ...jobOptions, repeat: { every: config.keeper.scanIntervalMs } }
    );
  }
  for (const strategyId of strategyIds) {
    await strategyQueue.add(
      `strategy:${strategyId}`,
      { strategyId, timestamp: new Date().toISOString() },
      { ...jobOptions, repeat: { every: config.keeper.strategyIntervalMs } }
    );
  }
  logger.info("Repeatable jobs registered", {
    assets: engine.ledger.listAssets(),
    strategies: strategyIds.length,
  });

  // Summaries carry bigints, which BullMQ cannot store as return values
  const scanWorker = createWorker<IdleScanJob>(QUEUES.IDLE_SCAN, async (job: Job<IdleScanJob>) => {
    await runIdleScan(engine, principal, job.data);
  });
  const strategyWorker = createWorker<StrategyExecuteJob>(QUEUES.STRATEGY_EXECUTE, async (job: Job<StrategyExecuteJob>) => {
    await runStrategyExecution(engine, principal, job.data);
  });

  logFailures(scanWorker);
  logFailures(strategyWorker);

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info("Keeper service shutting down...", { signal });
    try {
      await scanWorker.close();
      await strategyWorker.close();
      await scanQueue.close();
      await strategyQueue.close();
      await closeRedis();
      await closeDbPool();
    } catch (err) {
      logger.error("Shutdown did not complete cleanly", { error: errorMessage(err) });
      process.exit(1);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  logger.info("Keeper service running. Press Ctrl+C to stop.");
}

main().catch((err: unknown) => {
  logger.error("Keeper service failed to start", { error: errorMessage(err) });
  process.exit(1);
});
