// ============================================
// Redis Connection & BullMQ Helpers
// ============================================

import { Queue, Worker, type Processor, type WorkerOptions, type QueueOptions } from "bullmq";
import { Redis } from "ioredis";
import { loadConfig } from "./config.js";

let connection: Redis | null = null;

export function getRedisConnection(): Redis {
  if (!connection) {
    const { redis } = loadConfig();
    connection = new Redis({
      host: redis.host,
      port: redis.port,
      password: redis.password,
      maxRetriesPerRequest: null,
    });
  }
  return connection;
}

export function createQueue<T = unknown>(name: string, opts?: Partial<QueueOptions>): Queue<T> {
  return new Queue<T>(name, {
    connection: getRedisConnection(),
    ...opts,
  });
}

export function createWorker<T = unknown>(
  name: string,
  processor: Processor<T>,
  opts?: Partial<WorkerOptions>
): Worker<T> {
  // One job at a time: the engine serializes per asset and rejects overlap
  return new Worker<T>(name, processor, {
    connection: getRedisConnection(),
    concurrency: 1,
    ...opts,
  });
}

export async function closeRedis(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
