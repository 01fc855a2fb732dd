// ============================================
// Audit Trail
// ============================================

import {
  createLogger,
  errorMessage,
  type AuditEvent,
  type AuditEventType,
  type AuditSeverity,
} from "@idleflow/common";
import { systemClock, type Clock } from "../clock.js";

const logger = createLogger("engine:audit");

/** Durable destination for audit events */
export interface AuditSink {
  write(event: AuditEvent): Promise<void>;
}

export interface AuditFilter {
  type?: AuditEventType;
  asset?: string;
  since?: number;
}

export interface AuditTrailOptions {
  sink?: AuditSink | null;
  clock?: Clock;
  maxEvents?: number;
}

/**
 * Append-only, in-memory record of everything the engine did.
 * Every event is also forwarded to the sink when one is configured; sink
 * failures are logged and do not affect the operation being recorded.
 */
export class AuditTrail {
  private log: AuditEvent[] = [];
  private readonly sink: AuditSink | null;
  private readonly clock: Clock;
  private readonly maxEvents: number;

  constructor(opts: AuditTrailOptions = {}) {
    this.sink = opts.sink ?? null;
    this.clock = opts.clock ?? systemClock;
    this.maxEvents = opts.maxEvents ?? 10_000;
  }

  record(
    type: AuditEventType,
    details: Record<string, unknown>,
    opts: { asset?: string; severity?: AuditSeverity } = {}
  ): AuditEvent {
    const event: AuditEvent = {
      type,
      severity: opts.severity ?? "info",
      asset: opts.asset,
      at: this.clock(),
      details,
    };

    this.log.push(event);
    if (this.log.length > this.maxEvents) {
      this.log.shift();
    }

    if (this.sink) {
      void this.sink.write(event).catch((err: unknown) => {
        logger.warn("Audit sink write failed", { type, error: errorMessage(err) });
      });
    }
    return event;
  }

  events(filter: AuditFilter = {}): AuditEvent[] {
    return this.log.filter(
      (e) =>
        (filter.type === undefined || e.type === filter.type) &&
        (filter.asset === undefined || e.asset === filter.asset) &&
        (filter.since === undefined || e.at >= filter.since)
    );
  }

  get size(): number {
    return this.log.length;
  }
}
