// ============================================
// Postgres Audit Sink
// ============================================

import { query, type AuditEvent } from "@idleflow/common";
import type { AuditSink } from "./AuditTrail.js";

type QueryFn = (text: string, params?: unknown[]) => Promise<unknown>;

export const AUDIT_LOG_DDL = `
  CREATE TABLE IF NOT EXISTS audit_log (
    id          BIGSERIAL PRIMARY KEY,
    event_type  TEXT NOT NULL,
    severity    TEXT NOT NULL,
    source      TEXT NOT NULL,
    message     TEXT NOT NULL,
    details     JSONB,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`;

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Writes audit events to the shared `audit_log` table.
 */
export class PgAuditSink implements AuditSink {
  constructor(private run: QueryFn = query, private source = "engine") {}

  async ensureSchema(): Promise<void> {
    await this.run(AUDIT_LOG_DDL);
  }

  async write(event: AuditEvent): Promise<void> {
    await this.run(
      `INSERT INTO audit_log (event_type, severity, source, message, details, created_at)
       VALUES ($1, $2, $3, $4, $5, to_timestamp($6 / 1000.0))`,
      [
        event.type,
        event.severity,
        this.source,
        event.asset ? `${event.type} ${event.asset}` : event.type,
        JSON.stringify(event.details, jsonReplacer),
        event.at,
      ]
    );
  }
}
