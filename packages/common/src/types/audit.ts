// ============================================
// Audit Event Types
// ============================================

export type AuditEventType =
  | "asset.registered"
  | "venue.registered"
  | "venue.frozen"
  | "venue.unfrozen"
  | "ledger.deposit"
  | "ledger.withdraw"
  | "ledger.rebalance"
  | "ledger.halted"
  | "ledger.reconciled"
  | "scan.completed"
  | "opportunity.proposed"
  | "opportunity.completed"
  | "opportunity.failed"
  | "opportunity.expired"
  | "strategy.created"
  | "strategy.updated"
  | "strategy.executed"
  | "strategy.adapted"
  | "emergency.reallocated";

export type AuditSeverity = "info" | "warning" | "error" | "critical";

export interface AuditEvent {
  type: AuditEventType;
  severity: AuditSeverity;
  asset?: string;
  at: number;
  details: Record<string, unknown>;
}
