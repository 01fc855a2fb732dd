// ============================================
// Engine Error Taxonomy
// ============================================

export enum ErrorCode {
  VALIDATION = "validation_error",
  INSUFFICIENT_LIQUIDITY = "insufficient_liquidity",
  INVARIANT_VIOLATION = "invariant_violation",
  STALE_OPPORTUNITY = "stale_opportunity",
  OPPORTUNITY_EXPIRED = "opportunity_expired",
  VENUE_UNAVAILABLE = "venue_unavailable",
  RATE_LIMITED = "rate_limited",
  REENTRANT_CALL = "reentrant_call",
  UNAUTHORIZED = "unauthorized",
}

export class EngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "EngineError";
  }
}

/** Bad input; nothing was changed */
export class ValidationError extends EngineError {
  constructor(message: string, public readonly errors: string[] = [message]) {
    super(ErrorCode.VALIDATION, message, { errors });
    this.name = "ValidationError";
  }
}

export class InsufficientLiquidityError extends EngineError {
  constructor(
    public readonly asset: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      ErrorCode.INSUFFICIENT_LIQUIDITY,
      `Insufficient liquidity for ${asset}: requested ${requested}, available ${available}`,
      { asset, requested, available }
    );
    this.name = "InsufficientLiquidityError";
  }
}

/** Ledger bug guard. The affected asset is halted until reconciled. */
export class InvariantViolationError extends EngineError {
  constructor(public readonly asset: string, message: string, details: Record<string, unknown> = {}) {
    super(ErrorCode.INVARIANT_VIOLATION, message, { asset, ...details });
    this.name = "InvariantViolationError";
  }
}

export class StaleOpportunityError extends EngineError {
  constructor(public readonly opportunityId: string, details: Record<string, unknown> = {}) {
    super(ErrorCode.STALE_OPPORTUNITY, `Opportunity ${opportunityId} is stale`, {
      opportunityId,
      ...details,
    });
    this.name = "StaleOpportunityError";
  }
}

export class OpportunityExpiredError extends EngineError {
  constructor(public readonly opportunityId: string, public readonly expiresAt: number) {
    super(ErrorCode.OPPORTUNITY_EXPIRED, `Opportunity ${opportunityId} expired at ${expiresAt}`, {
      opportunityId,
      expiresAt,
    });
    this.name = "OpportunityExpiredError";
  }
}

export class VenueUnavailableError extends EngineError {
  constructor(
    public readonly venue: string,
    public readonly step: string,
    cause: string,
    details: Record<string, unknown> = {}
  ) {
    super(ErrorCode.VENUE_UNAVAILABLE, `Venue ${venue} unavailable during ${step}: ${cause}`, {
      venue,
      step,
      cause,
      ...details,
    });
    this.name = "VenueUnavailableError";
  }
}

/** Retry after `retryAt`; not an operator concern */
export class RateLimitedError extends EngineError {
  constructor(message: string, public readonly retryAt: number | null, details: Record<string, unknown> = {}) {
    super(ErrorCode.RATE_LIMITED, message, { retryAt, ...details });
    this.name = "RateLimitedError";
  }
}

export class ReentrancyError extends EngineError {
  constructor(public readonly asset: string, operation: string, heldBy: string) {
    super(
      ErrorCode.REENTRANT_CALL,
      `${operation} rejected: ${asset} is locked by ${heldBy}`,
      { asset, operation, heldBy }
    );
    this.name = "ReentrancyError";
  }
}

export class UnauthorizedError extends EngineError {
  constructor(public readonly principal: string, public readonly role: string) {
    super(ErrorCode.UNAUTHORIZED, `${principal} lacks role ${role}`, { principal, role });
    this.name = "UnauthorizedError";
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
