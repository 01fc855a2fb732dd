// ============================================
// Rate Limiter
//
// Per-asset cooldown between reallocations and a cap on how much of the
// idle capital one cycle may move. State is never shared across assets.
// ============================================

import {
  applyBps,
  DEFAULT_COOLDOWN_MS,
  DEFAULT_MAX_REALLOCATION_PCT_BPS,
  isValidBps,
  RateLimitedError,
  ValidationError,
  type AssetId,
  type RateLimitState,
} from "@idleflow/common";

export interface RateLimitDefaults {
  cooldownMs?: number;
  maxReallocationPctBps?: number;
}

export interface CycleBudget {
  asset: AssetId;
  cap: bigint;
  used: bigint;
}

export class RateLimiter {
  private states = new Map<AssetId, RateLimitState>();
  private readonly cooldownMs: number;
  private readonly maxReallocationPctBps: number;

  constructor(defaults: RateLimitDefaults = {}) {
    this.cooldownMs = defaults.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.maxReallocationPctBps = defaults.maxReallocationPctBps ?? DEFAULT_MAX_REALLOCATION_PCT_BPS;
  }

  configure(asset: AssetId, params: RateLimitDefaults): RateLimitState {
    const current = this.state(asset);
    const next: RateLimitState = {
      lastReallocationAt: current.lastReallocationAt,
      cooldownMs: params.cooldownMs ?? current.cooldownMs,
      maxReallocationPctBps: params.maxReallocationPctBps ?? current.maxReallocationPctBps,
    };

    const errors: string[] = [];
    if (!Number.isInteger(next.cooldownMs) || next.cooldownMs < 0) {
      errors.push("cooldownMs must be a non-negative integer");
    }
    if (!isValidBps(next.maxReallocationPctBps) || next.maxReallocationPctBps === 0) {
      errors.push("maxReallocationPctBps must be within 1-10000");
    }
    if (errors.length > 0) {
      throw new ValidationError(`Invalid rate limit for ${asset}: ${errors.join("; ")}`, errors);
    }

    this.states.set(asset, next);
    return { ...next };
  }

  state(asset: AssetId): RateLimitState {
    const state = this.states.get(asset);
    if (state) return { ...state };
    return {
      lastReallocationAt: null,
      cooldownMs: this.cooldownMs,
      maxReallocationPctBps: this.maxReallocationPctBps,
    };
  }

  assertCooldown(asset: AssetId, now: number): void {
    const { lastReallocationAt, cooldownMs } = this.state(asset);
    if (lastReallocationAt === null) return;
    const retryAt = lastReallocationAt + cooldownMs;
    if (now < retryAt) {
      throw new RateLimitedError(`Cooldown active for ${asset} until ${retryAt}`, retryAt, {
        asset,
        lastReallocationAt,
        cooldownMs,
      });
    }
  }

  /** Checks the cooldown and opens a budget capped at a share of `idleAvailable` */
  beginCycle(asset: AssetId, idleAvailable: bigint, now: number): CycleBudget {
    this.assertCooldown(asset, now);
    const { maxReallocationPctBps } = this.state(asset);
    return { asset, cap: applyBps(idleAvailable, maxReallocationPctBps), used: 0n };
  }

  consume(budget: CycleBudget, amount: bigint): void {
    if (budget.used + amount > budget.cap) {
      throw new RateLimitedError(
        `Reallocation of ${amount} exceeds the cycle cap for ${budget.asset}`,
        null,
        { asset: budget.asset, amount, cap: budget.cap, used: budget.used }
      );
    }
    budget.used += amount;
  }

  record(asset: AssetId, now: number): void {
    const state = this.state(asset);
    this.states.set(asset, { ...state, lastReallocationAt: now });
  }
}
