// ============================================
// Basis-point helpers for bigint amounts
// ============================================

import { BPS_DENOMINATOR } from "../constants/defaults.js";

const DENOM = BigInt(BPS_DENOMINATOR);

/** amount * bps / 10 000, rounded down */
export function applyBps(amount: bigint, bps: number): bigint {
  return (amount * BigInt(Math.trunc(bps))) / DENOM;
}

export function isValidBps(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= BPS_DENOMINATOR;
}

export function sumBps(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * Split `amount` by bps weights. Each share is rounded down and the
 * rounding remainder goes to the first entry, so shares always sum to `amount`.
 */
export function splitByWeights(amount: bigint, weights: number[]): bigint[] {
  if (weights.length === 0) return [];
  const shares = weights.map((w) => applyBps(amount, w));
  const remainder = amount - sumAmounts(shares);
  shares[0] += remainder;
  return shares;
}

/** Ratio of two bigints as a float, 0 when the denominator is 0 */
export function ratio(numerator: bigint, denominator: bigint): number {
  if (denominator === 0n) return 0;
  return Number(numerator) / Number(denominator);
}

/** Clamp an adapter-reported amount into [0, requested] */
export function clampAmount(value: bigint, requested: bigint): bigint {
  if (value < 0n) return 0n;
  return value > requested ? requested : value;
}
