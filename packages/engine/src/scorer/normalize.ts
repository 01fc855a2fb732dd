/**
 * Normalizers for the reallocation score. Each maps onto 0-1.
 */

/** Extra headroom a venue should have beyond the amount moved */
const LIQUIDITY_MARGIN_BPS = 11_000n;

/**
 * Step score for how comfortably a venue absorbs `amount`:
 * - depth >= 2x amount (with margin): 1.0
 * - depth >= amount with margin: 0.9
 * - depth >= amount: 0.7
 * - below: 0.3
 */
export function liquidityScore(depth: bigint, amount: bigint): number {
  const withMargin = (amount * LIQUIDITY_MARGIN_BPS) / 10_000n;
  if (depth >= withMargin * 2n) return 1.0;
  if (depth >= withMargin) return 0.9;
  if (depth >= amount) return 0.7;
  return 0.3;
}

export function riskScoreNormalized(risk: number): number {
  return Math.min(Math.max(risk / 100, 0), 1);
}

/** Cost as a share of the gross yield gained, capped at 1 */
export function costShare(cost: bigint, grossBenefit: bigint): number {
  if (grossBenefit <= 0n) return 1;
  return Math.min(Number(cost) / Number(grossBenefit), 1);
}
