/** Paid visits needed before a free wash can be redeemed. */
export const LOYALTY_THRESHOLD = 10;

export interface LoyaltyEvaluation {
  points: number;
  threshold: number;
  eligible: boolean;
  remaining: number;
  /** 0..1, for progress bars */
  progress: number;
  progressPercent: number;
}

/**
 * Reward eligibility and progress for a customer's current loyalty points.
 *
 * Points past the threshold are reported as-is (they keep accumulating until
 * a redemption resets them), but progress saturates at 100%.
 */
export function evaluateLoyalty(points: number): LoyaltyEvaluation {
  const normalized = Math.max(0, Math.trunc(points));
  const progress = Math.min(normalized / LOYALTY_THRESHOLD, 1);

  return {
    points: normalized,
    threshold: LOYALTY_THRESHOLD,
    eligible: normalized >= LOYALTY_THRESHOLD,
    remaining: Math.max(LOYALTY_THRESHOLD - normalized, 0),
    progress,
    progressPercent: Math.round(progress * 100),
  };
}

export function canRedeemReward(points: number): boolean {
  return evaluateLoyalty(points).eligible;
}
