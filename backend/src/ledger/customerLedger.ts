/**
 * Customer counters as a fold over the visit log.
 *
 * The `customers` row caches the result of {@link replayVisits}; the visit
 * recorder advances it one entry at a time with {@link applyVisit}, and
 * reconciliation rebuilds it from scratch. Both paths must agree.
 */

export interface LedgerCounters {
  totalVisits: number;
  totalSpent: number;
  loyaltyPoints: number;
  /** `YYYY-MM-DD HH:mm:ss` of the latest visit */
  lastVisit: string | null;
}

export interface LedgerEntry {
  amountPaid: number;
  isLoyaltyReward: boolean;
  visitDate: string;
  visitTime: string;
}

export const EMPTY_LEDGER: LedgerCounters = {
  totalVisits: 0,
  totalSpent: 0,
  loyaltyPoints: 0,
  lastVisit: null,
};

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

export function applyVisit(counters: LedgerCounters, entry: LedgerEntry): LedgerCounters {
  const lastVisit = `${entry.visitDate} ${entry.visitTime}`;

  if (entry.isLoyaltyReward) {
    // Redemption consumes every accumulated point
    return {
      totalVisits: counters.totalVisits,
      totalSpent: roundMoney(counters.totalSpent + entry.amountPaid),
      loyaltyPoints: 0,
      lastVisit,
    };
  }

  return {
    totalVisits: counters.totalVisits + 1,
    totalSpent: roundMoney(counters.totalSpent + entry.amountPaid),
    loyaltyPoints: counters.loyaltyPoints + 1,
    lastVisit,
  };
}

/** Entries must be in chronological order. */
export function replayVisits(entries: readonly LedgerEntry[]): LedgerCounters {
  return entries.reduce<LedgerCounters>(applyVisit, EMPTY_LEDGER);
}
