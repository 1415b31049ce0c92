import type { DonorTotal, Leaderboard } from '../types/ledger.js';

/**
 * Rank donors by cumulative amount, highest first. `entries` must be in
 * first-donation order: equal amounts keep that order.
 */
export function rankDonors(entries: DonorTotal[]): DonorTotal[] {
  return entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => {
      if (a.entry.amount !== b.entry.amount) {
        return a.entry.amount > b.entry.amount ? -1 : 1;
      }
      return a.position - b.position;
    })
    .map(({ entry }) => entry);
}

/** Slice `[start, end)` of a ranking; out-of-range bounds give empty sequences */
export function sliceLeaderboard(ranked: DonorTotal[], start: number, end: number): Leaderboard {
  if (start >= end || start >= ranked.length) {
    return { donors: [], amounts: [] };
  }
  const page = ranked.slice(start, Math.min(end, ranked.length));
  return {
    donors: page.map(entry => entry.donor),
    amounts: page.map(entry => entry.amount),
  };
}
