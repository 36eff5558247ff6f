import type { RankedRecord, ScoredInstrument } from '@/types/market';

/**
 * Rank by composite descending. Array.prototype.sort is stable, so ties keep
 * configured order. Ranks are dense 1..N.
 */
export function rankRecords(scored: readonly ScoredInstrument[]): RankedRecord[] {
  return scored
    .slice()
    .sort((a, b) => b.breakdown.composite - a.breakdown.composite)
    .map((record, index) => ({ ...record, rank: index + 1 }));
}

export function selectTopK<T extends { rank: number }>(records: readonly T[], k: number): T[] {
  return records.filter((r) => r.rank <= k);
}
