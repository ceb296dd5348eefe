export interface RankedEntry {
  key: string;
  total: number;
  /** True for the synthetic entry absorbing everything past the cutoff */
  overflow: boolean;
}

export interface RankOptions<T> {
  key: (item: T) => string;
  measure: (item: T) => number;
  limit: number;
  /** When set, entries past `limit` collapse into one entry with this key */
  overflowLabel?: string;
}

// Code-unit order, independent of locale
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sum `measure` per key, keeping keys in first-seen order. */
export function sumBy<T>(
  items: readonly T[],
  key: (item: T) => string,
  measure: (item: T) => number
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    totals.set(k, (totals.get(k) ?? 0) + measure(item));
  }
  return totals;
}

/**
 * Sum per key, rank by total descending (ties by key ascending) and keep the
 * first `limit` keys. With an `overflowLabel`, the remaining keys are folded into
 * a single trailing entry so the totals still add up to the input's total. If a
 * kept key equals the label, the overflow is merged into it instead.
 */
export function rankAndTruncate<T>(items: readonly T[], options: RankOptions<T>): RankedEntry[] {
  const { key, measure, limit, overflowLabel } = options;

  const ranked = [...sumBy(items, key, measure).entries()]
    .map(([k, total]) => ({ key: k, total }))
    .sort((a, b) => b.total - a.total || compareText(a.key, b.key));

  const cutoff = Math.max(0, limit);
  const kept: RankedEntry[] = ranked.slice(0, cutoff).map((e) => ({ ...e, overflow: false }));
  const rest = ranked.slice(cutoff);

  if (overflowLabel === undefined || rest.length === 0) return kept;

  const restTotal = rest.reduce((sum, e) => sum + e.total, 0);
  const clash = kept.find((e) => e.key === overflowLabel);
  if (clash) {
    clash.total += restTotal;
    clash.overflow = true;
    return kept;
  }
  return [...kept, { key: overflowLabel, total: restTotal, overflow: true }];
}
