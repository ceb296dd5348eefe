import {
  aggregateAbundance,
  aggregateComposition,
  aggregateDiversity,
  aggregateRegionQuarter,
  aggregateSpatial,
  summarize,
} from "./aggregate";
import { applyFilters } from "./filter";
import { compareText } from "./rank";
import type { DashboardResult, FilterSelection, JoinedRecord, Page } from "./types";

export const DEFAULT_PAGE_SIZE = 15;
export const MAX_PAGE_SIZE = 1000;

/** Every view of the dashboard for one filter selection. */
export function buildDashboard(
  records: readonly JoinedRecord[],
  selection: FilterSelection
): DashboardResult {
  const filtered = applyFilters(records, selection);
  return {
    summary: summarize(filtered),
    composition: aggregateComposition(filtered),
    regionQuarter: aggregateRegionQuarter(filtered),
    spatial: aggregateSpatial(filtered),
    abundance: aggregateAbundance(filtered),
    diversity: aggregateDiversity(filtered),
  };
}

export const RECORD_SORT_KEYS = [
  "site_code",
  "sample_date",
  "display_name",
  "trap_name",
  "count",
  "lat",
  "lon",
  "region",
  "year",
  "month",
  "quarter",
] as const;
export type RecordSortKey = (typeof RECORD_SORT_KEYS)[number];
export type SortDirection = "asc" | "desc";

export function isRecordSortKey(value: string): value is RecordSortKey {
  return RECORD_SORT_KEYS.some((key) => key === value);
}

/**
 * Stable sort on one column. Missing coordinates go last in either direction.
 */
export function sortRecords(
  records: readonly JoinedRecord[],
  key: RecordSortKey,
  direction: SortDirection = "asc"
): JoinedRecord[] {
  const sign = direction === "desc" ? -1 : 1;
  return [...records].sort((a, b) => {
    const x = a[key];
    const y = b[key];
    if (x === null || y === null) return x === y ? 0 : x === null ? 1 : -1;
    const order = typeof x === "number" && typeof y === "number" ? x - y : compareText(String(x), String(y));
    return sign * order;
  });
}

export function paginate<T>(items: readonly T[], page: number, limit: number): Page<T> {
  const safeLimit = Math.min(Math.max(1, Math.floor(limit) || DEFAULT_PAGE_SIZE), MAX_PAGE_SIZE);
  const safePage = Math.max(1, Math.floor(page) || 1);
  const start = (safePage - 1) * safeLimit;

  return {
    data: items.slice(start, start + safeLimit),
    pagination: {
      page: safePage,
      limit: safeLimit,
      total: items.length,
      totalPages: Math.ceil(items.length / safeLimit),
    },
  };
}
