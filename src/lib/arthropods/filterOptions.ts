import { TOP_TAXA_LIMIT } from "@/config/dataset";
import { trapKey } from "./filter";
import { compareText, rankAndTruncate } from "./rank";
import type { FilterOptions, JoinedRecord } from "./types";

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].filter(Boolean).sort(compareText);
}

/**
 * Top taxa by total count over the records given. Used on the full dataset so
 * the taxon picker does not change as other filters narrow.
 */
export function topTaxa(records: readonly JoinedRecord[], limit: number = TOP_TAXA_LIMIT): string[] {
  return rankAndTruncate(records, {
    key: (r) => r.display_name,
    measure: (r) => r.count,
    limit,
  }).map((e) => e.key);
}

export function buildFilterOptions(records: readonly JoinedRecord[]): FilterOptions {
  let min: string | null = null;
  let max: string | null = null;
  for (const r of records) {
    if (min === null || r.sample_date < min) min = r.sample_date;
    if (max === null || r.sample_date > max) max = r.sample_date;
  }

  return {
    sites: distinctSorted(records.map((r) => r.site_code)),
    years: [...new Set(records.map((r) => r.year))].sort((a, b) => a - b),
    topTaxa: topTaxa(records),
    traps: distinctSorted(records.map(trapKey)),
    dateRange: min !== null && max !== null ? { min, max } : null,
  };
}
