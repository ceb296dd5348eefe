import { UNNAMED_TRAP } from "@/config/dataset";
import type { FilterSelection, JoinedRecord, Selection } from "./types";

export const ALL_RECORDS: FilterSelection = {
  sites: "all",
  taxa: "all",
  years: "all",
  traps: "all",
};

export function createSelection(partial: Partial<FilterSelection> = {}): FilterSelection {
  return { ...ALL_RECORDS, ...partial };
}

/** Trap value used by the trap filter; blank trap names share one option. */
export function trapKey(record: JoinedRecord): string {
  return record.trap_name || UNNAMED_TRAP;
}

export function matches<T>(selection: Selection<T>, value: T): boolean {
  return selection === "all" || selection.has(value);
}

/**
 * Records passing every dimension of the selection, in their original order.
 * Explicit empty sets match nothing; values not present in the data simply
 * match no records.
 */
export function applyFilters(
  records: readonly JoinedRecord[],
  selection: FilterSelection
): JoinedRecord[] {
  const { start, end } = selection.dateRange ?? {};

  return records.filter(
    (r) =>
      matches(selection.sites, r.site_code) &&
      matches(selection.taxa, r.display_name) &&
      matches(selection.years, r.year) &&
      matches(selection.traps, trapKey(r)) &&
      (start === undefined || r.sample_date >= start) &&
      (end === undefined || r.sample_date <= end)
  );
}
