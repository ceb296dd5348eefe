import { normalizeIsoDate } from "./dates";
import { createSelection } from "./filter";
import type { DateRange, FilterSelection, Selection } from "./types";

// --- Selection <-> URL search params ---
//
// Each dimension is a repeated param: ?sites=A&sites=B
// Absent param means "all"; a param with only empty values (?sites=) means an
// explicit empty selection, which matches nothing.

function readSet(params: URLSearchParams, name: string): Selection<string> {
  if (!params.has(name)) return "all";
  return new Set(params.getAll(name).filter(Boolean));
}

function readYears(params: URLSearchParams): Selection<number> {
  if (!params.has("years")) return "all";
  const years = params
    .getAll("years")
    .filter((v) => /^\d+$/.test(v))
    .map((v) => parseInt(v, 10));
  return new Set(years);
}

function readDateRange(params: URLSearchParams): DateRange | undefined {
  const start = normalizeIsoDate(params.get("start") ?? "");
  const end = normalizeIsoDate(params.get("end") ?? "");
  if (!start && !end) return undefined;
  return {
    ...(start ? { start } : {}),
    ...(end ? { end } : {}),
  };
}

export function parseSelectionParams(params: URLSearchParams): FilterSelection {
  const dateRange = readDateRange(params);
  return createSelection({
    sites: readSet(params, "sites"),
    taxa: readSet(params, "taxa"),
    years: readYears(params),
    traps: readSet(params, "traps"),
    ...(dateRange ? { dateRange } : {}),
  });
}

function writeSet<T>(params: URLSearchParams, name: string, selection: Selection<T>) {
  if (selection === "all") return;
  if (selection.size === 0) {
    params.append(name, "");
    return;
  }
  for (const value of selection) params.append(name, String(value));
}

export function selectionToParams(selection: FilterSelection): URLSearchParams {
  const params = new URLSearchParams();
  writeSet(params, "sites", selection.sites);
  writeSet(params, "taxa", selection.taxa);
  writeSet(params, "years", selection.years);
  writeSet(params, "traps", selection.traps);
  if (selection.dateRange?.start) params.set("start", selection.dateRange.start);
  if (selection.dateRange?.end) params.set("end", selection.dateRange.end);
  return params;
}
