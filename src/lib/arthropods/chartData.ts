import { OVERFLOW_LABEL, QUARTERS, REGIONS, type Quarter, type Region } from "@/config/dataset";
import { compareText } from "./rank";
import type { CompositionRow, RegionQuarterRow } from "./types";

export type ChartDatum = Record<string, string | number>;

// Property holding the x value in each pivoted datum, kept apart from series names
export const X_KEY = "__x";

export interface PivotedSeries {
  data: ChartDatum[];
  series: string[];
}

/**
 * Turn tidy rows into one object per x value with a property per series, the
 * shape recharts expects. Missing (x, series) cells are left out, not zeroed.
 */
export function pivotSeries<T>(
  rows: readonly T[],
  xOf: (row: T) => string | number,
  seriesOf: (row: T) => string,
  valueOf: (row: T) => number
): PivotedSeries {
  const byX = new Map<string | number, ChartDatum>();
  const series = new Set<string>();

  for (const row of rows) {
    const x = xOf(row);
    const name = seriesOf(row);
    series.add(name);
    const datum = byX.get(x) ?? { [X_KEY]: x };
    datum[name] = valueOf(row);
    byX.set(x, datum);
  }

  const xs = [...byX.keys()].sort((a, b) =>
    typeof a === "number" && typeof b === "number" ? a - b : compareText(String(a), String(b))
  );

  return {
    data: xs.map((x) => byX.get(x) ?? { [X_KEY]: x }),
    series: [...series].sort(compareText),
  };
}

/**
 * Stacked-bar data for the composition view: one bar per site, one stack
 * segment per taxon. Taxa are ordered by their total across sites, with the
 * overflow bucket always on top.
 */
export function pivotComposition(rows: readonly CompositionRow[]): PivotedSeries {
  const { data } = pivotSeries(
    rows,
    (r) => r.site_code,
    (r) => r.taxon,
    (r) => r.total_count
  );

  const totals = new Map<string, number>();
  for (const r of rows) {
    totals.set(r.taxon, (totals.get(r.taxon) ?? 0) + r.total_count);
  }

  const series = [...totals.keys()]
    .filter((t) => t !== OVERFLOW_LABEL)
    .sort((a, b) => (totals.get(b) ?? 0) - (totals.get(a) ?? 0) || compareText(a, b));
  if (totals.has(OVERFLOW_LABEL)) series.push(OVERFLOW_LABEL);

  return { data, series };
}

export type RegionQuarterDatum = { region: Region } & Record<Quarter, number>;

/** Dense region x quarter grid, with zero where the aggregate had no row. */
export function zeroFillRegionQuarter(rows: readonly RegionQuarterRow[]): RegionQuarterDatum[] {
  return REGIONS.map((region) => {
    const datum: RegionQuarterDatum = { region, Q1: 0, Q2: 0, Q3: 0, Q4: 0 };
    for (const quarter of QUARTERS) {
      const row = rows.find((r) => r.region === region && r.quarter === quarter);
      if (row) datum[quarter] = row.total_count;
    }
    return datum;
  });
}

/** Bubble radius in pixels, proportional to area (sqrt of the count). */
export function markerRadius(count: number, maxCount: number, minRadius = 4, maxRadius = 24): number {
  if (maxCount <= 0 || count <= 0) return minRadius;
  return minRadius + (maxRadius - minRadius) * Math.sqrt(count / maxCount);
}
