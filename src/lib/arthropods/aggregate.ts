import { COMPOSITION_TOP_N, OVERFLOW_LABEL, QUARTERS, REGIONS } from "@/config/dataset";
import { compareText, rankAndTruncate, sumBy } from "./rank";
import type {
  AbundanceRow,
  CompositionRow,
  DiversityRow,
  JoinedRecord,
  RegionQuarterRow,
  SelectionSummary,
  SiteTotalRow,
} from "./types";

function groupBy<T>(items: readonly T[], key: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) {
      group.push(item);
    } else {
      groups.set(k, [item]);
    }
  }
  return groups;
}

const countOf = (r: JoinedRecord) => r.count;

/**
 * Per-site community composition: the site's top taxa by count, with every
 * other taxon at that site summed into a single overflow row.
 */
export function aggregateComposition(
  records: readonly JoinedRecord[],
  topN: number = COMPOSITION_TOP_N
): CompositionRow[] {
  const bySite = groupBy(records, (r) => r.site_code);
  const rows: CompositionRow[] = [];

  for (const site of [...bySite.keys()].sort(compareText)) {
    const ranked = rankAndTruncate(bySite.get(site) ?? [], {
      key: (r) => r.display_name,
      measure: countOf,
      limit: topN,
      overflowLabel: OVERFLOW_LABEL,
    });
    for (const entry of ranked) {
      rows.push({ site_code: site, taxon: entry.key, total_count: entry.total });
    }
  }

  return rows;
}

/** Totals per (region, quarter); pairs with no records are left out. */
export function aggregateRegionQuarter(records: readonly JoinedRecord[]): RegionQuarterRow[] {
  const rows: RegionQuarterRow[] = [];
  const byRegion = groupBy(records, (r) => r.region);

  for (const region of REGIONS) {
    const group = byRegion.get(region);
    if (!group) continue;
    const byQuarter = sumBy(group, (r) => r.quarter, countOf);
    for (const quarter of QUARTERS) {
      const total = byQuarter.get(quarter);
      if (total !== undefined) rows.push({ region, quarter, total_count: total });
    }
  }

  return rows;
}

/** Per-site totals for the map. Sites without coordinates are not mapped. */
export function aggregateSpatial(records: readonly JoinedRecord[]): SiteTotalRow[] {
  const rows: SiteTotalRow[] = [];
  const bySite = groupBy(records, (r) => r.site_code);

  for (const site of [...bySite.keys()].sort(compareText)) {
    const group = bySite.get(site) ?? [];
    const { lat, lon } = group[0];
    if (lat === null || lon === null) continue;
    rows.push({
      site_code: site,
      lat,
      lon,
      total_count: group.reduce((sum, r) => sum + r.count, 0),
    });
  }

  return rows;
}

/** Monthly totals per site, ordered by month then site. */
export function aggregateAbundance(records: readonly JoinedRecord[]): AbundanceRow[] {
  const rows: AbundanceRow[] = [];
  const byMonth = groupBy(records, (r) => r.month);

  for (const month of [...byMonth.keys()].sort(compareText)) {
    const bySite = sumBy(byMonth.get(month) ?? [], (r) => r.site_code, countOf);
    for (const site of [...bySite.keys()].sort(compareText)) {
      rows.push({ month, site_code: site, total_count: bySite.get(site) ?? 0 });
    }
  }

  return rows;
}

// H = -sum(p * ln p) over positive totals
export function shannonIndex(totals: Iterable<number>): number {
  const positive = [...totals].filter((t) => t > 0);
  const sum = positive.reduce((s, t) => s + t, 0);
  if (sum === 0) return 0;
  return -positive.reduce((h, t) => {
    const p = t / sum;
    return h + p * Math.log(p);
  }, 0);
}

/** Taxon richness and Shannon diversity per site and year. */
export function aggregateDiversity(records: readonly JoinedRecord[]): DiversityRow[] {
  const rows: DiversityRow[] = [];
  const bySite = groupBy(records, (r) => r.site_code);

  for (const site of [...bySite.keys()].sort(compareText)) {
    const byYear = groupBy(bySite.get(site) ?? [], (r) => String(r.year));
    const years = [...byYear.keys()].map(Number).sort((a, b) => a - b);
    for (const year of years) {
      const taxa = sumBy(byYear.get(String(year)) ?? [], (r) => r.display_name, countOf);
      rows.push({
        site_code: site,
        year,
        richness: taxa.size,
        shannon: shannonIndex(taxa.values()),
      });
    }
  }

  return rows;
}

export function summarize(records: readonly JoinedRecord[]): SelectionSummary {
  return {
    records: records.length,
    sites: new Set(records.map((r) => r.site_code)).size,
    taxa: new Set(records.map((r) => r.display_name)).size,
  };
}
