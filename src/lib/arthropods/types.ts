import type { Quarter, Region } from "@/config/dataset";

export type { Quarter, Region };

/** One parsed CSV table: header names plus rows keyed by header. */
export interface CsvTable {
  name: string;
  fields: string[];
  rows: Record<string, string | undefined>[];
}

export interface Observation {
  site_code: string;
  /** ISO calendar date, `YYYY-MM-DD`; compares correctly as a string */
  sample_date: string;
  display_name: string;
  trap_name: string;
  count: number;
  extra: Readonly<Record<string, string>>;
}

export interface SiteMetadata {
  site_code: string;
  lat: number | null;
  lon: number | null;
}

export interface LandUseClass {
  site_code: string;
  region: Region;
}

export interface JoinedRecord extends Observation {
  lat: number | null;
  lon: number | null;
  region: Region;
  year: number;
  /** `YYYY-MM` */
  month: string;
  quarter: Quarter;
}

export type MissingReference = "coordinates" | "landuse";

export interface UnknownReferenceWarning {
  site_code: string;
  missing: MissingReference[];
}

export interface ArthropodDataset {
  records: readonly JoinedRecord[];
  warnings: UnknownReferenceWarning[];
}

/** `"all"` applies no restriction; a set (even an empty one) restricts to its members. */
export type Selection<T> = "all" | ReadonlySet<T>;

export interface DateRange {
  start?: string;
  end?: string;
}

export interface FilterSelection {
  sites: Selection<string>;
  taxa: Selection<string>;
  years: Selection<number>;
  traps: Selection<string>;
  dateRange?: DateRange;
}

export interface FilterOptions {
  sites: string[];
  years: number[];
  topTaxa: string[];
  traps: string[];
  dateRange: { min: string; max: string } | null;
}

export interface CompositionRow {
  site_code: string;
  taxon: string;
  total_count: number;
}

export interface RegionQuarterRow {
  region: Region;
  quarter: Quarter;
  total_count: number;
}

export interface SiteTotalRow {
  site_code: string;
  lat: number;
  lon: number;
  total_count: number;
}

export interface AbundanceRow {
  month: string;
  site_code: string;
  total_count: number;
}

export interface DiversityRow {
  site_code: string;
  year: number;
  richness: number;
  shannon: number;
}

export interface SelectionSummary {
  records: number;
  sites: number;
  taxa: number;
}

export interface DashboardResult {
  summary: SelectionSummary;
  composition: CompositionRow[];
  regionQuarter: RegionQuarterRow[];
  spatial: SiteTotalRow[];
  abundance: AbundanceRow[];
  diversity: DiversityRow[];
}

export interface Pagination {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export interface Page<T> {
  data: T[];
  pagination: Pagination;
}
