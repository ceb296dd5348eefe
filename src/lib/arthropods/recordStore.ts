import { z } from "zod";
import {
  DEFAULT_REGION,
  LATITUDE_COLUMNS,
  LONGITUDE_COLUMNS,
  REGIONS,
  type Region,
} from "@/config/dataset";
import { findColumn, requireColumns } from "./csv";
import { parseCalendarDate, quarterOf, toIsoDate, toIsoMonth, type CalendarDate } from "./dates";
import { DataFormatError } from "./errors";
import { compareText } from "./rank";
import type {
  ArthropodDataset,
  CsvTable,
  JoinedRecord,
  LandUseClass,
  MissingReference,
  Observation,
  SiteMetadata,
  UnknownReferenceWarning,
} from "./types";

const OBSERVATION_COLUMNS = ["site_code", "sample_date", "display_name", "count"] as const;
const CORE_OBSERVATION_FIELDS = new Set<string>([...OBSERVATION_COLUMNS, "trap_name"]);

const observationRow = z.object({
  site_code: z.string({ required_error: "site code is empty" }).min(1, "site code is empty"),
  sample_date: z
    .string({ required_error: "sample date is empty" })
    .transform((value, ctx) => {
      const date = parseCalendarDate(value);
      if (!date) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a valid date` });
        return z.NEVER;
      }
      return date;
    }),
  display_name: z.string().optional().default(""),
  trap_name: z.string().optional().default(""),
  // Blank counts read as zero
  count: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === "") return 0;
      const n = /^\d+$/.test(value) ? Number(value) : NaN;
      if (!Number.isSafeInteger(n)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${value}" is not a non-negative integer`,
        });
        return z.NEVER;
      }
      return n;
    }),
});

function toDataFormatError(table: CsvTable, index: number, error: z.ZodError): DataFormatError {
  const issue = error.issues[0];
  const column = issue.path.length > 0 ? String(issue.path[0]) : undefined;
  return new DataFormatError(issue.message, { table: table.name, row: index + 2, column });
}

function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined || value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export interface ParsedObservation {
  observation: Observation;
  date: CalendarDate;
}

export function parseObservations(table: CsvTable): ParsedObservation[] {
  requireColumns(table, OBSERVATION_COLUMNS);
  const passthrough = table.fields.filter((f) => !CORE_OBSERVATION_FIELDS.has(f));

  return table.rows.map((row, index) => {
    const result = observationRow.safeParse(row);
    if (!result.success) throw toDataFormatError(table, index, result.error);

    const extra: Record<string, string> = {};
    for (const field of passthrough) {
      extra[field] = row[field] ?? "";
    }

    return {
      observation: {
        site_code: result.data.site_code,
        sample_date: toIsoDate(result.data.sample_date),
        display_name: result.data.display_name,
        trap_name: result.data.trap_name,
        count: result.data.count,
        extra,
      },
      date: result.data.sample_date,
    };
  });
}

/**
 * Site coordinates keyed by site code. The first row with both coordinates wins;
 * sites that never have both are left out.
 */
export function parseSiteMetadata(table: CsvTable): Map<string, SiteMetadata> {
  requireColumns(table, ["site_code"]);
  const lookup = new Map<string, SiteMetadata>();

  const latColumn = findColumn(table, LATITUDE_COLUMNS);
  const lonColumn = findColumn(table, LONGITUDE_COLUMNS);
  if (!latColumn || !lonColumn) {
    console.warn(
      `${table.name}: no latitude/longitude columns found (have: ${table.fields.join(", ")}); sites will not be mapped`
    );
    return lookup;
  }

  for (const row of table.rows) {
    const siteCode = row.site_code;
    if (!siteCode || lookup.has(siteCode)) continue;
    const lat = parseCoordinate(row[latColumn]);
    const lon = parseCoordinate(row[lonColumn]);
    if (lat === null || lon === null) continue;
    lookup.set(siteCode, { site_code: siteCode, lat, lon });
  }

  return lookup;
}

const REGION_BY_LABEL = new Map<string, Region>(REGIONS.map((r) => [r.toLowerCase(), r]));

export function parseLandUse(table: CsvTable): Map<string, LandUseClass> {
  requireColumns(table, ["site_code", "landuse"]);
  const lookup = new Map<string, LandUseClass>();
  const unrecognized = new Set<string>();

  for (const row of table.rows) {
    const siteCode = row.site_code;
    if (!siteCode || lookup.has(siteCode)) continue;
    const label = row.landuse ?? "";
    let region = REGION_BY_LABEL.get(label.toLowerCase());
    if (!region) {
      unrecognized.add(label || "(blank)");
      region = DEFAULT_REGION;
    }
    lookup.set(siteCode, { site_code: siteCode, region });
  }

  if (unrecognized.size > 0) {
    console.warn(
      `${table.name}: unrecognized landuse label(s) ${[...unrecognized].join(", ")} mapped to "${DEFAULT_REGION}"`
    );
  }

  return lookup;
}

/**
 * Join observations to site coordinates and land-use classes, deriving year,
 * month and quarter once. Observations for sites missing from either lookup are
 * kept (no coordinates, default region) and reported as warnings.
 */
export function buildDataset(
  observationsTable: CsvTable,
  sitesTable: CsvTable,
  landuseTable: CsvTable
): ArthropodDataset {
  const observations = parseObservations(observationsTable);
  const sites = parseSiteMetadata(sitesTable);
  const landuse = parseLandUse(landuseTable);

  const missingBySite = new Map<string, MissingReference[]>();

  const records: JoinedRecord[] = observations.map(({ observation: obs, date }) => {
    const site = sites.get(obs.site_code);
    const landClass = landuse.get(obs.site_code);

    if (!missingBySite.has(obs.site_code)) {
      const missing: MissingReference[] = [];
      if (!site) missing.push("coordinates");
      if (!landClass) missing.push("landuse");
      missingBySite.set(obs.site_code, missing);
    }

    return {
      ...obs,
      lat: site ? site.lat : null,
      lon: site ? site.lon : null,
      region: landClass ? landClass.region : DEFAULT_REGION,
      year: date.year,
      month: toIsoMonth(date),
      quarter: quarterOf(date.month),
    };
  });

  const warnings: UnknownReferenceWarning[] = [...missingBySite.entries()]
    .filter(([, missing]) => missing.length > 0)
    .map(([site_code, missing]) => ({ site_code, missing }))
    .sort((a, b) => compareText(a.site_code, b.site_code));

  if (warnings.length > 0) {
    const detail = warnings.map((w) => `${w.site_code} (${w.missing.join(", ")})`).join("; ");
    console.warn(`Unknown site references in ${observationsTable.name}: ${detail}`);
  }

  return { records, warnings };
}
