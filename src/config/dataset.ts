/**
 * Dataset configuration for the arthropod survey dashboard
 *
 * The three source tables are CSV files read from a data directory:
 * - observations: one row per trap sample and taxon (site_code, sample_date, display_name, trap_name, count)
 * - sites: site coordinates (site_code plus a latitude and a longitude column)
 * - landuse: site_code -> landuse class derived from NLCD rasters
 *
 * File locations can be overridden with environment variables so the same build
 * can be pointed at a different export.
 */

import path from "path";

export interface DatasetConfig {
  dataDir: string;
  observationsFile: string;
  sitesFile: string;
  landuseFile: string;
}

export const DEFAULT_OBSERVATIONS_FILE = "41_core_arthropods.csv";
export const DEFAULT_SITES_FILE = "arthros_temporal.csv";
export const DEFAULT_LANDUSE_FILE = "site_landuse_from_nlcd.csv";

export function getDatasetConfig(env: NodeJS.ProcessEnv = process.env): DatasetConfig {
  return {
    dataDir: env.ARTHROPOD_DATA_DIR || path.join(process.cwd(), "data"),
    observationsFile: env.ARTHROPOD_OBSERVATIONS_FILE || DEFAULT_OBSERVATIONS_FILE,
    sitesFile: env.ARTHROPOD_SITES_FILE || DEFAULT_SITES_FILE,
    landuseFile: env.ARTHROPOD_LANDUSE_FILE || DEFAULT_LANDUSE_FILE,
  };
}

// Number of taxa offered in the taxon filter (ranked over the full dataset)
export const TOP_TAXA_LIMIT = 100;

// Taxa shown per site in the composition chart before collapsing into OVERFLOW_LABEL
export const COMPOSITION_TOP_N = 10;

export const OVERFLOW_LABEL = "Other";

// Filter value standing for observations with a blank trap name
export const UNNAMED_TRAP = "(none)";

// Candidate header names, first match wins
export const LATITUDE_COLUMNS = ["lat", "latitude", "Lat", "Latitude"] as const;
export const LONGITUDE_COLUMNS = ["long", "lon", "longitude", "Longitude", "Long"] as const;

export const REGIONS = ["Urban", "Desert", "Agricultural", "Other"] as const;
export type Region = (typeof REGIONS)[number];

// Sites missing from the land-use table land here
export const DEFAULT_REGION: Region = "Other";

export const QUARTERS = ["Q1", "Q2", "Q3", "Q4"] as const;
export type Quarter = (typeof QUARTERS)[number];

export const QUARTER_COLORS: Record<Quarter, string> = {
  Q1: "#0ea5e9", // sky-500
  Q2: "#22c55e", // green-500
  Q3: "#f97316", // orange-500
  Q4: "#a855f7", // purple-500
};

// Palette cycled through for taxa in the composition chart; OVERFLOW_LABEL always uses the last entry
export const TAXON_PALETTE = [
  "#ef4444",
  "#f97316",
  "#eab308",
  "#84cc16",
  "#14b8a6",
  "#06b6d4",
  "#3b82f6",
  "#8b5cf6",
  "#d946ef",
  "#f43f5e",
  "#78716c",
];
