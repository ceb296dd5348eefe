import type { DatasetConfig } from "@/config/dataset";
import { quarterOf } from "../dates";
import type { JoinedRecord } from "../types";

// Three sites: S1 (Urban) and S2 (Desert) are fully described, S3 has neither
// coordinates nor a land-use class.
export const FIXTURE_CONFIG: DatasetConfig = {
  dataDir: __dirname,
  observationsFile: "observations.csv",
  sitesFile: "sites.csv",
  landuseFile: "landuse.csv",
};

export function makeRecord(overrides: Partial<JoinedRecord> = {}): JoinedRecord {
  const sample_date = overrides.sample_date ?? "2020-05-01";
  return {
    site_code: "S1",
    sample_date,
    display_name: "Formicidae",
    trap_name: "pitfall-1",
    count: 1,
    extra: {},
    lat: 33.45,
    lon: -112.07,
    region: "Urban",
    year: parseInt(sample_date.slice(0, 4), 10),
    month: sample_date.slice(0, 7),
    quarter: quarterOf(parseInt(sample_date.slice(5, 7), 10)),
    ...overrides,
  };
}
