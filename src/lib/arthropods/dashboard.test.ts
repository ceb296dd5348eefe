import { describe, it, expect } from "vitest";
import { makeRecord } from "./__fixtures__/records";
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  buildDashboard,
  isRecordSortKey,
  paginate,
  sortRecords,
} from "./dashboard";
import { ALL_RECORDS, createSelection } from "./filter";

const records = [
  makeRecord({ site_code: "S1", display_name: "Formicidae", count: 10 }),
  makeRecord({ site_code: "S2", display_name: "Araneae", count: 2, region: "Desert", lat: null, lon: null }),
];

describe("buildDashboard", () => {
  it("aggregates only the filtered records", () => {
    const result = buildDashboard(records, createSelection({ sites: new Set(["S2"]) }));
    expect(result.summary).toEqual({ records: 1, sites: 1, taxa: 1 });
    expect(result.composition).toEqual([{ site_code: "S2", taxon: "Araneae", total_count: 2 }]);
    expect(result.regionQuarter).toEqual([{ region: "Desert", quarter: "Q2", total_count: 2 }]);
    expect(result.spatial).toEqual([]);
  });

  it("returns empty views for a selection that matches nothing", () => {
    expect(buildDashboard(records, createSelection({ sites: new Set() }))).toEqual({
      summary: { records: 0, sites: 0, taxa: 0 },
      composition: [],
      regionQuarter: [],
      spatial: [],
      abundance: [],
      diversity: [],
    });
  });

  it("maps only sites with coordinates", () => {
    const result = buildDashboard(records, ALL_RECORDS);
    expect(result.spatial.map((r) => r.site_code)).toEqual(["S1"]);
    expect(result.composition.map((r) => r.site_code)).toEqual(["S1", "S2"]);
  });
});

describe("sortRecords", () => {
  const unsorted = [
    makeRecord({ site_code: "S2", count: 3, lat: 33.6 }),
    makeRecord({ site_code: "S3", count: 8, lat: null, lon: null }),
    makeRecord({ site_code: "S1", count: 3, lat: 33.45 }),
    makeRecord({ site_code: "S4", count: 12, lat: 33.1 }),
  ];
  const sites = (rs: readonly { site_code: string }[]) => rs.map((r) => r.site_code);

  it("sorts numbers numerically in either direction, keeping ties in input order", () => {
    expect(sites(sortRecords(unsorted, "count"))).toEqual(["S2", "S1", "S3", "S4"]);
    expect(sites(sortRecords(unsorted, "count", "desc"))).toEqual(["S4", "S3", "S2", "S1"]);
  });

  it("sorts text columns by code unit", () => {
    expect(sites(sortRecords(unsorted, "site_code", "desc"))).toEqual(["S4", "S3", "S2", "S1"]);
  });

  it("puts missing coordinates last in both directions", () => {
    expect(sites(sortRecords(unsorted, "lat"))).toEqual(["S4", "S1", "S2", "S3"]);
    expect(sites(sortRecords(unsorted, "lat", "desc"))).toEqual(["S2", "S1", "S4", "S3"]);
  });

  it("leaves its input untouched", () => {
    sortRecords(unsorted, "count");
    expect(sites(unsorted)).toEqual(["S2", "S3", "S1", "S4"]);
  });

  it("accepts only joined record columns as sort keys", () => {
    expect(isRecordSortKey("lat")).toBe(true);
    expect(isRecordSortKey("extra")).toBe(false);
    expect(isRecordSortKey("observer")).toBe(false);
  });
});

describe("paginate", () => {
  const items = Array.from({ length: 35 }, (_, i) => i);

  it("slices the requested page", () => {
    expect(paginate(items, 2, 15)).toEqual({
      data: [15, 16, 17, 18, 19, 20, 21, 22, 23, 24, 25, 26, 27, 28, 29],
      pagination: { page: 2, limit: 15, total: 35, totalPages: 3 },
    });
    expect(paginate(items, 3, 15).data).toEqual([30, 31, 32, 33, 34]);
  });

  it("returns an empty page past the end", () => {
    expect(paginate(items, 9, 15).data).toEqual([]);
  });

  it("clamps bad page and limit values", () => {
    expect(paginate(items, 0, 10).pagination.page).toBe(1);
    expect(paginate(items, NaN, 10).pagination.page).toBe(1);
    expect(paginate(items, 1, NaN).pagination.limit).toBe(DEFAULT_PAGE_SIZE);
    expect(paginate(items, 1, -5).pagination.limit).toBe(1);
    expect(paginate(items, 1, 50000).pagination.limit).toBe(MAX_PAGE_SIZE);
  });
});
