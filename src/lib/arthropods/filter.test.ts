import { describe, it, expect } from "vitest";
import { makeRecord } from "./__fixtures__/records";
import { ALL_RECORDS, applyFilters, createSelection } from "./filter";

const records = [
  makeRecord({ site_code: "S1", display_name: "Formicidae", sample_date: "2020-03-31", count: 10 }),
  makeRecord({ site_code: "S1", display_name: "Araneae", sample_date: "2020-04-01", count: 5 }),
  makeRecord({ site_code: "S2", display_name: "Formicidae", sample_date: "2020-07-15", trap_name: "pitfall-2" }),
  makeRecord({ site_code: "S3", display_name: "Acari", sample_date: "2021-05-05" }),
];

const sitesOf = (rs: readonly { site_code: string; sample_date: string }[]) =>
  rs.map((r) => `${r.site_code}@${r.sample_date}`);

describe("applyFilters", () => {
  it("returns every record, in order, when all dimensions are unrestricted", () => {
    expect(applyFilters(records, ALL_RECORDS)).toEqual(records);
  });

  it("restricts to the selected sites", () => {
    const result = applyFilters(records, createSelection({ sites: new Set(["S1", "S3"]) }));
    expect(sitesOf(result)).toEqual(["S1@2020-03-31", "S1@2020-04-01", "S3@2021-05-05"]);
  });

  it("matches nothing for an explicit empty set", () => {
    expect(applyFilters(records, createSelection({ taxa: new Set() }))).toEqual([]);
    expect(applyFilters(records, createSelection({ years: new Set() }))).toEqual([]);
  });

  it("combines dimensions with AND", () => {
    const result = applyFilters(
      records,
      createSelection({ taxa: new Set(["Formicidae"]), years: new Set([2020]), traps: new Set(["pitfall-2"]) })
    );
    expect(sitesOf(result)).toEqual(["S2@2020-07-15"]);
  });

  it("treats an empty site set differently from all sites", () => {
    expect(applyFilters(records, createSelection({ sites: "all" }))).toHaveLength(4);
    expect(applyFilters(records, createSelection({ sites: new Set() }))).toEqual([]);
  });

  it("selects blank trap names through the unnamed trap option", () => {
    const withBlank = [...records, makeRecord({ site_code: "S4", trap_name: "", sample_date: "2021-06-01" })];
    expect(sitesOf(applyFilters(withBlank, createSelection({ traps: new Set(["(none)"]) })))).toEqual([
      "S4@2021-06-01",
    ]);
    expect(applyFilters(withBlank, createSelection({ traps: new Set(["pitfall-1", "pitfall-2"]) }))).toEqual(
      records
    );
  });

  it("ignores selected values that do not occur in the data", () => {
    const result = applyFilters(records, createSelection({ sites: new Set(["S1", "NOPE"]) }));
    expect(result).toHaveLength(2);
  });

  it("applies inclusive date bounds", () => {
    const result = applyFilters(
      records,
      createSelection({ dateRange: { start: "2020-04-01", end: "2020-07-15" } })
    );
    expect(sitesOf(result)).toEqual(["S1@2020-04-01", "S2@2020-07-15"]);
  });

  it("accepts an open-ended date range", () => {
    const result = applyFilters(records, createSelection({ dateRange: { start: "2021-01-01" } }));
    expect(sitesOf(result)).toEqual(["S3@2021-05-05"]);
  });

  it("does not mutate its input", () => {
    const copy = [...records];
    applyFilters(records, createSelection({ sites: new Set(["S2"]) }));
    expect(records).toEqual(copy);
  });
});
