import { describe, it, expect } from "vitest";
import { createSelection } from "./filter";
import { parseSelectionParams, selectionToParams } from "./params";

describe("parseSelectionParams", () => {
  it("treats absent params as unrestricted", () => {
    expect(parseSelectionParams(new URLSearchParams())).toEqual({
      sites: "all",
      taxa: "all",
      years: "all",
      traps: "all",
    });
  });

  it("reads repeated params into sets", () => {
    const selection = parseSelectionParams(
      new URLSearchParams("sites=S1&sites=S2&taxa=Acari&years=2020&years=2021&traps=pitfall-1")
    );
    expect(selection.sites).toEqual(new Set(["S1", "S2"]));
    expect(selection.taxa).toEqual(new Set(["Acari"]));
    expect(selection.years).toEqual(new Set([2020, 2021]));
    expect(selection.traps).toEqual(new Set(["pitfall-1"]));
  });

  it("reads a param with no values as an empty selection", () => {
    const selection = parseSelectionParams(new URLSearchParams("sites=&years="));
    expect(selection.sites).toEqual(new Set());
    expect(selection.years).toEqual(new Set());
    expect(selection.taxa).toBe("all");
  });

  it("drops years that are not whole numbers", () => {
    const selection = parseSelectionParams(new URLSearchParams("years=2020&years=abc&years=20.5"));
    expect(selection.years).toEqual(new Set([2020]));
  });

  it("normalizes date bounds and ignores invalid ones", () => {
    expect(parseSelectionParams(new URLSearchParams("start=2020-1-5&end=2020-02-30")).dateRange).toEqual({
      start: "2020-01-05",
    });
    expect(parseSelectionParams(new URLSearchParams("start=soon")).dateRange).toBeUndefined();
  });
});

describe("selectionToParams", () => {
  it("writes nothing for an unrestricted selection", () => {
    expect(selectionToParams(createSelection()).toString()).toBe("");
  });

  it("writes one param per value and an empty param for an empty set", () => {
    const params = selectionToParams(
      createSelection({
        sites: new Set(["S1", "S2"]),
        taxa: new Set(),
        years: new Set([2021]),
        dateRange: { end: "2021-12-31" },
      })
    );
    expect(params.toString()).toBe("sites=S1&sites=S2&taxa=&years=2021&end=2021-12-31");
  });

  it("reads back what it writes", () => {
    const selection = createSelection({
      sites: new Set(["S 1", "S&2"]),
      traps: new Set(),
      dateRange: { start: "2020-01-01", end: "2020-06-30" },
    });
    expect(parseSelectionParams(selectionToParams(selection))).toEqual(selection);
  });
});
