import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FIXTURE_CONFIG, makeRecord } from "./__fixtures__/records";
import { ArthropodDatasetCache, loadArthropodDataset } from "./dataset";
import type { ArthropodDataset } from "./types";

const EMPTY: ArthropodDataset = { records: [], warnings: [] };

describe("loadArthropodDataset", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads and joins the three tables", async () => {
    const { records, warnings } = await loadArthropodDataset(FIXTURE_CONFIG);
    expect(records).toHaveLength(6);
    expect(records.map((r) => r.region)).toEqual(["Urban", "Urban", "Desert", "Desert", "Other", "Other"]);
    expect(records[2]).toMatchObject({ site_code: "S2", lat: 33.6, lon: -111.8, quarter: "Q3" });
    expect(records[0].extra).toEqual({ observer: "A. Reyes" });
    expect(warnings).toEqual([{ site_code: "S3", missing: ["coordinates", "landuse"] }]);
  });

  it("names the table and path when a file cannot be read", async () => {
    const config = { ...FIXTURE_CONFIG, sitesFile: "missing.csv" };
    const error: unknown = await loadArthropodDataset(config).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(Error);
    if (!(error instanceof Error)) return;
    expect(error.message).toMatch(/^Failed to read sites table from .*missing\.csv$/);
    expect(error.cause).toBeDefined();
  });
});

describe("ArthropodDatasetCache", () => {
  it("loads once and shares the result between concurrent callers", async () => {
    const loader = vi.fn(async () => EMPTY);
    const cache = new ArthropodDatasetCache(loader);

    const [a, b] = await Promise.all([cache.get(), cache.get()]);
    const c = await cache.get();

    expect(loader).toHaveBeenCalledTimes(1);
    expect(a).toBe(EMPTY);
    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it("loads again after invalidate", async () => {
    const second: ArthropodDataset = { records: [], warnings: [] };
    const loader = vi.fn<() => Promise<ArthropodDataset>>()
      .mockResolvedValueOnce(EMPTY)
      .mockResolvedValueOnce(second);
    const cache = new ArthropodDatasetCache(loader);

    expect(await cache.get()).toBe(EMPTY);
    cache.invalidate();
    expect(await cache.get()).toBe(second);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("does not keep a failed load", async () => {
    const loader = vi.fn<() => Promise<ArthropodDataset>>()
      .mockRejectedValueOnce(new Error("disk unavailable"))
      .mockResolvedValueOnce(EMPTY);
    const cache = new ArthropodDatasetCache(loader);

    await expect(cache.get()).rejects.toThrow("disk unavailable");
    expect(await cache.get()).toBe(EMPTY);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("derives filter options once per load", async () => {
    const first: ArthropodDataset = {
      records: [makeRecord({ site_code: "S1" }), makeRecord({ site_code: "S2" })],
      warnings: [],
    };
    const second: ArthropodDataset = { records: [makeRecord({ site_code: "S9" })], warnings: [] };
    const loader = vi.fn<() => Promise<ArthropodDataset>>()
      .mockResolvedValueOnce(first)
      .mockResolvedValueOnce(second);
    const cache = new ArthropodDatasetCache(loader);

    const options = await cache.getOptions();
    expect(options.sites).toEqual(["S1", "S2"]);
    expect(await cache.getOptions()).toBe(options);

    cache.invalidate();
    expect((await cache.getOptions()).sites).toEqual(["S9"]);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("recomputes options after a failed load", async () => {
    const loader = vi.fn<() => Promise<ArthropodDataset>>()
      .mockRejectedValueOnce(new Error("disk unavailable"))
      .mockResolvedValueOnce({ records: [makeRecord({ site_code: "S5" })], warnings: [] });
    const cache = new ArthropodDatasetCache(loader);

    await expect(cache.getOptions()).rejects.toThrow("disk unavailable");
    expect((await cache.getOptions()).sites).toEqual(["S5"]);
  });

  it("keeps a newer load when an invalidated one fails", async () => {
    let rejectFirst: (error: Error) => void = () => {};
    const loader = vi.fn<() => Promise<ArthropodDataset>>()
      .mockReturnValueOnce(
        new Promise<ArthropodDataset>((_, reject) => {
          rejectFirst = reject;
        })
      )
      .mockResolvedValueOnce(EMPTY);
    const cache = new ArthropodDatasetCache(loader);

    const first = cache.get();
    cache.invalidate();
    const second = cache.get();
    rejectFirst(new Error("stale"));

    await expect(first).rejects.toThrow("stale");
    expect(await second).toBe(EMPTY);
    expect(await cache.get()).toBe(EMPTY);
    expect(loader).toHaveBeenCalledTimes(2);
  });
});
