import { promises as fs } from "fs";
import path from "path";
import { getDatasetConfig, type DatasetConfig } from "@/config/dataset";
import { parseCsv } from "./csv";
import { buildFilterOptions } from "./filterOptions";
import { buildDataset } from "./recordStore";
import type { ArthropodDataset, CsvTable, FilterOptions } from "./types";

async function readTable(dataDir: string, fileName: string, name: string): Promise<CsvTable> {
  const filePath = path.join(dataDir, fileName);
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new Error(`Failed to read ${name} table from ${filePath}`, { cause: error });
  }
  return parseCsv(content, name);
}

export async function loadArthropodDataset(
  config: DatasetConfig = getDatasetConfig()
): Promise<ArthropodDataset> {
  const [observations, sites, landuse] = await Promise.all([
    readTable(config.dataDir, config.observationsFile, "observations"),
    readTable(config.dataDir, config.sitesFile, "sites"),
    readTable(config.dataDir, config.landuseFile, "landuse"),
  ]);
  return buildDataset(observations, sites, landuse);
}

/**
 * Holds the joined relation for the life of the process. The first `get()`
 * starts the load and every caller shares it; `invalidate()` drops it so the
 * next `get()` reads the files again. A failed load is not kept.
 *
 * Filter options are derived once per load and dropped with it.
 */
export class ArthropodDatasetCache {
  private pending: Promise<ArthropodDataset> | null = null;
  private derivedOptions: { load: Promise<ArthropodDataset>; options: Promise<FilterOptions> } | null =
    null;

  constructor(private readonly loader: () => Promise<ArthropodDataset>) {}

  get(): Promise<ArthropodDataset> {
    if (this.pending) return this.pending;

    const loading = this.loader().catch((error: unknown) => {
      if (this.pending === loading) this.pending = null;
      throw error;
    });
    this.pending = loading;
    return loading;
  }

  getOptions(): Promise<FilterOptions> {
    const load = this.get();
    let derived = this.derivedOptions;
    if (!derived || derived.load !== load) {
      derived = { load, options: load.then(({ records }) => buildFilterOptions(records)) };
      this.derivedOptions = derived;
    }
    return derived.options;
  }

  invalidate(): void {
    this.pending = null;
    this.derivedOptions = null;
  }
}

export const arthropodDataset = new ArthropodDatasetCache(() => loadArthropodDataset());
