/**
 * Validate the configured arthropod CSV exports before deploying them.
 *
 * Loads and joins the three tables exactly as the API does, then prints the
 * filter domains and any sites missing coordinates or a land-use class.
 *
 * Usage:
 *   npx tsx scripts/check-dataset.ts
 *   ARTHROPOD_DATA_DIR=/path/to/export npx tsx scripts/check-dataset.ts
 *
 * Exits with status 1 if a table is missing a column or holds an unparsable value.
 */

import { getDatasetConfig } from "../src/config/dataset";
import { loadArthropodDataset } from "../src/lib/arthropods/dataset";
import { isDataFormatError } from "../src/lib/arthropods/errors";
import { buildFilterOptions } from "../src/lib/arthropods/filterOptions";

async function main() {
  const config = getDatasetConfig();
  console.log(`Checking dataset in ${config.dataDir}\n`);

  const { records, warnings } = await loadArthropodDataset(config);
  const options = buildFilterOptions(records);
  const total = records.reduce((sum, r) => sum + r.count, 0);

  console.log(`  Records        ${records.length.toLocaleString()} (${total.toLocaleString()} individuals)`);
  console.log(`  Sites          ${options.sites.length}`);
  console.log(`  Years          ${options.years.join(", ")}`);
  console.log(`  Traps          ${options.traps.length}`);
  console.log(`  Taxa offered   ${options.topTaxa.length}`);
  if (options.dateRange) {
    console.log(`  Date range     ${options.dateRange.min} .. ${options.dateRange.max}`);
  }

  if (warnings.length > 0) {
    console.log(`\n${warnings.length} site(s) with incomplete metadata:`);
    for (const w of warnings) {
      console.log(`  ${w.site_code.padEnd(12)} missing ${w.missing.join(" and ")}`);
    }
  }
}

main().catch((error: unknown) => {
  if (isDataFormatError(error)) {
    console.error(`\nDataset is malformed: ${error.message}`);
  } else {
    console.error("\nFailed to load dataset:", error);
  }
  process.exitCode = 1;
});
