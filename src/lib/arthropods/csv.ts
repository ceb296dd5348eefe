import Papa from "papaparse";
import { DataFormatError } from "./errors";
import type { CsvTable } from "./types";

/**
 * Parse a CSV export with a header row. Headers and cells are trimmed.
 *
 * Short rows are accepted (their missing cells read as undefined); rows with
 * extra fields or broken quoting fail the whole table.
 */
export function parseCsv(text: string, name: string): CsvTable {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.replace(/^\uFEFF/, "").trim(),
    transform: (value) => value.trim(),
  });

  const fatal = parsed.errors.find((e) => e.code !== "TooFewFields");
  if (fatal) {
    throw new DataFormatError(fatal.message, {
      table: name,
      // papaparse counts data rows from 0; the header is line 1
      row: fatal.row !== undefined ? fatal.row + 2 : undefined,
    });
  }

  return {
    name,
    fields: (parsed.meta.fields ?? []).filter(Boolean),
    rows: parsed.data,
  };
}

export function requireColumns(table: CsvTable, columns: readonly string[]): void {
  const missing = columns.filter((c) => !table.fields.includes(c));
  if (missing.length > 0) {
    throw new DataFormatError(`missing required column(s): ${missing.join(", ")}`, {
      table: table.name,
    });
  }
}

/** First candidate present in the header, or null. */
export function findColumn(table: CsvTable, candidates: readonly string[]): string | null {
  return candidates.find((c) => table.fields.includes(c)) ?? null;
}
