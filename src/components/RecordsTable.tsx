"use client";

import { useState, useEffect } from "react";
import type { RecordSortKey, SortDirection } from "@/lib/arthropods/dashboard";
import { selectionToParams } from "@/lib/arthropods/params";
import type { FilterSelection, JoinedRecord, Page, Pagination } from "@/lib/arthropods/types";

const PAGE_SIZE = 15;

const COLUMNS: { key: RecordSortKey; label: string }[] = [
  { key: "site_code", label: "Site" },
  { key: "sample_date", label: "Date" },
  { key: "year", label: "Year" },
  { key: "month", label: "Month" },
  { key: "quarter", label: "Quarter" },
  { key: "display_name", label: "Taxon" },
  { key: "trap_name", label: "Trap" },
  { key: "count", label: "Count" },
  { key: "region", label: "Region" },
  { key: "lat", label: "Lat" },
  { key: "lon", label: "Lon" },
];

function formatCell(record: JoinedRecord, key: RecordSortKey): string {
  const value = record[key];
  if (value === null) return "";
  if (key === "lat" || key === "lon") return Number(value).toFixed(4);
  return String(value);
}

// Passthrough columns present on the current page, in first-seen order
function extraColumns(records: JoinedRecord[]): string[] {
  const names = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record.extra)) names.add(name);
  }
  return [...names];
}

export default function RecordsTable({ selection }: { selection: FilterSelection }) {
  const [records, setRecords] = useState<JoinedRecord[]>([]);
  const [pagination, setPagination] = useState<Pagination>({ page: 1, limit: PAGE_SIZE, total: 0, totalPages: 0 });
  const [page, setPage] = useState(1);
  const [loading, setLoading] = useState(true);
  const [sort, setSort] = useState<{ key: RecordSortKey; dir: SortDirection } | null>(null);

  // Back to the first page whenever the filters or the order change
  useEffect(() => {
    setPage(1);
  }, [selection, sort]);

  useEffect(() => {
    const params = selectionToParams(selection);
    params.set("page", String(page));
    params.set("limit", String(PAGE_SIZE));
    if (sort) {
      params.set("sort", sort.key);
      params.set("dir", sort.dir);
    }

    let cancelled = false;
    async function fetchRecords() {
      setLoading(true);
      try {
        const response = await fetch(`/api/records?${params}`);
        if (!response.ok) throw new Error(`Records request failed: ${response.status}`);
        const result: Page<JoinedRecord> = await response.json();
        if (!cancelled) {
          setRecords(result.data);
          setPagination(result.pagination);
        }
      } catch (error) {
        console.error("Failed to fetch records:", error);
      } finally {
        if (!cancelled) setLoading(false);
      }
    }
    fetchRecords();
    return () => {
      cancelled = true;
    };
  }, [selection, page, sort]);

  // Ascending, then descending, then back to file order
  const cycleSort = (key: RecordSortKey) => {
    setSort((current) => {
      if (!current || current.key !== key) return { key, dir: "asc" };
      if (current.dir === "asc") return { key, dir: "desc" };
      return null;
    });
  };

  const extras = extraColumns(records);

  return (
    <div>
      <div className="overflow-x-auto rounded-lg border border-zinc-200 dark:border-zinc-800">
        <table className="w-full text-xs">
          <thead className="bg-zinc-50 dark:bg-zinc-800/50">
            <tr>
              {COLUMNS.map((c) => (
                <th key={c.key} className="px-3 py-2 text-left font-semibold text-zinc-700 dark:text-zinc-300">
                  <button onClick={() => cycleSort(c.key)} className="hover:text-zinc-900 dark:hover:text-zinc-100">
                    {c.label}
                    {sort?.key === c.key && (sort.dir === "asc" ? " ▲" : " ▼")}
                  </button>
                </th>
              ))}
              {extras.map((name) => (
                <th key={`extra-${name}`} className="px-3 py-2 text-left font-semibold text-zinc-500 dark:text-zinc-400">
                  {name}
                </th>
              ))}
            </tr>
          </thead>
          <tbody className={loading ? "opacity-50" : ""}>
            {records.map((record, idx) => (
              <tr key={idx} className="border-t border-zinc-100 dark:border-zinc-800">
                {COLUMNS.map((c) => (
                  <td key={c.key} className="px-3 py-1.5 text-zinc-600 dark:text-zinc-400 whitespace-nowrap">
                    {formatCell(record, c.key)}
                  </td>
                ))}
                {extras.map((name) => (
                  <td key={`extra-${name}`} className="px-3 py-1.5 text-zinc-500 dark:text-zinc-500">
                    {record.extra[name] ?? ""}
                  </td>
                ))}
              </tr>
            ))}
            {!loading && records.length === 0 && (
              <tr>
                <td colSpan={COLUMNS.length + extras.length} className="px-3 py-6 text-center text-zinc-500">
                  No records match the selected filters.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
      <div className="flex items-center justify-between mt-3 text-sm text-zinc-600 dark:text-zinc-400">
        <span>
          {pagination.total.toLocaleString()} records
          {pagination.totalPages > 0 && ` · page ${pagination.page} of ${pagination.totalPages}`}
        </span>
        <div className="flex gap-2">
          <button
            onClick={() => setPage((p) => Math.max(1, p - 1))}
            disabled={pagination.page <= 1}
            className="px-3 py-1 rounded-md border border-zinc-200 dark:border-zinc-700 disabled:opacity-40"
          >
            Previous
          </button>
          <button
            onClick={() => setPage((p) => p + 1)}
            disabled={pagination.page >= pagination.totalPages}
            className="px-3 py-1 rounded-md border border-zinc-200 dark:border-zinc-700 disabled:opacity-40"
          >
            Next
          </button>
        </div>
      </div>
    </div>
  );
}
