"use client";

import { useState } from "react";
import type { DateRange, FilterOptions, FilterSelection, Selection } from "@/lib/arthropods/types";

interface MultiSelectProps<T extends string | number> {
  label: string;
  options: T[];
  selection: Selection<T>;
  onChange: (selection: Selection<T>) => void;
  searchable?: boolean;
}

function MultiSelect<T extends string | number>({
  label,
  options,
  selection,
  onChange,
  searchable = false,
}: MultiSelectProps<T>) {
  const [query, setQuery] = useState("");

  const isChecked = (value: T) => selection === "all" || selection.has(value);
  const selectedCount = selection === "all" ? options.length : selection.size;

  const toggle = (value: T) => {
    // Leaving "all" starts from every option checked
    const next = new Set(selection === "all" ? options : selection);
    if (next.has(value)) {
      next.delete(value);
    } else {
      next.add(value);
    }
    onChange(next);
  };

  const visible = query
    ? options.filter((o) => String(o).toLowerCase().includes(query.toLowerCase()))
    : options;

  return (
    <div className="mb-5">
      <div className="flex items-center justify-between mb-1.5">
        <span className="text-sm font-medium text-zinc-700 dark:text-zinc-300">
          {label}
          <span className="ml-1 text-xs text-zinc-400">
            ({selection === "all" ? "all" : `${selectedCount}/${options.length}`})
          </span>
        </span>
        <div className="flex gap-2 text-xs">
          <button
            onClick={() => onChange("all")}
            className="text-zinc-500 hover:text-zinc-900 dark:hover:text-zinc-100"
          >
            All
          </button>
          <button
            onClick={() => onChange(new Set<T>())}
            className="text-zinc-500 hover:text-zinc-900 dark:hover:text-zinc-100"
          >
            None
          </button>
        </div>
      </div>
      {searchable && (
        <input
          type="text"
          value={query}
          onChange={(e) => setQuery(e.target.value)}
          placeholder={`Search ${label.toLowerCase()}...`}
          className="w-full mb-1.5 px-2 py-1 text-sm rounded-md border border-zinc-200 dark:border-zinc-700 bg-white dark:bg-zinc-800"
        />
      )}
      <div className="max-h-44 overflow-y-auto rounded-md border border-zinc-200 dark:border-zinc-800 p-1.5 space-y-0.5">
        {visible.map((option) => (
          <label
            key={String(option)}
            className="flex items-center gap-2 px-1 text-sm text-zinc-700 dark:text-zinc-300 cursor-pointer hover:bg-zinc-50 dark:hover:bg-zinc-800 rounded"
          >
            <input type="checkbox" checked={isChecked(option)} onChange={() => toggle(option)} />
            <span className="truncate">{option}</span>
          </label>
        ))}
        {visible.length === 0 && <p className="px-1 text-xs text-zinc-400">No matches</p>}
      </div>
    </div>
  );
}

interface FilterPanelProps {
  options: FilterOptions;
  selection: FilterSelection;
  onSitesChange: (selection: Selection<string>) => void;
  onTaxaChange: (selection: Selection<string>) => void;
  onYearsChange: (selection: Selection<number>) => void;
  onTrapsChange: (selection: Selection<string>) => void;
  onDateRangeChange: (range: DateRange | undefined) => void;
  onClear: () => void;
}

export default function FilterPanel({
  options,
  selection,
  onSitesChange,
  onTaxaChange,
  onYearsChange,
  onTrapsChange,
  onDateRangeChange,
  onClear,
}: FilterPanelProps) {
  const range = selection.dateRange ?? {};

  return (
    <aside className="bg-white dark:bg-zinc-900 rounded-xl p-5 shadow-sm border border-zinc-200 dark:border-zinc-800">
      <div className="flex items-center justify-between mb-4">
        <h2 className="text-lg font-semibold text-zinc-900 dark:text-zinc-100">Filters</h2>
        <button
          onClick={onClear}
          className="text-xs text-zinc-500 hover:text-zinc-900 dark:hover:text-zinc-100"
        >
          Reset
        </button>
      </div>

      <MultiSelect label="Sites" options={options.sites} selection={selection.sites} onChange={onSitesChange} />
      <MultiSelect
        label="Taxa (top 100 by total count)"
        options={options.topTaxa}
        selection={selection.taxa}
        onChange={onTaxaChange}
        searchable
      />
      <MultiSelect label="Years" options={options.years} selection={selection.years} onChange={onYearsChange} />
      <MultiSelect label="Traps" options={options.traps} selection={selection.traps} onChange={onTrapsChange} />

      {options.dateRange && (
        <div>
          <span className="block text-sm font-medium text-zinc-700 dark:text-zinc-300 mb-1.5">
            Date range
          </span>
          <div className="flex gap-2">
            <input
              type="date"
              value={range.start ?? ""}
              min={options.dateRange.min}
              max={options.dateRange.max}
              onChange={(e) => onDateRangeChange({ ...range, start: e.target.value || undefined })}
              className="flex-1 px-2 py-1 text-sm rounded-md border border-zinc-200 dark:border-zinc-700 bg-white dark:bg-zinc-800"
            />
            <input
              type="date"
              value={range.end ?? ""}
              min={options.dateRange.min}
              max={options.dateRange.max}
              onChange={(e) => onDateRangeChange({ ...range, end: e.target.value || undefined })}
              className="flex-1 px-2 py-1 text-sm rounded-md border border-zinc-200 dark:border-zinc-700 bg-white dark:bg-zinc-800"
            />
          </div>
        </div>
      )}
    </aside>
  );
}
