"use client";

import { useState, useEffect, useMemo } from "react";
import dynamic from "next/dynamic";
import FilterPanel from "../components/FilterPanel";
import CompositionChart from "../components/CompositionChart";
import RegionQuarterChart from "../components/RegionQuarterChart";
import SeriesLineChart from "../components/SeriesLineChart";
import RecordsTable from "../components/RecordsTable";
import { useFilterParams } from "@/hooks/useFilterParams";
import { pivotSeries } from "@/lib/arthropods/chartData";
import { selectionToParams } from "@/lib/arthropods/params";
import type { DashboardResult, FilterOptions } from "@/lib/arthropods/types";

// Leaflet touches window on import
const SiteMap = dynamic(() => import("../components/SiteMap"), {
  ssr: false,
  loading: () => (
    <div className="h-[400px] flex items-center justify-center bg-zinc-100 dark:bg-zinc-800 rounded-lg text-zinc-400">
      Loading map...
    </div>
  ),
});

function Panel({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <section className="bg-white dark:bg-zinc-900 rounded-xl p-6 shadow-sm border border-zinc-200 dark:border-zinc-800">
      <h2 className="text-lg font-semibold text-zinc-900 dark:text-zinc-100 mb-4">{title}</h2>
      {children}
    </section>
  );
}

export default function DashboardPage() {
  const {
    selection,
    setSelectedSites,
    setSelectedTaxa,
    setSelectedYears,
    setSelectedTraps,
    setDateRange,
    clearAllFilters,
  } = useFilterParams();

  const [options, setOptions] = useState<FilterOptions | null>(null);
  const [dashboard, setDashboard] = useState<DashboardResult | null>(null);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    fetch("/api/options")
      .then(async (res) => {
        const data = await res.json();
        if (!res.ok) throw new Error(data.error || "Failed to load filter options");
        setOptions(data);
      })
      .catch((err: unknown) => {
        console.error(err);
        setError(err instanceof Error ? err.message : "Failed to load filter options");
      });
  }, []);

  useEffect(() => {
    let cancelled = false;
    async function fetchDashboard() {
      setLoading(true);
      try {
        const response = await fetch(`/api/dashboard?${selectionToParams(selection)}`);
        const result = await response.json();
        if (!response.ok) throw new Error(result.error || "Failed to load dashboard");
        if (!cancelled) {
          setDashboard(result);
          setError(null);
        }
      } catch (err) {
        console.error("Error fetching dashboard:", err);
        if (!cancelled) setError(err instanceof Error ? err.message : "Failed to load dashboard");
      } finally {
        if (!cancelled) setLoading(false);
      }
    }
    fetchDashboard();
    return () => {
      cancelled = true;
    };
  }, [selection]);

  const abundance = useMemo(
    () =>
      pivotSeries(
        dashboard?.abundance ?? [],
        (r) => r.month,
        (r) => r.site_code,
        (r) => r.total_count
      ),
    [dashboard]
  );
  const richness = useMemo(
    () =>
      pivotSeries(
        dashboard?.diversity ?? [],
        (r) => r.year,
        (r) => r.site_code,
        (r) => r.richness
      ),
    [dashboard]
  );
  const shannon = useMemo(
    () =>
      pivotSeries(
        dashboard?.diversity ?? [],
        (r) => r.year,
        (r) => r.site_code,
        (r) => r.shannon
      ),
    [dashboard]
  );

  return (
    <div className="min-h-screen bg-zinc-50 dark:bg-zinc-950 p-4 md:p-8">
      <main className="max-w-7xl mx-auto">
        <div className="mb-6">
          <h1 className="text-3xl font-bold text-zinc-900 dark:text-zinc-100 mb-2">
            CAP LTER Arthropods Dashboard
          </h1>
          <p className="text-zinc-600 dark:text-zinc-400">
            Explore long-term ecological trends in arthropod communities across CAP LTER sites.
          </p>
        </div>

        {error && (
          <div className="mb-6 p-4 rounded-lg bg-red-50 dark:bg-red-950 text-red-700 dark:text-red-300 text-sm">
            {error}
          </div>
        )}

        <div className="grid grid-cols-1 lg:grid-cols-4 gap-6">
          <div className="lg:col-span-1">
            {options ? (
              <FilterPanel
                options={options}
                selection={selection}
                onSitesChange={setSelectedSites}
                onTaxaChange={setSelectedTaxa}
                onYearsChange={setSelectedYears}
                onTrapsChange={setSelectedTraps}
                onDateRangeChange={setDateRange}
                onClear={clearAllFilters}
              />
            ) : (
              <div className="bg-white dark:bg-zinc-900 border border-zinc-200 dark:border-zinc-800 rounded-xl p-6">
                <div className="animate-pulse space-y-3">
                  <div className="h-4 bg-zinc-200 dark:bg-zinc-700 rounded w-1/2"></div>
                  <div className="h-32 bg-zinc-200 dark:bg-zinc-700 rounded"></div>
                </div>
              </div>
            )}
          </div>

          <div className={`lg:col-span-3 space-y-6 ${loading ? "opacity-60" : ""}`}>
            {dashboard && (
              <>
                <p className="text-sm text-zinc-500">
                  Records: {dashboard.summary.records.toLocaleString()} | Sites: {dashboard.summary.sites} | Taxa:{" "}
                  {dashboard.summary.taxa}
                </p>
                <Panel title="Community composition (top 10 taxa per site)">
                  <CompositionChart rows={dashboard.composition} />
                </Panel>
                <Panel title="Quarterly abundance by land use">
                  <RegionQuarterChart rows={dashboard.regionQuarter} />
                </Panel>
                <Panel title="Sites (bubble size = total count)">
                  <SiteMap sites={dashboard.spatial} />
                </Panel>
                <Panel title="Abundance over time (monthly total counts)">
                  <SeriesLineChart pivoted={abundance} yLabel="Total count" />
                </Panel>
                <Panel title="Diversity by year">
                  <div className="grid grid-cols-1 md:grid-cols-2 gap-6">
                    <SeriesLineChart pivoted={richness} yLabel="Richness" height={260} />
                    <SeriesLineChart
                      pivoted={shannon}
                      yLabel="Shannon H"
                      height={260}
                      formatValue={(v) => v.toFixed(3)}
                    />
                  </div>
                </Panel>
              </>
            )}
            <Panel title="Data explorer">
              <RecordsTable selection={selection} />
            </Panel>
          </div>
        </div>
      </main>
    </div>
  );
}
