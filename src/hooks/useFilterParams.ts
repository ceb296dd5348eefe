"use client";

import { useState, useCallback, useEffect } from "react";
import { createSelection } from "@/lib/arthropods/filter";
import { parseSelectionParams, selectionToParams } from "@/lib/arthropods/params";
import type { DateRange, FilterSelection, Selection } from "@/lib/arthropods/types";

function buildQs(selection: FilterSelection): string {
  const qs = selectionToParams(selection).toString();
  return qs ? `?${qs}` : "";
}

type SetDimension = "sites" | "taxa" | "traps";

/**
 * Hook that syncs the dashboard filter selection with URL search parameters,
 * so filtered views can be shared and bookmarked.
 *
 * Uses local useState for instant UI updates and native
 * history.replaceState/pushState to sync the URL, without going through the
 * Next.js router.
 *
 * Example URL: /?sites=AD-10&sites=M-8&years=2019&taxa=Araneae
 */
export function useFilterParams() {
  // SSR-safe: the server always renders the unfiltered view
  const [selection, setSelection] = useState<FilterSelection>(() => {
    if (typeof window !== "undefined") {
      return parseSelectionParams(new URLSearchParams(window.location.search));
    }
    return createSelection();
  });

  // Back/forward buttons
  useEffect(() => {
    const onPopState = () => {
      setSelection(parseSelectionParams(new URLSearchParams(window.location.search)));
    };
    window.addEventListener("popstate", onPopState);
    return () => window.removeEventListener("popstate", onPopState);
  }, []);

  const syncUrl = useCallback((next: FilterSelection, push: boolean) => {
    const url = window.location.pathname + buildQs(next);
    if (push) {
      window.history.pushState(null, "", url);
    } else {
      window.history.replaceState(null, "", url);
    }
  }, []);

  const update = useCallback(
    (updater: (prev: FilterSelection) => FilterSelection, push: boolean) => {
      setSelection((prev) => {
        const next = updater(prev);
        queueMicrotask(() => syncUrl(next, push));
        return next;
      });
    },
    [syncUrl]
  );

  const setDimension = useCallback(
    (dimension: SetDimension, value: Selection<string>) => {
      update((prev) => ({ ...prev, [dimension]: value }), dimension === "sites");
    },
    [update]
  );

  const setYears = useCallback(
    (value: Selection<number>) => {
      update((prev) => ({ ...prev, years: value }), false);
    },
    [update]
  );

  const setDateRange = useCallback(
    (range: DateRange | undefined) => {
      update((prev) => {
        if (!range || (!range.start && !range.end)) {
          return createSelection({
            sites: prev.sites,
            taxa: prev.taxa,
            years: prev.years,
            traps: prev.traps,
          });
        }
        return { ...prev, dateRange: range };
      }, false);
    },
    [update]
  );

  const clearAllFilters = useCallback(() => {
    update(() => createSelection(), true);
  }, [update]);

  return {
    selection,
    setSelectedSites: (value: Selection<string>) => setDimension("sites", value),
    setSelectedTaxa: (value: Selection<string>) => setDimension("taxa", value),
    setSelectedTraps: (value: Selection<string>) => setDimension("traps", value),
    setSelectedYears: setYears,
    setDateRange,
    clearAllFilters,
  };
}
