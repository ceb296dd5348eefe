"use client";

import { useEffect } from "react";
import { useMap } from "react-leaflet";

interface FitSitesControlProps {
  points: [number, number][];
}

// Zooms the map to the mapped sites whenever they change, and on demand
export default function FitSitesControl({ points }: FitSitesControlProps) {
  const map = useMap();

  const fit = () => {
    if (points.length === 0) return;
    if (points.length === 1) {
      map.setView(points[0], 12);
      return;
    }
    map.fitBounds(points, { padding: [24, 24] });
  };

  useEffect(() => {
    fit();
  }, [map, points]);

  return (
    <button
      onClick={fit}
      disabled={points.length === 0}
      className="absolute top-2 right-2 z-[1000] bg-white dark:bg-zinc-800 p-2 rounded-lg shadow-md border border-zinc-200 dark:border-zinc-700 hover:bg-zinc-50 dark:hover:bg-zinc-700 disabled:opacity-50 transition-colors"
      title="Zoom to sites"
    >
      <svg className="w-5 h-5 text-zinc-600 dark:text-zinc-300" fill="none" stroke="currentColor" viewBox="0 0 24 24">
        <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M4 8V4h4M20 8V4h-4M4 16v4h4M20 16v4h-4" />
      </svg>
    </button>
  );
}
