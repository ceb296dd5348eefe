"use client";

import { useEffect, useMemo, useState } from "react";
import dynamic from "next/dynamic";
import "leaflet/dist/leaflet.css";
import { markerRadius } from "@/lib/arthropods/chartData";
import type { SiteTotalRow } from "@/lib/arthropods/types";

// Dynamically import Leaflet components
const MapContainer = dynamic(
  () => import("react-leaflet").then((mod) => mod.MapContainer),
  { ssr: false }
);
const TileLayer = dynamic(
  () => import("react-leaflet").then((mod) => mod.TileLayer),
  { ssr: false }
);
const CircleMarker = dynamic(
  () => import("react-leaflet").then((mod) => mod.CircleMarker),
  { ssr: false }
);
const Popup = dynamic(
  () => import("react-leaflet").then((mod) => mod.Popup),
  { ssr: false }
);
const FitSitesControl = dynamic(
  () => import("./FitSitesControl"),
  { ssr: false }
);

// Phoenix metro area, used until the sites are fitted
const DEFAULT_CENTER: [number, number] = [33.45, -112.07];

interface SiteMapProps {
  sites: SiteTotalRow[];
}

export default function SiteMap({ sites }: SiteMapProps) {
  const [mounted, setMounted] = useState(false);

  useEffect(() => {
    setMounted(true);
  }, []);

  const maxCount = Math.max(0, ...sites.map((s) => s.total_count));
  const points = useMemo(
    () => sites.map((s): [number, number] => [s.lat, s.lon]),
    [sites]
  );

  return (
    <div className="h-[400px] rounded-lg overflow-hidden border border-zinc-200 dark:border-zinc-700 relative isolate z-0">
      {mounted ? (
        <MapContainer center={DEFAULT_CENTER} zoom={9} style={{ height: "100%", width: "100%" }}>
          <TileLayer
            attribution='&copy; <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a>'
            url="https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png"
          />
          <FitSitesControl points={points} />
          {sites.map((site) => (
            <CircleMarker
              key={site.site_code}
              center={[site.lat, site.lon]}
              radius={markerRadius(site.total_count, maxCount)}
              pathOptions={{
                color: "#1d4ed8",
                fillColor: "#3b82f6",
                fillOpacity: 0.6,
                weight: 1,
              }}
            >
              <Popup>
                <div className="text-sm">
                  <div className="font-medium">{site.site_code}</div>
                  <div>Total count: {site.total_count.toLocaleString()}</div>
                  <div className="text-xs text-gray-500">
                    {site.lat.toFixed(4)}, {site.lon.toFixed(4)}
                  </div>
                </div>
              </Popup>
            </CircleMarker>
          ))}
        </MapContainer>
      ) : null}
      {sites.length === 0 && (
        <div className="absolute inset-0 z-[1000] flex items-center justify-center bg-white/70 dark:bg-zinc-900/70 text-sm text-zinc-500">
          No mapped sites for the selected filters
        </div>
      )}
    </div>
  );
}
