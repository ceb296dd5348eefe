"use client";

import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Legend,
} from "recharts";
import { QUARTERS, QUARTER_COLORS } from "@/config/dataset";
import { zeroFillRegionQuarter } from "@/lib/arthropods/chartData";
import type { RegionQuarterRow } from "@/lib/arthropods/types";

export default function RegionQuarterChart({ rows }: { rows: RegionQuarterRow[] }) {
  if (rows.length === 0) {
    return <p className="text-sm text-zinc-500">No land use / quarter data for the selected filters.</p>;
  }

  return (
    <ResponsiveContainer width="100%" height={320}>
      <BarChart data={zeroFillRegionQuarter(rows)}>
        <CartesianGrid strokeDasharray="3 3" className="opacity-30" />
        <XAxis dataKey="region" tick={{ fontSize: 11 }} />
        <YAxis
          tick={{ fontSize: 10 }}
          tickFormatter={(v: number) => (v >= 1000 ? `${v / 1000}k` : String(v))}
          label={{ value: "Total count", angle: -90, position: "insideLeft", fontSize: 11 }}
        />
        <Tooltip formatter={(value) => Number(value).toLocaleString()} />
        <Legend wrapperStyle={{ fontSize: "11px" }} />
        {QUARTERS.map((quarter) => (
          <Bar key={quarter} dataKey={quarter} fill={QUARTER_COLORS[quarter]} radius={[2, 2, 0, 0]} />
        ))}
      </BarChart>
    </ResponsiveContainer>
  );
}
