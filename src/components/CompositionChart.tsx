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
import { OVERFLOW_LABEL, TAXON_PALETTE } from "@/config/dataset";
import { X_KEY, pivotComposition } from "@/lib/arthropods/chartData";
import type { CompositionRow } from "@/lib/arthropods/types";

const formatNumber = (num: number) => num.toLocaleString();

function taxonColor(taxon: string, index: number): string {
  if (taxon === OVERFLOW_LABEL) return TAXON_PALETTE[TAXON_PALETTE.length - 1];
  return TAXON_PALETTE[index % (TAXON_PALETTE.length - 1)];
}

export default function CompositionChart({ rows }: { rows: CompositionRow[] }) {
  if (rows.length === 0) {
    return <p className="text-sm text-zinc-500">No taxa available for the selected filters.</p>;
  }

  const { data, series } = pivotComposition(rows);

  return (
    <ResponsiveContainer width="100%" height={380}>
      <BarChart data={data}>
        <CartesianGrid strokeDasharray="3 3" className="opacity-30" />
        <XAxis dataKey={X_KEY} tick={{ fontSize: 10 }} interval={0} angle={-45} textAnchor="end" height={60} />
        <YAxis
          tick={{ fontSize: 10 }}
          tickFormatter={(v: number) => (v >= 1000 ? `${v / 1000}k` : String(v))}
          label={{ value: "Total count", angle: -90, position: "insideLeft", fontSize: 11 }}
        />
        <Tooltip
          formatter={(value) => formatNumber(Number(value))}
          contentStyle={{
            backgroundColor: "rgba(255,255,255,0.95)",
            border: "1px solid #e5e7eb",
            borderRadius: "8px",
          }}
        />
        <Legend wrapperStyle={{ fontSize: "11px" }} />
        {series.map((taxon, index) => (
          <Bar key={taxon} dataKey={taxon} stackId="site" fill={taxonColor(taxon, index)} />
        ))}
      </BarChart>
    </ResponsiveContainer>
  );
}
