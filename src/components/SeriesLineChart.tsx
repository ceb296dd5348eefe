"use client";

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Legend,
} from "recharts";
import { TAXON_PALETTE } from "@/config/dataset";
import { X_KEY, type PivotedSeries } from "@/lib/arthropods/chartData";

interface SeriesLineChartProps {
  pivoted: PivotedSeries;
  yLabel: string;
  height?: number;
  formatValue?: (value: number) => string;
}

// One line per series (site), x values taken from the pivoted X_KEY property
export default function SeriesLineChart({
  pivoted,
  yLabel,
  height = 300,
  formatValue = (v) => v.toLocaleString(),
}: SeriesLineChartProps) {
  return (
    <ResponsiveContainer width="100%" height={height}>
      <LineChart data={pivoted.data}>
        <CartesianGrid strokeDasharray="3 3" className="opacity-30" />
        <XAxis dataKey={X_KEY} tick={{ fontSize: 10 }} />
        <YAxis
          tick={{ fontSize: 10 }}
          label={{ value: yLabel, angle: -90, position: "insideLeft", fontSize: 11 }}
        />
        <Tooltip formatter={(value) => formatValue(Number(value))} />
        <Legend wrapperStyle={{ fontSize: "11px" }} />
        {pivoted.series.map((name, index) => (
          <Line
            key={name}
            type="monotone"
            dataKey={name}
            stroke={TAXON_PALETTE[index % TAXON_PALETTE.length]}
            dot={{ r: 2 }}
            connectNulls
          />
        ))}
      </LineChart>
    </ResponsiveContainer>
  );
}
