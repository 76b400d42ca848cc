/**
 * Portfolio value vs. total invested, indexed by day of the run.
 */

import { useMemo } from "react";
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from "recharts";
import type { DayRecord } from "../lib/dca";
import { formatUsd } from "../lib/format";
import { toChartPoints } from "../lib/view";
import { theme } from "../theme";

interface GrowthChartProps {
  records: DayRecord[];
  height?: number;
}

function compactUsd(v: number): string {
  const n = Math.abs(v);
  if (n >= 1_000_000) return `$${(v / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `$${(v / 1_000).toFixed(1)}k`;
  return `$${v.toFixed(0)}`;
}

export function GrowthChart({ records, height = 400 }: GrowthChartProps) {
  const data = useMemo(() => toChartPoints(records), [records]);

  if (data.length === 0) {
    return (
      <div
        style={{
          height,
          background: theme.colors.bg.cardAlt,
          borderRadius: theme.radius.lg,
          display: "flex",
          alignItems: "center",
          justifyContent: "center",
          color: theme.colors.text.muted,
          fontSize: "0.9rem",
        }}
      >
        No data available to display.
      </div>
    );
  }

  return (
    <div
      style={{
        width: "100%",
        minWidth: 300,
        height,
        background: theme.colors.bg.cardAlt,
        borderRadius: theme.radius.lg,
        padding: theme.spacing.sm,
        boxSizing: "border-box",
      }}
    >
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data} margin={{ top: 10, right: 20, left: 10, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" stroke={theme.colors.chart.grid} />
          <XAxis
            dataKey="day"
            type="number"
            domain={["dataMin", "dataMax"]}
            stroke={theme.colors.chart.axis}
            fontSize={10}
            tickLine={false}
          />
          <YAxis
            stroke={theme.colors.chart.axis}
            fontSize={10}
            tickLine={false}
            tickFormatter={(v) => compactUsd(Number(v))}
          />
          <Tooltip
            contentStyle={{
              background: theme.colors.bg.card,
              border: `1px solid ${theme.colors.border}`,
              borderRadius: theme.radius.md,
              color: theme.colors.text.primary,
            }}
            labelFormatter={(label) => `Day ${String(label)}`}
            formatter={(value) => formatUsd(Number(value))}
          />
          <Legend />
          <Line
            type="monotone"
            dataKey="portfolioValue"
            name="Portfolio Value"
            stroke={theme.colors.chart.portfolio}
            strokeWidth={2}
            dot={false}
          />
          <Line
            type="monotone"
            dataKey="totalInvested"
            name="Total Invested"
            stroke={theme.colors.chart.invested}
            strokeWidth={2}
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
