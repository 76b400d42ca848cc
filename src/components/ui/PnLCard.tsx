import { theme } from "../../theme";
import { formatPct, formatUsd } from "../../lib/format";
import { Card } from "./Card";

interface PnLCardProps {
  label: string;
  value: number;
  pct?: number;
}

/** Profit/loss in dollars, colored by sign, with an optional return %. */
export function PnLCard({ label, value, pct }: PnLCardProps) {
  const color = value >= 0 ? theme.colors.pnl.positive : theme.colors.pnl.negative;
  return (
    <Card minWidth={140}>
      <div style={theme.typography.label}>{label}</div>
      <div style={{ ...theme.typography.pnlValue, color }}>
        {value >= 0 ? "+" : ""}
        {formatUsd(value)}
        {pct !== undefined && <span style={{ fontSize: "0.85rem", marginLeft: theme.spacing.sm }}>({formatPct(pct)})</span>}
      </div>
    </Card>
  );
}
