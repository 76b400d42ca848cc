import { theme } from "../../theme";
import { Card } from "./Card";

interface StatCardProps {
  label: string;
  value: React.ReactNode;
  hint?: string;
  minWidth?: number;
}

export function StatCard({ label, value, hint, minWidth = 140 }: StatCardProps) {
  return (
    <Card minWidth={minWidth}>
      <div style={theme.typography.label}>{label}</div>
      <div style={theme.typography.value}>{value}</div>
      {hint && <div style={{ fontSize: "0.75rem", color: theme.colors.text.muted, marginTop: theme.spacing.xs }}>{hint}</div>}
    </Card>
  );
}

export function StatCards({ children }: { children: React.ReactNode }) {
  return (
    <div style={{ display: "flex", gap: theme.spacing.lg, flexWrap: "wrap", alignItems: "stretch" }}>
      {children}
    </div>
  );
}
