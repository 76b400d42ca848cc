import { theme } from "../../theme";

const thStyle: React.CSSProperties = {
  padding: theme.spacing.md,
  textAlign: "left",
  fontWeight: 600,
  color: theme.colors.text.secondary,
  position: "sticky",
  top: 0,
  background: theme.colors.bg.card,
};

const tdStyle: React.CSSProperties = {
  padding: theme.spacing.md,
  color: theme.colors.text.primary,
};

export interface Column<T> {
  key: string;
  header: string;
  render: (row: T) => React.ReactNode;
  align?: "left" | "right";
}

interface DataTableProps<T> {
  columns: Column<T>[];
  data: T[];
  getRowKey: (row: T) => string;
  /** Scroll inside this height (px) instead of growing the page */
  maxHeight?: number;
  emptyMessage?: string;
}

export function DataTable<T>({
  columns,
  data,
  getRowKey,
  maxHeight,
  emptyMessage = "No data.",
}: DataTableProps<T>) {
  if (data.length === 0) {
    return (
      <p style={{ color: theme.colors.text.secondary }}>{emptyMessage}</p>
    );
  }

  return (
    <div
      style={{
        maxHeight,
        overflowY: maxHeight ? "auto" : undefined,
        borderRadius: theme.radius.lg,
        border: `1px solid ${theme.colors.border}`,
      }}
    >
      <table
        style={{
          width: "100%",
          borderCollapse: "collapse",
          background: theme.colors.bg.cardAlt,
          fontVariantNumeric: "tabular-nums",
        }}
      >
        <thead>
          <tr>
            {columns.map((col) => (
              <th key={col.key} style={{ ...thStyle, textAlign: col.align ?? "left" }}>
                {col.header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {data.map((row) => (
            <tr key={getRowKey(row)} style={{ borderTop: `1px solid ${theme.colors.border}` }}>
              {columns.map((col) => (
                <td key={col.key} style={{ ...tdStyle, textAlign: col.align ?? "left" }}>
                  {col.render(row)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
