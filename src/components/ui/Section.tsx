import { theme } from "../../theme";

interface SectionProps {
  title: string;
  /** Right-aligned controls next to the title */
  actions?: React.ReactNode;
  children: React.ReactNode;
}

export function Section({ title, actions, children }: SectionProps) {
  return (
    <section style={{ minWidth: 0 }}>
      <div style={{ display: "flex", justifyContent: "space-between", alignItems: "center", marginBottom: theme.spacing.md }}>
        <h2 style={{ ...theme.typography.sectionTitle, margin: 0, color: theme.colors.text.primary }}>{title}</h2>
        {actions}
      </div>
      {children}
    </section>
  );
}
