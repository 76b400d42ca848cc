import { theme } from "../../theme";

interface CardProps {
  children: React.ReactNode;
  style?: React.CSSProperties;
  minWidth?: number;
  /** flex-grow inside a row layout */
  grow?: number;
}

export function Card({ children, style, minWidth, grow }: CardProps) {
  return (
    <div
      style={{
        padding: theme.spacing.lg,
        background: theme.colors.bg.card,
        borderRadius: theme.radius.lg,
        border: `1px solid ${theme.colors.border}`,
        minWidth: minWidth ?? 0,
        flex: grow !== undefined ? `${grow} 1 0` : undefined,
        ...style,
      }}
    >
      {children}
    </div>
  );
}
