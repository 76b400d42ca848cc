import { theme } from "../../theme";

interface InputProps extends Omit<React.InputHTMLAttributes<HTMLInputElement>, "style"> {
  label?: string;
  style?: React.CSSProperties;
}

export function Input({ label, style, id, ...props }: InputProps) {
  const input = (
    <input
      id={id}
      style={{
        padding: theme.spacing.sm,
        borderRadius: theme.radius.md,
        background: theme.colors.bg.cardAlt,
        color: theme.colors.text.primary,
        border: `1px solid ${theme.colors.border}`,
        fontSize: "0.9rem",
        boxSizing: "border-box",
        width: "100%",
        ...style,
      }}
      {...props}
    />
  );
  if (!label) return input;
  return (
    <label htmlFor={id} style={{ display: "flex", flexDirection: "column", gap: theme.spacing.xs, flex: 1 }}>
      <span style={theme.typography.label}>{label}</span>
      {input}
    </label>
  );
}
