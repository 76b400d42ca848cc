import { theme } from "../../theme";

type Tone = "error" | "warning";

interface ErrorBannerProps {
  message: string;
  detail?: string;
  tone?: Tone;
}

const TONES: Record<Tone, { bg: string; color: string; label: string }> = {
  error: { bg: theme.colors.bg.error, color: "#fecaca", label: "Error:" },
  warning: { bg: theme.colors.bg.warning, color: "#fef08a", label: "Warning:" },
};

export function ErrorBanner({ message, detail, tone = "error" }: ErrorBannerProps) {
  const t = TONES[tone];
  return (
    <div
      role={tone === "error" ? "alert" : "status"}
      style={{
        padding: theme.spacing.lg,
        background: t.bg,
        borderRadius: theme.radius.lg,
        color: t.color,
      }}
    >
      <strong>{t.label}</strong> {message}
      {detail && (
        <>
          <br />
          <span style={{ fontSize: "0.85rem" }}>{detail}</span>
        </>
      )}
    </div>
  );
}
