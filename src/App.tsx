/**
 * dca-tracker: daily dollar-cost averaging dashboard.
 */

import { DcaPage } from "./components/pages/DcaPage";
import { theme } from "./theme";

function Logo() {
  return (
    <div style={{ display: "flex", alignItems: "center", gap: "8px" }}>
      <svg width="10" height="10" viewBox="0 0 10 10" fill="none">
        <circle cx="5" cy="5" r="5" fill={theme.colors.chart.invested} opacity="0.9" />
        <circle cx="5" cy="5" r="3" fill={theme.colors.chart.portfolio} />
      </svg>
      <span style={{ fontSize: "1.3rem", fontWeight: 700, letterSpacing: "-0.02em", color: theme.colors.text.heading }}>
        Daily Investment Tracker
      </span>
    </div>
  );
}

function App() {
  return (
    <div
      style={{
        minHeight: "100vh",
        background: theme.colors.bg.page,
        color: theme.colors.text.primary,
        fontFamily: "-apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif",
      }}
    >
      <header
        style={{
          display: "flex",
          alignItems: "center",
          padding: "0.75rem 1.5rem",
          borderBottom: `1px solid ${theme.colors.bg.cardAlt}`,
          position: "sticky",
          top: 0,
          background: theme.colors.bg.page,
          zIndex: 50,
        }}
      >
        <Logo />
      </header>

      <main style={{ padding: "1.25rem 1.5rem", maxWidth: "1400px", margin: "0 auto" }}>
        <DcaPage />
      </main>
    </div>
  );
}

export default App;
