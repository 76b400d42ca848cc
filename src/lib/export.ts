/**
 * CSV export of a simulation run.
 * Server sends it as an attachment; the dashboard builds it locally.
 */

import type { DayRecord, SimulationParameters } from "./dca";

export const CSV_HEADERS = [
  "day",
  "date",
  "price",
  "units_bought",
  "total_units",
  "portfolio_value",
  "total_invested",
] as const;

export function recordsToCsv(records: readonly DayRecord[]): string {
  const rows = records.map((r) =>
    [
      r.dayIndex,
      r.date,
      r.price.toFixed(2),
      r.assetUnitsAcquiredThisDay.toFixed(8),
      r.cumulativeAssetUnits.toFixed(8),
      r.portfolioValue.toFixed(2),
      r.totalInvested.toFixed(2),
    ].join(",")
  );
  return [CSV_HEADERS.join(","), ...rows].join("\n");
}

/** dca-{days}d-{amount}usd-YYYYMMDD.csv */
export function simulationCsvFilename(params: SimulationParameters, now = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, "");
  const amount = String(params.dailyContribution).replace(/[^0-9]/g, "-");
  return `dca-${params.lookbackDays}d-${amount}usd-${date}.csv`;
}

/** Browser-only: save the current run as a CSV file. */
export function downloadSimulationCsv(records: readonly DayRecord[], params: SimulationParameters): void {
  const blob = new Blob([recordsToCsv(records)], { type: "text/csv" });
  const objectUrl = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = objectUrl;
  a.download = simulationCsvFilename(params);
  a.click();
  URL.revokeObjectURL(objectUrl);
}
