/**
 * Shapes simulation output for the table, chart and warning banner.
 * Shared by the dashboard and the CLI.
 */

import type { DayRecord, InsufficientHistory } from "./dca";
import { formatUsd } from "./format";

export interface ChartPoint {
  day: number;
  portfolioValue: number;
  totalInvested: number;
}

export interface TableRow {
  day: number;
  date: string;
  price: string;
  portfolioValue: string;
  totalInvested: string;
}

export function toChartPoints(records: readonly DayRecord[]): ChartPoint[] {
  return records.map((r) => ({
    day: r.dayIndex,
    portfolioValue: r.portfolioValue,
    totalInvested: r.totalInvested,
  }));
}

export function toTableRows(records: readonly DayRecord[]): TableRow[] {
  return records.map((r) => ({
    day: r.dayIndex,
    date: r.date,
    price: formatUsd(r.price),
    portfolioValue: formatUsd(r.portfolioValue),
    totalInvested: formatUsd(r.totalInvested),
  }));
}

export function insufficientHistoryMessage(info: InsufficientHistory): string {
  return (
    `Only ${info.availableDays} days of data are available, ` +
    `but you requested ${info.requestedDays} days. Showing all available data.`
  );
}
