/**
 * Daily DCA simulator. Invests a fixed amount on each of the most recent N
 * price rows and tracks holdings value against capital put in.
 *
 * The lookback is a count of rows, not calendar days: gaps in the series are
 * neither back-filled nor penalized.
 */

import type { PriceObservation } from "./prices";

export const MIN_LOOKBACK_DAYS = 1;
export const MAX_LOOKBACK_DAYS = 365;
export const DEFAULT_LOOKBACK_DAYS = 120;
export const DEFAULT_DAILY_CONTRIBUTION = 100;

export interface SimulationParameters {
  lookbackDays: number; // rows, 1..365
  dailyContribution: number; // fiat per row
}

export interface DayRecord {
  dayIndex: number; // 1-based position in the window
  date: string;
  price: number;
  assetUnitsAcquiredThisDay: number;
  cumulativeAssetUnits: number;
  portfolioValue: number;
  totalInvested: number;
}

/** Fewer rows were available than requested; the run used all of them. */
export interface InsufficientHistory {
  requestedDays: number;
  availableDays: number;
}

export interface SimulationResult {
  params: SimulationParameters;
  requestedDays: number;
  effectiveDays: number;
  insufficientHistory: InsufficientHistory | null;
  records: DayRecord[];
}

export interface SimulationSummary {
  days: number;
  firstDate: string;
  lastDate: string;
  totalInvested: number;
  portfolioValue: number;
  totalUnits: number;
  profit: number;
  returnPct: number;
  averageCost: number;
}

export class InvalidParameterError extends Error {
  readonly code = "invalid_parameter" as const;
  readonly parameter: keyof SimulationParameters;
  readonly value: number;

  constructor(parameter: keyof SimulationParameters, value: number, message: string) {
    super(message);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.value = value;
  }
}

export class InvalidPriceDataError extends Error {
  readonly code = "invalid_price_data" as const;
  readonly date: string;
  readonly price: number;

  constructor(date: string, price: number) {
    super(`Invalid price ${price} on ${date}: prices must be positive`);
    this.name = "InvalidPriceDataError";
    this.date = date;
    this.price = price;
  }
}

export type SimulationError = InvalidParameterError | InvalidPriceDataError;

export function isSimulationError(e: unknown): e is SimulationError {
  return e instanceof InvalidParameterError || e instanceof InvalidPriceDataError;
}

export function validateParameters(params: SimulationParameters): void {
  const { lookbackDays, dailyContribution } = params;
  if (!Number.isInteger(lookbackDays)) {
    throw new InvalidParameterError("lookbackDays", lookbackDays, `lookbackDays must be a whole number, got ${lookbackDays}`);
  }
  if (lookbackDays < MIN_LOOKBACK_DAYS || lookbackDays > MAX_LOOKBACK_DAYS) {
    throw new InvalidParameterError(
      "lookbackDays",
      lookbackDays,
      `lookbackDays must be between ${MIN_LOOKBACK_DAYS} and ${MAX_LOOKBACK_DAYS}, got ${lookbackDays}`
    );
  }
  if (!Number.isFinite(dailyContribution) || dailyContribution <= 0) {
    throw new InvalidParameterError(
      "dailyContribution",
      dailyContribution,
      `dailyContribution must be greater than 0, got ${dailyContribution}`
    );
  }
}

/** Trailing min(lookbackDays, series.length) rows, chronological order kept. */
export function selectWindow<T>(series: readonly T[], lookbackDays: number): T[] {
  const w = Math.min(lookbackDays, series.length);
  return series.slice(series.length - w);
}

export function simulate(series: readonly PriceObservation[], params: SimulationParameters): SimulationResult {
  validateParameters(params);
  const { lookbackDays, dailyContribution } = params;
  const window = selectWindow(series, lookbackDays);

  // Check the whole window up front so a bad row never yields partial output
  for (const obs of window) {
    if (!Number.isFinite(obs.price) || obs.price <= 0) {
      throw new InvalidPriceDataError(obs.date, obs.price);
    }
  }

  let cumulativeAssetUnits = 0;
  const records: DayRecord[] = window.map((obs, i) => {
    const dayIndex = i + 1;
    const assetUnitsAcquiredThisDay = dailyContribution / obs.price;
    cumulativeAssetUnits += assetUnitsAcquiredThisDay;
    return {
      dayIndex,
      date: obs.date,
      price: obs.price,
      assetUnitsAcquiredThisDay,
      cumulativeAssetUnits,
      portfolioValue: cumulativeAssetUnits * obs.price,
      totalInvested: dayIndex * dailyContribution,
    };
  });

  const effectiveDays = window.length;
  return {
    params: { lookbackDays, dailyContribution },
    requestedDays: lookbackDays,
    effectiveDays,
    insufficientHistory:
      effectiveDays < lookbackDays ? { requestedDays: lookbackDays, availableDays: effectiveDays } : null,
    records,
  };
}

/** Final-day figures. Null for an empty run. */
export function summarize(records: readonly DayRecord[]): SimulationSummary | null {
  if (records.length === 0) return null;
  const first = records[0];
  const last = records[records.length - 1];
  const profit = last.portfolioValue - last.totalInvested;
  return {
    days: records.length,
    firstDate: first.date,
    lastDate: last.date,
    totalInvested: last.totalInvested,
    portfolioValue: last.portfolioValue,
    totalUnits: last.cumulativeAssetUnits,
    profit,
    returnPct: (profit / last.totalInvested) * 100,
    averageCost: last.totalInvested / last.cumulativeAssetUnits,
  };
}
