/**
 * Price series: observation type, row parsing and providers.
 * Browser-safe: file access lives in priceFile.ts.
 */

export interface PriceObservation {
  date: string; // YYYY-MM-DD
  price: number;
}

/** Anything that can hand the simulator an ordered price series. */
export interface PriceSeriesProvider {
  getRecentSeries(): Promise<PriceObservation[]>;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Normalise a date-ish value to YYYY-MM-DD. Returns null when unparseable. */
export function normalizeDate(value: unknown): string | null {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    const d = new Date(value);
    return Number.isNaN(d.getTime()) ? null : d.toISOString().slice(0, 10);
  }
  if (typeof value !== "string") return null;
  const s = value.trim();
  const iso = ISO_DATE.exec(s);
  if (iso) {
    const d = new Date(Date.UTC(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3])));
    // Reject rollovers like 2024-02-31
    if (d.getUTCMonth() !== Number(iso[2]) - 1 || d.getUTCDate() !== Number(iso[3])) return null;
    return `${iso[1]}-${iso[2]}-${iso[3]}`;
  }
  const d = new Date(s);
  if (s === "" || Number.isNaN(d.getTime())) return null;
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

function toPrice(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick(row: Record<string, unknown>, keys: string[]): unknown {
  for (const k of keys) {
    if (k in row) return row[k];
  }
  return undefined;
}

/**
 * Parse raw JSON rows ({ Date, Close } or { date, price }) into a sorted series.
 * Rows without a numeric price are dropped; non-positive prices are kept so the
 * simulator can reject them. Later rows win on duplicate dates.
 */
export function parsePriceRows(raw: unknown): PriceObservation[] {
  if (!Array.isArray(raw)) throw new Error("Price data must be an array of rows");
  const byDate = new Map<string, PriceObservation>();
  raw.forEach((row: unknown, i) => {
    if (!isRecord(row)) throw new Error(`Price row ${i} is not an object`);
    const price = toPrice(pick(row, ["Close", "close", "price", "Price"]));
    if (price === null) return;
    const rawDate = pick(row, ["Date", "date"]);
    const date = normalizeDate(rawDate);
    if (!date) throw new Error(`Price row ${i} has an invalid date: ${String(rawDate)}`);
    byDate.set(date, { date, price });
  });
  return sortSeries([...byDate.values()]);
}

export function sortSeries(series: PriceObservation[]): PriceObservation[] {
  return [...series].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Fixed in-memory series (fixtures, replays). */
export class StaticPriceProvider implements PriceSeriesProvider {
  private readonly series: PriceObservation[];

  constructor(series: PriceObservation[]) {
    this.series = sortSeries(series);
  }

  async getRecentSeries(): Promise<PriceObservation[]> {
    return this.series.map((o) => ({ ...o }));
  }
}

function copySeries(series: PriceObservation[]): PriceObservation[] {
  return series.map((o) => ({ ...o }));
}

/**
 * TTL cache in front of another provider. Concurrent misses share one load.
 * Callers get their own copy of the rows. clear() drops the cache and detaches
 * any load in flight, so the next call always goes to the inner provider.
 */
export class CachedPriceProvider implements PriceSeriesProvider {
  private cache: { data: PriceObservation[]; ts: number } | null = null;
  private pending: Promise<PriceObservation[]> | null = null;
  private generation = 0;

  constructor(
    private readonly inner: PriceSeriesProvider,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async getRecentSeries(): Promise<PriceObservation[]> {
    if (this.cache && this.now() - this.cache.ts < this.ttlMs) return copySeries(this.cache.data);
    if (!this.pending) this.pending = this.load(this.generation);
    return copySeries(await this.pending);
  }

  private load(generation: number): Promise<PriceObservation[]> {
    const loading: Promise<PriceObservation[]> = this.inner
      .getRecentSeries()
      .then((data) => {
        if (generation === this.generation) this.cache = { data, ts: this.now() };
        return data;
      })
      .finally(() => {
        if (this.pending === loading) this.pending = null;
      });
    return loading;
  }

  clear(): void {
    this.generation++;
    this.cache = null;
    this.pending = null;
  }
}
