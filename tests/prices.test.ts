import { describe, it, expect } from "vitest";
import * as path from "path";
import { fileURLToPath } from "url";
import {
  CachedPriceProvider,
  StaticPriceProvider,
  normalizeDate,
  parsePriceRows,
  type PriceObservation,
  type PriceSeriesProvider,
} from "../src/lib/prices.ts";
import { JsonFilePriceProvider } from "../src/lib/priceFile.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const fixture = path.join(__dirname, "fixtures", "prices.json");

describe("parsePriceRows", () => {
  it("sorts by date and drops rows without a numeric price", () => {
    const rows = parsePriceRows([
      { Date: "2024-01-03", Close: 400 },
      { Date: "2024-01-01", Close: 100 },
      { Date: "2024-01-02", Close: null },
      { Date: "2024-01-04", Close: "abc" },
    ]);
    expect(rows).toEqual([
      { date: "2024-01-01", price: 100 },
      { date: "2024-01-03", price: 400 },
    ]);
  });

  it("accepts lowercase keys, numeric strings and price aliases", () => {
    const rows = parsePriceRows([
      { date: "2024-02-01", price: "42.5" },
      { date: "2024-02-02", close: 43 },
    ]);
    expect(rows).toEqual([
      { date: "2024-02-01", price: 42.5 },
      { date: "2024-02-02", price: 43 },
    ]);
  });

  it("normalises timestamps and epoch milliseconds to calendar dates", () => {
    const rows = parsePriceRows([
      { Date: "2024-01-05T12:30:00Z", Close: 1 },
      { Date: Date.UTC(2024, 0, 6), Close: 2 },
    ]);
    expect(rows.map((r) => r.date)).toEqual(["2024-01-05", "2024-01-06"]);
  });

  it("keeps the later row on duplicate dates", () => {
    const rows = parsePriceRows([
      { Date: "2024-01-01", Close: 1 },
      { Date: "2024-01-01", Close: 2 },
    ]);
    expect(rows).toEqual([{ date: "2024-01-01", price: 2 }]);
  });

  it("keeps non-positive prices for the simulator to reject", () => {
    expect(parsePriceRows([{ Date: "2024-01-01", Close: 0 }])).toEqual([{ date: "2024-01-01", price: 0 }]);
  });

  it("throws on an unparseable date", () => {
    expect(() => parsePriceRows([{ Date: "not a date", Close: 1 }])).toThrow("Price row 0 has an invalid date: not a date");
  });

  it("throws when the payload is not an array", () => {
    expect(() => parsePriceRows({ Date: "2024-01-01" })).toThrow("Price data must be an array of rows");
  });
});

describe("normalizeDate", () => {
  it("rejects impossible calendar dates", () => {
    expect(normalizeDate("2024-02-31")).toBeNull();
    expect(normalizeDate("2024-02-29")).toBe("2024-02-29");
    expect(normalizeDate("")).toBeNull();
    expect(normalizeDate(undefined)).toBeNull();
  });
});

describe("StaticPriceProvider", () => {
  it("returns a sorted copy of its rows", async () => {
    const provider = new StaticPriceProvider([
      { date: "2024-01-02", price: 2 },
      { date: "2024-01-01", price: 1 },
    ]);
    const a = await provider.getRecentSeries();
    expect(a.map((o) => o.date)).toEqual(["2024-01-01", "2024-01-02"]);
    a[0].price = 999;
    const b = await provider.getRecentSeries();
    expect(b[0].price).toBe(1);
  });
});

describe("CachedPriceProvider", () => {
  class CountingProvider implements PriceSeriesProvider {
    calls = 0;

    async getRecentSeries(): Promise<PriceObservation[]> {
      this.calls++;
      return [{ date: "2024-01-01", price: this.calls }];
    }
  }

  it("serves cached data within the TTL and reloads after it", async () => {
    const inner = new CountingProvider();
    let now = 1_000;
    const cached = new CachedPriceProvider(inner, 500, () => now);

    expect((await cached.getRecentSeries())[0].price).toBe(1);
    now = 1_499;
    expect((await cached.getRecentSeries())[0].price).toBe(1);
    expect(inner.calls).toBe(1);

    now = 1_500;
    expect((await cached.getRecentSeries())[0].price).toBe(2);
    expect(inner.calls).toBe(2);
  });

  it("reloads on every call with a TTL of 0", async () => {
    const inner = new CountingProvider();
    const cached = new CachedPriceProvider(inner, 0, () => 1_000);
    await cached.getRecentSeries();
    expect((await cached.getRecentSeries())[0].price).toBe(2);
    expect(inner.calls).toBe(2);
  });

  it("shares one load between concurrent callers", async () => {
    const inner = new CountingProvider();
    const cached = new CachedPriceProvider(inner, 60_000);
    const [a, b] = await Promise.all([cached.getRecentSeries(), cached.getRecentSeries()]);
    expect(inner.calls).toBe(1);
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });

  it("hands each caller its own copy of the cached rows", async () => {
    const cached = new CachedPriceProvider(new CountingProvider(), 60_000);
    const a = await cached.getRecentSeries();
    a[0].price = -1;
    const b = await cached.getRecentSeries();
    expect(b[0].price).toBe(1);
  });

  it("reloads after clear()", async () => {
    const inner = new CountingProvider();
    const cached = new CachedPriceProvider(inner, 60_000);
    await cached.getRecentSeries();
    cached.clear();
    await cached.getRecentSeries();
    expect(inner.calls).toBe(2);
  });

  it("does not reuse or store a load started before clear()", async () => {
    const release: Array<() => void> = [];
    let calls = 0;
    const inner: PriceSeriesProvider = {
      getRecentSeries() {
        calls++;
        const price = calls;
        return new Promise((resolve) => {
          release.push(() => resolve([{ date: "2024-01-01", price }]));
        });
      },
    };
    const cached = new CachedPriceProvider(inner, 60_000);

    const first = cached.getRecentSeries();
    cached.clear();
    const second = cached.getRecentSeries();
    expect(calls).toBe(2);

    release[0]();
    release[1]();
    expect((await first)[0].price).toBe(1);
    expect((await second)[0].price).toBe(2);

    const third = await cached.getRecentSeries();
    expect(third[0].price).toBe(2);
    expect(calls).toBe(2);
  });

  it("does not cache a failed load", async () => {
    let fail = true;
    const inner: PriceSeriesProvider = {
      async getRecentSeries() {
        if (fail) throw new Error("upstream down");
        return [{ date: "2024-01-01", price: 1 }];
      },
    };
    const cached = new CachedPriceProvider(inner, 60_000);
    await expect(cached.getRecentSeries()).rejects.toThrow("upstream down");
    fail = false;
    await expect(cached.getRecentSeries()).resolves.toEqual([{ date: "2024-01-01", price: 1 }]);
  });
});

describe("JsonFilePriceProvider", () => {
  it("reads, cleans and sorts a price file", async () => {
    const series = await new JsonFilePriceProvider(fixture).getRecentSeries();
    expect(series).toEqual([
      { date: "2024-01-01", price: 100 },
      { date: "2024-01-02", price: 200 },
      { date: "2024-01-03", price: 400 },
      { date: "2024-01-10", price: 250 },
    ]);
  });

  it("rejects when the file is missing", async () => {
    const provider = new JsonFilePriceProvider(path.join(__dirname, "fixtures", "missing.json"));
    await expect(provider.getRecentSeries()).rejects.toThrow("Cannot read price file");
  });
});
