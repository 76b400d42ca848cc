import { describe, it, expect } from "vitest";
import request from "supertest";
import app, { createApp } from "../server/app.ts";
import { StaticPriceProvider, type PriceSeriesProvider } from "../src/lib/prices.ts";

const twoDays = createApp(
  new StaticPriceProvider([
    { date: "2024-01-02", price: 200 },
    { date: "2024-01-01", price: 100 },
  ])
);

describe("GET /api/prices", () => {
  it("returns the series with its range", async () => {
    const res = await request(twoDays).get("/api/prices");
    expect(res.status).toBe(200);
    expect(res.body.count).toBe(2);
    expect(res.body.first).toEqual({ date: "2024-01-01", price: 100 });
    expect(res.body.last).toEqual({ date: "2024-01-02", price: 200 });
    expect(res.body.observations).toHaveLength(2);
  });

  it("reads DCA_DATA_FILE in the default app", async () => {
    const res = await request(app).get("/api/prices");
    expect(res.status).toBe(200);
    expect(res.body.count).toBe(4);
    expect(res.body.last).toEqual({ date: "2024-01-10", price: 250 });
  });

  it("returns 502 when the price source fails", async () => {
    const broken: PriceSeriesProvider = {
      async getRecentSeries() {
        throw new Error("feed offline");
      },
    };
    const res = await request(createApp(broken)).get("/api/prices");
    expect(res.status).toBe(502);
    expect(res.body.error).toBe("price_source_unavailable");
    expect(res.body.message).toBe("feed offline");
  });
});

describe("POST /api/simulate", () => {
  it("runs the simulation and reports a shortened window", async () => {
    const res = await request(twoDays)
      .post("/api/simulate")
      .send({ lookbackDays: 5, dailyContribution: 100 });
    expect(res.status).toBe(200);
    expect(res.body.requestedDays).toBe(5);
    expect(res.body.effectiveDays).toBe(2);
    expect(res.body.insufficientHistory).toEqual({ requestedDays: 5, availableDays: 2 });
    expect(res.body.records[1]).toEqual({
      dayIndex: 2,
      date: "2024-01-02",
      price: 200,
      assetUnitsAcquiredThisDay: 0.5,
      cumulativeAssetUnits: 1.5,
      portfolioValue: 300,
      totalInvested: 200,
    });
    expect(res.body.summary.profit).toBe(100);
    expect(res.body.summary.returnPct).toBe(50);
  });

  it("falls back to default parameters", async () => {
    const res = await request(twoDays).post("/api/simulate").send({});
    expect(res.status).toBe(200);
    expect(res.body.params).toEqual({ lookbackDays: 120, dailyContribution: 100 });
  });

  it("returns 400 invalid_parameter for a zero contribution", async () => {
    const res = await request(twoDays)
      .post("/api/simulate")
      .send({ lookbackDays: 5, dailyContribution: 0 });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("invalid_parameter");
    expect(res.body.parameter).toBe("dailyContribution");
    expect(res.body.records).toBeUndefined();
  });

  it("returns 400 bad_request for a non-numeric field", async () => {
    const res = await request(twoDays)
      .post("/api/simulate")
      .send({ lookbackDays: "abc" });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("bad_request");
    expect(res.body.message).toBe("lookbackDays must be a number");
  });

  it("returns 422 invalid_price_data with the offending row", async () => {
    const zero = createApp(
      new StaticPriceProvider([
        { date: "2024-01-01", price: 100 },
        { date: "2024-01-02", price: 0 },
      ])
    );
    const res = await request(zero)
      .post("/api/simulate")
      .send({ lookbackDays: 2, dailyContribution: 100 });
    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      error: "invalid_price_data",
      message: "Invalid price 0 on 2024-01-02: prices must be positive",
      date: "2024-01-02",
      price: 0,
    });
  });
});

describe("GET /api/simulate/export", () => {
  it("returns the run as a CSV attachment", async () => {
    const res = await request(twoDays).get("/api/simulate/export?days=2&amount=100");
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/csv");
    expect(res.headers["content-disposition"]).toMatch(/^attachment; filename="dca-2d-100usd-\d{8}\.csv"$/);
    expect(res.text.split("\n")).toEqual([
      "day,date,price,units_bought,total_units,portfolio_value,total_invested",
      "1,2024-01-01,100.00,1.00000000,1.00000000,100.00,100.00",
      "2,2024-01-02,200.00,0.50000000,1.50000000,300.00,200.00",
    ]);
  });

  it("returns 400 for an invalid lookback", async () => {
    const res = await request(twoDays).get("/api/simulate/export?days=0");
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("invalid_parameter");
  });
});

describe("unknown routes", () => {
  it("returns 404 JSON under /api", async () => {
    const res = await request(twoDays).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });
});
