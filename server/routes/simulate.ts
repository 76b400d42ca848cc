/**
 * DCA simulation endpoints.
 *
 *   POST /api/simulate          { lookbackDays, dailyContribution } → result + summary
 *   GET  /api/simulate/export   ?days=&amount= → CSV attachment
 */

import { Router, type Response } from "express";
import {
  DEFAULT_DAILY_CONTRIBUTION,
  DEFAULT_LOOKBACK_DAYS,
  isSimulationError,
  simulate,
  summarize,
  type SimulationParameters,
  type SimulationResult,
} from "../../src/lib/dca.ts";
import { recordsToCsv, simulationCsvFilename } from "../../src/lib/export.ts";
import type { PriceObservation, PriceSeriesProvider } from "../../src/lib/prices.ts";

// ── Helpers ───────────────────────────────────────────────────────────────────

/** Absent → fallback; present but not numeric → null. */
function numberField(value: unknown, fallback: number): number | null {
  if (value === undefined || value === null || value === "") return fallback;
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const n = Number(value.trim());
    return Number.isNaN(n) ? null : n;
  }
  return null;
}

function readParams(
  days: unknown,
  amount: unknown,
  names: [string, string]
): SimulationParameters | { error: string } {
  const lookbackDays = numberField(days, DEFAULT_LOOKBACK_DAYS);
  if (lookbackDays === null) return { error: `${names[0]} must be a number` };
  const dailyContribution = numberField(amount, DEFAULT_DAILY_CONTRIBUTION);
  if (dailyContribution === null) return { error: `${names[1]} must be a number` };
  return { lookbackDays, dailyContribution };
}

/** Runs the simulation; on failure writes the error response and returns null. */
async function run(
  provider: PriceSeriesProvider,
  params: SimulationParameters,
  res: Response
): Promise<SimulationResult | null> {
  let series: PriceObservation[];
  try {
    series = await provider.getRecentSeries();
  } catch (e) {
    console.error("[simulate] Price source failed:", (e as Error).message);
    res.status(502).json({ error: "price_source_unavailable", message: (e as Error).message });
    return null;
  }
  try {
    return simulate(series, params);
  } catch (e) {
    if (!isSimulationError(e)) throw e;
    if (e.code === "invalid_parameter") {
      res.status(400).json({ error: e.code, message: e.message, parameter: e.parameter, value: e.value });
    } else {
      res.status(422).json({ error: e.code, message: e.message, date: e.date, price: e.price });
    }
    return null;
  }
}

// ── Routes ────────────────────────────────────────────────────────────────────

export function simulateRouter(provider: PriceSeriesProvider): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    const body = (req.body ?? {}) as { lookbackDays?: unknown; dailyContribution?: unknown };
    const params = readParams(body.lookbackDays, body.dailyContribution, ["lookbackDays", "dailyContribution"]);
    if ("error" in params) {
      res.status(400).json({ error: "bad_request", message: params.error });
      return;
    }
    const result = await run(provider, params, res);
    if (!result) return;
    if (result.insufficientHistory) {
      console.log(
        `[simulate] Requested ${result.requestedDays} days, only ${result.effectiveDays} available`
      );
    }
    res.json({ ...result, summary: summarize(result.records) });
  });

  router.get("/export", async (req, res) => {
    const params = readParams(req.query.days, req.query.amount, ["days", "amount"]);
    if ("error" in params) {
      res.status(400).json({ error: "bad_request", message: params.error });
      return;
    }
    const result = await run(provider, params, res);
    if (!result) return;
    res.setHeader("Content-Type", "text/csv");
    res.setHeader("Content-Disposition", `attachment; filename="${simulationCsvFilename(result.params)}"`);
    res.send(recordsToCsv(result.records));
  });

  return router;
}
