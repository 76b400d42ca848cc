/**
 * Price series passthrough. The dashboard simulates locally from this.
 */

import { Router } from "express";
import type { PriceSeriesProvider } from "../../src/lib/prices.ts";

export function pricesRouter(provider: PriceSeriesProvider): Router {
  const router = Router();

  /** GET /api/prices: full series plus its range */
  router.get("/", async (_req, res) => {
    try {
      const observations = await provider.getRecentSeries();
      res.json({
        count: observations.length,
        first: observations[0] ?? null,
        last: observations[observations.length - 1] ?? null,
        observations,
      });
    } catch (e) {
      console.error("[prices] Failed to load series:", (e as Error).message);
      res.status(502).json({ error: "price_source_unavailable", message: (e as Error).message });
    }
  });

  return router;
}
