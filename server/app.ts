/**
 * Express app, exported for testing.
 * createApp() takes any price provider; the default export reads DCA_DATA_FILE.
 */

import "dotenv/config";
import * as path from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import express, { type Express } from "express";
import cors from "cors";
import { pricesRouter } from "./routes/prices.ts";
import { simulateRouter } from "./routes/simulate.ts";
import { loadConfig } from "./config.ts";
import { CachedPriceProvider, type PriceSeriesProvider } from "../src/lib/prices.ts";
import { JsonFilePriceProvider } from "../src/lib/priceFile.ts";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const distPath = path.join(__dirname, "..", "dist");

export function createApp(provider: PriceSeriesProvider): Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use("/api/prices", pricesRouter(provider));
  app.use("/api/simulate", simulateRouter(provider));

  app.use(express.static(distPath));
  app.get("/{*path}", (req, res) => {
    if (req.path.startsWith("/api")) {
      res.status(404).json({ error: "Not found" });
    } else if (!existsSync(path.join(distPath, "index.html"))) {
      res.status(503).send(
        "<html><body style='font:16px monospace;background:#020817;color:#e2e8f0;padding:2rem'>" +
        "<h2>dashboard not built</h2>" +
        "<p>Run <code style='background:#1e293b;padding:2px 6px;border-radius:4px'>npm run build</code> then restart the server.</p>" +
        "</body></html>"
      );
    } else {
      res.sendFile(path.join(distPath, "index.html"));
    }
  });

  return app;
}

const config = loadConfig();
const app = createApp(new CachedPriceProvider(new JsonFilePriceProvider(config.dataFile), config.cacheTtlMs));

export default app;
