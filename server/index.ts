#!/usr/bin/env node
/**
 * dca-tracker backend. Serves the simulation API and the built dashboard.
 */

import app from "./app.ts";
import { loadConfig } from "./config.ts";

const { port, dataFile } = loadConfig();

const server = app.listen(port, "0.0.0.0", () => {
  console.log(`DCA tracker backend: http://localhost:${port}`);
  console.log(`  API: /api/prices, /api/simulate, /api/simulate/export`);
  console.log(`  Data: ${dataFile}`);
});

// ── Clean shutdown ────────────────────────────────────────────────────────────

function shutdown(signal: string): void {
  console.log(`\n[server] ${signal} received, shutting down`);
  server.close(() => process.exit(0));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
