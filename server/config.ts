/**
 * Server configuration from environment (.env loaded by app.ts).
 */

import { DEFAULT_DATA_FILE } from "../src/lib/priceFile.ts";

export interface ServerConfig {
  port: number;
  dataFile: string;
  cacheTtlMs: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** 0 turns the price cache off. */
function nonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    dataFile: env.DCA_DATA_FILE || DEFAULT_DATA_FILE,
    cacheTtlMs: nonNegativeInt(env.DCA_CACHE_TTL_MS, DEFAULT_CACHE_TTL_MS),
  };
}
