/**
 * API client for the dca-tracker server.
 * Used by the dashboard (same origin) and by the CLI when --api is given.
 */

import type { SimulationParameters, SimulationResult, SimulationSummary } from "./dca";
import { parsePriceRows, type PriceObservation, type PriceSeriesProvider } from "./prices";

const DEFAULT_API = "http://localhost:3000";

function base(): string {
  if (typeof window === "undefined") {
    return process.env.DCA_API_URL ?? DEFAULT_API;
  }
  // In browser: use VITE_API_URL if set, else same origin
  const url = import.meta.env.VITE_API_URL ?? "";
  if (url) return url;
  const origin = window.location.origin;
  if (origin && origin !== "null" && !origin.startsWith("file")) return origin;
  return DEFAULT_API;
}

export interface PricesResponse {
  count: number;
  first: PriceObservation | null;
  last: PriceObservation | null;
  observations: PriceObservation[];
}

export interface SimulateResponse extends SimulationResult {
  summary: SimulationSummary | null;
}

/** Error body from the server: { error: code, message? } */
export class ApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
  }
}

async function failure(res: Response): Promise<ApiError> {
  const text = await res.text();
  try {
    const body = JSON.parse(text) as { error?: string; message?: string };
    return new ApiError(res.status, body.error ?? "error", body.message ?? body.error ?? text);
  } catch {
    return new ApiError(res.status, "error", text || `HTTP ${res.status}`);
  }
}

export async function apiGetPrices(baseUrl = base()): Promise<PricesResponse> {
  const res = await fetch(`${baseUrl}/api/prices`);
  if (!res.ok) throw await failure(res);
  return res.json();
}

export async function apiSimulate(params: SimulationParameters, baseUrl = base()): Promise<SimulateResponse> {
  const res = await fetch(`${baseUrl}/api/simulate`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(params),
  });
  if (!res.ok) throw await failure(res);
  return res.json();
}

/** Price series served by GET /api/prices. */
export class ApiPriceProvider implements PriceSeriesProvider {
  private readonly baseUrl: string | undefined;

  constructor(baseUrl?: string) {
    this.baseUrl = baseUrl;
  }

  async getRecentSeries(): Promise<PriceObservation[]> {
    const body = await apiGetPrices(this.baseUrl ?? base());
    return parsePriceRows(body.observations);
  }
}
