/**
 * JSON file provider, the default price source for the server and CLI.
 */

import { readFile } from "fs/promises";
import * as path from "path";
import { parsePriceRows, type PriceObservation, type PriceSeriesProvider } from "./prices";

export const DEFAULT_DATA_FILE = path.join("data", "btc_prices.json");

export class JsonFilePriceProvider implements PriceSeriesProvider {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async getRecentSeries(): Promise<PriceObservation[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (e) {
      throw new Error(`Cannot read price file ${this.filePath}: ${(e as Error).message}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new Error(`Price file ${this.filePath} is not valid JSON: ${(e as Error).message}`);
    }
    const series = parsePriceRows(raw);
    console.log(`[prices] Loaded ${series.length} rows from ${this.filePath}`);
    return series;
  }
}
