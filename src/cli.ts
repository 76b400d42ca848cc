#!/usr/bin/env node
/**
 * DCA tracker CLI (headless).
 * Reads the local price file (or the server with --api) and prints the run.
 * Usage: npm run cli [command] [options]
 */

import "dotenv/config";
import { Command } from "commander";
import * as fs from "fs";
import {
  DEFAULT_DAILY_CONTRIBUTION,
  DEFAULT_LOOKBACK_DAYS,
  isSimulationError,
  simulate,
  summarize,
  type DayRecord,
  type SimulationParameters,
  type SimulationResult,
} from "./lib/dca";
import type { PriceObservation, PriceSeriesProvider } from "./lib/prices";
import { DEFAULT_DATA_FILE, JsonFilePriceProvider } from "./lib/priceFile";
import { ApiError, ApiPriceProvider, apiSimulate } from "./lib/api";
import { csvToPriceRows, type PriceFileRow } from "./lib/convert";
import { recordsToCsv } from "./lib/export";
import { formatPct, formatUnits, formatUsd } from "./lib/format";
import { insufficientHistoryMessage } from "./lib/view";

const DATA_FILE = process.env.DCA_DATA_FILE || DEFAULT_DATA_FILE;

/** --api alone means the default server; --api <url> names one. */
function apiUrl(api: string | boolean | undefined): string | undefined {
  return typeof api === "string" ? api : undefined;
}

function providerFor(opts: { file: string; api?: string | boolean }): PriceSeriesProvider {
  if (opts.api) return new ApiPriceProvider(apiUrl(opts.api));
  return new JsonFilePriceProvider(opts.file);
}

/** Server-side run: the server validates and simulates, errors come back as ApiError. */
async function simulateRemote(params: SimulationParameters, api: string | boolean): Promise<SimulationResult> {
  try {
    return await apiSimulate(params, apiUrl(api));
  } catch (e) {
    if (e instanceof ApiError) fail(`Error (${e.code}): ${e.message}`);
    fail(`Failed to reach the server: ${(e as Error).message}`);
  }
}

/** Local run against the price file. */
async function simulateLocal(params: SimulationParameters, file: string): Promise<SimulationResult> {
  let series: PriceObservation[];
  try {
    series = await providerFor({ file }).getRecentSeries();
  } catch (e) {
    fail(`Failed to load prices: ${(e as Error).message}`);
  }
  try {
    return simulate(series, params);
  } catch (e) {
    if (isSimulationError(e)) fail(`Error (${e.code}): ${e.message}`);
    throw e;
  }
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function printTable(records: DayRecord[]): void {
  const header = [
    "Day".padStart(4),
    "Date".padEnd(10),
    "Price".padStart(14),
    "Portfolio Value".padStart(16),
    "Total Invested".padStart(16),
  ].join(" | ");
  console.log(header);
  console.log("-".repeat(header.length));
  for (const r of records) {
    console.log(
      [
        String(r.dayIndex).padStart(4),
        r.date.padEnd(10),
        formatUsd(r.price).padStart(14),
        formatUsd(r.portfolioValue).padStart(16),
        formatUsd(r.totalInvested).padStart(16),
      ].join(" | ")
    );
  }
}

const program = new Command();

program
  .name("dca")
  .description("Daily dollar-cost averaging simulator (headless CLI)")
  .option("--json", "Output as JSON");

// --- simulate ---

program
  .command("simulate")
  .description("Invest a fixed amount on each of the last N price rows")
  .option("-d, --days <number>", "Number of rows to go back (1-365)", String(DEFAULT_LOOKBACK_DAYS))
  .option("-a, --amount <number>", "Daily investment amount ($)", String(DEFAULT_DAILY_CONTRIBUTION))
  .option("-f, --file <path>", "Price file (JSON rows with Date/Close)", DATA_FILE)
  .option("--api [url]", "Run the simulation on the dca-tracker server instead of a local file")
  .option("--csv <path>", "Also write the full run to a CSV file")
  .option("-r, --rows <number>", "Show only the last N table rows")
  .action(async (opts) => {
    const json = program.opts().json;
    const params = { lookbackDays: Number(opts.days), dailyContribution: Number(opts.amount) };

    const result = opts.api ? await simulateRemote(params, opts.api) : await simulateLocal(params, opts.file);

    if (opts.csv) {
      fs.writeFileSync(opts.csv, recordsToCsv(result.records) + "\n");
    }

    const summary = summarize(result.records);
    if (json) {
      console.log(JSON.stringify({ ...result, summary }));
      return;
    }

    if (result.insufficientHistory) {
      console.error(`Warning: ${insufficientHistoryMessage(result.insufficientHistory)}`);
    }
    if (!summary) {
      console.log("No data available to display.");
      return;
    }

    console.log(`\n=== DCA: ${formatUsd(params.dailyContribution)}/day over ${summary.days} days (${summary.firstDate} → ${summary.lastDate}) ===\n`);
    console.log(`Total invested:  ${formatUsd(summary.totalInvested)}`);
    console.log(`Portfolio value: ${formatUsd(summary.portfolioValue)}`);
    console.log(`Profit:          ${formatUsd(summary.profit)} (${formatPct(summary.returnPct)})`);
    console.log(`Units held:      ${formatUnits(summary.totalUnits)}`);
    console.log(`Average cost:    ${formatUsd(summary.averageCost)}`);
    console.log("");

    const rows = opts.rows ? Math.max(1, parseInt(opts.rows, 10) || 1) : result.records.length;
    printTable(result.records.slice(-rows));
    if (opts.csv) console.log(`\nWrote ${result.records.length} rows to ${opts.csv}`);
  });

// --- prices ---

program
  .command("prices")
  .description("Show the range of the price series")
  .option("-f, --file <path>", "Price file (JSON rows with Date/Close)", DATA_FILE)
  .option("--api [url]", "Read prices from the dca-tracker server instead of a file")
  .action(async (opts) => {
    const json = program.opts().json;
    let series: PriceObservation[];
    try {
      series = await providerFor(opts).getRecentSeries();
    } catch (e) {
      fail(`Failed to load prices: ${(e as Error).message}`);
    }
    const first = series[0];
    const last = series[series.length - 1];
    if (json) {
      console.log(JSON.stringify({ count: series.length, first: first ?? null, last: last ?? null }));
      return;
    }
    if (!first || !last) {
      console.log("No price rows.");
      return;
    }
    console.log(`${series.length} rows: ${first.date} (${formatUsd(first.price)}) → ${last.date} (${formatUsd(last.price)})`);
  });

// --- convert ---

program
  .command("convert")
  .description("Convert a CSV price export (Date, Close columns) to a JSON price file")
  .argument("<input>", "CSV file")
  .argument("<output>", "JSON file to write")
  .action((input: string, output: string) => {
    let rows: PriceFileRow[];
    try {
      rows = csvToPriceRows(fs.readFileSync(input, "utf-8"));
    } catch (e) {
      fail(`Failed to convert ${input}: ${(e as Error).message}`);
    }
    fs.writeFileSync(output, JSON.stringify(rows, null, 2) + "\n");
    console.log(`Wrote ${rows.length} rows to ${output}`);
  });

program.parseAsync().catch((e: unknown) => {
  fail(`Unexpected error: ${e instanceof Error ? e.message : String(e)}`);
});
