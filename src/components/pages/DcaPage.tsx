/**
 * DCA simulator page: inputs, summary cards, portfolio table and growth chart.
 * Prices are fetched once; every input change re-runs the simulation locally.
 */

import { useEffect, useMemo, useState } from "react";
import {
  DEFAULT_DAILY_CONTRIBUTION,
  DEFAULT_LOOKBACK_DAYS,
  MAX_LOOKBACK_DAYS,
  MIN_LOOKBACK_DAYS,
  isSimulationError,
  simulate,
  summarize,
  type SimulationResult,
} from "../../lib/dca";
import type { PriceObservation } from "../../lib/prices";
import { ApiPriceProvider } from "../../lib/api";
import { downloadSimulationCsv } from "../../lib/export";
import { formatUnits, formatUsd } from "../../lib/format";
import { insufficientHistoryMessage, toTableRows, type TableRow } from "../../lib/view";
import { theme } from "../../theme";
import { Button } from "../Button";
import { GrowthChart } from "../GrowthChart";
import { Card } from "../ui/Card";
import { DataTable, type Column } from "../ui/DataTable";
import { ErrorBanner } from "../ui/ErrorBanner";
import { Input } from "../ui/Input";
import { PnLCard } from "../ui/PnLCard";
import { Section } from "../ui/Section";
import { StatCard, StatCards } from "../ui/StatCards";

const MAX_DAILY_CONTRIBUTION = 10_000;

const provider = new ApiPriceProvider();

const columns: Column<TableRow>[] = [
  { key: "day", header: "Day", render: (r) => r.day },
  { key: "date", header: "Date", render: (r) => r.date },
  { key: "price", header: "Price", render: (r) => r.price, align: "right" },
  { key: "value", header: "Portfolio Value", render: (r) => r.portfolioValue, align: "right" },
  { key: "invested", header: "Total Invested", render: (r) => r.totalInvested, align: "right" },
];

type Outcome = { result: SimulationResult; error: null } | { result: null; error: string };

function run(series: PriceObservation[], days: string, amount: string): Outcome {
  try {
    return { result: simulate(series, { lookbackDays: Number(days), dailyContribution: Number(amount) }), error: null };
  } catch (e) {
    if (isSimulationError(e)) return { result: null, error: e.message };
    throw e;
  }
}

export function DcaPage() {
  const [series, setSeries] = useState<PriceObservation[] | null>(null);
  const [loadError, setLoadError] = useState<string | null>(null);
  const [days, setDays] = useState(String(DEFAULT_LOOKBACK_DAYS));
  const [amount, setAmount] = useState(String(DEFAULT_DAILY_CONTRIBUTION));

  useEffect(() => {
    let cancelled = false;
    provider
      .getRecentSeries()
      .then((data) => {
        if (!cancelled) setSeries(data);
      })
      .catch((e: unknown) => {
        if (!cancelled) setLoadError(e instanceof Error ? e.message : String(e));
      });
    return () => {
      cancelled = true;
    };
  }, []);

  const outcome = useMemo(() => (series ? run(series, days, amount) : null), [series, days, amount]);
  const result = outcome?.result ?? null;
  const summary = useMemo(() => (result ? summarize(result.records) : null), [result]);
  const rows = useMemo(() => (result ? toTableRows(result.records) : []), [result]);

  return (
    <div style={{ display: "flex", flexDirection: "column", gap: theme.spacing.xl, width: "100%", minWidth: 0 }}>
      <Card>
        <div style={{ display: "flex", gap: theme.spacing.lg, flexWrap: "wrap" }}>
          <Input
            id="days"
            label={`Number of days to go back (max ${MAX_LOOKBACK_DAYS})`}
            type="number"
            min={MIN_LOOKBACK_DAYS}
            max={MAX_LOOKBACK_DAYS}
            step={1}
            value={days}
            onChange={(e) => setDays(e.target.value)}
          />
          <Input
            id="amount"
            label="Daily investment amount ($)"
            type="number"
            min={1}
            max={MAX_DAILY_CONTRIBUTION}
            step={10}
            value={amount}
            onChange={(e) => setAmount(e.target.value)}
          />
        </div>
      </Card>

      {loadError && <ErrorBanner message="Could not load price data." detail={loadError} />}
      {!series && !loadError && <p style={{ color: theme.colors.text.secondary }}>Loading prices…</p>}
      {outcome?.error && <ErrorBanner message={outcome.error} />}
      {result?.insufficientHistory && (
        <ErrorBanner tone="warning" message={insufficientHistoryMessage(result.insufficientHistory)} />
      )}
      {result && !summary && <ErrorBanner message="No data available to display." />}

      {result && summary && (
        <>
          <StatCards>
            <StatCard label="Total Invested" value={formatUsd(summary.totalInvested)} hint={`${summary.days} days`} />
            <StatCard label="Portfolio Value" value={formatUsd(summary.portfolioValue)} />
            <PnLCard label="Profit / Loss" value={summary.profit} pct={summary.returnPct} />
            <StatCard label="Units Held" value={formatUnits(summary.totalUnits)} hint={`avg cost ${formatUsd(summary.averageCost)}`} />
            <StatCard label="Period" value={`${summary.firstDate} → ${summary.lastDate}`} />
          </StatCards>

          <div style={{ display: "flex", gap: theme.spacing.xl, flexWrap: "wrap", alignItems: "flex-start" }}>
            <Card grow={3} minWidth={360}>
              <Section
                title="Portfolio Table"
                actions={
                  <Button size="sm" onClick={() => downloadSimulationCsv(result.records, result.params)}>
                    Export CSV
                  </Button>
                }
              >
                <DataTable columns={columns} data={rows} getRowKey={(r) => String(r.day)} maxHeight={600} />
              </Section>
            </Card>
            <Card grow={2} minWidth={320}>
              <Section title="Portfolio Growth Over Time">
                <GrowthChart records={result.records} />
              </Section>
            </Card>
          </div>
        </>
      )}
    </div>
  );
}
