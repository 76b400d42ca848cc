const usd = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** $1,234.56 / -$1,234.56 */
export function formatUsd(value: number): string {
  const s = usd.format(Math.abs(value));
  return value < 0 && s !== "0.00" ? `-$${s}` : `$${s}`;
}

export function formatPct(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}%`;
}

/** Asset units: 8 decimals, trailing zeros dropped. */
export function formatUnits(value: number): string {
  return value.toFixed(8).replace(/\.?0+$/, "");
}
