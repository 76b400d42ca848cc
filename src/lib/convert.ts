/**
 * CSV → JSON price file conversion.
 * Input: any daily OHLC export with Date and Close columns (case and spacing ignored).
 * Output rows: { Date: "YYYY-MM-DD", Close: number rounded to cents }.
 */

import { normalizeDate } from "./prices";

export interface PriceFileRow {
  Date: string;
  Close: number;
}

/** Split one CSV line, honouring double-quoted fields and "" escapes. */
export function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let field = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(field);
      field = "";
    } else {
      field += ch;
    }
  }
  out.push(field);
  return out;
}

/** " close " → "Close" */
function normalizeHeader(h: string): string {
  const s = h.trim().toLowerCase();
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function parseClose(value: string): number | null {
  const s = value.trim().replace(/^\$/, "").replace(/,/g, "");
  if (s === "") return null;
  const n = Number(s);
  return Number.isFinite(n) ? Math.round(n * 100) / 100 : null;
}

export function csvToPriceRows(csv: string): PriceFileRow[] {
  const lines = csv.replace(/^\uFEFF/, "").split(/\r?\n/).filter((l) => l.trim() !== "");
  if (lines.length === 0) throw new Error("CSV is empty");

  const headers = splitCsvLine(lines[0]).map(normalizeHeader);
  const dateCol = headers.indexOf("Date");
  const closeCol = headers.indexOf("Close");
  if (dateCol < 0) throw new Error("CSV has no Date column");
  if (closeCol < 0) throw new Error("CSV has no Close column");

  const rows: PriceFileRow[] = [];
  for (let i = 1; i < lines.length; i++) {
    const cells = splitCsvLine(lines[i]);
    const close = parseClose(cells[closeCol] ?? "");
    if (close === null) continue;
    const date = normalizeDate(cells[dateCol] ?? "");
    if (!date) throw new Error(`Line ${i + 1}: invalid date "${cells[dateCol] ?? ""}"`);
    rows.push({ Date: date, Close: close });
  }
  return rows;
}
