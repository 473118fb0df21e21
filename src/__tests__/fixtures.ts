import { ALL_STOCKS, UNIVERSE } from "../config";
import { transformOrThrow } from "../etl/transform";
import type { ChartResponse } from "../api";
import type { RawTable, RawValue, TimeSeriesTable } from "../types";

export function isoDate(offset: number): string {
  return new Date(Date.UTC(2024, 0, 1 + offset)).toISOString().slice(0, 10);
}

/**
 * Two-level raw table over the full universe. Stock k closes at 100 + 10k + i
 * on row i; USD/MXN climbs 0.05 a day from 20; the 10Y sits at 4 and EUR/USD at 1.08.
 */
export function makeRawTable(rows: number): RawTable {
  const dates = Array.from({ length: rows }, (_, i) => isoDate(i));
  const close: Record<string, RawValue[]> = {};
  ALL_STOCKS.forEach((symbol, k) => {
    close[symbol] = dates.map((_, i) => 100 + 10 * k + i);
  });
  close["^TNX"] = dates.map(() => 4);
  close["MXN=X"] = dates.map((_, i) => 20 + 0.05 * i);
  close["EURUSD=X"] = dates.map(() => 1.08);
  return { layout: "fields", dates, fields: { Close: close } };
}

export function makeTable(rows: number): TimeSeriesTable {
  return transformOrThrow(makeRawTable(rows), UNIVERSE);
}

/** Small hand-written table; every column must have `dates.length` values. */
export function tableOf(dates: string[], columns: Record<string, number[]>): TimeSeriesTable {
  return { dates, columns };
}

/** One-symbol chart payload; an empty `timestamps` list means no bars. */
export function chartPayload(
  symbol: string,
  timestamps: number[],
  close: (number | null)[],
  adjclose?: (number | null)[],
): ChartResponse {
  return {
    chart: {
      result: [
        {
          meta: { symbol, gmtoffset: -18000 },
          ...(timestamps.length > 0 ? { timestamp: timestamps } : {}),
          indicators: {
            quote: [{ close }],
            ...(adjclose ? { adjclose: [{ adjclose }] } : {}),
          },
        },
      ],
      error: null,
    },
  };
}

export function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}
