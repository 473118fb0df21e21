import { z } from "zod";

import { config } from "./config";
import { logger } from "./lib/logger";
import type { DateRange, RawTable, RawValue } from "./types";

/* ── Chart endpoint payload ──────────────────────────────── */

const nullableSeries = z.array(z.number().nullable());

const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string(),
      gmtoffset: z.number().optional(),
    })
    .passthrough(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(z.object({ close: nullableSeries.optional() }).passthrough()),
    adjclose: z.array(z.object({ adjclose: nullableSeries })).optional(),
  }),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

/** Pluggable data source: daily closes for `symbols` over `range`. */
export type SeriesFetcher = (symbols: readonly string[], range: DateRange) => Promise<RawTable>;

export interface SymbolHistory {
  symbol: string;
  close: Map<string, RawValue>;
  adjClose: Map<string, RawValue> | null;
}

async function get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const response = await fetch(`${config.apiBase}${path}`);
  if (!response.ok) {
    throw new Error(`API ${path} failed with status ${response.status}`);
  }
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`API ${path} returned an unexpected payload`);
  }
  return parsed.data;
}

function toUnixSeconds(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / 1000);
}

/** Exchange-local calendar date of a bar timestamp. */
function barDate(ts: number, gmtoffset: number): string {
  return new Date((ts + gmtoffset) * 1000).toISOString().slice(0, 10);
}

export function parseChart(payload: ChartResponse): SymbolHistory | null {
  if (payload.chart.error) {
    throw new Error(`${payload.chart.error.code}: ${payload.chart.error.description}`);
  }
  const result = payload.chart.result?.[0];
  if (!result || !result.timestamp || result.timestamp.length === 0) return null;

  const offset = result.meta.gmtoffset ?? 0;
  const closes = result.indicators.quote[0]?.close ?? [];
  const adj = result.indicators.adjclose?.[0]?.adjclose ?? null;

  const close = new Map<string, RawValue>();
  const adjClose = adj ? new Map<string, RawValue>() : null;
  result.timestamp.forEach((ts, i) => {
    const date = barDate(ts, offset);
    close.set(date, closes[i] ?? null);
    if (adj && adjClose) adjClose.set(date, adj[i] ?? null);
  });
  return { symbol: result.meta.symbol, close, adjClose };
}

/**
 * Aligns per-symbol histories on the union of their dates. Every symbol in
 * `symbols` gets a close column; one with no history is all missing.
 */
export function mergeHistories(
  histories: SymbolHistory[],
  symbols: readonly string[] = histories.map((h) => h.symbol),
): RawTable {
  const dates = [...new Set(histories.flatMap((h) => [...h.close.keys()]))].sort();
  const close: Record<string, RawValue[]> = {};
  const adjClose: Record<string, RawValue[]> = {};

  for (const symbol of symbols) {
    close[symbol] = dates.map(() => null);
  }
  for (const h of histories) {
    close[h.symbol] = dates.map((d) => h.close.get(d) ?? null);
    const adj = h.adjClose;
    if (adj) adjClose[h.symbol] = dates.map((d) => adj.get(d) ?? null);
  }

  const fields: Record<string, Record<string, RawValue[]>> = { Close: close };
  if (Object.keys(adjClose).length > 0) fields["Adj Close"] = adjClose;
  return { layout: "fields", dates, fields };
}

export const fetchHistory: SeriesFetcher = async (symbols, range) => {
  const query = toQuery({
    period1: toUnixSeconds(range.start),
    period2: toUnixSeconds(range.end) + 86_400,
    interval: "1d",
    events: "history",
  });
  const payloads = await Promise.all(
    symbols.map((symbol) =>
      get(`/v8/finance/chart/${encodeURIComponent(symbol)}${query}`, chartResponseSchema),
    ),
  );
  // Keyed by the requested symbol, whatever the payload's meta reports.
  const histories = payloads.flatMap((p, i) => {
    const history = parseChart(p);
    return history ? [{ ...history, symbol: symbols[i] }] : [];
  });
  if (histories.length < symbols.length) {
    logger.warn(`Fetched ${histories.length}/${symbols.length} series for ${range.start}..${range.end}`);
  } else {
    logger.debug(`Fetched ${histories.length}/${symbols.length} series for ${range.start}..${range.end}`);
  }
  return mergeHistories(histories, symbols);
};

export const api = {
  history: (symbols: readonly string[], range: DateRange) => fetchHistory(symbols, range),
};

function toQuery(params: Record<string, unknown>): string {
  const sp = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value === undefined || value === null || value === "") {
      return;
    }
    sp.set(key, String(value));
  });
  const q = sp.toString();
  return q ? `?${q}` : "";
}
