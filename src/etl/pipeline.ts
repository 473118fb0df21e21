/**
 * Fetch → transform → cache. The only entry point the dashboard calls to get
 * its table; failures come back as a tagged result, never as a throw.
 */
import { api, type SeriesFetcher } from "../api";
import { allSymbols, config, UNIVERSE } from "../config";
import { DataUnavailableError, toLogError, toPipelineError } from "../lib/errors";
import { logger } from "../lib/logger";
import { fail, mapResult } from "../lib/result";
import type {
  DateRange,
  FxQuoteConvention,
  MarketSnapshot,
  PipelineResult,
  RawTable,
  SymbolUniverse,
} from "../types";
import { TtlCache } from "./cache";
import { transform } from "./transform";

export interface LoadOptions {
  fetcher?: SeriesFetcher;
  universe?: SymbolUniverse;
  range?: DateRange;
  fxQuote?: FxQuoteConvention;
  cache?: TtlCache<MarketSnapshot>;
  now?: () => Date;
}

const tableCache = new TtlCache<MarketSnapshot>(config.cacheTtlMs);

export function historyRange(now: Date, days: number): DateRange {
  const end = now.toISOString().slice(0, 10);
  const start = new Date(now.getTime() - days * 86_400_000).toISOString().slice(0, 10);
  return { start, end };
}

export function cacheKey(universe: SymbolUniverse, range: DateRange): string {
  return `${allSymbols(universe).join(",")}|${range.start}|${range.end}`;
}

async function fetchRaw(fetcher: SeriesFetcher, symbols: string[], range: DateRange): Promise<RawTable> {
  try {
    return await fetcher(symbols, range);
  } catch (err) {
    logger.error("Series fetch failed", toLogError(err));
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataUnavailableError(`Market data could not be downloaded: ${reason}`);
  }
}

/**
 * A cache hit returns the stored snapshot, so `fetchedAt` is the time of the
 * original download.
 */
export async function loadMarketTable(options: LoadOptions = {}): Promise<PipelineResult<MarketSnapshot>> {
  const fetcher = options.fetcher ?? api.history;
  const universe = options.universe ?? UNIVERSE;
  const cache = options.cache ?? tableCache;
  const now = options.now ?? (() => new Date());
  const range = options.range ?? historyRange(now(), config.historyDays);
  const key = cacheKey(universe, range);

  const cached = cache.get(key);
  if (cached) {
    logger.debug(`Table cache hit (${cached.table.dates.length} rows)`);
    return { ok: true, value: cached };
  }

  let raw: RawTable;
  try {
    raw = await fetchRaw(fetcher, allSymbols(universe), range);
  } catch (err) {
    return fail(toPipelineError(err));
  }

  const fetchedAt = now();
  const result = mapResult(transform(raw, universe, { fxQuote: options.fxQuote ?? config.fxQuote }), (table) => ({
    table,
    fetchedAt,
  }));
  if (result.ok) {
    cache.set(key, result.value);
    logger.info(`Loaded ${result.value.table.dates.length} rows for ${range.start}..${range.end}`);
  } else {
    logger.error(`ETL failed (${result.error.kind}): ${result.error.message}`);
  }
  return result;
}

/** Manual refresh: the next load goes back to the data source. */
export function clearMarketTableCache(): void {
  tableCache.clear();
}
