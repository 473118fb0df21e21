import { useCallback, useEffect, useRef, useState } from "react";

import { clearMarketTableCache, loadMarketTable } from "../etl/pipeline";
import { toPipelineError } from "../lib/errors";
import { fail } from "../lib/result";
import type { MarketSnapshot, PipelineResult } from "../types";

export interface MarketTableState {
  result: PipelineResult<MarketSnapshot> | null;
  loading: boolean;
  /** When the shown table left the data source; unchanged by cache hits. */
  lastRefreshed: Date | null;
  /** Clears the table cache and loads again from the data source. */
  forceRefresh: () => Promise<void>;
}

export function useMarketTable(
  loader: () => Promise<PipelineResult<MarketSnapshot>> = loadMarketTable,
): MarketTableState {
  const [result, setResult] = useState<PipelineResult<MarketSnapshot> | null>(null);
  const [loading, setLoading] = useState(true);
  const mounted = useRef(true);
  const loaderRef = useRef(loader);
  loaderRef.current = loader;

  const load = useCallback(async () => {
    setLoading(true);
    let next: PipelineResult<MarketSnapshot>;
    try {
      next = await loaderRef.current();
    } catch (err) {
      next = fail(toPipelineError(err));
    }
    if (!mounted.current) {
      return;
    }
    setResult(next);
    setLoading(false);
  }, []);

  const forceRefresh = useCallback(async () => {
    clearMarketTableCache();
    await load();
  }, [load]);

  useEffect(() => {
    mounted.current = true;
    void load();
    return () => {
      mounted.current = false;
    };
  }, [load]);

  const lastRefreshed = result?.ok ? result.value.fetchedAt : null;

  return { result, loading, lastRefreshed, forceRefresh };
}
