import { renderHook, waitFor } from "@testing-library/react";

import { useMarketTable } from "../hooks/useMarketTable";
import { fail, ok } from "../lib/result";
import type { MarketSnapshot, PipelineResult } from "../types";
import { makeTable } from "./fixtures";

describe("useMarketTable", () => {
  it("reports when the table was fetched, not when it was rendered", async () => {
    const fetchedAt = new Date("2024-03-10T09:00:00Z");
    const loader = vi.fn(async (): Promise<PipelineResult<MarketSnapshot>> => ok({ table: makeTable(5), fetchedAt }));

    const { result } = renderHook(() => useMarketTable(loader));

    await waitFor(() => expect(result.current.loading).toBe(false));
    expect(result.current.lastRefreshed).toBe(fetchedAt);
  });

  it("has no refresh time after a failed load", async () => {
    const loader = vi.fn(
      async (): Promise<PipelineResult<MarketSnapshot>> => fail({ kind: "DataUnavailable", message: "offline" }),
    );

    const { result } = renderHook(() => useMarketTable(loader));

    await waitFor(() => expect(result.current.loading).toBe(false));
    expect(result.current.lastRefreshed).toBeNull();
    expect(result.current.result).toEqual({ ok: false, error: { kind: "DataUnavailable", message: "offline" } });
  });
});
