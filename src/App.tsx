import { useMemo, useState } from "react";
import { Navigate, Route, Routes } from "react-router-dom";

import { evaluateAlerts } from "./analytics/alerts";
import { computeKpis } from "./analytics/kpis";
import { clampWindow, latestRow, windowTable } from "./analytics/window";
import { AlertsPanel } from "./components/AlertsPanel";
import { AppShell } from "./components/AppShell";
import { ControlPanel, type DashboardControls } from "./components/ControlPanel";
import { ErrorState } from "./components/ErrorState";
import { KpiGrid } from "./components/KpiCard";
import { LastRefreshed } from "./components/LastRefreshed";
import { NavRail } from "./components/NavRail";
import { DashboardSkeleton } from "./components/SkeletonLoader";
import { config, DEFAULT_THRESHOLDS, WINDOW_DEFAULT_DAYS } from "./config";
import { useMarketTable } from "./hooks/useMarketTable";
import { mapResult } from "./lib/result";
import { InsightsPage } from "./pages/InsightsPage";
import { MacroPage } from "./pages/MacroPage";
import { MarketPage } from "./pages/MarketPage";

const INITIAL_CONTROLS: DashboardControls = {
  windowDays: WINDOW_DEFAULT_DAYS,
  thresholds: DEFAULT_THRESHOLDS,
};

export function App() {
  const market = useMarketTable();
  const [controls, setControls] = useState<DashboardControls>(INITIAL_CONTROLS);

  const windowed = useMemo(
    () =>
      market.result &&
      mapResult(market.result, ({ table }) =>
        windowTable(table, clampWindow(controls.windowDays, table.dates.length)),
      ),
    [market.result, controls.windowDays],
  );

  const sidebar = (
    <ControlPanel
      controls={controls}
      onChange={setControls}
      onForceRefresh={() => void market.forceRefresh()}
      refreshing={market.loading}
    />
  );

  if (market.loading && !windowed) {
    return (
      <AppShell sidebar={sidebar}>
        <DashboardSkeleton />
      </AppShell>
    );
  }

  if (!windowed) return null;

  if (!windowed.ok) {
    return (
      <AppShell sidebar={sidebar}>
        <ErrorState error={windowed.error} onRetry={() => void market.forceRefresh()} />
      </AppShell>
    );
  }

  const table = windowed.value;
  const latest = latestRow(table);
  const alerts = latest ? evaluateAlerts(latest, controls.thresholds) : [];

  return (
    <AppShell sidebar={sidebar}>
      <div className="page-meta">
        <LastRefreshed at={market.lastRefreshed} ttlMs={config.cacheTtlMs} />
        <span className="text-tertiary">
          {table.dates[0]} → {table.dates[table.dates.length - 1]} ({table.dates.length} rows)
        </span>
      </div>

      <AlertsPanel alerts={alerts} />
      <KpiGrid kpis={computeKpis(table)} />

      <NavRail />
      <Routes>
        <Route path="/market" element={<MarketPage table={table} />} />
        <Route path="/macro" element={<MacroPage table={table} thresholds={controls.thresholds} />} />
        <Route path="/insights" element={<InsightsPage table={table} />} />
        <Route path="*" element={<Navigate to="/market" replace />} />
      </Routes>
    </AppShell>
  );
}
