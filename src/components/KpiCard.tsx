import type { Kpi } from "../types";

export function KpiCard({ kpi }: { kpi: Kpi }) {
  return (
    <div className="kpi-card" data-testid={`kpi-${kpi.key}`}>
      <div className="kpi-label">{kpi.label}</div>
      <div className="kpi-value">{kpi.formatted}</div>
      <div className={`kpi-delta ${kpi.direction}`}>
        {kpi.direction === "positive" && "▲ "}
        {kpi.direction === "negative" && "▼ "}
        {kpi.formattedDelta}
      </div>
    </div>
  );
}

export function KpiGrid({ kpis }: { kpis: Kpi[] }) {
  if (kpis.length === 0) {
    return <div className="empty-state">Not enough history to compare against the previous day.</div>;
  }
  return (
    <div className="kpi-grid">
      {kpis.map((kpi) => (
        <KpiCard key={kpi.key} kpi={kpi} />
      ))}
    </div>
  );
}
