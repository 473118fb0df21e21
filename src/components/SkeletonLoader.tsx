/**
 * Pulsing placeholders shown while the table loads.
 */
export function SkeletonLoader({
  variant = "card",
  count = 1,
}: {
  variant?: "text" | "card" | "chart";
  count?: number;
}) {
  const cls = `skeleton skeleton-${variant}`;
  return (
    <div className="skeleton-stack" aria-busy="true">
      {Array.from({ length: count }, (_, i) => (
        <div key={i} className={cls} />
      ))}
    </div>
  );
}

/** Four KPI tiles plus a chart block, matching the dashboard header. */
export function DashboardSkeleton() {
  return (
    <section aria-label="Loading market data">
      <div className="kpi-grid">
        {Array.from({ length: 4 }, (_, i) => (
          <div key={i} className="skeleton skeleton-card" />
        ))}
      </div>
      <SkeletonLoader variant="chart" />
    </section>
  );
}
