import { COLUMNS } from "../config";
import type { Kpi, TimeSeriesTable } from "../types";
import { latestRow } from "./window";

interface KpiSpec {
  key: string;
  label: string;
  digits: number;
  suffix?: string;
}

const KPI_SPECS: readonly KpiSpec[] = [
  { key: COLUMNS.domesticFx, label: "USD / MXN", digits: 2 },
  { key: COLUMNS.foreignFx, label: "USD / EUR", digits: 3, suffix: " €" },
  { key: COLUMNS.shortRate, label: "CETES 28D", digits: 2 },
  { key: COLUMNS.longRate, label: "US 10Y Treasury", digits: 2 },
];

function direction(delta: number): Kpi["direction"] {
  if (delta > 0) return "positive";
  if (delta < 0) return "negative";
  return "neutral";
}

/** Latest value and day-over-day change; empty when fewer than two rows exist. */
export function computeKpis(table: TimeSeriesTable): Kpi[] {
  const current = latestRow(table, 0);
  const prev = latestRow(table, 1);
  if (!current || !prev) return [];

  return KPI_SPECS.flatMap((spec) => {
    const value = current[spec.key];
    const before = prev[spec.key];
    if (value === undefined || before === undefined) return [];
    const delta = value - before;
    return [
      {
        key: spec.key,
        label: spec.label,
        value,
        delta,
        formatted: `${value.toFixed(spec.digits)}${spec.suffix ?? ""}`,
        formattedDelta: delta.toFixed(2),
        direction: direction(delta),
      },
    ];
  });
}
