import { WINDOW_MAX_DAYS, WINDOW_MIN_DAYS } from "../config";
import type { TableRow, TimeSeriesTable } from "../types";

/**
 * Trailing `nDays` rows by position. Asking for more rows than the table
 * holds returns the table itself. Callers keep `nDays >= 2` via clampWindow.
 */
export function windowTable(table: TimeSeriesTable, nDays: number): TimeSeriesTable {
  if (nDays >= table.dates.length) return table;
  const from = table.dates.length - nDays;
  const columns: Record<string, readonly number[]> = {};
  for (const [name, values] of Object.entries(table.columns)) {
    columns[name] = values.slice(from);
  }
  return { dates: table.dates.slice(from), columns };
}

export function clampWindow(requested: number, rowCount: number): number {
  const bounded = Math.min(Math.max(Math.round(requested), WINDOW_MIN_DAYS), WINDOW_MAX_DAYS);
  return Math.max(2, Math.min(bounded, rowCount));
}

/** Row `offset` positions before the last one (0 = latest). */
export function latestRow(table: TimeSeriesTable, offset = 0): TableRow | undefined {
  const index = table.dates.length - 1 - offset;
  if (index < 0) return undefined;
  const row: TableRow = {};
  for (const [name, values] of Object.entries(table.columns)) {
    row[name] = values[index];
  }
  return row;
}

/** Row-oriented view for recharts, keyed by `date` plus the requested columns. */
export function toChartRows(
  table: TimeSeriesTable,
  keys: readonly string[],
): Array<Record<string, string | number>> {
  return table.dates.map((date, i) => {
    const row: Record<string, string | number> = { date };
    for (const key of keys) {
      const values = table.columns[key];
      if (values) row[key] = values[i];
    }
    return row;
  });
}
