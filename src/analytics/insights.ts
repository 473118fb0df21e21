/**
 * Derived metrics for the Insights tab. All functions are stateless and read
 * only the windowed table they are given.
 */
import { TRADING_DAYS_PER_YEAR } from "../config";
import type {
  CorrelationView,
  OlsFit,
  RelativePerformancePoint,
  SymbolUniverse,
  TimeSeriesTable,
  VolatilityRecord,
} from "../types";

/** Simple returns; the result is one shorter than the input. */
export function percentChange(series: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < series.length; i++) {
    out.push(series[i] / series[i - 1] - 1);
  }
  return out;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/** Standard deviation with n - 1 in the denominator; NaN below two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return NaN;
  const m = mean(values);
  const ss = values.reduce((s, v) => s + (v - m) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

export function annualizedVolatility(series: readonly number[]): number {
  const returns = percentChange(series);
  const scale = Math.sqrt(TRADING_DAYS_PER_YEAR) * 100;
  if (returns.length === 1) {
    // Two rows: single-period magnitude, undefined when the rows are equal.
    const r = returns[0];
    return Number.isFinite(r) && r !== 0 ? Math.abs(r) * scale : NaN;
  }
  return sampleStd(returns) * scale;
}

/** One record per stock, highest volatility first; NaN values sort last. */
export function volatilityRanking(table: TimeSeriesTable, universe: SymbolUniverse): VolatilityRecord[] {
  const records: VolatilityRecord[] = [];
  const groups = [
    ["primary", universe.primary],
    ["secondary", universe.secondary],
  ] as const;

  for (const [group, symbols] of groups) {
    for (const symbol of symbols) {
      const series = table.columns[symbol];
      if (!series) continue;
      records.push({ symbol, group, volatility: annualizedVolatility(series) });
    }
  }

  return records.sort((a, b) => {
    if (Number.isNaN(a.volatility)) return Number.isNaN(b.volatility) ? 0 : 1;
    if (Number.isNaN(b.volatility)) return -1;
    return b.volatility - a.volatility;
  });
}

const NAN_FIT: OlsFit = { slope: NaN, intercept: NaN, r: NaN, rSquared: NaN };

/** Ordinary least squares of `y` on `x`. */
export function olsFit(xs: readonly number[], ys: readonly number[]): OlsFit {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return NAN_FIT;

  const mx = mean(xs.slice(0, n));
  const my = mean(ys.slice(0, n));
  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }
  if (sxx === 0) return NAN_FIT;

  const slope = sxy / sxx;
  const intercept = my - slope * mx;
  const r = syy === 0 ? NaN : sxy / Math.sqrt(sxx * syy);
  return { slope, intercept, r, rSquared: r * r };
}

/** Scatter points plus a descriptive best-fit line between the extreme x values. */
export function correlationView(table: TimeSeriesTable, xKey: string, yKey: string): CorrelationView {
  const xs = table.columns[xKey] ?? [];
  const ys = table.columns[yKey] ?? [];
  const n = Math.min(xs.length, ys.length);
  const points = table.dates.slice(0, n).map((date, i) => ({ date, x: xs[i], y: ys[i] }));
  const fit = olsFit(xs, ys);

  let trendline: { x: number; y: number }[] = [];
  if (Number.isFinite(fit.slope)) {
    const lo = Math.min(...xs.slice(0, n));
    const hi = Math.max(...xs.slice(0, n));
    trendline = [lo, hi].map((x) => ({ x, y: fit.intercept + fit.slope * x }));
  }

  return { xKey, yKey, points, fit, trendline };
}

/** Each column rescaled so the window's first row equals 100. */
export function normalizeBase100(table: TimeSeriesTable, keys: readonly string[]): Record<string, number[]> {
  const out: Record<string, number[]> = {};
  for (const key of keys) {
    const series = table.columns[key];
    if (!series || series.length === 0) continue;
    const base = series[0];
    out[key] = series.map((v) => (v / base) * 100);
  }
  return out;
}

/**
 * One symbol against the equal-weight mean of a group, both anchored at 100
 * on the first row of the current window.
 */
export function relativePerformance(
  table: TimeSeriesTable,
  symbol: string,
  group: readonly string[],
): RelativePerformancePoint[] {
  const symbolIndex = normalizeBase100(table, [symbol])[symbol];
  if (!symbolIndex) return [];
  const members = Object.values(normalizeBase100(table, group));

  return table.dates.map((date, i) => ({
    date,
    symbolIndex: symbolIndex[i],
    groupIndex: mean(members.map((m) => m[i])),
  }));
}
