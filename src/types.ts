/** A raw cell as delivered by the series fetcher; `null` marks a missing quote. */
export type RawValue = number | null;

/**
 * Raw fetcher output. Either two-level (field kind × symbol, e.g.
 * `fields["Close"]["AAPL"]`) or flat (one close series per symbol).
 */
export type RawTable =
  | {
      layout: "fields";
      dates: string[];
      fields: Record<string, Record<string, RawValue[]>>;
    }
  | {
      layout: "flat";
      dates: string[];
      columns: Record<string, RawValue[]>;
    };

/** Shape-normalized close table; may still contain gaps. */
export interface CloseTable {
  dates: string[];
  columns: Record<string, RawValue[]>;
}

/** Gap-free daily table, one column per symbol or metric. */
export interface TimeSeriesTable {
  readonly dates: readonly string[];
  readonly columns: Readonly<Record<string, readonly number[]>>;
}

export type TableRow = Record<string, number>;

export interface SymbolUniverse {
  primary: readonly string[];
  secondary: readonly string[];
  macro: readonly string[];
}

export type SymbolGroup = "primary" | "secondary";

export interface DateRange {
  start: string;
  end: string;
}

export interface ThresholdConfig {
  /** USD/MXN ceiling. */
  domesticCeiling: number;
  /** US 10Y Treasury yield ceiling, in percent. */
  longRateCeiling: number;
  /** USD/EUR floor. */
  foreignFloor: number;
}

export type AlertSeverity = "error" | "warn" | "info";

export type AlertRule = "domestic-ceiling" | "long-rate-ceiling" | "foreign-floor";

export interface Alert {
  rule: AlertRule;
  severity: AlertSeverity;
  text: string;
  value: number;
}

/**
 * How the euro source column is quoted. `foreign-per-domestic` means the
 * column reads as dollars per euro and the derived USD_EUR is its reciprocal.
 */
export type FxQuoteConvention = "foreign-per-domestic" | "domestic-per-foreign";

export type PipelineErrorKind = "DataUnavailable" | "TransformError";

export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
}

export type PipelineResult<T> = { ok: true; value: T } | { ok: false; error: PipelineError };

/** A loaded table and the time it was fetched from the data source. */
export interface MarketSnapshot {
  table: TimeSeriesTable;
  fetchedAt: Date;
}

export interface VolatilityRecord {
  symbol: string;
  group: SymbolGroup;
  /** Annualized, in percent. NaN when the window is too short. */
  volatility: number;
}

export interface OlsFit {
  slope: number;
  intercept: number;
  r: number;
  rSquared: number;
}

export interface CorrelationPoint {
  date: string;
  x: number;
  y: number;
}

export interface CorrelationView {
  xKey: string;
  yKey: string;
  points: CorrelationPoint[];
  fit: OlsFit;
  trendline: { x: number; y: number }[];
}

export interface RelativePerformancePoint {
  date: string;
  symbolIndex: number;
  groupIndex: number;
}

export interface Kpi {
  key: string;
  label: string;
  value: number;
  delta: number;
  formatted: string;
  formattedDelta: string;
  direction: "positive" | "negative" | "neutral";
}
