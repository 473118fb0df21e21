import { z } from "zod";

import { logger } from "./lib/logger";
import type { FxQuoteConvention, SymbolUniverse, ThresholdConfig } from "./types";

/* ── Symbol universe ─────────────────────────────────────── */

export const BIG_TECH = ["AAPL", "MSFT", "NVDA", "GOOGL", "META", "TSLA", "AMZN"] as const;

// JP Morgan, Coca-Cola, Disney, Exxon, Pfizer
export const TRADITIONAL = ["JPM", "KO", "DIS", "XOM", "PFE"] as const;

// 10Y Treasury yield, USD/MXN, EUR/USD
export const MACRO = ["^TNX", "MXN=X", "EURUSD=X"] as const;

export const UNIVERSE: SymbolUniverse = {
  primary: BIG_TECH,
  secondary: TRADITIONAL,
  macro: MACRO,
};

export const GROUP_LABELS = {
  primary: "Big Tech",
  secondary: "Traditional",
} as const;

export const ALL_STOCKS: readonly string[] = [...BIG_TECH, ...TRADITIONAL];

export function allSymbols(universe: SymbolUniverse): string[] {
  return [...universe.primary, ...universe.secondary, ...universe.macro];
}

/* ── Column names ────────────────────────────────────────── */

export const COLUMNS = {
  longRate: "US_TREASURY_10Y",
  domesticFx: "USD_MXN",
  foreignFxSource: "EUR_USD",
  foreignFx: "USD_EUR",
  shortRate: "CETES_28",
} as const;

export const MACRO_RENAMES: Readonly<Record<string, string>> = {
  "^TNX": COLUMNS.longRate,
  "MXN=X": COLUMNS.domesticFx,
  "EURUSD=X": COLUMNS.foreignFxSource,
};

/** Close field first, adjusted close as fallback. */
export const CLOSE_FIELDS = ["Close", "Adj Close"] as const;

/* ── Synthetic short-term rate ───────────────────────────── */

export const SHORT_RATE_MODEL = {
  seed: 42,
  start: 10.5,
  end: 11.25,
  noiseStd: 0.05,
} as const;

/* ── Dashboard defaults ──────────────────────────────────── */

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  domesticCeiling: 20.5,
  longRateCeiling: 4.5,
  foreignFloor: 0.9,
};

export const WINDOW_MIN_DAYS = 30;
export const WINDOW_MAX_DAYS = 700;
export const WINDOW_DEFAULT_DAYS = 365;

export const DEFAULT_SELECTION = ["NVDA", "KO", "TSLA", "JPM"];

export const TRADING_DAYS_PER_YEAR = 252;

/* ── Runtime environment ─────────────────────────────────── */

export const envSchema = z.object({
  VITE_API_BASE_URL: z.string().default("/yahoo"),
  VITE_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).max(86_400).default(3600),
  VITE_HISTORY_DAYS: z.coerce.number().int().min(30).max(3650).default(730),
  VITE_FX_QUOTE: z.enum(["foreign-per-domestic", "domestic-per-foreign"]).default("foreign-per-domestic"),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, unknown>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    logger.error("Environment validation failed:", result.error.format());
    throw new Error("Invalid environment variables");
  }

  return result.data;
}

export interface AppConfig {
  apiBase: string;
  cacheTtlMs: number;
  historyDays: number;
  fxQuote: FxQuoteConvention;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    apiBase: env.VITE_API_BASE_URL,
    cacheTtlMs: env.VITE_CACHE_TTL_SECONDS * 1000,
    historyDays: env.VITE_HISTORY_DAYS,
    fxQuote: env.VITE_FX_QUOTE,
  };
}

export const config: AppConfig = toAppConfig(validateEnv(import.meta.env));
