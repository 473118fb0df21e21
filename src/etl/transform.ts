import { COLUMNS, MACRO_RENAMES, SHORT_RATE_MODEL } from "../config";
import { DataUnavailableError, TransformError, toPipelineError } from "../lib/errors";
import { fail, ok } from "../lib/result";
import type {
  CloseTable,
  FxQuoteConvention,
  PipelineResult,
  RawTable,
  RawValue,
  SymbolUniverse,
  TimeSeriesTable,
} from "../types";
import { fillGaps } from "./fill";
import { normalizeShape } from "./shape";
import { syntheticShortRate, type RampNoiseModel } from "./syntheticRate";

export interface TransformOptions {
  fxQuote?: FxQuoteConvention;
  shortRateModel?: RampNoiseModel;
}

const REQUIRED_MACRO_COLUMNS = [COLUMNS.longRate, COLUMNS.domesticFx, COLUMNS.foreignFxSource];

export function renameMacroColumns(table: CloseTable): CloseTable {
  const columns: Record<string, RawValue[]> = {};
  for (const [name, values] of Object.entries(table.columns)) {
    columns[MACRO_RENAMES[name] ?? name] = values;
  }
  return { dates: table.dates, columns };
}

/**
 * USD_EUR from the euro source column. With `foreign-per-domestic` the
 * source reads as dollars per euro, so the result is its reciprocal.
 */
export function deriveForeignFx(source: readonly RawValue[], quote: FxQuoteConvention): RawValue[] {
  if (quote === "domestic-per-foreign") return [...source];
  return source.map((v) => (v === null ? null : 1 / v));
}

function assertColumns(table: CloseTable, names: readonly string[]): void {
  const missing = names.filter((name) => !(name in table.columns));
  if (missing.length > 0) {
    throw new TransformError(`Expected column(s) missing after rename: ${missing.join(", ")}.`);
  }
}

function fillTable(table: CloseTable): TimeSeriesTable {
  const columns: Record<string, number[]> = {};
  for (const [name, values] of Object.entries(table.columns)) {
    const filled = fillGaps(values);
    const complete: number[] = [];
    for (const v of filled) {
      if (v === null) {
        throw new DataUnavailableError(`Column ${name} has no data in the requested range.`);
      }
      complete.push(v);
    }
    columns[name] = complete;
  }
  return Object.freeze({
    dates: Object.freeze([...table.dates]),
    columns: Object.freeze(columns),
  });
}

export function transformOrThrow(
  raw: RawTable,
  universe: SymbolUniverse,
  options: TransformOptions = {},
): TimeSeriesTable {
  const renamed = renameMacroColumns(normalizeShape(raw));
  assertColumns(renamed, REQUIRED_MACRO_COLUMNS);

  const length = renamed.dates.length;
  for (const [name, values] of Object.entries(renamed.columns)) {
    if (values.length !== length) {
      throw new TransformError(`Column ${name} has ${values.length} rows, expected ${length}.`);
    }
  }

  const stocks = [...universe.primary, ...universe.secondary];
  const absent = stocks.filter((symbol) => !(symbol in renamed.columns));
  if (absent.length > 0) {
    throw new DataUnavailableError(`No data returned for: ${absent.join(", ")}.`);
  }

  const columns: Record<string, RawValue[]> = {};
  // Universe order first so downstream tables and charts list symbols predictably.
  for (const symbol of stocks) {
    columns[symbol] = renamed.columns[symbol];
  }
  for (const [name, values] of Object.entries(renamed.columns)) {
    if (!(name in columns)) columns[name] = values;
  }

  columns[COLUMNS.foreignFx] = deriveForeignFx(
    renamed.columns[COLUMNS.foreignFxSource],
    options.fxQuote ?? "foreign-per-domestic",
  );
  columns[COLUMNS.shortRate] = syntheticShortRate(length, options.shortRateModel ?? SHORT_RATE_MODEL);

  return fillTable({ dates: renamed.dates, columns });
}

/** ETL entry point; every failure comes back as a tagged result. */
export function transform(
  raw: RawTable,
  universe: SymbolUniverse,
  options: TransformOptions = {},
): PipelineResult<TimeSeriesTable> {
  try {
    return ok(transformOrThrow(raw, universe, options));
  } catch (err) {
    return fail(toPipelineError(err, "TransformError"));
  }
}
