import { CLOSE_FIELDS } from "../config";
import { DataUnavailableError } from "../lib/errors";
import type { CloseTable, RawTable } from "../types";

function isEmpty(raw: RawTable): boolean {
  if (raw.dates.length === 0) return true;
  const columns = raw.layout === "flat" ? raw.columns : Object.values(raw.fields)[0] ?? {};
  return Object.keys(columns).length === 0;
}

/**
 * Collapses either raw layout into one close series per symbol.
 * For the two-level layout the `Close` field wins over `Adj Close`.
 */
export function normalizeShape(raw: RawTable): CloseTable {
  if (isEmpty(raw)) {
    throw new DataUnavailableError("The data source returned no rows.");
  }

  if (raw.layout === "flat") {
    return { dates: [...raw.dates], columns: { ...raw.columns } };
  }

  for (const field of CLOSE_FIELDS) {
    const columns = raw.fields[field];
    if (columns && Object.keys(columns).length > 0) {
      return { dates: [...raw.dates], columns: { ...columns } };
    }
  }

  throw new DataUnavailableError(
    `No closing-price field found (expected one of: ${CLOSE_FIELDS.join(", ")}).`,
  );
}
