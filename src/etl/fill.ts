import type { RawValue } from "../types";

export function forwardFill(values: readonly RawValue[]): RawValue[] {
  let last: RawValue = null;
  return values.map((v) => {
    if (v !== null) last = v;
    return last;
  });
}

export function backwardFill(values: readonly RawValue[]): RawValue[] {
  const out = [...values];
  let next: RawValue = null;
  for (let i = out.length - 1; i >= 0; i--) {
    if (out[i] !== null) next = out[i];
    else out[i] = next;
  }
  return out;
}

/** Forward-fill, then backward-fill; `null` only survives in an all-missing column. */
export function fillGaps(values: readonly RawValue[]): RawValue[] {
  return backwardFill(forwardFill(values));
}
