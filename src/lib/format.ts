/** Fixed-digit number, or "n/a" for NaN and infinities. */
export function fmtNumber(v: number, digits = 2): string {
  return Number.isFinite(v) ? v.toFixed(digits) : "n/a";
}
