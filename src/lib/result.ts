import type { PipelineError, PipelineResult } from "../types";

export function ok<T>(value: T): PipelineResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: PipelineError): PipelineResult<T> {
  return { ok: false, error };
}

/** Applies `fn` to a successful value; a failure passes through untouched. */
export function mapResult<T, U>(result: PipelineResult<T>, fn: (value: T) => U): PipelineResult<U> {
  return result.ok ? ok(fn(result.value)) : result;
}
