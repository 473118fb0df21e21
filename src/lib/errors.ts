import type { PipelineError, PipelineErrorKind } from "../types";

/** Fetch returned nothing usable, or a required series could not be resolved. */
export class DataUnavailableError extends Error {
  readonly kind: PipelineErrorKind = "DataUnavailable";

  constructor(message: string) {
    super(message);
    this.name = "DataUnavailableError";
  }
}

/** Structural failure while deriving columns (e.g. an expected column is absent). */
export class TransformError extends Error {
  readonly kind: PipelineErrorKind = "TransformError";

  constructor(message: string) {
    super(message);
    this.name = "TransformError";
  }
}

export function toPipelineError(err: unknown, fallback: PipelineErrorKind = "DataUnavailable"): PipelineError {
  if (err instanceof DataUnavailableError || err instanceof TransformError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: fallback, message: err instanceof Error ? err.message : String(err) };
}

export function toLogError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  try {
    return { message: JSON.stringify(err) };
  } catch {
    return { message: String(err) };
  }
}
