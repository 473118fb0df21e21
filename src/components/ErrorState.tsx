import type { PipelineError } from "../types";

const TITLES: Record<PipelineError["kind"], string> = {
  DataUnavailable: "Market data unavailable",
  TransformError: "Data processing failed",
};

export function ErrorState({ error, onRetry }: { error: PipelineError; onRetry?: () => void }) {
  return (
    <div className="error-box" role="alert">
      <h3>{TITLES[error.kind]}</h3>
      <p>{error.message}</p>
      {onRetry && (
        <button className="btn btn-secondary" type="button" onClick={onRetry}>
          Try again
        </button>
      )}
    </div>
  );
}
