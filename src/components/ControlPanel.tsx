import { WINDOW_MAX_DAYS, WINDOW_MIN_DAYS } from "../config";
import type { ThresholdConfig } from "../types";

export interface DashboardControls {
  windowDays: number;
  thresholds: ThresholdConfig;
}

const THRESHOLD_INPUTS: { key: keyof ThresholdConfig; label: string; step: number }[] = [
  { key: "domesticCeiling", label: "USD/MXN ceiling", step: 0.1 },
  { key: "longRateCeiling", label: "US 10Y ceiling (%)", step: 0.1 },
  { key: "foreignFloor", label: "USD/EUR floor (dollar weakness)", step: 0.01 },
];

export function ControlPanel({
  controls,
  onChange,
  onForceRefresh,
  refreshing,
}: {
  controls: DashboardControls;
  onChange: (next: DashboardControls) => void;
  onForceRefresh: () => void;
  refreshing: boolean;
}) {
  function setThreshold(key: keyof ThresholdConfig, raw: string) {
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(value)) return;
    onChange({ ...controls, thresholds: { ...controls.thresholds, [key]: value } });
  }

  return (
    <aside className="control-panel" aria-label="Control panel">
      <h2 className="control-panel-title">Control Panel</h2>

      <div className="control-section">
        <div className="nav-section-label">Analysis period</div>
        <label className="control-field">
          History days: <span className="font-mono">{controls.windowDays}</span>
          <input
            type="range"
            min={WINDOW_MIN_DAYS}
            max={WINDOW_MAX_DAYS}
            value={controls.windowDays}
            onChange={(e) => onChange({ ...controls, windowDays: Number(e.target.value) })}
          />
        </label>
      </div>

      <div className="control-section">
        <div className="nav-section-label">Alert thresholds</div>
        {THRESHOLD_INPUTS.map((input) => (
          <label key={input.key} className="control-field">
            {input.label}
            <input
              type="number"
              step={input.step}
              value={controls.thresholds[input.key]}
              onChange={(e) => setThreshold(input.key, e.target.value)}
            />
          </label>
        ))}
      </div>

      <button className="btn btn-primary" type="button" onClick={onForceRefresh} disabled={refreshing}>
        {refreshing ? "Refreshing…" : "Force data refresh"}
      </button>
    </aside>
  );
}
