/**
 * Threshold alerts for the latest row. Rendered in evaluation order
 * (USD/MXN, US 10Y, USD/EUR); the list is never re-sorted here.
 */
import type { Alert, AlertSeverity } from "../types";

const SEVERITY_ICON: Record<AlertSeverity, string> = { error: "✖", warn: "⚠", info: "●" };
const SEVERITY_LABEL: Record<AlertSeverity, string> = {
  error: "CRITICAL",
  warn: "ALERT",
  info: "NOTICE",
};

export function AlertsPanel({ alerts }: { alerts: Alert[] }) {
  if (alerts.length === 0) {
    return <div className="banner banner-ok">All indicators are within their configured thresholds.</div>;
  }

  return (
    <div className="data-card" role="region" aria-label="Active alerts">
      <h3 className="card-title">Active System Alerts</h3>
      <ul className="alerts-panel">
        {alerts.map((alert) => (
          <li key={alert.rule} className="alert-item">
            <span className={`alert-icon ${alert.severity}`}>{SEVERITY_ICON[alert.severity]}</span>
            <span className="alert-text">
              <strong>{SEVERITY_LABEL[alert.severity]}:</strong> {alert.text}
            </span>
          </li>
        ))}
      </ul>
    </div>
  );
}
