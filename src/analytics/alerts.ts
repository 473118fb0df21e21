import { COLUMNS } from "../config";
import type { Alert, AlertRule, AlertSeverity, TableRow, ThresholdConfig } from "../types";

interface AlertRuleSpec {
  rule: AlertRule;
  severity: AlertSeverity;
  column: string;
  comparator: "above" | "below";
  limit: (t: ThresholdConfig) => number;
  message: (limit: number, value: number) => string;
}

/* Evaluation order is part of the contract; the panel renders alerts as returned. */
const RULES: readonly AlertRuleSpec[] = [
  {
    rule: "domestic-ceiling",
    severity: "error",
    column: COLUMNS.domesticFx,
    comparator: "above",
    limit: (t) => t.domesticCeiling,
    message: (limit, value) => `Dollar above ${limit} MXN (current: ${value.toFixed(2)})`,
  },
  {
    rule: "long-rate-ceiling",
    severity: "warn",
    column: COLUMNS.longRate,
    comparator: "above",
    limit: (t) => t.longRateCeiling,
    message: (limit, value) => `US 10Y Treasury above ${limit}% (current: ${value.toFixed(2)}%)`,
  },
  {
    rule: "foreign-floor",
    severity: "info",
    column: COLUMNS.foreignFx,
    comparator: "below",
    limit: (t) => t.foreignFloor,
    message: (_limit, value) => `Dollar weakening against the euro (current: ${value.toFixed(2)} €)`,
  },
];

export function evaluateAlerts(latest: TableRow, thresholds: ThresholdConfig): Alert[] {
  const alerts: Alert[] = [];
  for (const spec of RULES) {
    const value = latest[spec.column];
    if (value === undefined) continue;
    const limit = spec.limit(thresholds);
    const fired = spec.comparator === "above" ? value > limit : value < limit;
    if (fired) {
      alerts.push({ rule: spec.rule, severity: spec.severity, text: spec.message(limit, value), value });
    }
  }
  return alerts;
}
