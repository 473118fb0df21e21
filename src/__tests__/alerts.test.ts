import { evaluateAlerts } from "../analytics/alerts";
import { DEFAULT_THRESHOLDS } from "../config";

const THRESHOLDS = { domesticCeiling: 20.5, longRateCeiling: 4.5, foreignFloor: 0.9 };

describe("evaluateAlerts", () => {
  it("fires every rule in the fixed order", () => {
    const alerts = evaluateAlerts({ USD_MXN: 21.0, US_TREASURY_10Y: 5.0, USD_EUR: 0.85 }, THRESHOLDS);

    expect(alerts).toEqual([
      {
        rule: "domestic-ceiling",
        severity: "error",
        text: "Dollar above 20.5 MXN (current: 21.00)",
        value: 21,
      },
      {
        rule: "long-rate-ceiling",
        severity: "warn",
        text: "US 10Y Treasury above 4.5% (current: 5.00%)",
        value: 5,
      },
      {
        rule: "foreign-floor",
        severity: "info",
        text: "Dollar weakening against the euro (current: 0.85 €)",
        value: 0.85,
      },
    ]);
  });

  it("returns nothing when every value is inside its threshold", () => {
    expect(evaluateAlerts({ USD_MXN: 19.8, US_TREASURY_10Y: 4.1, USD_EUR: 0.93 }, THRESHOLDS)).toEqual([]);
  });

  it("does not fire on a value equal to the limit", () => {
    expect(evaluateAlerts({ USD_MXN: 20.5, US_TREASURY_10Y: 4.5, USD_EUR: 0.9 }, THRESHOLDS)).toEqual([]);
  });

  it("fires only the rules that trip", () => {
    const alerts = evaluateAlerts({ USD_MXN: 18, US_TREASURY_10Y: 4.0, USD_EUR: 0.88 }, THRESHOLDS);
    expect(alerts.map((a) => a.rule)).toEqual(["foreign-floor"]);
  });

  it("ignores missing and NaN values", () => {
    expect(evaluateAlerts({ USD_MXN: NaN, USD_EUR: NaN }, THRESHOLDS)).toEqual([]);
  });

  it("can be silenced with an unreachable threshold", () => {
    const alerts = evaluateAlerts(
      { USD_MXN: 25, US_TREASURY_10Y: 5, USD_EUR: 0.8 },
      { ...DEFAULT_THRESHOLDS, domesticCeiling: Infinity },
    );
    expect(alerts.map((a) => a.rule)).toEqual(["long-rate-ceiling", "foreign-floor"]);
  });
});
