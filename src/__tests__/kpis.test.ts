import { computeKpis } from "../analytics/kpis";
import { tableOf } from "./fixtures";

describe("computeKpis", () => {
  it("compares the latest row with the previous one", () => {
    const table = tableOf(["2024-01-01", "2024-01-02"], {
      USD_MXN: [20, 20.5],
      USD_EUR: [0.9, 0.9],
      CETES_28: [11, 10.9],
      US_TREASURY_10Y: [4.2, 4.25],
    });

    const kpis = computeKpis(table);

    expect(kpis.map((k) => [k.label, k.formatted, k.formattedDelta, k.direction])).toEqual([
      ["USD / MXN", "20.50", "0.50", "positive"],
      ["USD / EUR", "0.900 €", "0.00", "neutral"],
      ["CETES 28D", "10.90", "-0.10", "negative"],
      ["US 10Y Treasury", "4.25", "0.05", "positive"],
    ]);
  });

  it("is empty with a single row", () => {
    const table = tableOf(["2024-01-01"], { USD_MXN: [20], USD_EUR: [0.9], CETES_28: [11], US_TREASURY_10Y: [4] });
    expect(computeKpis(table)).toEqual([]);
  });
});
