import { clampWindow, latestRow, toChartRows, windowTable } from "../analytics/window";
import { isoDate, tableOf } from "./fixtures";

const table = tableOf(
  [0, 1, 2, 3, 4].map(isoDate),
  { A: [1, 2, 3, 4, 5], B: [10, 20, 30, 40, 50] },
);

describe("windowTable", () => {
  it("keeps the trailing rows by position", () => {
    const w = windowTable(table, 3);
    expect(w.dates).toEqual(["2024-01-03", "2024-01-04", "2024-01-05"]);
    expect(w.columns.A).toEqual([3, 4, 5]);
    expect(w.columns.B).toEqual([30, 40, 50]);
  });

  it("returns the table unchanged when asked for more rows than it has", () => {
    expect(windowTable(table, 10)).toBe(table);
    expect(windowTable(table, 5)).toBe(table);
  });
});

describe("clampWindow", () => {
  it("keeps the slider range", () => {
    expect(clampWindow(10, 500)).toBe(30);
    expect(clampWindow(1000, 800)).toBe(700);
    expect(clampWindow(365, 500)).toBe(365);
  });

  it("never exceeds the available rows and never drops below two", () => {
    expect(clampWindow(365, 100)).toBe(100);
    expect(clampWindow(365, 1)).toBe(2);
  });
});

describe("latestRow", () => {
  it("reads the last and previous rows", () => {
    expect(latestRow(table)).toEqual({ A: 5, B: 50 });
    expect(latestRow(table, 1)).toEqual({ A: 4, B: 40 });
    expect(latestRow(table, 5)).toBeUndefined();
  });
});

describe("toChartRows", () => {
  it("pivots the requested columns into row objects", () => {
    expect(toChartRows(windowTable(table, 2), ["B", "missing"])).toEqual([
      { date: "2024-01-04", B: 40 },
      { date: "2024-01-05", B: 50 },
    ]);
  });
});
