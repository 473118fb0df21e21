import { fireEvent, render, screen, within } from "@testing-library/react";

import { DEFAULT_THRESHOLDS } from "../config";
import { InsightsPage } from "../pages/InsightsPage";
import { MacroPage } from "../pages/MacroPage";
import { MarketPage } from "../pages/MarketPage";
import { makeTable } from "./fixtures";

describe("MarketPage", () => {
  it("starts with the default selection pressed", () => {
    render(<MarketPage table={makeTable(40)} />);
    for (const symbol of ["NVDA", "KO", "TSLA", "JPM"]) {
      expect(screen.getByRole("button", { name: symbol })).toHaveAttribute("aria-pressed", "true");
    }
    expect(screen.getByRole("button", { name: "AAPL" })).toHaveAttribute("aria-pressed", "false");
  });

  it("lists the last five closes to two decimals", () => {
    render(<MarketPage table={makeTable(40)} />);
    const rows = screen.getAllByRole("row");
    // header + five dates
    expect(rows).toHaveLength(6);
    expect(within(rows[5]).getByText("2024-02-09")).toBeInTheDocument();
    expect(within(rows[5]).getByText("159.00")).toBeInTheDocument();
  });

  it("asks for a selection once every company is deselected", () => {
    render(<MarketPage table={makeTable(40)} />);
    for (const symbol of ["NVDA", "KO", "TSLA", "JPM"]) {
      fireEvent.click(screen.getByRole("button", { name: symbol }));
    }
    expect(screen.getByText("Select at least one company to display.")).toBeInTheDocument();
    expect(screen.queryByText("Latest Closing Prices")).not.toBeInTheDocument();
  });
});

describe("MacroPage", () => {
  it("renders the FX and rate sections", () => {
    render(<MacroPage table={makeTable(40)} thresholds={DEFAULT_THRESHOLDS} />);
    expect(screen.getByRole("heading", { name: "FX & Rates" })).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "USD / MXN" })).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "USD / EUR" })).toBeInTheDocument();
    expect(screen.getByRole("heading", { name: "Rate Comparison: CETES vs US Treasury" })).toBeInTheDocument();
  });
});

describe("InsightsPage", () => {
  it("ranks the most volatile stock first", () => {
    render(<InsightsPage table={makeTable(10)} />);
    const rows = screen.getAllByRole("row");
    expect(rows).toHaveLength(13);
    // Lowest price level with the same daily step moves the most.
    expect(within(rows[1]).getByText("AAPL")).toBeInTheDocument();
    expect(within(rows[12]).getByText("PFE")).toBeInTheDocument();
  });

  it("shows n/a for every volatility on a single-row window", () => {
    render(<InsightsPage table={makeTable(1)} />);
    expect(screen.getAllByText("n/a")).toHaveLength(12);
  });
});
