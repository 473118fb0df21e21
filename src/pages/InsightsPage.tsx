/**
 * Three guided questions answered from the windowed table:
 * group risk, dollar vs treasury correlation, NVIDIA vs the traditional basket.
 */
import { useMemo } from "react";
import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  ComposedChart,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Scatter,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import { correlationView, relativePerformance, volatilityRanking } from "../analytics/insights";
import { COLUMNS, GROUP_LABELS, TRADITIONAL, UNIVERSE } from "../config";
import { fmtNumber } from "../lib/format";
import type { SymbolGroup, TimeSeriesTable } from "../types";

const GROUP_COLORS: Record<SymbolGroup, string> = { primary: "#8E44AD", secondary: "#27AE60" };

const FOCUS_SYMBOL = "NVDA";

export function InsightsPage({ table }: { table: TimeSeriesTable }) {
  const volatility = useMemo(() => volatilityRanking(table, UNIVERSE), [table]);
  const correlation = useMemo(() => correlationView(table, COLUMNS.longRate, COLUMNS.foreignFx), [table]);
  const performance = useMemo(() => relativePerformance(table, FOCUS_SYMBOL, TRADITIONAL), [table]);
  const lastPerformance = performance[performance.length - 1];

  return (
    <section>
      <h2 className="page-title">Data-Driven Insights</h2>

      <div className="chart-card">
        <h3>1. Which group carries more risk: Big Tech or Traditional?</h3>
        <p className="chart-caption">Annualized volatility (standard deviation of daily returns × √252).</p>
        <ResponsiveContainer width="100%" height={300}>
          <BarChart data={volatility}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="symbol" />
            <YAxis unit="%" />
            <Tooltip />
            <Bar dataKey="volatility" name="Annual volatility %">
              {volatility.map((v) => (
                <Cell key={v.symbol} fill={GROUP_COLORS[v.group]} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
        <table className="compact-table">
          <thead>
            <tr>
              <th>Ticker</th>
              <th>Group</th>
              <th>Volatility %</th>
            </tr>
          </thead>
          <tbody>
            {volatility.map((v) => (
              <tr key={v.symbol}>
                <td className="mono">{v.symbol}</td>
                <td>{GROUP_LABELS[v.group]}</td>
                <td className="mono">{fmtNumber(v.volatility)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>

      <div className="chart-card">
        <h3>2. Does dollar strength against the euro track US Treasury yields?</h3>
        <p className="chart-caption">
          US 10Y yield vs USD/EUR with an OLS trendline. Slope {fmtNumber(correlation.fit.slope, 4)}, r ={" "}
          {fmtNumber(correlation.fit.r, 3)}, R² = {fmtNumber(correlation.fit.rSquared, 3)}
        </p>
        <ResponsiveContainer width="100%" height={320}>
          <ComposedChart>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis type="number" dataKey="x" name="10Y yield" unit="%" domain={["auto", "auto"]} />
            <YAxis type="number" dataKey="y" name="USD in EUR" domain={["auto", "auto"]} />
            <Tooltip />
            <Scatter data={correlation.points} fill="#1f6feb" name="Daily close" />
            <Line data={correlation.trendline} dataKey="y" stroke="#dd6b20" dot={false} name="OLS fit" />
          </ComposedChart>
        </ResponsiveContainer>
      </div>

      <div className="chart-card">
        <h3>3. Has NVIDIA outperformed the five traditional companies combined?</h3>
        <p className="chart-caption">
          Cumulative growth, both rebased to 100 at the start of the window.
          {lastPerformance &&
            ` Latest: NVDA ${fmtNumber(lastPerformance.symbolIndex, 1)} vs Traditional ${fmtNumber(lastPerformance.groupIndex, 1)}.`}
        </p>
        <ResponsiveContainer width="100%" height={320}>
          <LineChart data={performance}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="date" minTickGap={32} />
            <YAxis domain={["auto", "auto"]} />
            <Tooltip />
            <Legend />
            <Line type="monotone" dataKey="symbolIndex" stroke="#76D7C4" dot={false} name="Index NVDA" />
            <Line type="monotone" dataKey="groupIndex" stroke="#85929E" dot={false} name="Index Traditional" />
          </LineChart>
        </ResponsiveContainer>
      </div>
    </section>
  );
}
