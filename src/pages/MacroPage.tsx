import { useMemo } from "react";
import {
  Area,
  AreaChart,
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ReferenceLine,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";

import { toChartRows } from "../analytics/window";
import { COLUMNS } from "../config";
import type { ThresholdConfig, TimeSeriesTable } from "../types";

export function MacroPage({ table, thresholds }: { table: TimeSeriesTable; thresholds: ThresholdConfig }) {
  const rows = useMemo(
    () =>
      toChartRows(table, [COLUMNS.domesticFx, COLUMNS.foreignFx, COLUMNS.shortRate, COLUMNS.longRate]),
    [table],
  );

  return (
    <section>
      <h2 className="page-title">FX & Rates</h2>

      <div className="two-col">
        <div className="chart-card">
          <h3>USD / MXN</h3>
          <p className="chart-caption">Mexican peso trend</p>
          <ResponsiveContainer width="100%" height={280}>
            <AreaChart data={rows}>
              <CartesianGrid strokeDasharray="3 3" />
              <XAxis dataKey="date" minTickGap={32} />
              <YAxis domain={["auto", "auto"]} />
              <Tooltip />
              <Area type="monotone" dataKey={COLUMNS.domesticFx} stroke="#1f6feb" fill="#1f6feb" fillOpacity={0.2} />
              <ReferenceLine
                y={thresholds.domesticCeiling}
                stroke="red"
                strokeDasharray="6 4"
                label="Threshold"
              />
            </AreaChart>
          </ResponsiveContainer>
        </div>

        <div className="chart-card">
          <h3>USD / EUR</h3>
          <p className="chart-caption">Euros per dollar</p>
          <ResponsiveContainer width="100%" height={280}>
            <LineChart data={rows}>
              <CartesianGrid strokeDasharray="3 3" />
              <XAxis dataKey="date" minTickGap={32} />
              <YAxis domain={["auto", "auto"]} />
              <Tooltip />
              <Line type="monotone" dataKey={COLUMNS.foreignFx} stroke="#2ECC71" dot={false} strokeWidth={2} />
            </LineChart>
          </ResponsiveContainer>
        </div>
      </div>

      <div className="chart-card">
        <h3>Rate Comparison: CETES vs US Treasury</h3>
        <p className="chart-caption">Rate spread (CETES 28D is a modelled series)</p>
        <ResponsiveContainer width="100%" height={300}>
          <LineChart data={rows}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="date" minTickGap={32} />
            <YAxis unit="%" domain={["auto", "auto"]} />
            <Tooltip />
            <Legend />
            <Line type="monotone" dataKey={COLUMNS.shortRate} stroke="blue" dot={false} name="CETES 28D" />
            <Line type="monotone" dataKey={COLUMNS.longRate} stroke="orange" dot={false} name="US 10Y" />
          </LineChart>
        </ResponsiveContainer>
      </div>
    </section>
  );
}
