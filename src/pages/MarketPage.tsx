import { useMemo, useState } from "react";
import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import { normalizeBase100 } from "../analytics/insights";
import { SymbolPicker } from "../components/SymbolPicker";
import { DEFAULT_SELECTION } from "../config";
import type { TimeSeriesTable } from "../types";

const LINE_COLORS = ["#1f6feb", "#dd6b20", "#0f9d58", "#8e44ad", "#c0392b", "#16a085", "#f1c40f", "#34495e"];

function buildIndexRows(table: TimeSeriesTable, symbols: string[]) {
  const indexed = normalizeBase100(table, symbols);
  return table.dates.map((date, i) => {
    const row: Record<string, string | number> = { date };
    for (const symbol of symbols) {
      const series = indexed[symbol];
      if (series) row[symbol] = series[i];
    }
    return row;
  });
}

export function MarketPage({ table }: { table: TimeSeriesTable }) {
  const [selected, setSelected] = useState<string[]>(DEFAULT_SELECTION);

  const indexRows = useMemo(() => buildIndexRows(table, selected), [table, selected]);
  const tailStart = Math.max(0, table.dates.length - 5);
  const tailDates = table.dates.slice(tailStart);

  return (
    <section>
      <h2 className="page-title">Historical Price Analysis</h2>
      <SymbolPicker selected={selected} onChange={setSelected} />

      {selected.length === 0 ? (
        <div className="banner banner-info">Select at least one company to display.</div>
      ) : (
        <>
          <div className="chart-card">
            <h3>Relative Performance (Base 100 = start of period)</h3>
            <ResponsiveContainer width="100%" height={360}>
              <LineChart data={indexRows}>
                <CartesianGrid strokeDasharray="3 3" />
                <XAxis dataKey="date" minTickGap={32} />
                <YAxis domain={["auto", "auto"]} />
                <Tooltip />
                <Legend />
                {selected.map((symbol, i) => (
                  <Line
                    key={symbol}
                    type="monotone"
                    dataKey={symbol}
                    stroke={LINE_COLORS[i % LINE_COLORS.length]}
                    dot={false}
                    strokeWidth={1.5}
                  />
                ))}
              </LineChart>
            </ResponsiveContainer>
          </div>

          <div className="table-card">
            <h3>Latest Closing Prices</h3>
            <table>
              <thead>
                <tr>
                  <th>Date</th>
                  {selected.map((symbol) => (
                    <th key={symbol}>{symbol}</th>
                  ))}
                </tr>
              </thead>
              <tbody>
                {tailDates.map((date, offset) => (
                  <tr key={date}>
                    <td className="mono">{date}</td>
                    {selected.map((symbol) => (
                      <td key={symbol} className="mono">
                        {table.columns[symbol]?.[tailStart + offset]?.toFixed(2) ?? "—"}
                      </td>
                    ))}
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </>
      )}
    </section>
  );
}
