import { Bar, BarChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";
import { isNumericColumn } from "../../lib/explore/pipeline";
import { histogram } from "../../lib/explore/summary";
import type { Table } from "../../lib/import/types";
import { formatCell } from "./DataTable";
import { COLOR_PALETTE } from "./GroupedChart";

type HistogramGridProps = {
  table: Table;
};

export const HistogramGrid = ({ table }: HistogramGridProps) => {
  const numericColumns = table.columns.filter(isNumericColumn);
  if (numericColumns.length === 0) {
    return <p className="muted">No numeric columns to plot.</p>;
  }

  return (
    <div className="histogram-grid">
      {numericColumns.map((column, index) => {
        const data = histogram(column).map((bin) => ({
          range: `${formatCell(bin.start)}–${formatCell(bin.end)}`,
          count: bin.count
        }));
        return (
          <article key={column.name} className="chart-card">
            <h5>{column.name}</h5>
            {data.length === 0 ? (
              <p className="muted">No values.</p>
            ) : (
              <ResponsiveContainer width="100%" height={200}>
                <BarChart data={data}>
                  <CartesianGrid strokeDasharray="3 3" />
                  <XAxis dataKey="range" tick={{ fontSize: 9 }} />
                  <YAxis allowDecimals={false} tick={{ fontSize: 10 }} />
                  <Tooltip />
                  <Bar dataKey="count" name="Count" fill={COLOR_PALETTE[index % COLOR_PALETTE.length]} />
                </BarChart>
              </ResponsiveContainer>
            )}
          </article>
        );
      })}
    </div>
  );
};
