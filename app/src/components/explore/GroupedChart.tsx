import {
  Area,
  AreaChart,
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  Legend,
  Line,
  LineChart,
  Pie,
  PieChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis
} from "recharts";
import type { ChartType } from "../../lib/explore/types";
import type { Table } from "../../lib/import/types";
import { formatCell } from "./DataTable";

export const COLOR_PALETTE = ["#2563eb", "#16a34a", "#f97316", "#9333ea", "#dc2626", "#0891b2"];

type ChartPoint = {
  label: string;
  value: number;
};

type GroupedChartProps = {
  grouped: Table;
  chartType: ChartType;
};

export const toChartPoints = (grouped: Table): ChartPoint[] => {
  const [keyColumn, valueColumn] = grouped.columns;
  if (!keyColumn || !valueColumn) {
    return [];
  }
  return keyColumn.values.map((key, index) => {
    const value = valueColumn.values[index];
    return {
      label: key === null ? "(empty)" : formatCell(key),
      value: typeof value === "number" ? value : 0
    };
  });
};

export const GroupedChart = ({ grouped, chartType }: GroupedChartProps) => {
  const data = toChartPoints(grouped);
  const valueName = grouped.columns[1]?.name ?? "value";

  const renderChart = () => {
    if (chartType === "pie") {
      return (
        <PieChart>
          <Pie data={data} dataKey="value" nameKey="label" outerRadius={110}>
            {data.map((point, index) => (
              <Cell key={`${point.label}-${index}`} fill={COLOR_PALETTE[index % COLOR_PALETTE.length]} />
            ))}
          </Pie>
          <Tooltip />
          <Legend />
        </PieChart>
      );
    }
    if (chartType === "line") {
      return (
        <LineChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" tick={{ fontSize: 11 }} />
          <YAxis tick={{ fontSize: 11 }} />
          <Tooltip />
          <Line type="monotone" dataKey="value" name={valueName} stroke={COLOR_PALETTE[0]} />
        </LineChart>
      );
    }
    if (chartType === "area") {
      return (
        <AreaChart data={data}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" tick={{ fontSize: 11 }} />
          <YAxis tick={{ fontSize: 11 }} />
          <Tooltip />
          <Area
            type="monotone"
            dataKey="value"
            name={valueName}
            stroke={COLOR_PALETTE[0]}
            fill={COLOR_PALETTE[0]}
            fillOpacity={0.25}
          />
        </AreaChart>
      );
    }
    return (
      <BarChart data={data}>
        <CartesianGrid strokeDasharray="3 3" />
        <XAxis dataKey="label" tick={{ fontSize: 11 }} />
        <YAxis tick={{ fontSize: 11 }} />
        <Tooltip />
        <Bar dataKey="value" name={valueName} fill={COLOR_PALETTE[0]} />
      </BarChart>
    );
  };

  return (
    <div className="chart-box">
      <ResponsiveContainer width="100%" height={300}>
        {renderChart()}
      </ResponsiveContainer>
    </div>
  );
};
