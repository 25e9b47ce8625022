import {
  aggregateFunctions,
  chartTypes,
  type AggregateFunction,
  type AggregateSpec,
  type ChartType
} from "../../lib/explore/types";
import type { Table } from "../../lib/import/types";
import { DataTable } from "./DataTable";
import { GroupedChart } from "./GroupedChart";

type AggregatePanelProps = {
  table: Table;
  spec: AggregateSpec;
  onSpecChange: (next: AggregateSpec) => void;
  chartType: ChartType;
  onChartTypeChange: (next: ChartType) => void;
  grouped: Table | null;
};

const isAggregateFunction = (value: string): value is AggregateFunction =>
  aggregateFunctions.some((fn) => fn === value);

const isChartType = (value: string): value is ChartType =>
  chartTypes.some((type) => type === value);

export const AggregatePanel = ({
  table,
  spec,
  onSpecChange,
  chartType,
  onChartTypeChange,
  grouped
}: AggregatePanelProps) => {
  const columnOptions = table.columns.map((column) => (
    <option key={column.name} value={column.name}>
      {column.name}
    </option>
  ));

  return (
    <div className="aggregate-panel">
      <div className="control-row">
        <label className="field">
          <span>Group by column</span>
          <select
            value={spec.groupBy}
            onChange={(event) => onSpecChange({ ...spec, groupBy: event.target.value })}
          >
            {columnOptions}
          </select>
        </label>
        <label className="field">
          <span>Aggregate column</span>
          <select
            value={spec.target}
            onChange={(event) => onSpecChange({ ...spec, target: event.target.value })}
          >
            {columnOptions}
          </select>
        </label>
        <label className="field">
          <span>Aggregation function</span>
          <select
            value={spec.fn}
            onChange={(event) => {
              const value = event.target.value;
              if (isAggregateFunction(value)) {
                onSpecChange({ ...spec, fn: value });
              }
            }}
          >
            {aggregateFunctions.map((fn) => (
              <option key={fn} value={fn}>
                {fn}
              </option>
            ))}
          </select>
        </label>
        <label className="field">
          <span>Chart type</span>
          <select
            value={chartType}
            onChange={(event) => {
              const value = event.target.value;
              if (isChartType(value)) {
                onChartTypeChange(value);
              }
            }}
          >
            {chartTypes.map((type) => (
              <option key={type} value={type}>
                {type}
              </option>
            ))}
          </select>
        </label>
      </div>
      {grouped && (
        <div className="aggregate-result">
          <DataTable table={grouped} caption="Grouped result" />
          <GroupedChart grouped={grouped} chartType={chartType} />
        </div>
      )}
    </div>
  );
};
