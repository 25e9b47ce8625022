import type { CellValue, Table } from "../import/types";

export type RangeFilter = {
  kind: "range";
  column: string;
  min?: number;
  max?: number;
};

export type SetFilter = {
  kind: "set";
  column: string;
  values: CellValue[];
};

export type FilterSpec = RangeFilter | SetFilter;

export type FilterOptions =
  | { kind: "range"; min: number | null; max: number | null }
  | { kind: "set"; values: CellValue[] };

export const aggregateFunctions = ["sum", "mean", "count", "max", "min"] as const;

export type AggregateFunction = (typeof aggregateFunctions)[number];

export type AggregateSpec = {
  groupBy: string;
  target: string;
  fn: AggregateFunction;
};

export type PipelineResult = {
  filtered: Table;
  grouped: Table | null;
};

export const chartTypes = ["bar", "line", "area", "pie"] as const;

export type ChartType = (typeof chartTypes)[number];
