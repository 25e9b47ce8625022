import type { CellValue, Column, ColumnKind, Table } from "../import/types";
import type {
  AggregateFunction,
  AggregateSpec,
  FilterOptions,
  FilterSpec,
  PipelineResult
} from "./types";

export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }
}

export const isNumericColumn = (column: Column): boolean =>
  column.kind === "integer" || column.kind === "float";

export const findColumn = (table: Table, name: string): Column => {
  const column = table.columns.find((candidate) => candidate.name === name);
  if (!column) {
    throw new PipelineError(`Unknown column "${name}".`);
  }
  return column;
};

const numericValues = (column: Column): number[] =>
  column.values.filter((value): value is number => typeof value === "number");

const observedRange = (column: Column): { min: number | null; max: number | null } => {
  let min: number | null = null;
  let max: number | null = null;
  numericValues(column).forEach((value) => {
    min = min === null || value < min ? value : min;
    max = max === null || value > max ? value : max;
  });
  return { min, max };
};

const distinctValues = (column: Column): CellValue[] => {
  const seen = new Set<CellValue>();
  column.values.forEach((value) => {
    if (value !== null) {
      seen.add(value);
    }
  });
  return Array.from(seen);
};

export const filterOptions = (table: Table, columnName: string): FilterOptions => {
  const column = findColumn(table, columnName);
  if (isNumericColumn(column)) {
    return { kind: "range", ...observedRange(column) };
  }
  return { kind: "set", values: distinctValues(column) };
};

/** Full observed range, or every distinct non-null value. */
export const defaultFilter = (table: Table, columnName: string): FilterSpec => {
  const options = filterOptions(table, columnName);
  if (options.kind === "range") {
    return {
      kind: "range",
      column: columnName,
      min: options.min ?? undefined,
      max: options.max ?? undefined
    };
  }
  return { kind: "set", column: columnName, values: options.values };
};

const selectRows = (table: Table, keep: boolean[]): Table => {
  const columns = table.columns.map((column) => ({
    ...column,
    values: column.values.filter((_, rowIndex) => keep[rowIndex])
  }));
  return {
    columns,
    rowCount: keep.filter(Boolean).length
  };
};

export const applyFilter = (table: Table, spec: FilterSpec): Table => {
  const column = findColumn(table, spec.column);

  if (spec.kind === "range") {
    if (!isNumericColumn(column) && column.kind !== "null") {
      throw new PipelineError(`Column "${column.name}" is not numeric; use a value filter.`);
    }
    const observed = observedRange(column);
    if (observed.min === null || observed.max === null) {
      return selectRows(table, column.values.map(() => false));
    }
    const min = spec.min ?? observed.min;
    const max = spec.max ?? observed.max;
    return selectRows(
      table,
      column.values.map((value) => typeof value === "number" && value >= min && value <= max)
    );
  }

  if (isNumericColumn(column)) {
    throw new PipelineError(`Column "${column.name}" is numeric; use a range filter.`);
  }
  const allowed = new Set<CellValue>(spec.values);
  return selectRows(
    table,
    column.values.map((value) => allowed.has(value))
  );
};

const typeRank = (value: CellValue): number => {
  if (typeof value === "boolean") {
    return 0;
  }
  if (typeof value === "number") {
    return 1;
  }
  return 2;
};

/** Ascending key order with the null group last. */
export const compareGroupKeys = (a: CellValue, b: CellValue): number => {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : 1;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a ? 1 : -1;
  }
  return typeRank(a) - typeRank(b);
};

const reduce = (fn: AggregateFunction, values: number[]): number | null => {
  switch (fn) {
    case "count":
      return values.length;
    case "sum":
      return values.reduce((total, value) => total + value, 0);
    case "mean":
      return values.length === 0
        ? null
        : values.reduce((total, value) => total + value, 0) / values.length;
    case "max":
      return values.length === 0
        ? null
        : values.reduce((best, value) => (value > best ? value : best), values[0]);
    case "min":
      return values.length === 0
        ? null
        : values.reduce((best, value) => (value < best ? value : best), values[0]);
  }
};

const resultKind = (fn: AggregateFunction, target: Column): ColumnKind => {
  if (fn === "count") {
    return "integer";
  }
  if (fn === "mean") {
    return "float";
  }
  return target.kind === "integer" ? "integer" : "float";
};

export const aggregateColumnName = (spec: AggregateSpec): string =>
  spec.groupBy === spec.target ? `${spec.target}_${spec.fn}` : spec.target;

/**
 * Groups the table by one column and reduces one numeric column per group.
 * Returns null when the target column is not numeric.
 */
export const aggregate = (table: Table, spec: AggregateSpec): Table | null => {
  const groupColumn = findColumn(table, spec.groupBy);
  const targetColumn = findColumn(table, spec.target);
  if (!isNumericColumn(targetColumn)) {
    return null;
  }

  const groups = new Map<CellValue, number[]>();
  groupColumn.values.forEach((key, rowIndex) => {
    const bucket = groups.get(key) ?? [];
    const value = targetColumn.values[rowIndex];
    if (typeof value === "number") {
      bucket.push(value);
    }
    groups.set(key, bucket);
  });

  const keys = Array.from(groups.keys()).sort(compareGroupKeys);
  return {
    columns: [
      { name: groupColumn.name, kind: groupColumn.kind, values: keys },
      {
        name: aggregateColumnName(spec),
        kind: resultKind(spec.fn, targetColumn),
        values: keys.map((key) => reduce(spec.fn, groups.get(key) ?? []))
      }
    ],
    rowCount: keys.length
  };
};

export const runPipeline = (
  table: Table,
  filter: FilterSpec,
  aggregateSpec?: AggregateSpec | null
): PipelineResult => {
  const filtered = applyFilter(table, filter);
  return {
    filtered,
    grouped: aggregateSpec ? aggregate(filtered, aggregateSpec) : null
  };
};

/** Groups by the first column and aggregates the first numeric column, when there is one. */
export const defaultAggregate = (table: Table): AggregateSpec | null => {
  const first = table.columns[0];
  if (!first) {
    return null;
  }
  const target = table.columns.find(isNumericColumn) ?? first;
  return { groupBy: first.name, target: target.name, fn: "sum" };
};
