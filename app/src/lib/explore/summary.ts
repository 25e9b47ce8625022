import type { Column, Table } from "../import/types";
import { isNumericColumn } from "./pipeline";

export type TableSummary = {
  rowCount: number;
  columnCount: number;
  nullRatePct: number;
  distinctRowCount: number;
};

export type HistogramBin = {
  start: number;
  end: number;
  count: number;
};

export type CorrelationMatrix = {
  columns: string[];
  values: (number | null)[][];
};

export const DEFAULT_HISTOGRAM_BINS = 20;

export const summarizeTable = (table: Table): TableSummary => {
  const cellCount = table.rowCount * table.columns.length;
  const nullCount = table.columns.reduce(
    (total, column) => total + column.values.filter((value) => value === null).length,
    0
  );

  const distinctRows = new Set<string>();
  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex += 1) {
    distinctRows.add(JSON.stringify(table.columns.map((column) => column.values[rowIndex] ?? null)));
  }

  return {
    rowCount: table.rowCount,
    columnCount: table.columns.length,
    nullRatePct: cellCount === 0 ? 0 : (nullCount / cellCount) * 100,
    distinctRowCount: distinctRows.size
  };
};

/** Equal-width bins over the observed range; the last bin includes the maximum. */
export const histogram = (column: Column, binCount = DEFAULT_HISTOGRAM_BINS): HistogramBin[] => {
  const values = column.values.filter((value): value is number => typeof value === "number");
  if (values.length === 0 || binCount < 1) {
    return [];
  }

  let min = values[0];
  let max = values[0];
  values.forEach((value) => {
    min = Math.min(min, value);
    max = Math.max(max, value);
  });

  if (min === max) {
    return [{ start: min, end: max, count: values.length }];
  }

  const width = (max - min) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, index) => ({
    start: min + index * width,
    end: index === binCount - 1 ? max : min + (index + 1) * width,
    count: 0
  }));
  values.forEach((value) => {
    const index = Math.min(Math.floor((value - min) / width), binCount - 1);
    bins[index].count += 1;
  });
  return bins;
};

const pearson = (left: Column, right: Column): number | null => {
  const xs: number[] = [];
  const ys: number[] = [];
  left.values.forEach((value, rowIndex) => {
    const other = right.values[rowIndex];
    if (typeof value === "number" && typeof other === "number") {
      xs.push(value);
      ys.push(other);
    }
  });
  if (xs.length < 2) {
    return null;
  }

  const meanX = xs.reduce((total, value) => total + value, 0) / xs.length;
  const meanY = ys.reduce((total, value) => total + value, 0) / ys.length;
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  xs.forEach((x, index) => {
    const dx = x - meanX;
    const dy = ys[index] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  });
  if (varianceX === 0 || varianceY === 0) {
    return null;
  }
  return covariance / Math.sqrt(varianceX * varianceY);
};

/** Pairwise Pearson correlation over rows where both columns are non-null. */
export const correlationMatrix = (table: Table): CorrelationMatrix => {
  const numeric = table.columns.filter(isNumericColumn);
  return {
    columns: numeric.map((column) => column.name),
    values: numeric.map((left, rowIndex) =>
      numeric.map((right, columnIndex) => {
        const value = pearson(left, right);
        return rowIndex === columnIndex && value !== null ? 1 : value;
      })
    )
  };
};
