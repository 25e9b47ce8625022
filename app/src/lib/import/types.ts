export type CellValue = string | number | boolean | null;

export type ColumnKind = "integer" | "float" | "text" | "boolean" | "null";

export type Column = {
  name: string;
  kind: ColumnKind;
  values: CellValue[];
};

/**
 * Column-oriented table. Every column holds `rowCount` values and every
 * non-null value matches the column kind.
 */
export type Table = {
  columns: Column[];
  rowCount: number;
};

/** Row-oriented output of a format reader, before kinds are inferred. */
export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: CellValue[][];
};

export type FileKind = "delimited" | "spreadsheet" | "records" | "columnar";

export type TableRow = Record<string, CellValue>;

export const emptyTable: Table = { columns: [], rowCount: 0 };

export const tableRows = (table: Table): TableRow[] =>
  Array.from({ length: table.rowCount }, (_, rowIndex) => {
    const row: TableRow = {};
    table.columns.forEach((column) => {
      row[column.name] = column.values[rowIndex] ?? null;
    });
    return row;
  });

export const sliceTable = (table: Table, start: number, end?: number): Table => {
  const columns = table.columns.map((column) => ({
    ...column,
    values: column.values.slice(start, end)
  }));
  return {
    columns,
    rowCount: columns[0]?.values.length ?? 0
  };
};
