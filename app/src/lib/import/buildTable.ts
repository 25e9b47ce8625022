import type { CellValue, Column, ColumnKind, RawTable, Table } from "./types";

/** Maps any reader output onto a scalar cell. */
export const normalizeCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    return value.trim() === "" ? null : value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return new TextDecoder().decode(value);
  }
  return JSON.stringify(value);
};

export const normalizeHeader = (value: unknown, index: number): string => {
  const text = String(value ?? "").trim();
  return text.length > 0 ? text : `Column ${index + 1}`;
};

export const inferColumnKind = (values: CellValue[]): ColumnKind => {
  let sawValue = false;
  let allBoolean = true;
  let allNumber = true;
  let allInteger = true;

  values.forEach((value) => {
    if (value === null) {
      return;
    }
    sawValue = true;
    if (typeof value !== "boolean") {
      allBoolean = false;
    }
    if (typeof value !== "number") {
      allNumber = false;
      allInteger = false;
    } else if (!Number.isInteger(value)) {
      allInteger = false;
    }
  });

  if (!sawValue) {
    return "null";
  }
  if (allBoolean) {
    return "boolean";
  }
  if (allInteger) {
    return "integer";
  }
  if (allNumber) {
    return "float";
  }
  return "text";
};

export const buildColumn = (name: string, rawValues: CellValue[]): Column => {
  const values = rawValues.map((value) => normalizeCell(value));
  const kind = inferColumnKind(values);
  if (kind !== "text") {
    return { name, kind, values };
  }
  return {
    name,
    kind,
    values: values.map((value) => (value === null ? null : String(value)))
  };
};

export const buildTable = (raw: RawTable): Table => {
  const columns = raw.headers.map((header, columnIndex) =>
    buildColumn(
      header,
      raw.rows.map((row) => row[columnIndex] ?? null)
    )
  );
  return {
    columns,
    rowCount: raw.rows.length
  };
};
