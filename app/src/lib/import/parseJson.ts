import { FormatError } from "./errors";
import { normalizeCell } from "./buildTable";
import type { RawTable } from "./types";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fromRecords = (records: unknown[]): RawTable => {
  const headers: string[] = [];
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (!isRecord(record)) {
      throw new FormatError(`JSON record ${index} is not an object.`, "records");
    }
    Object.keys(record).forEach((key) => {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    });
  });

  return {
    headers,
    rows: records.map((record) =>
      headers.map((header) => (isRecord(record) ? normalizeCell(record[header]) : null))
    )
  };
};

// { column: [v0, v1] } or { column: { "0": v0, "1": v1 } }
const fromColumns = (columns: JsonRecord): RawTable => {
  const headers = Object.keys(columns);
  const indexKeys: string[] = [];
  const seenKeys = new Set<string>();

  const columnValues = headers.map((header) => {
    const column = columns[header];
    if (Array.isArray(column)) {
      return (key: string) => column[Number(key)];
    }
    if (isRecord(column)) {
      Object.keys(column).forEach((key) => {
        if (!seenKeys.has(key)) {
          seenKeys.add(key);
          indexKeys.push(key);
        }
      });
      return (key: string) => column[key];
    }
    throw new FormatError(`JSON column "${header}" is neither an array nor an object.`, "records");
  });

  const rowCount = Math.max(
    indexKeys.length,
    ...headers.map((header) => {
      const column = columns[header];
      return Array.isArray(column) ? column.length : 0;
    })
  );
  const keys = Array.from({ length: rowCount }, (_, index) => indexKeys[index] ?? String(index));

  return {
    headers,
    rows: keys.map((key) => columnValues.map((read) => normalizeCell(read(key))))
  };
};

export const parseJsonRecords = (text: string): RawTable => {
  let content: unknown;
  try {
    content = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Invalid JSON: ${message}`, "records", { cause: error });
  }

  if (Array.isArray(content)) {
    return fromRecords(content);
  }
  if (isRecord(content)) {
    return fromColumns(content);
  }
  throw new FormatError("JSON must be an array of records or an object of columns.", "records");
};
