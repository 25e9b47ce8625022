import { FormatError } from "./errors";
import { normalizeHeader } from "./buildTable";
import type { CellValue, RawTable } from "./types";

const numericPattern = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const booleanPattern = /^(true|false)$/i;
const missingMarkers = new Set([
  "NA",
  "N/A",
  "n/a",
  "#N/A",
  "<NA>",
  "NaN",
  "nan",
  "-nan",
  "null",
  "NULL"
]);

const sanitizeText = (text: string): string =>
  text.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

const parseRecords = (text: string, delimiter: string): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (char === '"') {
      const nextChar = text[index + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      record.push(current);
      current = "";
      continue;
    }

    if (char === "\n" && !inQuotes) {
      record.push(current);
      records.push(record);
      record = [];
      current = "";
      continue;
    }

    current += char;
  }

  if (inQuotes) {
    throw new FormatError("CSV contains an unterminated quoted field.", "delimited");
  }

  record.push(current);
  records.push(record);
  return records.filter((cells) => cells.some((cell) => cell.trim().length > 0));
};

const coerceCell = (value: string): CellValue => {
  const trimmed = value.trim();
  if (!trimmed || missingMarkers.has(trimmed)) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  if (booleanPattern.test(trimmed)) {
    return trimmed.toLowerCase() === "true";
  }
  return trimmed;
};

export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const firstLine = sanitized.split("\n").find((line) => line.trim().length > 0);
  if (!firstLine) {
    throw new FormatError("CSV appears to be empty.", "delimited");
  }

  const delimiter = detectDelimiter(firstLine);
  const [rawHeaders, ...records] = parseRecords(sanitized, delimiter);
  const headers = rawHeaders.map((header, index) => normalizeHeader(header, index));
  const rows = records.map((record) => {
    if (record.length > headers.length) {
      throw new FormatError(
        `CSV row has ${record.length} fields, expected ${headers.length}.`,
        "delimited"
      );
    }
    return headers.map((_, index) => coerceCell(record[index] ?? ""));
  });

  return {
    headers,
    rows
  };
};
