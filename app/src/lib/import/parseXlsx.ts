import * as XLSX from "xlsx";
import { FormatError } from "./errors";
import { normalizeCell, normalizeHeader } from "./buildTable";
import type { RawTable } from "./types";

export type SpreadsheetFormat = "xlsx" | "xls";

// xlsx is a ZIP package, xls a compound file
const signatures: Record<SpreadsheetFormat, readonly number[]> = {
  xlsx: [0x50, 0x4b, 0x03, 0x04],
  xls: [0xd0, 0xcf, 0x11, 0xe0]
};

const hasSignature = (bytes: Uint8Array, signature: readonly number[]): boolean =>
  bytes.length >= signature.length && signature.every((byte, index) => bytes[index] === byte);

const readWorkbook = (data: ArrayBuffer | Uint8Array, format: SpreadsheetFormat): XLSX.WorkBook => {
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  // SheetJS falls back to CSV or HTML when it finds no workbook
  if (!hasSignature(bytes, signatures[format])) {
    throw new FormatError(`File is not a spreadsheet workbook (.${format}).`, "spreadsheet");
  }
  try {
    return XLSX.read(bytes, { type: "array", cellDates: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new FormatError(`Unable to read workbook: ${message}`, "spreadsheet", {
      cause: error
    });
  }
};

/** Reads the first worksheet; its first row is the header. */
export const parseSpreadsheet = (
  data: ArrayBuffer | Uint8Array,
  format: SpreadsheetFormat = "xlsx"
): RawTable => {
  const workbook = readWorkbook(data, format);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheetName || !sheet) {
    throw new FormatError("Workbook has no sheets.", "spreadsheet");
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    blankrows: false
  });
  const [rawHeaders = [], ...dataRows] = rows;
  const headers = Array.from(rawHeaders, (header, index) => normalizeHeader(header, index));

  return {
    sheetName,
    headers,
    rows: dataRows.map((row) => headers.map((_, index) => normalizeCell(row[index])))
  };
};
