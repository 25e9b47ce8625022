import { buildTable } from "../../app/src/lib/import/buildTable";
import { canonicalizeRawTable } from "../../app/src/lib/import/canonicalize";
import { UnsupportedFileTypeError } from "../../app/src/lib/import/errors";
import { parseCsvText } from "../../app/src/lib/import/parseCsv";
import { parseJsonRecords } from "../../app/src/lib/import/parseJson";
import { parseSpreadsheet } from "../../app/src/lib/import/parseXlsx";
import type { FileKind, RawTable, Table } from "../../app/src/lib/import/types";
import { parseParquet } from "./parquet";

const extensionKinds: Record<string, FileKind> = {
  csv: "delimited",
  xlsx: "spreadsheet",
  xls: "spreadsheet",
  json: "records",
  parquet: "columnar"
};

export const fileExtension = (fileName: string): string => {
  const dot = fileName.lastIndexOf(".");
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : "";
};

export const fileKindForExtension = (extension: string): FileKind => {
  const kind = extensionKinds[extension.toLowerCase()];
  if (!kind) {
    throw new UnsupportedFileTypeError(extension);
  }
  return kind;
};

const decodeText = (bytes: Uint8Array): string => new TextDecoder("utf-8").decode(bytes);

const readRawTable = async (
  bytes: Uint8Array,
  kind: FileKind,
  extension: string
): Promise<RawTable> => {
  switch (kind) {
    case "delimited":
      return parseCsvText(decodeText(bytes));
    case "spreadsheet":
      return parseSpreadsheet(bytes, extension === "xls" ? "xls" : "xlsx");
    case "records":
      return parseJsonRecords(decodeText(bytes));
    case "columnar":
      return parseParquet(bytes);
  }
};

export type IngestResult = {
  fileKind: FileKind;
  table: Table;
};

/**
 * Parses uploaded bytes with the reader chosen by the declared extension.
 * Reader errors propagate; column names are canonicalized afterwards.
 */
export const ingestFile = async (bytes: Uint8Array, extension: string): Promise<IngestResult> => {
  const fileKind = fileKindForExtension(extension);
  const raw = await readRawTable(bytes, fileKind, extension.toLowerCase());
  return {
    fileKind,
    table: buildTable(canonicalizeRawTable(raw))
  };
};
