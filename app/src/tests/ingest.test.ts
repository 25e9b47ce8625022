// @vitest-environment node
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ParquetSchema, ParquetWriter } from "parquetjs-lite";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fileExtension, fileKindForExtension, ingestFile } from "../../../api/utils/ingest";
import { FormatError, UnsupportedFileTypeError } from "../lib/import/errors";

describe("file kind dispatch", () => {
  it("takes the lowercased text after the last dot", () => {
    expect(fileExtension("Report.Final.XLSX")).toBe("xlsx");
    expect(fileExtension("README")).toBe("");
  });

  it("maps extensions to readers", () => {
    expect(fileKindForExtension("csv")).toBe("delimited");
    expect(fileKindForExtension("XLS")).toBe("spreadsheet");
    expect(fileKindForExtension("json")).toBe("records");
    expect(fileKindForExtension("parquet")).toBe("columnar");
    expect(() => fileKindForExtension("txt")).toThrow(UnsupportedFileTypeError);
    expect(() => fileKindForExtension("")).toThrow('Unsupported file type "(none)".');
  });
});

describe("ingestFile", () => {
  it("parses CSV and canonicalizes column names", async () => {
    const result = await ingestFile(Buffer.from("First Name,Age\nAda,36\nGrace,\n"), "csv");

    expect(result).toEqual({
      fileKind: "delimited",
      table: {
        columns: [
          { name: "first_name", kind: "text", values: ["Ada", "Grace"] },
          { name: "age", kind: "integer", values: [36, null] }
        ],
        rowCount: 2
      }
    });
  });

  it("parses spreadsheets", async () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["Sample ID", "Yield"],
      ["s1", 0.5],
      ["s2", 0.75]
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Results");
    const bytes: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });

    const result = await ingestFile(bytes, "xlsx");

    expect(result.fileKind).toBe("spreadsheet");
    expect(result.table.columns).toEqual([
      { name: "sample_id", kind: "text", values: ["s1", "s2"] },
      { name: "yield", kind: "float", values: [0.5, 0.75] }
    ]);
  });

  it("rejects bytes that are not a workbook of the declared kind", async () => {
    const csv = ingestFile(Buffer.from("city,visits\nOslo,3\nLima,5\n"), "xlsx");
    await expect(csv).rejects.toBeInstanceOf(FormatError);
    await expect(csv).rejects.toThrow("File is not a spreadsheet workbook (.xlsx).");

    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([["a"], [1]]), "Sheet1");
    const xlsx: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    await expect(ingestFile(xlsx, "XLS")).rejects.toThrow(
      "File is not a spreadsheet workbook (.xls)."
    );
  });

  it("parses JSON records", async () => {
    const result = await ingestFile(Buffer.from('[{"City":"Oslo","Open":true}]'), "json");

    expect(result.table.columns).toEqual([
      { name: "city", kind: "text", values: ["Oslo"] },
      { name: "open", kind: "boolean", values: [true] }
    ]);
  });

  it("propagates reader errors", async () => {
    await expect(ingestFile(Buffer.from("[1, 2]"), "json")).rejects.toBeInstanceOf(FormatError);
    await expect(ingestFile(Buffer.from("a,b"), "txt")).rejects.toBeInstanceOf(
      UnsupportedFileTypeError
    );
  });

  describe("parquet", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "explorer-parquet-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("reads every row with fields in schema order", async () => {
      const path = join(dir, "orders.parquet");
      const schema = new ParquetSchema({
        Product: { type: "UTF8" },
        Quantity: { type: "INT32" },
        Price: { type: "DOUBLE", optional: true }
      });
      const writer = await ParquetWriter.openFile(schema, path);
      await writer.appendRow({ Product: "bolt", Quantity: 4, Price: 0.25 });
      await writer.appendRow({ Product: "nut", Quantity: 10 });
      await writer.close();

      const result = await ingestFile(readFileSync(path), "parquet");

      expect(result.fileKind).toBe("columnar");
      expect(result.table).toEqual({
        columns: [
          { name: "product", kind: "text", values: ["bolt", "nut"] },
          { name: "quantity", kind: "integer", values: [4, 10] },
          { name: "price", kind: "float", values: [0.25, null] }
        ],
        rowCount: 2
      });
    });
  });
});
