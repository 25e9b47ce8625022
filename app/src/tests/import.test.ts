import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { buildColumn, buildTable, normalizeCell } from "../lib/import/buildTable";
import { FormatError } from "../lib/import/errors";
import { parseCsvText } from "../lib/import/parseCsv";
import { parseJsonRecords } from "../lib/import/parseJson";
import { parseSpreadsheet } from "../lib/import/parseXlsx";

describe("import parsing", () => {
  it("parses CSV with comma delimiter", () => {
    const table = parseCsvText("time,value\n0,1\n1,2");

    expect(table.headers).toEqual(["time", "value"]);
    expect(table.rows).toEqual([
      [0, 1],
      [1, 2]
    ]);
  });

  it("parses CSV with semicolon delimiter", () => {
    const table = parseCsvText("t;signal\r\n0;3.5\r\n1;4.1\r\n");

    expect(table.headers).toEqual(["t", "signal"]);
    expect(table.rows).toEqual([
      [0, 3.5],
      [1, 4.1]
    ]);
  });

  it("handles quoted fields, escaped quotes and a byte order mark", () => {
    const table = parseCsvText('\uFEFFname,note\n"Smith, J","said ""hi"""\n');

    expect(table.headers).toEqual(["name", "note"]);
    expect(table.rows).toEqual([["Smith, J", 'said "hi"']]);
  });

  it("turns blanks into null and true/false into booleans", () => {
    const table = parseCsvText("flag,n\nTRUE,\nfalse,3");

    expect(table.rows).toEqual([
      [true, null],
      [false, 3]
    ]);
  });

  it("reads missing-value markers as null", () => {
    const raw = parseCsvText("g,v\na,1\na,NA\nb,5\nb,nan\nc,N/A\nc,NULL");

    expect(raw.rows.map((row) => row[1])).toEqual([1, null, 5, null, null, null]);
    expect(buildTable(raw).columns[1]).toEqual({
      name: "v",
      kind: "integer",
      values: [1, null, 5, null, null, null]
    });
  });

  it("accepts signed numbers and a bare leading or trailing point", () => {
    const table = parseCsvText("x\n.5\n5.\n+5\n-.25\n1e3");

    expect(table.rows).toEqual([[0.5], [5], [5], [-0.25], [1000]]);
  });

  it("names blank headers by position", () => {
    expect(parseCsvText("a,,c\n1,2,3").headers).toEqual(["a", "Column 2", "c"]);
  });

  it("rejects malformed CSV", () => {
    expect(() => parseCsvText("a\n\"open")).toThrow(FormatError);
    expect(() => parseCsvText("a,b\n1,2,3")).toThrow("CSV row has 3 fields, expected 2.");
    expect(() => parseCsvText("\n  \n")).toThrow("CSV appears to be empty.");
  });

  it("parses XLSX first sheet", () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ["time", "value"],
      [0, 10],
      [1, 12]
    ]);
    const other = XLSX.utils.aoa_to_sheet([["ignored"], [1]]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, "Run1");
    XLSX.utils.book_append_sheet(workbook, other, "Run2");
    const buffer: ArrayBuffer = XLSX.write(workbook, { type: "array", bookType: "xlsx" });

    const table = parseSpreadsheet(buffer);

    expect(table.sheetName).toBe("Run1");
    expect(table.headers).toEqual(["time", "value"]);
    expect(table.rows).toEqual([
      [0, 10],
      [1, 12]
    ]);
  });

  it("parses an array of JSON records in first-seen key order", () => {
    const table = parseJsonRecords('[{"a":1,"b":"x"},{"b":"y","c":true}]');

    expect(table.headers).toEqual(["a", "b", "c"]);
    expect(table.rows).toEqual([
      [1, "x", null],
      [null, "y", true]
    ]);
  });

  it("parses a JSON object of columns", () => {
    const table = parseJsonRecords('{"a":[1,2],"b":{"0":"x","1":"y"}}');

    expect(table.headers).toEqual(["a", "b"]);
    expect(table.rows).toEqual([
      [1, "x"],
      [2, "y"]
    ]);
  });

  it("rejects JSON that is not tabular", () => {
    expect(() => parseJsonRecords("{not json")).toThrow(FormatError);
    expect(() => parseJsonRecords("42")).toThrow(
      "JSON must be an array of records or an object of columns."
    );
    expect(() => parseJsonRecords("[1]")).toThrow("JSON record 0 is not an object.");
  });
});

describe("table building", () => {
  it("infers one kind per column", () => {
    const table = buildTable(parseCsvText("id,price,label,flag,empty\n1,2.5,x,true,\n2,3,y,false,"));

    expect(table.rowCount).toBe(2);
    expect(table.columns.map((column) => column.kind)).toEqual([
      "integer",
      "float",
      "text",
      "boolean",
      "null"
    ]);
    expect(table.columns[1].values).toEqual([2.5, 3]);
    expect(table.columns[4].values).toEqual([null, null]);
  });

  it("stores mixed columns as text", () => {
    expect(buildColumn("code", [1, "A1", null])).toEqual({
      name: "code",
      kind: "text",
      values: ["1", "A1", null]
    });
  });

  it("normalizes reader values onto cells", () => {
    expect(normalizeCell(Number.NaN)).toBeNull();
    expect(normalizeCell(BigInt(7))).toBe(7);
    expect(normalizeCell("   ")).toBeNull();
    expect(normalizeCell(new Date("2024-03-01T00:00:00.000Z"))).toBe("2024-03-01T00:00:00.000Z");
    expect(normalizeCell({ nested: 1 })).toBe('{"nested":1}');
  });
});
