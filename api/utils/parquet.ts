import { ParquetReader } from "parquetjs-lite";
import { normalizeCell } from "../../app/src/lib/import/buildTable";
import type { RawTable } from "../../app/src/lib/import/types";

/** Reads every row of a parquet file; top-level fields become columns in schema order. */
export const parseParquet = async (bytes: Uint8Array): Promise<RawTable> => {
  const reader = await ParquetReader.openBuffer(Buffer.from(bytes));
  try {
    const headers = Object.keys(reader.getSchema().fields);
    const cursor = reader.getCursor();
    const rows: RawTable["rows"] = [];
    let record: Record<string, unknown> | null = null;
    while ((record = await cursor.next())) {
      const current = record;
      rows.push(headers.map((header) => normalizeCell(current[header])));
    }
    return { headers, rows };
  } finally {
    await reader.close();
  }
};
