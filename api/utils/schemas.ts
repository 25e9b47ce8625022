import { z } from "zod";
import type { CellValue, ColumnKind } from "../../app/src/lib/import/types";

const cellSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

const matchesKind = (kind: ColumnKind, value: CellValue): boolean => {
  if (value === null) {
    return true;
  }
  switch (kind) {
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number";
    case "text":
      return typeof value === "string";
    case "boolean":
      return typeof value === "boolean";
    case "null":
      return false;
  }
};

const columnSchema = z
  .object({
    name: z.string().min(1).max(256),
    kind: z.enum(["integer", "float", "text", "boolean", "null"]),
    values: z.array(cellSchema)
  })
  .strict()
  .superRefine((column, ctx) => {
    const badIndex = column.values.findIndex((value) => !matchesKind(column.kind, value));
    if (badIndex >= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["values", badIndex],
        message: `Value does not match column kind "${column.kind}".`
      });
    }
  });

export const tableSchema = z
  .object({
    columns: z.array(columnSchema).min(1).max(1000),
    rowCount: z.number().int().min(0)
  })
  .strict()
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.columns.forEach((column, index) => {
      if (column.values.length !== table.rowCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["columns", index, "values"],
          message: `Expected ${table.rowCount} values, received ${column.values.length}.`
        });
      }
      // SQLite column names are case-insensitive
      const key = column.name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["columns", index, "name"],
          message: `Duplicate column name "${column.name}".`
        });
      }
      seen.add(key);
    });
  });

export const persistRequestSchema = z
  .object({
    name: z.string().trim().min(1),
    table: tableSchema
  })
  .strict();

export type PersistRequest = z.infer<typeof persistRequestSchema>;
