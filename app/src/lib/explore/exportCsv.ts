import type { CellValue, Table } from "../import/types";

const needsQuoting = /[",\n\r]/;

const formatField = (value: CellValue): string => {
  if (value === null) {
    return "";
  }
  const text = String(value);
  return needsQuoting.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const tableToCsv = (table: Table): string => {
  const lines = [table.columns.map((column) => formatField(column.name)).join(",")];
  for (let rowIndex = 0; rowIndex < table.rowCount; rowIndex += 1) {
    lines.push(table.columns.map((column) => formatField(column.values[rowIndex] ?? null)).join(","));
  }
  return `${lines.join("\n")}\n`;
};

export const exportFileName = (relation: string): string => `${relation}_filtered.csv`;

/** Offers the table as a browser download. */
export const downloadCsv = (table: Table, relation: string) => {
  const blob = new Blob([tableToCsv(table)], { type: "text/csv;charset=utf-8" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = exportFileName(relation);
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
};
