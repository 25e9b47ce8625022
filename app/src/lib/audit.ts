export type AuditEntry = {
  id: string;
  ts: string;
  type: AuditEntryType;
  payload: Record<string, unknown>;
};

export type AuditEntryType =
  | "FILE_UPLOADED"
  | "FILE_PARSED"
  | "FILE_PARSE_FAILED"
  | "TABLE_LOADED"
  | "TABLE_LOAD_FAILED"
  | "TABLE_OPENED"
  | "TABLE_OPEN_FAILED"
  | "EXPORT_DOWNLOADED";

export const createAuditEntry = (
  type: AuditEntryType,
  payload: Record<string, unknown>,
  now = new Date()
): AuditEntry => ({
  id: `audit-${Math.random().toString(36).slice(2, 10)}`,
  ts: now.toISOString(),
  type,
  payload
});

const text = (value: unknown, fallback: string): string =>
  typeof value === "string" && value.length > 0 ? value : fallback;

const count = (value: unknown): number => (typeof value === "number" ? value : 0);

export const formatAuditEntry = (entry: AuditEntry): string => {
  const { payload } = entry;
  switch (entry.type) {
    case "FILE_UPLOADED":
      return `File ${text(payload.fileName, "upload")} queued for parsing.`;
    case "FILE_PARSED":
      return `Parsed ${text(payload.fileName, "file")}: ${count(payload.rowCount)} rows, ${count(payload.columnCount)} columns.`;
    case "TABLE_LOADED":
      return `Table '${text(payload.name, "table")}' loaded into the database (${count(payload.rowCount)} rows).`;
    case "TABLE_OPENED":
      return `Opened table '${text(payload.name, "table")}' (${count(payload.rowCount)} rows).`;
    case "EXPORT_DOWNLOADED":
      return `Downloaded ${text(payload.fileName, "export")} (${count(payload.rowCount)} rows).`;
    case "FILE_PARSE_FAILED":
    case "TABLE_LOAD_FAILED":
    case "TABLE_OPEN_FAILED":
      return text(payload.message, "Request failed.");
  }
};

export const formatTimestamp = (value: string): string => {
  const date = new Date(value);
  if (Number.isNaN(date.valueOf())) {
    return value;
  }
  return `${date.toLocaleDateString("en-GB")} ${date.toLocaleTimeString("en-GB", {
    hour: "2-digit",
    minute: "2-digit"
  })}`;
};
