import type { FileKind, Table } from "../import/types";

export class ApiError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export type IngestResponse = {
  fileName: string;
  fileKind: FileKind;
  table: Table;
};

export type PersistResponse = {
  name: string;
  rowCount: number;
  columnCount: number;
};

const errorMessage = (text: string): string => {
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
      return String(parsed.error);
    }
    return text;
  } catch {
    return text;
  }
};

const handleResponse = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    const message = errorMessage(await response.text());
    throw new ApiError(message || "Request failed", response.status);
  }
  return response.json();
};

export const uploadFile = async (file: File): Promise<IngestResponse> => {
  const response = await fetch(`/api/ingest?filename=${encodeURIComponent(file.name)}`, {
    method: "POST",
    headers: { "Content-Type": "application/octet-stream" },
    body: file
  });
  return handleResponse<IngestResponse>(response);
};

export const listRelations = async (): Promise<string[]> => {
  const response = await fetch("/api/relations");
  const payload = await handleResponse<{ relations: string[] }>(response);
  return payload.relations;
};

export const fetchRelation = async (name: string): Promise<Table> => {
  const response = await fetch(`/api/relation?name=${encodeURIComponent(name)}`);
  const payload = await handleResponse<{ name: string; table: Table }>(response);
  return payload.table;
};

export const persistRelation = async (name: string, table: Table): Promise<PersistResponse> => {
  const response = await fetch("/api/relation", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ name, table })
  });
  return handleResponse<PersistResponse>(response);
};
