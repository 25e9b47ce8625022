import { loadConfig } from "./utils/config";
import { messageForError, statusForError } from "./utils/errors";
import {
  createRequestId,
  HttpError,
  jsonResponse,
  logFailure,
  logStart,
  logSuccess,
  readJsonBody,
  requestUrl,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";
import { persistRequestSchema } from "./utils/schemas";
import { persistRelation, retrieveRelation, withStore } from "./utils/store";

export const config = {
  runtime: "nodejs"
};

const retrieve = async (req: ApiRequest, res: ApiResponse, requestId: string) => {
  const name = requestUrl(req).searchParams.get("name")?.trim() ?? "";
  if (!name) {
    throw new HttpError(400, "name query parameter is required");
  }
  const table = await withStore(loadConfig().dbPath, (db) => retrieveRelation(db, name));
  logSuccess("relation", { requestId, action: "retrieve", name, rowCount: table.rowCount });
  jsonResponse(res, 200, { name, table });
};

const persist = async (req: ApiRequest, res: ApiResponse, requestId: string) => {
  const { maxUploadBytes, dbPath } = loadConfig();
  const body = await readJsonBody(req, maxUploadBytes);
  const { name, table } = persistRequestSchema.parse(body);
  await withStore(dbPath, (db) => persistRelation(db, name, table), "write");
  logSuccess("relation", { requestId, action: "persist", name, rowCount: table.rowCount });
  jsonResponse(res, 200, { name, rowCount: table.rowCount, columnCount: table.columns.length });
};

/**
 * GET /api/relation?name=<name> reads a table back.
 * POST /api/relation with `{ name, table }` replaces the table of that name.
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = createRequestId();
  const method = req.method ?? "GET";
  logStart("relation", { requestId, method });

  try {
    if (method === "GET") {
      await retrieve(req, res, requestId);
      return;
    }
    if (method === "POST" || method === "PUT") {
      await persist(req, res, requestId);
      return;
    }
    jsonResponse(res, 405, { error: "Method not allowed", requestId });
  } catch (error) {
    logFailure("relation", requestId, error);
    jsonResponse(res, statusForError(error), {
      error: messageForError(error, "Table request failed"),
      requestId
    });
  }
}
