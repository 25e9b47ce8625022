import { loadConfig } from "./utils/config";
import { messageForError, statusForError } from "./utils/errors";
import { createRequestId, jsonResponse, logFailure, type ApiRequest, type ApiResponse } from "./utils/http";
import { listRelations, withStore } from "./utils/store";

export const config = {
  runtime: "nodejs"
};

/** GET /api/relations: names of every persisted table. */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = createRequestId();

  if (req.method && req.method !== "GET") {
    jsonResponse(res, 405, { error: "Method not allowed", requestId });
    return;
  }

  try {
    const relations = await withStore(loadConfig().dbPath, listRelations);
    jsonResponse(res, 200, { relations });
  } catch (error) {
    logFailure("relations", requestId, error);
    jsonResponse(res, statusForError(error), {
      error: messageForError(error, "Unable to list tables"),
      requestId
    });
  }
}
