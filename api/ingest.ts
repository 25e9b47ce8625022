import { loadConfig } from "./utils/config";
import { messageForError, statusForError } from "./utils/errors";
import {
  createRequestId,
  HttpError,
  jsonResponse,
  logFailure,
  logStart,
  logSuccess,
  readRequestBytes,
  requestUrl,
  type ApiRequest,
  type ApiResponse
} from "./utils/http";
import { fileExtension, fileKindForExtension, ingestFile, type IngestResult } from "./utils/ingest";

export const config = {
  runtime: "nodejs"
};

// any reader failure is malformed content, whatever the library throws
const parseUpload = async (bytes: Uint8Array, extension: string): Promise<IngestResult> => {
  try {
    return await ingestFile(bytes, extension);
  } catch (error) {
    if (statusForError(error) === 500) {
      throw new HttpError(422, messageForError(error, "Unable to parse file"));
    }
    throw error;
  }
};

/**
 * POST /api/ingest?filename=<name> with the raw file as body.
 * Responds with the parsed, canonicalized table.
 */
export default async function handler(req: ApiRequest, res: ApiResponse) {
  const requestId = createRequestId();

  if (req.method && req.method !== "POST") {
    jsonResponse(res, 405, { error: "Method not allowed", requestId });
    return;
  }

  const fileName = requestUrl(req).searchParams.get("filename")?.trim() ?? "";
  logStart("ingest", { requestId, fileName });

  try {
    if (!fileName) {
      throw new HttpError(400, "filename query parameter is required");
    }
    const extension = fileExtension(fileName);
    fileKindForExtension(extension);

    const { maxUploadBytes } = loadConfig();
    const bytes = await readRequestBytes(req, maxUploadBytes);
    if (bytes.byteLength === 0) {
      throw new HttpError(400, "Uploaded file is empty");
    }

    const result = await parseUpload(bytes, extension);

    logSuccess("ingest", {
      requestId,
      fileName,
      fileKind: result.fileKind,
      rowCount: result.table.rowCount,
      columnCount: result.table.columns.length
    });
    jsonResponse(res, 200, { fileName, fileKind: result.fileKind, table: result.table });
  } catch (error) {
    logFailure("ingest", requestId, error);
    jsonResponse(res, statusForError(error), {
      error: messageForError(error, "Ingest failed"),
      requestId
    });
  }
}
