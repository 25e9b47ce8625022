import { randomUUID } from "node:crypto";

/** The subset of `IncomingMessage` the handlers read. */
export type ApiRequest = AsyncIterable<Uint8Array | string> & {
  method?: string;
  url?: string;
  body?: unknown;
};

/** The subset of `ServerResponse` the handlers write. */
export type ApiResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
};

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export class PayloadTooLargeError extends HttpError {
  constructor(limit: number) {
    super(413, `Upload exceeds the ${limit} byte limit.`);
    this.name = "PayloadTooLargeError";
  }
}

export const jsonResponse = (res: ApiResponse, statusCode: number, payload: unknown) => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(payload));
};

export const createRequestId = (): string => {
  try {
    return randomUUID();
  } catch {
    return `req-${Math.random().toString(36).slice(2, 10)}`;
  }
};

export const requestUrl = (req: ApiRequest): URL => new URL(req.url ?? "/", "http://localhost");

const withinLimit = (bytes: Uint8Array, limit: number): Uint8Array => {
  if (bytes.byteLength > limit) {
    throw new PayloadTooLargeError(limit);
  }
  return bytes;
};

/**
 * Collects the raw body. Frameworks that pre-parse bodies leave them on
 * `req.body`; otherwise the stream is drained up to `limit` bytes.
 */
export const readRequestBytes = async (req: ApiRequest, limit: number): Promise<Uint8Array> => {
  if (req.body instanceof Uint8Array) {
    return withinLimit(req.body, limit);
  }
  if (typeof req.body === "string") {
    return withinLimit(Buffer.from(req.body), limit);
  }

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : Buffer.from(chunk);
    total += buffer.byteLength;
    if (total > limit) {
      throw new PayloadTooLargeError(limit);
    }
    chunks.push(buffer);
  }
  return Buffer.concat(chunks);
};

export const readJsonBody = async (req: ApiRequest, limit: number): Promise<unknown> => {
  if (typeof req.body === "object" && req.body !== null && !(req.body instanceof Uint8Array)) {
    return req.body;
  }
  const bytes = await readRequestBytes(req, limit);
  if (bytes.byteLength === 0) {
    return null;
  }
  try {
    return JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch {
    throw new HttpError(400, "Request body is not valid JSON.");
  }
};

export const logStart = (scope: string, payload: Record<string, unknown>) => {
  console.info(`[${scope}] start`, payload);
};

export const logSuccess = (scope: string, payload: Record<string, unknown>) => {
  console.info(`[${scope}] success`, payload);
};

export const logFailure = (scope: string, requestId: string, error: unknown) => {
  const payload =
    error instanceof Error
      ? { message: error.message, stack: error.stack }
      : { message: String(error), stack: undefined };
  console.error(`[${scope}] fail`, { requestId, ...payload });
};
