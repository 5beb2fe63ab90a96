import { randomUUID } from "crypto";
import { CORS_HEADERS } from "./cors.js";
import { ValidationError } from "./errors.js";
import { parsePositiveInt } from "./validators.js";

/**
 * The slice of an API Gateway proxy event the handlers read. A full
 * `APIGatewayProxyEvent` is assignable to it, and so is the request the
 * local dev server builds.
 */
export type GatewayRequest = {
  httpMethod: string;
  path?: string;
  headers?: Record<string, string | undefined> | null;
  queryStringParameters?: Record<string, string | undefined> | null;
  body?: string | null;
  isBase64Encoded?: boolean;
  requestContext?: { requestId?: string };
};

export type ApiResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

export type ResponseOptions = {
  requestId: string;
  cacheControl?: string;
  headers?: Record<string, string>;
};

export function getHeader(req: GatewayRequest, name: string): string {
  const headers = req.headers ?? {};
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === "string") return value.trim();
  }
  return "";
}

export function getRequestId(req: GatewayRequest): string {
  return getHeader(req, "x-request-id") || req.requestContext?.requestId || randomUUID();
}

export function getQueryParam(req: GatewayRequest, ...names: string[]): string | undefined {
  const params = req.queryStringParameters ?? {};
  for (const name of names) {
    const value = params[name];
    if (value !== undefined && value.trim() !== "") return value;
  }
  return undefined;
}

export function requireStudentId(req: GatewayRequest): number {
  const raw = getQueryParam(req, "id_aluno", "student_id");
  if (raw === undefined) {
    throw new ValidationError("missing_student_id", "Query parameter 'id_aluno' is required.");
  }

  const studentId = parsePositiveInt(raw);
  if (studentId === null) {
    throw new ValidationError("invalid_student_id", "Query parameter 'id_aluno' must be a positive integer.");
  }
  return studentId;
}

export function readJsonBody(req: GatewayRequest): Record<string, unknown> {
  if (req.body === undefined || req.body === null || req.body === "") {
    throw new ValidationError("empty_body", "Request body is empty.");
  }

  const raw = req.isBase64Encoded ? Buffer.from(req.body, "base64").toString("utf8") : req.body;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError("invalid_json", "Request body is not valid JSON.");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ValidationError("invalid_body", "Request body must be a JSON object.");
  }

  return Object.fromEntries(Object.entries(parsed));
}

export function buildHeaders(options: ResponseOptions): Record<string, string> {
  return {
    ...CORS_HEADERS,
    "Content-Type": "application/json",
    "Cache-Control": options.cacheControl ?? "no-store",
    "X-Content-Type-Options": "nosniff",
    "X-Request-Id": options.requestId,
    ...options.headers
  };
}

export function jsonResponse(statusCode: number, payload: unknown, options: ResponseOptions): ApiResponse {
  return {
    statusCode,
    headers: buildHeaders(options),
    body: JSON.stringify(payload)
  };
}
