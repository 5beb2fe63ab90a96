import type { Logger } from "pino";
import { isPreflight, preflightResponse } from "./cors.js";
import { AppError, MethodNotAllowedError, buildApiErrorPayload } from "./errors.js";
import { getRequestId, jsonResponse, type ApiResponse, type GatewayRequest } from "./http.js";
import { createRequestLogger, sanitizeError, sanitizeMeta } from "./logger.js";

export type ApiHandlerContext = {
  req: GatewayRequest;
  method: string;
  requestId: string;
  log: Logger;
};

/** What a handler body returns; `withApiHandler` turns it into the envelope. */
export type ApiResult = {
  statusCode: number;
  body: unknown;
};

export type ApiHandlerOptions = {
  logger: Logger;
  methods?: string[];
  cacheControl?: string;
};

export type ApiHandler = (req: GatewayRequest) => Promise<ApiResponse>;

function normalizeMethod(value: string): string {
  return String(value || "").trim().toUpperCase();
}

export function withApiHandler(
  handler: (ctx: ApiHandlerContext) => Promise<ApiResult>,
  options: ApiHandlerOptions
): ApiHandler {
  const allowedMethods = Array.isArray(options.methods)
    ? options.methods.map(normalizeMethod).filter(Boolean)
    : null;

  return async (req: GatewayRequest): Promise<ApiResponse> => {
    if (isPreflight(req)) return preflightResponse();

    const requestId = getRequestId(req);
    const log = createRequestLogger(options.logger, req, requestId);
    const method = normalizeMethod(req.httpMethod);
    const startedAt = Date.now();

    let response: ApiResponse;
    try {
      if (allowedMethods && !allowedMethods.includes(method)) {
        throw new MethodNotAllowedError(method, allowedMethods);
      }

      const result = await handler({ req, method, requestId, log });
      response = jsonResponse(result.statusCode, result.body, {
        requestId,
        cacheControl: options.cacheControl
      });
    } catch (error) {
      response = errorResponse(error, requestId, log);
    }

    log.info(
      sanitizeMeta({ statusCode: response.statusCode, durationMs: Date.now() - startedAt }),
      "invocation_completed"
    );
    return response;
  };
}

function errorResponse(error: unknown, requestId: string, log: Logger): ApiResponse {
  if (!(error instanceof AppError)) {
    log.error({ error: sanitizeError(error) }, "unhandled_handler_error");
    return jsonResponse(
      500,
      buildApiErrorPayload({ code: "internal_error", message: "Unexpected internal error.", requestId }),
      { requestId }
    );
  }

  if (error.statusCode >= 500) {
    log.error({ error: sanitizeError(error), code: error.code }, "handler_failed");
  } else {
    log.warn({ code: error.code, message: error.message }, "request_rejected");
  }

  const headers = error instanceof MethodNotAllowedError ? { Allow: error.allowed.join(", ") } : undefined;

  return jsonResponse(
    error.statusCode,
    buildApiErrorPayload({ code: error.code, message: error.message, details: error.details, requestId }),
    { requestId, headers }
  );
}
