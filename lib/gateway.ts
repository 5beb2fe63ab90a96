import type { Request, Response } from "express";
import type { ApiHandler } from "./apiHandler.js";
import type { GatewayRequest } from "./http.js";

function flattenHeaders(headers: Request["headers"]): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

function flattenQuery(query: Request["query"]): Record<string, string | undefined> | null {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(query)) {
    if (typeof value === "string") out[key] = value;
    else if (Array.isArray(value) && typeof value[0] === "string") out[key] = value[0];
  }
  return Object.keys(out).length ? out : null;
}

export type ExpressRequestSlice = Pick<Request, "method" | "path" | "headers" | "query" | "body">;

/** Builds the proxy-event slice the handlers read from an express request with a raw text body. */
export function toGatewayRequest(req: ExpressRequestSlice): GatewayRequest {
  const rawBody: unknown = req.body;
  return {
    httpMethod: req.method,
    path: req.path,
    headers: flattenHeaders(req.headers),
    queryStringParameters: flattenQuery(req.query),
    body: typeof rawBody === "string" && rawBody.length ? rawBody : null,
    isBase64Encoded: false
  };
}

export function mountHandler(handler: ApiHandler) {
  return async (req: Request, res: Response): Promise<void> => {
    const result = await handler(toGatewayRequest(req));
    res.status(result.statusCode).set(result.headers).send(result.body);
  };
}
