import type { ApiResponse, GatewayRequest } from "./http.js";

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "OPTIONS,GET,POST,PUT,PATCH",
  "Access-Control-Allow-Headers": "Content-Type"
};

export function isPreflight(req: GatewayRequest): boolean {
  return String(req.httpMethod || "").trim().toUpperCase() === "OPTIONS";
}

export function preflightResponse(): ApiResponse {
  return {
    statusCode: 200,
    headers: { ...CORS_HEADERS },
    body: JSON.stringify({ message: "CORS OK" })
  };
}
