import { pino, type Logger } from "pino";
import type { GatewayRequest } from "./http.js";

const SENSITIVE_KEYS = ["authorization", "token", "password", "secret", "secretstring", "credentials"];

const REDACTION_PATHS = [
  "authorization",
  "headers.authorization",
  "headers.Authorization",
  "password",
  "secret",
  "credentials.password",
  "creds.password",
  "SecretString"
];

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEYS.some((entry) => normalized.includes(entry));
}

function sanitizeRecord(value: object, depth: number): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (isSensitiveKey(key)) {
      out[key] = "[redacted]";
      continue;
    }

    out[key] = sanitizeObject(item, depth + 1);
  }

  return out;
}

function sanitizeObject(value: unknown, depth = 0): unknown {
  if (depth > 5) return "[truncated]";
  if (!value || typeof value !== "object") return value;

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeObject(item, depth + 1));
  }

  return sanitizeRecord(value, depth);
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

export function sanitizeError(error: unknown): Record<string, unknown> {
  if (!error || typeof error !== "object") {
    return { name: "Error", message: String(error ?? "Unknown error") };
  }

  const result: Record<string, unknown> = {
    name: String(readField(error, "name") || "Error"),
    message: String(readField(error, "message") || "Unknown error")
  };

  const code = readField(error, "code");
  if (code !== undefined) result.code = String(code);

  const stack = readField(error, "stack");
  if (process.env.NODE_ENV !== "production" && stack) {
    result.stack = String(stack);
  }

  const cause = readField(error, "cause");
  if (cause instanceof Error) {
    result.cause = { name: cause.name, message: cause.message };
  }

  return sanitizeRecord(result, 0);
}

export function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  return sanitizeRecord(meta, 0);
}

export function createLogger(level = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    level,
    redact: {
      paths: REDACTION_PATHS,
      censor: "[redacted]"
    }
  });
}

export function createRequestLogger(base: Logger, req: GatewayRequest, requestId: string): Logger {
  return base.child({
    requestId,
    method: String(req.httpMethod || ""),
    path: String(req.path || "")
  });
}
