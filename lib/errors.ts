export type ApiErrorPayload = {
  code: string;
  message: string;
  requestId: string;
  details?: unknown;
};

export function buildApiErrorPayload(input: ApiErrorPayload): ApiErrorPayload & { error: string } {
  const payload: ApiErrorPayload & { error: string } = {
    code: input.code,
    error: input.code,
    message: input.message,
    requestId: input.requestId
  };

  if (input.details !== undefined) payload.details = input.details;
  return payload;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(statusCode: number, code: string, message: string, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super(400, code, message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super(404, code, message, details);
  }
}

export class MethodNotAllowedError extends AppError {
  readonly allowed: string[];

  constructor(method: string, allowed: string[]) {
    super(405, "method_not_allowed", `Method ${method || "UNKNOWN"} is not allowed.`);
    this.allowed = allowed;
  }
}

/** Missing deployment configuration or an unusable credential secret. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(500, "configuration_error", message, undefined, options);
  }
}

export class StorageError extends AppError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super(500, code, message, undefined, options);
  }
}

export class TransportError extends AppError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(500, "publish_failed", message, details, options);
  }
}

export function getPgErrorCode(error: unknown): string {
  if (!error || typeof error !== "object" || !("code" in error)) return "";
  return String(error.code ?? "");
}

const PG_ERROR_CODES: Record<string, string> = {
  "23505": "unique_violation",
  "23503": "foreign_key_violation",
  "23514": "check_violation",
  "57014": "query_canceled"
};

export function toStorageError(error: unknown): AppError {
  if (error instanceof AppError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code = PG_ERROR_CODES[getPgErrorCode(error)] ?? "storage_error";
  return new StorageError(code, message, { cause: error });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
