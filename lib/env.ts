import { ConfigurationError } from "./errors.js";

export type DatabaseSettings = {
  host: string;
  port: number;
  database: string;
  connectTimeoutMs: number;
  ssl: boolean;
};

const DEFAULT_DB_PORT = 5432;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export function normalizeEnvValue(raw: unknown): string {
  const base = String(raw ?? "").trim();
  const withoutEscapedNewline = base.replace(/\\n/g, "").replace(/\\r/g, "");
  const unquoted = withoutEscapedNewline.replace(/^['"]|['"]$/g, "");
  return unquoted.trim();
}

export function env(name: string, fallback?: string): string {
  const value = normalizeEnvValue(process.env[name]);
  if (value) return value;
  if (fallback !== undefined) return fallback;
  throw new ConfigurationError(`Missing env var: ${name}`);
}

function parsePort(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65_535) {
    throw new ConfigurationError(`Invalid DB_PORT: ${raw}`);
  }
  return parsed;
}

function parseTimeoutMs(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 1_000) return DEFAULT_CONNECT_TIMEOUT_MS;
  if (parsed > 30_000) return 30_000;
  return Math.trunc(parsed);
}

function parseFlag(raw: string): boolean {
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

export function getRegion(): string {
  return env("REGION_NAME");
}

export function getSecretId(): string {
  return env("SECRET_ARN");
}

export function getQueueUrl(): string {
  return env("SQS_QUEUE_URL");
}

export function getDatabaseSettings(): DatabaseSettings {
  return {
    host: env("DB_PROXY"),
    database: env("DB_NAME"),
    port: parsePort(env("DB_PORT", String(DEFAULT_DB_PORT))),
    connectTimeoutMs: parseTimeoutMs(env("DB_CONNECT_TIMEOUT_MS", String(DEFAULT_CONNECT_TIMEOUT_MS))),
    ssl: parseFlag(env("DB_SSL", "false"))
  };
}
