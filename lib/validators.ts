/** Largest value a Postgres `integer` column holds. */
export const MAX_ID = 2_147_483_647;

/** Ceiling of a `numeric(10, 2)` amount. */
export const MAX_AMOUNT = 99_999_999.99;

/** Trimmed text, or null when it is missing, blank, not a scalar or longer than `maxLen`. */
export function sanitizeString(value: unknown, maxLen = 240): string | null {
  if (value === null || value === undefined || typeof value === "object") return null;
  const str = String(value).trim();
  if (!str || str.length > maxLen) return null;
  return str;
}

export function isOverLength(value: unknown, maxLen: number): boolean {
  if (typeof value !== "string" && typeof value !== "number") return false;
  return String(value).trim().length > maxLen;
}

export function onlyDigits(value: unknown): string {
  return String(value ?? "").replace(/\D+/g, "");
}

export function normalizeCpf(value: unknown): string | null {
  if (value === null || value === undefined || typeof value === "object") return null;
  const cpf = onlyDigits(value);
  if (cpf.length !== 11) return null;
  return cpf;
}

/** Accepts integers and plain decimal-digit strings in 1..MAX_ID; anything else is null. */
export function parsePositiveInt(value: unknown): number | null {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return null;
  }

  if (!Number.isSafeInteger(parsed) || parsed <= 0 || parsed > MAX_ID) return null;
  return parsed;
}

/** Accepts numbers and `123`, `123.45` or `123,45` strings; the result is rounded to cents. */
export function parsePositiveAmount(value: unknown): number | null {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && /^\d+(?:[.,]\d+)?$/.test(value.trim())) {
    parsed = Number(value.trim().replace(",", "."));
  } else {
    return null;
  }

  if (!Number.isFinite(parsed)) return null;
  const cents = Math.round(parsed * 100) / 100;
  if (cents <= 0 || cents > MAX_AMOUNT) return null;
  return cents;
}
