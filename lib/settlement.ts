import type { DbConnection } from "./db.js";
import { ValidationError } from "./errors.js";
import type { PaymentStatus } from "./records.js";
import { parsePositiveAmount, parsePositiveInt, sanitizeString } from "./validators.js";

export const PAYMENT_METHOD_MAX_LENGTH = 40;

export type PaymentOutcome = Exclude<PaymentStatus, "Pending">;

export const PAYMENT_OUTCOMES: readonly PaymentOutcome[] = ["Paid", "Cancelled"];

export type SettlementRequest = {
  paymentId: number;
  engagementId: number;
  amount: number;
  paymentMethod: string;
  status: PaymentStatus;
};

/** Stand-in for the payment processor: given a pending payment, decide how it settles. */
export type SettlementDecision = (request: SettlementRequest) => PaymentOutcome | Promise<PaymentOutcome>;

type SettlementMessage = {
  id_pagamento: number;
  id_conexao: number;
  valor: number;
  forma_pagamento: string;
  status_pagamento: PaymentStatus;
};

export function encodeSettlementMessage(request: SettlementRequest): string {
  const message: SettlementMessage = {
    id_pagamento: request.paymentId,
    id_conexao: request.engagementId,
    valor: request.amount,
    forma_pagamento: request.paymentMethod,
    status_pagamento: request.status
  };
  return JSON.stringify(message);
}

function isPaymentStatus(value: unknown): value is PaymentStatus {
  return value === "Pending" || value === "Paid" || value === "Cancelled";
}

export function parseSettlementMessage(body: string): SettlementRequest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new ValidationError("invalid_message", "Settlement message is not valid JSON.");
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ValidationError("invalid_message", "Settlement message must be a JSON object.");
  }

  const fields = new Map(Object.entries(parsed));
  const paymentId = parsePositiveInt(fields.get("id_pagamento"));
  const engagementId = parsePositiveInt(fields.get("id_conexao"));
  const amount = parsePositiveAmount(fields.get("valor"));
  const paymentMethod = sanitizeString(fields.get("forma_pagamento"), PAYMENT_METHOD_MAX_LENGTH);
  const status = fields.get("status_pagamento") ?? "Pending";

  const missing = [
    paymentId === null ? "id_pagamento" : null,
    engagementId === null ? "id_conexao" : null,
    amount === null ? "valor" : null,
    paymentMethod === null ? "forma_pagamento" : null,
    isPaymentStatus(status) ? null : "status_pagamento"
  ].filter((field): field is string => field !== null);

  if (paymentId === null || engagementId === null || amount === null || paymentMethod === null || !isPaymentStatus(status)) {
    throw new ValidationError("invalid_message", "Settlement message has missing or invalid fields.", { fields: missing });
  }

  return { paymentId, engagementId, amount, paymentMethod, status };
}

export function randomSettlementDecision(random: () => number = Math.random): SettlementDecision {
  return () => (random() < 0.5 ? "Paid" : "Cancelled");
}

export function fixedSettlementDecision(outcome: PaymentOutcome): SettlementDecision {
  return () => outcome;
}

export function parseOutcome(value: unknown): PaymentOutcome | null {
  const normalized = String(value ?? "").trim().toLowerCase();
  return PAYMENT_OUTCOMES.find((outcome) => outcome.toLowerCase() === normalized) ?? null;
}

/**
 * Sets the terminal status unconditionally. The stored status is not
 * re-checked, so a redelivered message rewrites the same value.
 * Resolves to the number of rows touched.
 */
export async function settlePayment(conn: DbConnection, paymentId: number, outcome: PaymentOutcome): Promise<number> {
  const { rowCount } = await conn.query(
    "update pagamentos set status_pagamento = $1 where id_pagamento = $2",
    [outcome, paymentId]
  );
  return rowCount ?? 0;
}
