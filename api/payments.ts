import { withApiHandler, type ApiHandlerContext, type ApiResult } from "../lib/apiHandler.js";
import { StorageError, ValidationError } from "../lib/errors.js";
import { readJsonBody, requireStudentId } from "../lib/http.js";
import { METRIC_PAYMENT_REGISTERED } from "../lib/metrics.js";
import { toPaymentRecord, type PaymentRow } from "../lib/records.js";
import { createCoreRuntime, createMessageChannel, createMetricsSink, type Runtime } from "../lib/runtime.js";
import { PAYMENT_METHOD_MAX_LENGTH, type SettlementRequest } from "../lib/settlement.js";
import { parsePositiveAmount, parsePositiveInt, sanitizeString } from "../lib/validators.js";

export type PaymentsDeps = Pick<Runtime, "database" | "channel" | "metrics" | "logger">;

type PaymentInput = {
  engagementId: number;
  amount: number;
  paymentMethod: string;
};

export function parsePaymentInput(body: Record<string, unknown>): PaymentInput {
  const engagementId = parsePositiveInt(body.id_conexao);
  const amount = parsePositiveAmount(body.valor);
  const paymentMethod = sanitizeString(body.forma_pagamento, PAYMENT_METHOD_MAX_LENGTH);

  if (engagementId === null || amount === null || paymentMethod === null) {
    const invalid = [
      engagementId === null ? "id_conexao" : null,
      amount === null ? "valor" : null,
      paymentMethod === null ? "forma_pagamento" : null
    ].filter((field): field is string => field !== null);

    throw new ValidationError(
      "invalid_payment",
      `Fields 'id_conexao' and 'valor' must be positive numbers and 'forma_pagamento' non-empty text of at most ${PAYMENT_METHOD_MAX_LENGTH} characters.`,
      { fields: invalid }
    );
  }

  return { engagementId, amount, paymentMethod };
}

export function createPaymentsHandler(deps: PaymentsDeps) {
  async function createPayment(ctx: ApiHandlerContext): Promise<ApiResult> {
    const input = parsePaymentInput(readJsonBody(ctx.req));

    // withTransaction resolves only after COMMIT, so the row is visible before the message exists.
    const paymentId = await deps.database.withTransaction(async (conn) => {
      const { rows } = await conn.query<{ id_pagamento: number }>(
        `insert into pagamentos (id_conexao, valor, forma_pagamento, status_pagamento)
         values ($1, $2, $3, 'Pending')
         returning id_pagamento`,
        [input.engagementId, input.amount, input.paymentMethod]
      );

      const id = rows[0]?.id_pagamento;
      if (id === undefined) throw new StorageError("storage_error", "Payment insert returned no id.");
      return Number(id);
    });

    ctx.log.info({ paymentId, engagementId: input.engagementId }, "payment_inserted");

    const request: SettlementRequest = {
      paymentId,
      engagementId: input.engagementId,
      amount: input.amount,
      paymentMethod: input.paymentMethod,
      status: "Pending"
    };

    // A failed publish leaves the row Pending; recovering it needs a reconciliation sweep.
    await deps.channel.publish(request);
    deps.metrics.count(METRIC_PAYMENT_REGISTERED);

    return {
      statusCode: 201,
      body: { message: "Payment registered and sent for processing.", id_pagamento: paymentId }
    };
  }

  async function listPayments(ctx: ApiHandlerContext): Promise<ApiResult> {
    const studentId = requireStudentId(ctx.req);

    const rows = await deps.database.withConnection(async (conn) => {
      const { rows } = await conn.query<PaymentRow>(
        `select pg.id_pagamento, pg.id_conexao, pg.valor, pg.forma_pagamento, pg.status_pagamento
           from pagamentos pg
           join conexoes_aluno_prof c on c.id_conexao = pg.id_conexao
          where c.id_aluno = $1
          order by pg.id_pagamento`,
        [studentId]
      );
      return rows;
    });

    ctx.log.info({ studentId, count: rows.length }, "payments_listed");
    return { statusCode: 200, body: rows.map(toPaymentRecord) };
  }

  async function paymentsHandler(ctx: ApiHandlerContext): Promise<ApiResult> {
    if (ctx.method === "GET") return listPayments(ctx);
    return createPayment(ctx);
  }

  return withApiHandler(paymentsHandler, { logger: deps.logger, methods: ["GET", "POST"] });
}

const runtime = createCoreRuntime("payments");

export const handler = createPaymentsHandler({
  ...runtime,
  channel: createMessageChannel(runtime.logger),
  metrics: createMetricsSink(runtime.logger, "payments")
});
