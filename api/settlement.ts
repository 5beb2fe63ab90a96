import type { SQSBatchResponse, SQSEvent, SQSRecord } from "aws-lambda";
import { AppError, NotFoundError } from "../lib/errors.js";
import { sanitizeError } from "../lib/logger.js";
import { METRIC_SETTLEMENT_UPDATE, outcomeMetric } from "../lib/metrics.js";
import { createCoreRuntime, createMetricsSink, createSettlementDecision, type Runtime } from "../lib/runtime.js";
import { parseSettlementMessage, settlePayment, type PaymentOutcome, type SettlementRequest } from "../lib/settlement.js";

export type SettlementDeps = Pick<Runtime, "database" | "decide" | "metrics" | "logger">;

/** The part of an SQS record the worker reads. */
export type SettlementRecord = Pick<SQSRecord, "messageId" | "body">;

export type SettlementEvent = {
  Records?: SettlementRecord[];
};

type ParsedRecord = {
  messageId: string;
  request: SettlementRequest;
};

/**
 * Consumes a batch of settlement requests. Records are handled one by one:
 * a malformed body or a missing payment is logged and dropped, while a
 * decision or storage failure is returned in `batchItemFailures` so the
 * queue redelivers only that record.
 */
export function createSettlementWorker(deps: SettlementDeps) {
  const { logger } = deps;

  function parseRecords(records: SettlementRecord[]): ParsedRecord[] {
    const parsed: ParsedRecord[] = [];
    for (const record of records) {
      try {
        parsed.push({ messageId: record.messageId, request: parseSettlementMessage(record.body) });
      } catch (error) {
        logger.error({ messageId: record.messageId, error: sanitizeError(error) }, "settlement_message_rejected");
      }
    }
    return parsed;
  }

  return async (event: SettlementEvent): Promise<SQSBatchResponse> => {
    const records = event.Records ?? [];
    const parsed = parseRecords(records);
    const batchItemFailures: SQSBatchResponse["batchItemFailures"] = [];

    if (!parsed.length) {
      logger.info({ received: records.length }, "settlement_batch_empty");
      return { batchItemFailures };
    }

    try {
      await deps.database.withConnection(async (conn) => {
        for (const { messageId, request } of parsed) {
          const log = logger.child({ messageId, paymentId: request.paymentId });
          try {
            const outcome: PaymentOutcome = await deps.decide(request);
            const updated = await settlePayment(conn, request.paymentId, outcome);
            if (updated === 0) {
              throw new NotFoundError("payment_not_found", `Payment ${request.paymentId} not found.`);
            }

            deps.metrics.count(METRIC_SETTLEMENT_UPDATE);
            deps.metrics.count(outcomeMetric(outcome));
            log.info({ outcome }, "payment_settled");
          } catch (error) {
            log.error({ error: sanitizeError(error) }, "payment_settlement_failed");
            if (!(error instanceof NotFoundError)) {
              batchItemFailures.push({ itemIdentifier: messageId });
            }
          }
        }
      });
    } catch (error) {
      // Credentials or connection failed before any record was settled.
      logger.error(
        { error: sanitizeError(error), code: error instanceof AppError ? error.code : undefined },
        "settlement_batch_failed"
      );
      return { batchItemFailures: parsed.map(({ messageId }) => ({ itemIdentifier: messageId })) };
    }

    logger.info(
      { received: records.length, parsed: parsed.length, failed: batchItemFailures.length },
      "settlement_batch_completed"
    );
    return { batchItemFailures };
  };
}

const runtime = createCoreRuntime("settlement");

export const handler: (event: SQSEvent) => Promise<SQSBatchResponse> = createSettlementWorker({
  ...runtime,
  decide: createSettlementDecision(),
  metrics: createMetricsSink(runtime.logger, "settlement")
});
