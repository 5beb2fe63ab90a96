import {
  SQSClient,
  SendMessageCommand,
  type SendMessageCommandInput,
  type SendMessageCommandOutput
} from "@aws-sdk/client-sqs";
import type { Logger } from "pino";
import { getQueueUrl, getRegion } from "./env.js";
import { TransportError, describeError } from "./errors.js";
import { sanitizeError } from "./logger.js";
import { encodeSettlementMessage, type SettlementRequest } from "./settlement.js";

export interface MessageChannel {
  publish(message: SettlementRequest): Promise<void>;
}

export type SqsSend = (input: SendMessageCommandInput) => Promise<SendMessageCommandOutput>;

export function createSqsClient(): SQSClient {
  return new SQSClient({ region: async () => getRegion() });
}

export function sqsSender(client: SQSClient): SqsSend {
  return (input) => client.send(new SendMessageCommand(input));
}

export class SqsMessageChannel implements MessageChannel {
  constructor(
    private readonly send: SqsSend,
    private readonly logger: Logger
  ) {}

  async publish(message: SettlementRequest): Promise<void> {
    const details = { id_pagamento: message.paymentId };
    const queueUrl = getQueueUrl();

    try {
      const output = await this.send({ QueueUrl: queueUrl, MessageBody: encodeSettlementMessage(message) });
      this.logger.info({ ...details, messageId: output.MessageId }, "settlement_request_published");
    } catch (error) {
      this.logger.error({ ...details, error: sanitizeError(error) }, "settlement_request_publish_failed");
      throw new TransportError(
        `Failed to publish settlement request: ${describeError(error)}`,
        details,
        { cause: error }
      );
    }
  }
}
