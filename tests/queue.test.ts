import assert from "node:assert/strict";
import test from "node:test";
import type { SendMessageCommandInput, SendMessageCommandOutput } from "@aws-sdk/client-sqs";
import { ConfigurationError, TransportError } from "../lib/errors.js";
import { SqsMessageChannel } from "../lib/queue.js";
import type { SettlementRequest } from "../lib/settlement.js";
import { silentLogger, withEnv } from "./helpers/fakes.js";

const request: SettlementRequest = {
  paymentId: 11,
  engagementId: 7,
  amount: 150,
  paymentMethod: "pix",
  status: "Pending"
};

test("publish sends the encoded settlement request to the configured queue", async () => {
  await withEnv({ SQS_QUEUE_URL: "https://sqs.test/queue" }, async () => {
    const sent: SendMessageCommandInput[] = [];
    const channel = new SqsMessageChannel(async (input): Promise<SendMessageCommandOutput> => {
      sent.push(input);
      return { $metadata: {}, MessageId: "m-1" };
    }, silentLogger);

    await channel.publish(request);

    assert.deepEqual(sent, [
      {
        QueueUrl: "https://sqs.test/queue",
        MessageBody:
          '{"id_pagamento":11,"id_conexao":7,"valor":150,"forma_pagamento":"pix","status_pagamento":"Pending"}'
      }
    ]);
  });
});

test("a failed send becomes a TransportError carrying the payment id", async () => {
  await withEnv({ SQS_QUEUE_URL: "https://sqs.test/queue" }, async () => {
    const channel = new SqsMessageChannel(async () => {
      throw new Error("queue down");
    }, silentLogger);

    await assert.rejects(channel.publish(request), (error: unknown) => {
      if (!(error instanceof TransportError)) return false;
      assert.equal(error.code, "publish_failed");
      assert.equal(error.message, "Failed to publish settlement request: queue down");
      assert.deepEqual(error.details, { id_pagamento: 11 });
      return true;
    });
  });
});

test("a missing queue url fails without sending", async () => {
  await withEnv({ SQS_QUEUE_URL: undefined }, async () => {
    let sends = 0;
    const channel = new SqsMessageChannel(async () => {
      sends += 1;
      return { $metadata: {} };
    }, silentLogger);

    await assert.rejects(channel.publish(request), ConfigurationError);
    assert.equal(sends, 0);
  });
});
