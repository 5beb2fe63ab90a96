import type { Logger } from "pino";
import { SecretsManagerCredentialProvider, createSecretsManagerClient, secretsManagerFetcher } from "./credentials.js";
import { ProxyDatabase, type Database } from "./db.js";
import { normalizeEnvValue } from "./env.js";
import { createLogger } from "./logger.js";
import { EmbeddedMetricsSink, type MetricsSink } from "./metrics.js";
import { SqsMessageChannel, createSqsClient, sqsSender, type MessageChannel } from "./queue.js";
import {
  fixedSettlementDecision,
  parseOutcome,
  randomSettlementDecision,
  type SettlementDecision
} from "./settlement.js";

/** Every collaborator a handler may depend on; each handler picks its own slice. */
export type Runtime = {
  logger: Logger;
  database: Database;
  channel: MessageChannel;
  metrics: MetricsSink;
  decide: SettlementDecision;
};

export type CoreRuntime = Pick<Runtime, "logger" | "database">;

/**
 * Logger and database for one handler module, built once per cold start.
 * Nothing here talks to AWS or the database; configuration is read when a
 * call is made.
 */
export function createCoreRuntime(service: string): CoreRuntime {
  const logger = createLogger().child({ service });
  const credentials = new SecretsManagerCredentialProvider(
    secretsManagerFetcher(createSecretsManagerClient()),
    logger
  );

  return { logger, database: new ProxyDatabase({ credentials, logger }) };
}

export function createMessageChannel(logger: Logger): MessageChannel {
  return new SqsMessageChannel(sqsSender(createSqsClient()), logger);
}

export function createMetricsSink(logger: Logger, service: string): MetricsSink {
  const namespace = normalizeEnvValue(process.env.METRICS_NAMESPACE) || "TutoringMarketplace";
  return new EmbeddedMetricsSink(logger, namespace, service);
}

/** `SETTLEMENT_FORCED_OUTCOME` pins the decision; otherwise it is random. */
export function createSettlementDecision(): SettlementDecision {
  const forcedOutcome = parseOutcome(process.env.SETTLEMENT_FORCED_OUTCOME);
  return forcedOutcome ? fixedSettlementDecision(forcedOutcome) : randomSettlementDecision();
}
