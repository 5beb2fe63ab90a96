import type { Logger } from "pino";

/**
 * Write-only counter sink. Handlers never read metrics back.
 */
export interface MetricsSink {
  count(name: string, value?: number): void;
}

export const METRIC_PAYMENT_REGISTERED = "payment_registered";
export const METRIC_SETTLEMENT_UPDATE = "settlement_update_executed";

export function outcomeMetric(outcome: string): string {
  return `payment_${outcome.toLowerCase()}`;
}

/**
 * Writes CloudWatch Embedded Metric Format records as log lines, which the
 * Lambda log pipeline turns into counters.
 */
export class EmbeddedMetricsSink implements MetricsSink {
  constructor(
    private readonly logger: Logger,
    private readonly namespace: string,
    private readonly service: string
  ) {}

  count(name: string, value = 1): void {
    this.logger.info(
      {
        _aws: {
          Timestamp: Date.now(),
          CloudWatchMetrics: [
            {
              Namespace: this.namespace,
              Dimensions: [["service"]],
              Metrics: [{ Name: name, Unit: "Count" }]
            }
          ]
        },
        service: this.service,
        [name]: value
      },
      "metric"
    );
  }
}
