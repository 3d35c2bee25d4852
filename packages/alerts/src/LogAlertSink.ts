import type { AlertPayload, AlertSink } from "@candle-sentry/sdk";
import type { Logger } from "@candle-sentry/logger";

/**
 * Writes alerts to the log instead of sending them anywhere.
 */
export class LogAlertSink implements AlertSink {
  public readonly id = "log";

  public constructor(private readonly logger: Logger) {}

  public async deliver(payload: AlertPayload): Promise<void> {
    this.logger.info("Alert (not sent)", {
      strategy: payload.strategy,
      instrument: payload.instrument,
      timeframe: payload.timeframe,
      timestamp: payload.timestamp,
      reason: payload.reason,
    });
  }
}
