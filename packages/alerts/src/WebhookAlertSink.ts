import { DeliveryError, describeError, type AlertPayload, type AlertSink } from "@candle-sentry/sdk";
import { createHttpClient, type HttpClient, type HttpResponse } from "@candle-sentry/data";
import { createSilentLogger, type Logger } from "@candle-sentry/logger";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface WebhookAlertSinkOptions {
  readonly url: string;
  readonly timeoutMs?: number;
  readonly httpClient?: HttpClient;
  readonly logger?: Logger;
}

/** JSON body posted for every alert. */
export interface WebhookBody {
  readonly content: string;
  readonly strategy: string;
  readonly instrument: string;
  readonly timeframe: string;
  readonly time: string;
  readonly reason: string;
}

export const formatAlertContent = (payload: AlertPayload): string => {
  return [
    `**STRATEGY ALERT: ${payload.strategy}**`,
    `Instrument: ${payload.instrument}`,
    `Timeframe: ${payload.timeframe}`,
    `Candle Time: ${payload.timestamp}`,
    `Setup: ${payload.reason}`,
  ].join("\n");
};

export const toWebhookBody = (payload: AlertPayload): WebhookBody => ({
  content: formatAlertContent(payload),
  strategy: payload.strategy,
  instrument: payload.instrument,
  timeframe: payload.timeframe,
  time: payload.timestamp,
  reason: payload.reason,
});

/**
 * Posts alerts to a chat-style webhook (Discord, Slack-compatible endpoints).
 * Deliveries are attempted once; failures reject with `DeliveryError`.
 */
export class WebhookAlertSink implements AlertSink {
  public readonly id = "webhook";

  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;

  public constructor(options: WebhookAlertSinkOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpClient = options.httpClient ?? createHttpClient();
    this.logger = options.logger ?? createSilentLogger("alerts/webhook");
  }

  public async deliver(payload: AlertPayload): Promise<void> {
    await this.post(JSON.stringify(toWebhookBody(payload)), payload.strategy);
    this.logger.info("Webhook alert sent", {
      strategy: payload.strategy,
      instrument: payload.instrument,
      timeframe: payload.timeframe,
    });
  }

  /** Posts a plain notice, e.g. on startup. */
  public async announce(message: string): Promise<void> {
    await this.post(JSON.stringify({ content: message }), "announce");
  }

  private async post(body: string, strategy: string): Promise<void> {
    let response: HttpResponse;
    try {
      response = await this.httpClient.post(this.url, body, {
        headers: { "Content-Type": "application/json" },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new DeliveryError(`Error sending webhook: ${describeError(error)}`, {
        strategy,
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new DeliveryError(`Webhook responded with status ${response.statusCode}`, {
        strategy,
        statusCode: response.statusCode,
      });
    }
  }
}
