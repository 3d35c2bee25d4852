import { strict as assert } from "node:assert";
import test from "node:test";

import { DeliveryError, type AlertPayload } from "@candle-sentry/sdk";
import type { HttpClient, HttpRequestOptions, HttpResponse } from "@candle-sentry/data";

import { WebhookAlertSink, formatAlertContent } from "../src/WebhookAlertSink.js";

interface Posted {
  readonly url: string;
  readonly body: string;
  readonly options?: HttpRequestOptions;
}

class FakeHttpClient implements HttpClient {
  public posted: Posted[] = [];

  public constructor(private readonly reply: () => Promise<HttpResponse>) {}

  public async get(): Promise<HttpResponse> {
    throw new Error("not used");
  }

  public async post(url: string, body: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.posted.push({ url, body, options });
    return this.reply();
  }
}

const payload: AlertPayload = {
  strategy: "three_bear",
  instrument: "EUR_USD",
  timeframe: "M30",
  timestamp: "2024-03-01T01:30:00.000Z",
  reason: "3 Consecutive Bear Candles Detected.",
};

const status = (statusCode: number) => async (): Promise<HttpResponse> => ({
  statusCode,
  body: "",
  headers: {},
});

test("formatAlertContent renders a multi-line chat message", () => {
  assert.equal(
    formatAlertContent(payload),
    "**STRATEGY ALERT: three_bear**\n" +
      "Instrument: EUR_USD\n" +
      "Timeframe: M30\n" +
      "Candle Time: 2024-03-01T01:30:00.000Z\n" +
      "Setup: 3 Consecutive Bear Candles Detected.",
  );
});

test("deliver posts the alert as JSON", async () => {
  const httpClient = new FakeHttpClient(status(204));
  const sink = new WebhookAlertSink({ url: "http://hooks.test/alert", httpClient });

  await sink.deliver(payload);

  assert.equal(httpClient.posted.length, 1);
  const [posted] = httpClient.posted;
  assert.equal(posted?.url, "http://hooks.test/alert");
  assert.equal(posted?.options?.headers?.["Content-Type"], "application/json");
  assert.deepEqual(JSON.parse(posted?.body ?? "null"), {
    content: formatAlertContent(payload),
    strategy: "three_bear",
    instrument: "EUR_USD",
    timeframe: "M30",
    time: "2024-03-01T01:30:00.000Z",
    reason: "3 Consecutive Bear Candles Detected.",
  });
});

test("non-2xx responses reject with DeliveryError", async () => {
  const sink = new WebhookAlertSink({
    url: "http://hooks.test/alert",
    httpClient: new FakeHttpClient(status(500)),
  });

  await assert.rejects(sink.deliver(payload), (error: unknown) => {
    assert.ok(error instanceof DeliveryError);
    assert.equal(error.strategy, "three_bear");
    assert.equal(error.statusCode, 500);
    assert.equal(error.message, "Webhook responded with status 500");
    return true;
  });
});

test("transport failures reject with DeliveryError", async () => {
  const sink = new WebhookAlertSink({
    url: "http://hooks.test/alert",
    httpClient: new FakeHttpClient(async () => {
      throw new Error("connect ECONNREFUSED");
    }),
  });

  await assert.rejects(sink.deliver(payload), (error: unknown) => {
    assert.ok(error instanceof DeliveryError);
    assert.equal(error.message, "Error sending webhook: connect ECONNREFUSED");
    assert.equal(error.statusCode, undefined);
    return true;
  });
});

test("announce posts a plain content message", async () => {
  const httpClient = new FakeHttpClient(status(200));
  const sink = new WebhookAlertSink({ url: "http://hooks.test/alert", httpClient });

  await sink.announce("Watcher started");

  assert.deepEqual(JSON.parse(httpClient.posted[0]?.body ?? "null"), {
    content: "Watcher started",
  });
});
