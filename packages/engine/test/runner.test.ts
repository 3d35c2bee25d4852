import { strict as assert } from "node:assert";
import test from "node:test";

import { defaultRegistry, type Candle, type Strategy, type Timeframe } from "@candle-sentry/sdk";
import { createSilentLogger } from "@candle-sentry/logger";

import { StrategyRunner } from "../src/runner.js";
import { LiveWindowProvider } from "../src/windows.js";
import {
  InMemoryCandleSource,
  PartlyFailingSource,
  RecordingSink,
  bear,
  bull,
  cycleSeries,
} from "./helpers.js";

const logger = createSilentLogger();
const registry = defaultRegistry();
const eurusd = { instrument: "EUR_USD", timeframe: "M30" } as const;

const threeBearSeries = (): Candle[] => [
  bull("2024-03-01T00:00:00.000Z"),
  bear("2024-03-01T00:30:00.000Z"),
  bear("2024-03-01T01:00:00.000Z"),
  bear("2024-03-01T01:30:00.000Z"),
  bull("2024-03-01T02:00:00.000Z"),
];

const buildRunner = (source: InMemoryCandleSource, names: string[], sink = new RecordingSink()) => {
  const runner = new StrategyRunner({
    strategies: names.map((name) => registry.create(name, eurusd)),
    windows: new LiveWindowProvider(source),
    sink,
    logger,
  });
  return { runner, sink };
};

const waitFor = async (condition: () => boolean, timeoutMs = 2000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
};

test("a repeated completed candle alerts only once", async () => {
  const source = new InMemoryCandleSource(threeBearSeries());
  source.formingLast = true;
  const { runner, sink } = buildRunner(source, ["three_bear"]);

  const first = await runner.tick();
  const second = await runner.tick();

  assert.equal(first?.triggered, 1);
  assert.deepEqual(sink.delivered, [
    {
      strategy: "three_bear",
      instrument: "EUR_USD",
      timeframe: "M30",
      timestamp: "2024-03-01T01:30:00.000Z",
      reason: "3 Consecutive Bear Candles Detected.",
    },
  ]);
  assert.deepEqual(second, {
    evaluated: 0,
    triggered: 0,
    duplicate: 1,
    insufficient: 0,
    failed: 0,
    alerts: [],
  });
  assert.equal(
    runner.stateStore.snapshot()[0]?.lastEvaluatedTimestamp,
    "2024-03-01T01:30:00.000Z",
  );
});

test("too few completed candles skips evaluation", async () => {
  const source = new InMemoryCandleSource(threeBearSeries());
  source.visible = 3;
  source.formingLast = true;
  const { runner, sink } = buildRunner(source, ["three_bear"]);

  const summary = await runner.tick();

  assert.equal(summary?.insufficient, 1);
  assert.equal(summary?.evaluated, 0);
  assert.equal(sink.attempts, 0);
  assert.equal(runner.stateStore.size, 0);
});

test("a history shorter than the requested window skips evaluation", async () => {
  const source = new InMemoryCandleSource(cycleSeries("2024-03-01T00:00:00Z", 5));
  source.formingLast = true;
  const { runner, sink } = buildRunner(source, ["engulfing"]);

  const summary = await runner.tick();

  assert.deepEqual(source.latestCalls, [{ instrument: "EUR_USD", timeframe: "M30", count: 7 }]);
  assert.equal(summary?.insufficient, 1);
  assert.equal(summary?.evaluated, 0);
  assert.equal(sink.attempts, 0);
});

test("strategies sharing a combination share one fetch per tick", async () => {
  const source = new InMemoryCandleSource(cycleSeries("2024-03-01T00:00:00Z", 8));
  const { runner } = buildRunner(source, ["three_bear", "engulfing"]);

  const summary = await runner.tick();

  assert.deepEqual(source.latestCalls, [{ instrument: "EUR_USD", timeframe: "M30", count: 7 }]);
  assert.equal(summary?.evaluated, 2);
  assert.deepEqual(summary?.alerts, [
    {
      strategy: "engulfing",
      instrument: "EUR_USD",
      timeframe: "M30",
      timestamp: "2024-03-01T03:30:00.000Z",
      reason: "Engulfing Pattern Found (BULL Signal)",
    },
  ]);
});

test("a failing fetch does not stop the other units", async () => {
  const source = new PartlyFailingSource(threeBearSeries().slice(0, 4), "GBP_USD");
  const sink = new RecordingSink();
  const timeframe: Timeframe = "M30";
  const runner = new StrategyRunner({
    strategies: [
      registry.create("three_bear", { instrument: "GBP_USD", timeframe }),
      registry.create("three_bear", { instrument: "EUR_USD", timeframe }),
    ],
    windows: new LiveWindowProvider(source),
    sink,
    logger,
  });

  const summary = await runner.tick();

  assert.equal(summary?.failed, 1);
  assert.equal(summary?.triggered, 1);
  assert.deepEqual(
    sink.delivered.map((alert) => alert.instrument),
    ["EUR_USD"],
  );
});

test("a strategy that throws is counted as failed once per candle", async () => {
  let calls = 0;
  const broken: Strategy = {
    name: "broken",
    ...eurusd,
    requiredCandles: 4,
    minRequiredCompletedCandles: 3,
    check: () => {
      calls += 1;
      throw new Error("bad window");
    },
  };
  const source = new InMemoryCandleSource(threeBearSeries());
  source.formingLast = true;
  const sink = new RecordingSink();
  const runner = new StrategyRunner({
    strategies: [broken, registry.create("three_bear", eurusd)],
    windows: new LiveWindowProvider(source),
    sink,
    logger,
  });

  const first = await runner.tick();
  const second = await runner.tick();

  assert.equal(first?.failed, 1);
  assert.equal(first?.triggered, 1);
  assert.equal(second?.failed, 0);
  assert.equal(second?.duplicate, 2);
  assert.equal(calls, 1);
  assert.equal(sink.delivered.length, 1);
});

test("a failed delivery keeps the candle marked as evaluated", async () => {
  const source = new InMemoryCandleSource(threeBearSeries());
  source.formingLast = true;
  const sink = new RecordingSink();
  sink.failNext = 1;
  const { runner } = buildRunner(source, ["three_bear"], sink);

  const first = await runner.tick();
  const second = await runner.tick();

  assert.equal(first?.failed, 1);
  assert.deepEqual(first?.alerts, []);
  assert.equal(second?.duplicate, 1);
  assert.equal(sink.attempts, 1);
});

test("a tick started during another tick is skipped", async () => {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  class GatedSource extends InMemoryCandleSource {
    public override async fetchLatest(instrument: string, timeframe: Timeframe, count: number) {
      await gate;
      return super.fetchLatest(instrument, timeframe, count);
    }
  }

  const { runner } = buildRunner(new GatedSource(threeBearSeries()), ["three_bear"]);

  const first = runner.tick();
  assert.equal(runner.status, "evaluating");
  assert.equal(await runner.tick(), null);

  release();
  const summary = await first;
  assert.equal(summary?.evaluated, 1);
  assert.equal(runner.status, "idle");
});

test("start ticks immediately and on every interval until stopped", async () => {
  const source = new InMemoryCandleSource(threeBearSeries());
  source.formingLast = true;
  const { runner, sink } = buildRunner(source, ["three_bear"]);

  runner.start(10);
  try {
    await waitFor(() => source.latestCalls.length >= 3);
  } finally {
    runner.stop();
  }

  assert.equal(runner.isScheduled, false);
  assert.equal(sink.delivered.length, 1);
});
