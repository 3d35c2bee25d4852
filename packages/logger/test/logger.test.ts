import { strict as assert } from "node:assert";
import test, { type TestContext } from "node:test";
import { createLogger, createSilentLogger, isLogLevel } from "../src/index.js";

const captureStream = (t: TestContext, stream: NodeJS.WriteStream): string[] => {
  const lines: string[] = [];
  const originalWrite = stream.write.bind(stream);
  stream.write = (chunk: string | Uint8Array): boolean => {
    lines.push(chunk.toString());
    return true;
  };
  t.after(() => {
    stream.write = originalWrite;
  });
  return lines;
};

test("createLogger exposes its component name", () => {
  const logger = createLogger("engine/runner", { level: "info" });
  assert.equal(logger.component, "engine/runner");
  assert.equal(logger.level, "info");
});

test("logger writes one JSON line per entry to stdout", (t) => {
  const logs = captureStream(t, process.stdout);
  const logger = createLogger("test-log", { level: "debug" });

  logger.log("info", "candle checked", { strategy: "engulfing", extra: "data" });

  assert.equal(logs.length, 1);
  assert.ok(logs[0]?.endsWith("\n"));
  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "info");
  assert.equal(parsed.component, "test-log");
  assert.equal(parsed.msg, "candle checked");
  assert.equal(parsed.strategy, "engulfing");
  assert.equal(parsed.extra, "data");
  assert.ok(new Date(parsed.ts).getTime() > 0);
});

test("logger.error writes to stderr", (t) => {
  const errors = captureStream(t, process.stderr);
  const logger = createLogger("error-test", { level: "debug" });

  logger.error("fetch failed", { instrument: "EUR_USD", timeframe: "M30" });

  assert.equal(errors.length, 1);
  const parsed = JSON.parse(errors[0] ?? "{}");
  assert.equal(parsed.level, "error");
  assert.equal(parsed.instrument, "EUR_USD");
  assert.equal(parsed.timeframe, "M30");
});

test("entries below the threshold are dropped", (t) => {
  const logs = captureStream(t, process.stdout);
  const logger = createLogger("threshold-test", { level: "warn" });

  logger.debug("hidden");
  logger.info("hidden too");
  logger.warn("visible");

  assert.equal(logs.length, 1);
  assert.equal(JSON.parse(logs[0] ?? "{}").msg, "visible");
});

test("debug entries are written when the threshold is debug", (t) => {
  const logs = captureStream(t, process.stdout);
  const logger = createLogger("debug-test", { level: "debug" });

  logger.debug("verdict", { triggered: false });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "debug");
  assert.equal(parsed.triggered, false);
});

test("threshold falls back to LOG_LEVEL", (t) => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "ERROR";
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  assert.equal(createLogger("env-test").level, "error");
});

test("threshold defaults to info when LOG_LEVEL is not a level", (t) => {
  const previous = process.env.LOG_LEVEL;
  process.env.LOG_LEVEL = "verbose";
  t.after(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  assert.equal(createLogger("env-test").level, "info");
});

test("typed meta keys are omitted when they are not strings", (t) => {
  const logs = captureStream(t, process.stdout);
  const logger = createLogger("meta-test", { level: "info" });

  logger.info("message", { strategy: 7 as unknown as string });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(Object.keys(parsed).includes("strategy"), false);
});

test("nested metadata is serialised as-is", (t) => {
  const logs = captureStream(t, process.stdout);
  const logger = createLogger("complex-meta-test", { level: "info" });

  logger.info("tick", { counts: { evaluated: 2, triggered: 1 }, units: ["a", "b"] });

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.deepEqual(parsed.counts, { evaluated: 2, triggered: 1 });
  assert.deepEqual(parsed.units, ["a", "b"]);
});

test("silent logger writes nothing", (t) => {
  const logs = captureStream(t, process.stdout);
  const errors = captureStream(t, process.stderr);
  const logger = createSilentLogger();

  logger.info("nothing");
  logger.error("nothing");

  assert.equal(logs.length, 0);
  assert.equal(errors.length, 0);
});

test("isLogLevel accepts only known levels", () => {
  assert.equal(isLogLevel("warn"), true);
  assert.equal(isLogLevel("trace"), false);
  assert.equal(isLogLevel(undefined), false);
});
