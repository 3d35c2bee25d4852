import { isAbsolute, join } from "node:path";

import {
  defaultRegistry,
  describeError,
  type AlertSink,
  type BacktestReport,
  type Strategy,
  type StrategyRegistry,
} from "@candle-sentry/sdk";
import { CsvSource, OandaSource, type HttpClient, type ICandleSource } from "@candle-sentry/data";
import { LogAlertSink, WebhookAlertSink } from "@candle-sentry/alerts";
import {
  LiveWindowProvider,
  StrategyRunner,
  runBacktest,
  writeBacktestArtifacts,
  type BacktestArtifacts,
} from "@candle-sentry/engine";
import { createLogger, type Logger } from "@candle-sentry/logger";

import { requireOandaCredentials, type CliOptions, type WatcherConfig } from "./config.js";

export interface WatcherContext {
  readonly config: WatcherConfig;
  /** Base for relative dataset and output paths. */
  readonly rootDir: string;
  readonly logger: Logger;
  readonly registry?: StrategyRegistry;
  readonly httpClient?: HttpClient;
}

const resolvePath = (rootDir: string, path: string): string =>
  isAbsolute(path) ? path : join(rootDir, path);

export const createCandleSource = (
  source: CliOptions["source"],
  context: WatcherContext,
): ICandleSource => {
  if (source === "csv") {
    return new CsvSource({ datasetsDir: resolvePath(context.rootDir, context.config.datasetsDir) });
  }
  const { apiKey } = requireOandaCredentials(context.config);
  return new OandaSource({
    apiKey,
    environment: context.config.oanda.environment,
    httpClient: context.httpClient,
  });
};

export const createAlertSink = (context: WatcherContext): AlertSink => {
  if (!context.config.webhookUrl) {
    context.logger.warn("WEBHOOK_URL not set. Alerts will only be logged.");
    return new LogAlertSink(createLogger("alerts/log", { level: context.config.logLevel }));
  }
  return new WebhookAlertSink({
    url: context.config.webhookUrl,
    httpClient: context.httpClient,
    logger: createLogger("alerts/webhook", { level: context.config.logLevel }),
  });
};

/**
 * One strategy per (target, name) pair; targets outer, names inner, both in
 * configured order.
 */
export const buildLiveStrategies = (
  config: WatcherConfig,
  registry: StrategyRegistry = defaultRegistry(),
): Strategy[] => {
  const names = registry.resolve(config.strategies);
  return config.watchlist.flatMap((target) => names.map((name) => registry.create(name, target)));
};

export interface LiveWatcher {
  readonly runner: StrategyRunner;
  stop(): void;
}

export const startLiveWatcher = async (
  cli: CliOptions,
  context: WatcherContext,
): Promise<LiveWatcher> => {
  const source = createCandleSource(cli.source, context);
  const strategies = buildLiveStrategies(context.config, context.registry);
  const sink = createAlertSink(context);
  const runner = new StrategyRunner({
    strategies,
    windows: new LiveWindowProvider(source),
    sink,
    logger: createLogger("engine/runner", { level: context.config.logLevel }),
  });

  const targets = context.config.watchlist
    .map((target) => `${target.instrument} ${target.timeframe}`)
    .join(", ");
  context.logger.info("Live watcher starting", {
    source: source.id,
    sink: sink.id,
    targets,
    strategies: strategies.map((strategy) => strategy.name),
    pollIntervalMs: context.config.pollIntervalMs,
  });

  if (sink instanceof WebhookAlertSink) {
    try {
      await sink.announce(`Strategy watcher started for ${targets}.`);
    } catch (error) {
      context.logger.warn("Startup notice not delivered", { error: describeError(error) });
    }
  }

  runner.start(context.config.pollIntervalMs);
  return {
    runner,
    stop: () => {
      runner.stop();
      context.logger.info("Live watcher stopped");
    },
  };
};

export interface BacktestOutcome {
  readonly report: BacktestReport;
  readonly artifacts: BacktestArtifacts;
}

export const runBacktestCommand = async (
  cli: Extract<CliOptions, { mode: "backtest" }>,
  context: WatcherContext,
): Promise<BacktestOutcome> => {
  const report = await runBacktest(
    {
      instrument: cli.instrument,
      timeframe: cli.timeframe,
      start: cli.start,
      end: cli.end,
      strategies: cli.strategies,
    },
    {
      source: createCandleSource(cli.source, context),
      registry: context.registry,
      logger: createLogger("engine/backtester", { level: context.config.logLevel }),
    },
  );

  const outDir = resolvePath(context.rootDir, cli.out ?? join("storage", "runs"));
  const artifacts = await writeBacktestArtifacts(join(outDir, report.runId), report);

  context.logger.info("Backtest complete", {
    runId: report.runId,
    candles: report.candleCount,
    signals: report.records.length,
    signalCounts: report.signalCounts,
    reportJson: artifacts.reportJson,
  });
  return { report, artifacts };
};
