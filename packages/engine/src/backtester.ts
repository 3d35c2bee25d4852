import {
  BacktestRequestSchema,
  assertValid,
  defaultRegistry,
  type BacktestRecord,
  type BacktestReport,
  type BacktestRequest,
  type Candle,
  type StrategyRegistry,
} from "@candle-sentry/sdk";
import {
  completedOnly,
  filterCandlesInRange,
  normalizeSeries,
  sanitizeCandle,
  type ICandleSource,
} from "@candle-sentry/data";
import { createLogger, type Logger } from "@candle-sentry/logger";

import {
  evaluateUnit,
  unitErrorMeta,
  windowRequestFor,
  type UnitOutcome,
} from "./evaluation.js";
import { StrategyStateStore } from "./state.js";
import { HistoricalWindowProvider } from "./windows.js";

export interface BacktestDependencies {
  readonly source: ICandleSource;
  /** Defaults to the built-in strategies. */
  readonly registry?: StrategyRegistry;
  readonly logger?: Logger;
}

/**
 * Run identifier derived from the request alone, so repeated runs over the
 * same range land in the same place.
 */
export const makeRunId = (
  request: Pick<BacktestRequest, "instrument" | "timeframe" | "start" | "end">,
): string => {
  return [request.instrument, request.timeframe, request.start, request.end]
    .map((part) => part.toLowerCase().replace(/[^a-z0-9]+/g, ""))
    .join("-");
};

const loadSeries = async (
  request: BacktestRequest,
  source: ICandleSource,
): Promise<Candle[]> => {
  const raw = await source.fetchRange(
    request.instrument,
    request.timeframe,
    request.start,
    request.end,
  );
  const candles = raw
    .map((candle) => sanitizeCandle(candle))
    .filter((candle): candle is Candle => candle !== null);
  return completedOnly(
    filterCandlesInRange(normalizeSeries(candles), request.start, request.end),
  );
};

/**
 * Replays a historical range through the same evaluation step the live
 * runner uses and collects every positive verdict. No alert is sent.
 */
export async function runBacktest(
  request: BacktestRequest,
  deps: BacktestDependencies,
): Promise<BacktestReport> {
  const validated = assertValid(BacktestRequestSchema, request, "BacktestRequest");
  const registry = deps.registry ?? defaultRegistry();
  const logger = deps.logger ?? createLogger("engine/backtester");

  const target = { instrument: validated.instrument, timeframe: validated.timeframe };
  const names = registry.resolve(validated.strategies);
  const strategies = names.map((name) => registry.create(name, target));
  const runId = makeRunId(validated);

  logger.info("Backtest started", {
    runId,
    instrument: validated.instrument,
    timeframe: validated.timeframe,
    start: validated.start,
    end: validated.end,
    strategies: names,
  });

  const series = await loadSeries(validated, deps.source);
  if (series.length === 0) {
    logger.warn("No completed candles in range", {
      instrument: validated.instrument,
      timeframe: validated.timeframe,
    });
  }

  const states = new StrategyStateStore();
  const windows = new HistoricalWindowProvider(series);
  const records: BacktestRecord[] = [];
  const signalCounts: Record<string, number> = Object.fromEntries(names.map((name) => [name, 0]));
  let failedEvaluations = 0;

  for (let index = 0; index < series.length; index += 1) {
    windows.moveTo(index);
    for (const strategy of strategies) {
      let outcome: UnitOutcome;
      try {
        const result = await windows.getWindow(windowRequestFor(strategy));
        outcome = evaluateUnit(strategy, result, states, logger);
      } catch (error) {
        failedEvaluations += 1;
        logger.error("Strategy evaluation failed", { ...unitErrorMeta(strategy, error), index });
        continue;
      }
      if (outcome.kind !== "evaluated" || !outcome.verdict.triggered) {
        continue;
      }
      records.push({
        strategy: strategy.name,
        instrument: strategy.instrument,
        timeframe: strategy.timeframe,
        timestamp: outcome.timestamp,
        reason: outcome.verdict.reason,
        index,
      });
      signalCounts[strategy.name] = (signalCounts[strategy.name] ?? 0) + 1;
    }
  }

  logger.info("Backtest completed", {
    runId,
    candles: series.length,
    signals: records.length,
    failedEvaluations,
  });

  return {
    runId,
    instrument: validated.instrument,
    timeframe: validated.timeframe,
    start: validated.start,
    end: validated.end,
    strategies: names,
    candleCount: series.length,
    records,
    signalCounts,
  };
}
