import { describeError, type ISODate, type Strategy, type Verdict } from "@candle-sentry/sdk";
import type { Logger } from "@candle-sentry/logger";

import type { StrategyStateStore } from "./state.js";
import type { WindowRequest, WindowResult } from "./windows.js";

export type UnitOutcome =
  | { readonly kind: "insufficient"; readonly available: number }
  | { readonly kind: "duplicate"; readonly timestamp: ISODate }
  | { readonly kind: "evaluated"; readonly timestamp: ISODate; readonly verdict: Verdict };

export const windowRequestFor = (strategy: Strategy): WindowRequest => ({
  instrument: strategy.instrument,
  timeframe: strategy.timeframe,
  size: strategy.requiredCandles,
});

/** Log fields for a failure confined to one unit. */
export const unitErrorMeta = (strategy: Strategy, error: unknown) => ({
  strategy: strategy.name,
  instrument: strategy.instrument,
  timeframe: strategy.timeframe,
  error: describeError(error),
  errorName: error instanceof Error ? error.name : typeof error,
});

/**
 * One evaluation step, shared by the live runner and the backtester.
 * Synchronous: the only awaits in either loop are around it.
 */
export const evaluateUnit = (
  strategy: Strategy,
  result: WindowResult,
  states: StrategyStateStore,
  logger: Logger,
): UnitOutcome => {
  const meta = {
    strategy: strategy.name,
    instrument: strategy.instrument,
    timeframe: strategy.timeframe,
  };

  if (result.status === "insufficient") {
    logger.debug("Not enough completed candles", { ...meta, available: result.available });
    return { kind: "insufficient", available: result.available };
  }

  const { window } = result;
  const newest = window[window.length - 1];
  if (!newest || window.length < strategy.minRequiredCompletedCandles) {
    logger.debug("Not enough completed candles", { ...meta, available: window.length });
    return { kind: "insufficient", available: window.length };
  }

  const state = states.get(strategy);
  if (state.lastEvaluatedTimestamp === newest.openTime) {
    return { kind: "duplicate", timestamp: newest.openTime };
  }

  let verdict: Verdict;
  try {
    verdict = strategy.check(window);
  } finally {
    // Marked even when check throws.
    states.markEvaluated(strategy, newest.openTime);
  }
  logger.debug("Candle evaluated", {
    ...meta,
    candleTime: newest.openTime,
    triggered: verdict.triggered,
    reason: verdict.reason,
  });

  return { kind: "evaluated", timestamp: newest.openTime, verdict };
};
