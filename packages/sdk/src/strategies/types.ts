import type { z } from "zod";

import type { CandleWindow, Timeframe, Verdict } from "../index.js";

/** Instrument/timeframe pair a strategy is bound to for its lifetime. */
export interface StrategyTarget {
  readonly instrument: string;
  readonly timeframe: Timeframe;
}

/**
 * Pure pattern evaluator. Holds no candle data and no dedupe state;
 * the orchestrator only calls `check` with at least
 * `minRequiredCompletedCandles` candles.
 */
export interface Strategy extends StrategyTarget {
  readonly name: string;
  /** Window size requested from the provider. */
  readonly requiredCandles: number;
  /** Smallest window the logic can give a meaningful verdict on. */
  readonly minRequiredCompletedCandles: number;
  check(window: CandleWindow): Verdict;
}

export type StrategyFactory<P> = (target: StrategyTarget, params: P) => Strategy;

/**
 * Shape every strategy module exports: a registry name, a params schema
 * (defaults included) and a factory.
 */
export interface StrategyModule<Schema extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly name: string;
  readonly description: string;
  readonly schema: Schema;
  readonly factory: StrategyFactory<z.infer<Schema>>;
}
