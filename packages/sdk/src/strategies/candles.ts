import type { Candle } from "../index.js";

export type CandleDirection = "bull" | "bear" | "doji";

export const candleDirection = (candle: Candle): CandleDirection => {
  if (candle.close > candle.open) {
    return "bull";
  }
  if (candle.close < candle.open) {
    return "bear";
  }
  return "doji";
};

export const bodySize = (candle: Candle): number => Math.abs(candle.close - candle.open);

/**
 * Indexes from the newest end: `fromEnd(window, 1)` is the newest candle.
 */
export const fromEnd = (window: ReadonlyArray<Candle>, position: number): Candle => {
  const candle = window[window.length - position];
  if (!candle) {
    throw new RangeError(`window of ${window.length} has no candle at position ${position}`);
  }
  return candle;
};
