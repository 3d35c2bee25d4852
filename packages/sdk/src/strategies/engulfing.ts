import { z } from "zod";

import type { CandleWindow, Verdict } from "../index.js";
import { bodySize, candleDirection, fromEnd } from "./candles.js";
import type { StrategyFactory } from "./types.js";

export const name = "engulfing" as const;

export const description =
  "Three same-direction candles followed by a larger opposite candle.";

export const schema = z.object({}).strict();

export type EngulfingParams = z.infer<typeof schema>;

const REQUIRED_CANDLES = 6;
const MIN_COMPLETED_CANDLES = 4;

const miss = (detail: string): Verdict => ({
  triggered: false,
  reason: `No Engulfing Pattern (${detail})`,
});

const evaluate = (window: CandleWindow): Verdict => {
  // Candle 1 is the newest completed candle, candle 4 the oldest inspected.
  const candle1 = fromEnd(window, 1);
  const candle2 = fromEnd(window, 2);
  const dir1 = candleDirection(candle1);
  const dir2 = candleDirection(candle2);
  const dir3 = candleDirection(fromEnd(window, 3));
  const dir4 = candleDirection(fromEnd(window, 4));

  if (dir2 === "doji" || dir3 === "doji" || dir4 === "doji") {
    return miss("Doji in 2-4");
  }
  if (dir2 !== dir3 || dir3 !== dir4) {
    return miss("Candles 2-4 direction mismatch");
  }
  if (dir1 === "doji") {
    return miss("Candle 1 Doji");
  }
  if (dir1 === dir2) {
    return miss("Candle 1 same direction as Candle 2");
  }
  if (bodySize(candle1) <= bodySize(candle2)) {
    return miss("Candle 1 body not greater than Candle 2 body");
  }

  return {
    triggered: true,
    reason: `Engulfing Pattern Found (${dir1.toUpperCase()} Signal)`,
  };
};

export const factory: StrategyFactory<EngulfingParams> = (target) => ({
  name,
  instrument: target.instrument,
  timeframe: target.timeframe,
  requiredCandles: REQUIRED_CANDLES,
  minRequiredCompletedCandles: MIN_COMPLETED_CANDLES,
  check: evaluate,
});
