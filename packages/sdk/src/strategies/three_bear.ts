import { z } from "zod";

import type { CandleWindow, Verdict } from "../index.js";
import { candleDirection } from "./candles.js";
import type { StrategyFactory } from "./types.js";

export const name = "three_bear" as const;

export const description = "Three consecutive candles closing below their open.";

export const schema = z.object({}).strict();

export type ThreeBearParams = z.infer<typeof schema>;

const STREAK = 3;

export const factory: StrategyFactory<ThreeBearParams> = (target) => ({
  name,
  instrument: target.instrument,
  timeframe: target.timeframe,
  requiredCandles: STREAK + 1,
  minRequiredCompletedCandles: STREAK,
  check(window: CandleWindow): Verdict {
    const streak = window.slice(-STREAK);
    const allBear =
      streak.length === STREAK && streak.every((candle) => candleDirection(candle) === "bear");
    return allBear
      ? { triggered: true, reason: "3 Consecutive Bear Candles Detected." }
      : { triggered: false, reason: "No 3 Consecutive Bear Candles." };
  },
});
