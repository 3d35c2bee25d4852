import { z } from "zod";

import type { CandleWindow, Verdict } from "../index.js";
import { candleDirection } from "./candles.js";
import type { StrategyFactory } from "./types.js";

export const name = "sr_breakout" as const;

export const description =
  "Close beyond the nearest pin-structure support or resistance by more than one pip.";

export const schema = z
  .object({
    /** Candles scanned for support/resistance before the breakout candle. */
    lookback: z.number().int().min(2).default(50),
    /** Buffer a close must clear beyond the level. */
    pipSize: z.number().positive().default(0.01),
  })
  .strict();

export type SrBreakoutParams = z.infer<typeof schema>;

interface Levels {
  readonly support: number | null;
  readonly resistance: number | null;
}

/**
 * Bear then bull marks support at the bear close; bull then bear marks
 * resistance at the bull close. The lowest of each is kept.
 */
export const findLevels = (history: CandleWindow): Levels => {
  const supports: number[] = [];
  const resistances: number[] = [];

  for (let index = 0; index < history.length - 1; index += 1) {
    const previous = history[index];
    const current = history[index + 1];
    if (!previous || !current) {
      continue;
    }
    const previousDir = candleDirection(previous);
    const currentDir = candleDirection(current);

    if (previousDir === "bear" && currentDir === "bull") {
      supports.push(previous.close);
    }
    if (previousDir === "bull" && currentDir === "bear") {
      resistances.push(previous.close);
    }
  }

  return {
    support: supports.length > 0 ? Math.min(...supports) : null,
    resistance: resistances.length > 0 ? Math.min(...resistances) : null,
  };
};

export const factory: StrategyFactory<SrBreakoutParams> = (target, params) => {
  const minRequiredCompletedCandles = params.lookback + 1;

  return {
    name,
    instrument: target.instrument,
    timeframe: target.timeframe,
    // One extra candle of padding over the minimum.
    requiredCandles: minRequiredCompletedCandles + 1,
    minRequiredCompletedCandles,
    check(window: CandleWindow): Verdict {
      const breakout = window[window.length - 1];
      if (!breakout) {
        return { triggered: false, reason: "No S/R Breakout found." };
      }
      const close = breakout.close;
      const { support, resistance } = findLevels(window.slice(0, -1));

      if (resistance !== null && close > resistance + params.pipSize) {
        return {
          triggered: true,
          reason: `RESISTANCE Breakout detected at R=${resistance.toFixed(5)} (Close=${close.toFixed(5)}).`,
        };
      }
      if (support !== null && close < support - params.pipSize) {
        return {
          triggered: true,
          reason: `SUPPORT Breakout detected at S=${support.toFixed(5)} (Close=${close.toFixed(5)}).`,
        };
      }

      return { triggered: false, reason: "No S/R Breakout found." };
    },
  };
};
