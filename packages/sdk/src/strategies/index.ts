export * as engulfing from "./engulfing.js";
export * as srBreakout from "./sr_breakout.js";
export * as threeBear from "./three_bear.js";
