// Shared data model and runtime validators for candle-sentry.

import { z } from "zod";

import { ConfigurationError } from "./errors.js";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** Candle granularities understood by the upstream provider. */
export const TIMEFRAMES = [
  "S5",
  "S10",
  "S15",
  "S30",
  "M1",
  "M2",
  "M4",
  "M5",
  "M10",
  "M15",
  "M30",
  "H1",
  "H2",
  "H3",
  "H4",
  "H6",
  "H8",
  "H12",
  "D",
  "W",
  "M",
] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

/** ISO-8601 timestamp string, always UTC. */
export type ISODate = string;

/** Runtime validator for {@link Timeframe}. */
export const TimeframeSchema = z.enum(TIMEFRAMES);

/** Instrument identifiers use the provider's BASE_QUOTE form (e.g. "EUR_USD"). */
export const InstrumentSchema = z
  .string()
  .regex(/^[A-Z0-9]+_[A-Z0-9]+$/u, "expected an instrument such as EUR_USD");

/** Second-precision UTC timestamp accepted on the command line. */
export const IsoSecondsSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/u, "expected YYYY-MM-DDTHH:MM:SSZ")
  .refine((value) => !Number.isNaN(Date.parse(value)), "not a valid date");

/** -----------------------------------------------------------------------
 *  Candles & windows
 *  -------------------------------------------------------------------- */

/**
 * One OHLC bar. `complete` is false only for the bar still forming.
 */
export interface Candle {
  readonly openTime: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly complete: boolean;
  readonly volume?: number;
}

/**
 * Consecutive completed candles for one instrument/timeframe, oldest first.
 * The last element is the most recently completed candle.
 */
export type CandleWindow = ReadonlyArray<Candle>;

/** Runtime validator for {@link Candle}. */
export const CandleSchema = z.object({
  openTime: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  complete: z.boolean(),
  volume: z.number().nonnegative().optional(),
});

/** -----------------------------------------------------------------------
 *  Evaluation outputs
 *  -------------------------------------------------------------------- */

/** Outcome of one strategy evaluation. `reason` is set for both outcomes. */
export interface Verdict {
  readonly triggered: boolean;
  readonly reason: string;
}

/** Notification handed to an alert sink in live mode. */
export interface AlertPayload {
  readonly strategy: string;
  readonly instrument: string;
  readonly timeframe: Timeframe;
  /** `openTime` of the candle that triggered. */
  readonly timestamp: ISODate;
  readonly reason: string;
}

/** A triggered verdict captured during a backtest. */
export interface BacktestRecord extends AlertPayload {
  /** Cursor position of the triggering candle within the loaded series. */
  readonly index: number;
}

/**
 * Delivery contract for live alerts. Implementations reject with
 * `DeliveryError` when the payload could not be delivered.
 */
export interface AlertSink {
  readonly id: string;
  deliver(payload: AlertPayload): Promise<void>;
}

/** -----------------------------------------------------------------------
 *  BacktestRequest / BacktestReport
 *  -------------------------------------------------------------------- */

/**
 * Parameters of a single backtest run.
 * `strategies` is either a list of registered names or the reserved "all".
 */
export interface BacktestRequest {
  instrument: string;
  timeframe: Timeframe;
  /** Inclusive start, `YYYY-MM-DDTHH:MM:SSZ`. */
  start: ISODate;
  /** Inclusive end, `YYYY-MM-DDTHH:MM:SSZ`. */
  end: ISODate;
  strategies: string[] | "all";
}

/** Runtime validator for {@link BacktestRequest}. */
export const BacktestRequestSchema = z
  .object({
    instrument: InstrumentSchema,
    timeframe: TimeframeSchema,
    start: IsoSecondsSchema,
    end: IsoSecondsSchema,
    strategies: z.union([z.literal("all"), z.array(z.string().min(1)).min(1)]),
  })
  .refine((request) => Date.parse(request.start) < Date.parse(request.end), {
    message: "start must be before end",
    path: ["start"],
  });

/**
 * Sole artifact of a backtest: every triggered verdict, oldest first.
 */
export interface BacktestReport {
  /** Derived from instrument, timeframe and range; never from the clock. */
  readonly runId: string;
  readonly instrument: string;
  readonly timeframe: Timeframe;
  readonly start: ISODate;
  readonly end: ISODate;
  /** Strategy names after "all" expansion, in evaluation order. */
  readonly strategies: ReadonlyArray<string>;
  readonly candleCount: number;
  readonly records: ReadonlyArray<BacktestRecord>;
  readonly signalCounts: Readonly<Record<string, number>>;
}

/** -----------------------------------------------------------------------
 *  Helper: runtime assertion using zod
 *  -------------------------------------------------------------------- */

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param label - Descriptive label for error reporting.
 * @throws ConfigurationError when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid ${label}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export * from "./errors.js";
export * from "./strategies/types.js";
export * as strategies from "./strategies/index.js";
export {
  ALL_STRATEGIES,
  createStrategyRegistry,
  defaultRegistry,
  type StrategyRegistry,
  type StrategySelection,
} from "./strategies/registry.js";
export { bodySize, candleDirection, type CandleDirection } from "./strategies/candles.js";
