import { z } from "zod";

import {
  ConfigurationError,
  InstrumentSchema,
  IsoSecondsSchema,
  TimeframeSchema,
  assertValid,
  type StrategyTarget,
  type Timeframe,
} from "@candle-sentry/sdk";
import type { LogLevel } from "@candle-sentry/logger";

const emptyToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const EnvSchema = z.object({
  OANDA_API_KEY: optionalString,
  OANDA_ACCOUNT_ID: optionalString,
  OANDA_ENV: z.preprocess(emptyToUndefined, z.enum(["practice", "live"]).default("practice")),
  WEBHOOK_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  WATCHLIST: z.preprocess(emptyToUndefined, z.string().default("EUR_USD:M30")),
  STRATEGIES: z.preprocess(emptyToUndefined, z.string().default("all")),
  POLL_INTERVAL_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(60_000),
  ),
  DATASETS_DIR: z.preprocess(emptyToUndefined, z.string().default("storage/datasets")),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" ? emptyToUndefined(value.toLowerCase()) : value),
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
});

export interface WatcherConfig {
  readonly oanda: {
    readonly apiKey?: string;
    readonly accountId?: string;
    readonly environment: "practice" | "live";
  };
  readonly webhookUrl?: string;
  /** Live-mode targets in configured order. */
  readonly watchlist: ReadonlyArray<StrategyTarget>;
  readonly strategies: string[] | "all";
  readonly pollIntervalMs: number;
  readonly datasetsDir: string;
  readonly logLevel: LogLevel;
}

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const WatchTargetSchema = z.object({
  instrument: InstrumentSchema,
  timeframe: TimeframeSchema,
});

const parseWatchlist = (value: string): StrategyTarget[] => {
  const entries = splitList(value);
  if (entries.length === 0) {
    throw new ConfigurationError("WATCHLIST must name at least one INSTRUMENT:TIMEFRAME target");
  }
  return entries.map((entry) => {
    const [instrument, timeframe, ...rest] = entry.split(":");
    if (rest.length > 0) {
      throw new ConfigurationError(`Invalid WATCHLIST entry "${entry}"`);
    }
    return assertValid(WatchTargetSchema, { instrument, timeframe }, `WATCHLIST entry "${entry}"`);
  });
};

export const parseStrategyList = (value: string): string[] | "all" => {
  const names = splitList(value);
  if (names.length === 0) {
    throw new ConfigurationError("No strategies selected");
  }
  return names.length === 1 && names[0] === "all" ? "all" : names;
};

/**
 * Reads the watcher settings from environment variables.
 * @throws ConfigurationError
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): WatcherConfig => {
  const parsed = assertValid(EnvSchema, env, "environment");
  return {
    oanda: {
      apiKey: parsed.OANDA_API_KEY,
      accountId: parsed.OANDA_ACCOUNT_ID,
      environment: parsed.OANDA_ENV,
    },
    webhookUrl: parsed.WEBHOOK_URL,
    watchlist: parseWatchlist(parsed.WATCHLIST),
    strategies: parseStrategyList(parsed.STRATEGIES),
    pollIntervalMs: parsed.POLL_INTERVAL_MS,
    datasetsDir: parsed.DATASETS_DIR,
    logLevel: parsed.LOG_LEVEL,
  };
};

/** Credentials the OANDA source cannot run without. */
export const requireOandaCredentials = (
  config: WatcherConfig,
): { readonly apiKey: string; readonly accountId: string } => {
  const { apiKey, accountId } = config.oanda;
  if (!apiKey || !accountId) {
    throw new ConfigurationError(
      "OANDA_API_KEY or OANDA_ACCOUNT_ID not found in environment variables.",
    );
  }
  return { apiKey, accountId };
};

/** -----------------------------------------------------------------------
 *  Command line
 *  -------------------------------------------------------------------- */

export type CliOptions =
  | {
      readonly mode: "live";
      readonly source: "oanda" | "csv";
    }
  | {
      readonly mode: "backtest";
      readonly source: "oanda" | "csv";
      readonly instrument: string;
      readonly timeframe: Timeframe;
      readonly start: string;
      readonly end: string;
      readonly strategies: string[] | "all";
      readonly out?: string;
    };

const FLAGS = [
  "mode",
  "instrument",
  "timeframe",
  "start-date",
  "end-date",
  "strategies",
  "source",
  "out",
] as const;

type Flag = (typeof FLAGS)[number];

const FLAG_NAMES: ReadonlySet<string> = new Set(FLAGS);

const BACKTEST_ONLY_FLAGS: ReadonlyArray<Flag> = [
  "instrument",
  "timeframe",
  "start-date",
  "end-date",
  "strategies",
  "out",
];

const isFlag = (value: string): value is Flag => FLAG_NAMES.has(value);

const SourceSchema = z.enum(["oanda", "csv"]).default("oanda");

const BacktestArgsSchema = z.object({
  instrument: InstrumentSchema,
  timeframe: TimeframeSchema,
  start: IsoSecondsSchema,
  end: IsoSecondsSchema,
});

const tokenize = (argv: ReadonlyArray<string>): Map<Flag, string[]> => {
  const values = new Map<Flag, string[]>();
  let current: Flag | null = null;

  for (const arg of argv) {
    if (arg.startsWith("--")) {
      const [name = "", inline] = arg.slice(2).split("=", 2);
      if (!isFlag(name)) {
        throw new ConfigurationError(`Unknown option --${name}`);
      }
      if (values.has(name)) {
        throw new ConfigurationError(`Option --${name} given more than once`);
      }
      values.set(name, inline === undefined ? [] : [inline]);
      current = inline === undefined ? name : null;
      continue;
    }
    if (current === null) {
      throw new ConfigurationError(`Unexpected argument "${arg}"`);
    }
    values.get(current)?.push(arg);
    // Only --strategies takes several values.
    if (current !== "strategies") {
      current = null;
    }
  }

  return values;
};

const single = (values: Map<Flag, string[]>, flag: Flag): string | undefined => {
  const given = values.get(flag);
  if (given === undefined) {
    return undefined;
  }
  const [value] = given;
  if (value === undefined || value.trim() === "") {
    throw new ConfigurationError(`Option --${flag} needs a value`);
  }
  return value;
};

/**
 * Parses `--mode live|backtest` and the backtest options.
 * @throws ConfigurationError
 */
export const parseCliArgs = (argv: ReadonlyArray<string>): CliOptions => {
  const values = tokenize(argv);
  const mode = single(values, "mode") ?? "live";
  const source = assertValid(SourceSchema, single(values, "source"), "--source");

  if (mode === "live") {
    const misplaced = BACKTEST_ONLY_FLAGS.find((flag) => values.has(flag));
    if (misplaced !== undefined) {
      throw new ConfigurationError(`Option --${misplaced} is only valid with --mode backtest`);
    }
    return { mode, source };
  }
  if (mode !== "backtest") {
    throw new ConfigurationError(`Invalid --mode "${mode}". Expected live or backtest`);
  }

  const args = assertValid(
    BacktestArgsSchema,
    {
      instrument: single(values, "instrument"),
      timeframe: single(values, "timeframe"),
      start: single(values, "start-date"),
      end: single(values, "end-date"),
    },
    "backtest options",
  );
  const strategies = values.get("strategies") ?? ["all"];
  const out = single(values, "out");

  return {
    mode,
    source,
    ...args,
    strategies: parseStrategyList(strategies.join(",")),
    ...(out === undefined ? {} : { out }),
  };
};
