export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly strategy?: string;
  readonly instrument?: string;
  readonly timeframe?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly component: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  /** Lowest level that is written; falls back to LOG_LEVEL, then "info". */
  readonly level?: LogLevel;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
};

const resolveLevel = (options: LoggerOptions): LogLevel => {
  if (options.level) {
    return options.level;
  }
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const writeLine = (level: LogLevel, line: string): void => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const buildEntry = (component: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { strategy, instrument, timeframe, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
    ...(typeof strategy === "string" ? { strategy } : {}),
    ...(typeof instrument === "string" ? { instrument } : {}),
    ...(typeof timeframe === "string" ? { timeframe } : {}),
    ...rest,
  };
};

export const createLogger = (component: string, options: LoggerOptions = {}): Logger => {
  const threshold = resolveLevel(options);

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    const entry = buildEntry(component, level, msg, meta);
    writeLine(level, JSON.stringify(entry));
  };

  return {
    component,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
  };
};

/**
 * Logger that discards every entry, for callers that were given none.
 */
export const createSilentLogger = (component = "silent"): Logger => {
  const noop = (): void => {};
  return {
    component,
    level: "error",
    log: noop,
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  };
};
