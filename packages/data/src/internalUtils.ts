import type { Candle, ISODate } from "@candle-sentry/sdk";

/**
 * Shared helpers used across candle sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

export const toNumber = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
};

/**
 * Normalises provider timestamps (which may carry nanoseconds) to
 * millisecond-precision UTC ISO strings. Returns null when unparsable.
 */
export const normalizeTimestamp = (value: string): ISODate | null => {
  const trimmed = value.trim().replace(/(\.\d{3})\d+/u, "$1");
  const epoch = Date.parse(trimmed);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return new Date(epoch).toISOString();
};

/**
 * Re-validates a candle that came from a file or a remote payload.
 */
export const sanitizeCandle = (maybeCandle: unknown): Candle | null => {
  if (maybeCandle === null || typeof maybeCandle !== "object") {
    return null;
  }

  const record = maybeCandle as Record<string, unknown>;
  const { openTime, open, high, low, close, complete, volume } = record;
  if (
    typeof openTime !== "string" ||
    typeof open !== "number" ||
    typeof high !== "number" ||
    typeof low !== "number" ||
    typeof close !== "number" ||
    typeof complete !== "boolean"
  ) {
    return null;
  }

  const normalizedTime = normalizeTimestamp(openTime);
  if (normalizedTime === null) {
    return null;
  }

  return {
    openTime: normalizedTime,
    open,
    high,
    low,
    close,
    complete,
    ...(typeof volume === "number" ? { volume } : {}),
  };
};

const epochOf = (candle: Candle): number => Date.parse(candle.openTime);

/**
 * Orders candles by open time and keeps one candle per open time; a later
 * duplicate replaces an earlier one.
 */
export const normalizeSeries = (candles: ReadonlyArray<Candle>): Candle[] => {
  const byOpenTime = new Map<number, Candle>();
  for (const candle of candles) {
    byOpenTime.set(epochOf(candle), candle);
  }
  return Array.from(byOpenTime.entries())
    .sort(([a], [b]) => a - b)
    .map(([, candle]) => candle);
};

/**
 * Keeps candles whose open time lies inside the inclusive range.
 */
export const filterCandlesInRange = (
  candles: ReadonlyArray<Candle>,
  start: ISODate,
  end: ISODate,
): Candle[] => {
  const startEpoch = Date.parse(start);
  const endEpoch = Date.parse(end);

  return candles.filter((candle) => {
    const epoch = epochOf(candle);
    const afterStart = Number.isNaN(startEpoch) ? true : epoch >= startEpoch;
    const beforeEnd = Number.isNaN(endEpoch) ? true : epoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

export const completedOnly = (candles: ReadonlyArray<Candle>): Candle[] => {
  return candles.filter((candle) => candle.complete);
};
