import {
  ConfigurationError,
  DataSourceError,
  describeError,
  type Candle,
  type ISODate,
  type Timeframe,
} from "@candle-sentry/sdk";

import type { ICandleSource } from "./ICandleSource.js";
import { createHttpClient, type HttpClient, type HttpResponse } from "./httpClient.js";
import {
  filterCandlesInRange,
  normalizeSeries,
  normalizeTimestamp,
  toNumber,
} from "./internalUtils.js";

export type OandaEnvironment = "practice" | "live";

const BASE_URLS: Record<OandaEnvironment, string> = {
  practice: "https://api-fxpractice.oanda.com",
  live: "https://api-fxtrade.oanda.com",
};
// Largest page the candles endpoint serves per request.
const MAX_PAGE_SIZE = 5000;
const DEFAULT_TIMEOUT_MS = 15_000;

export interface OandaSourceOptions {
  readonly apiKey?: string;
  readonly environment?: OandaEnvironment;
  /** Overrides the environment's host, e.g. for a local stand-in. */
  readonly baseUrl?: string;
  readonly pageSize?: number;
  readonly timeoutMs?: number;
  readonly httpClient?: HttpClient;
}

type OandaRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is OandaRecord =>
  value !== null && typeof value === "object" && !Array.isArray(value);

interface PageQuery {
  readonly count: number;
  readonly from?: ISODate;
  readonly includeFirst?: boolean;
}

/**
 * OANDA v20 instrument candles, midpoint prices.
 */
export class OandaSource implements ICandleSource {
  public readonly id = "oanda";

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;

  public constructor(options: OandaSourceOptions = {}) {
    const apiKey = options.apiKey ?? process.env.OANDA_API_KEY ?? "";
    if (!apiKey) {
      throw new ConfigurationError("OANDA API key missing. Set OANDA_API_KEY environment variable.");
    }
    this.apiKey = apiKey;
    const environment = options.environment ?? "practice";
    this.baseUrl = (options.baseUrl ?? BASE_URLS[environment]).replace(/\/+$/u, "");
    this.pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, options.pageSize ?? MAX_PAGE_SIZE));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpClient = options.httpClient ?? createHttpClient();
  }

  public async fetchLatest(
    instrument: string,
    timeframe: Timeframe,
    count: number,
  ): Promise<ReadonlyArray<Candle>> {
    const page = await this.fetchPage(instrument, timeframe, {
      count: Math.min(MAX_PAGE_SIZE, Math.max(1, count)),
    });
    return normalizeSeries(page);
  }

  public async fetchRange(
    instrument: string,
    timeframe: Timeframe,
    start: ISODate,
    end: ISODate,
  ): Promise<ReadonlyArray<Candle>> {
    const endEpoch = Date.parse(end);
    const collected: Candle[] = [];
    let query: PageQuery = { from: start, count: this.pageSize, includeFirst: true };

    for (;;) {
      const page = await this.fetchPage(instrument, timeframe, query);
      const last = page[page.length - 1];
      if (!last) {
        break;
      }
      collected.push(...page);
      if (Date.parse(last.openTime) >= endEpoch || page.length < query.count) {
        break;
      }
      query = { from: last.openTime, count: this.pageSize, includeFirst: false };
    }

    return filterCandlesInRange(normalizeSeries(collected), start, end);
  }

  private async fetchPage(
    instrument: string,
    timeframe: Timeframe,
    query: PageQuery,
  ): Promise<Candle[]> {
    const url = new URL(
      `${this.baseUrl}/v3/instruments/${encodeURIComponent(instrument)}/candles`,
    );
    url.searchParams.set("granularity", timeframe);
    url.searchParams.set("price", "M");
    url.searchParams.set("count", String(query.count));
    if (query.from) {
      url.searchParams.set("from", query.from);
      url.searchParams.set("includeFirst", query.includeFirst === false ? "false" : "true");
    }

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url.toString(), {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Accept-Datetime-Format": "RFC3339",
        },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new DataSourceError(`OANDA request failed: ${describeError(error)}`, {
        instrument,
        timeframe,
        cause: error,
      });
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new DataSourceError(describeStatus(response.statusCode, instrument, timeframe), {
        instrument,
        timeframe,
        statusCode: response.statusCode,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new DataSourceError(`Unable to parse OANDA response: ${String(error)}`, {
        instrument,
        timeframe,
        statusCode: response.statusCode,
      });
    }

    const candles = isRecord(payload) ? payload.candles : undefined;
    if (!Array.isArray(candles)) {
      const payloadStr = JSON.stringify(payload) ?? String(payload);
      throw new DataSourceError(
        `OANDA response for ${instrument} (${timeframe}) has no candles: ${payloadStr.slice(0, 200)}`,
        { instrument, timeframe, statusCode: response.statusCode },
      );
    }

    return candles
      .map((record: unknown) => toCandle(record))
      .filter((candle): candle is Candle => candle !== null);
  }
}

const describeStatus = (statusCode: number, instrument: string, timeframe: string): string => {
  switch (statusCode) {
    case 400:
      return `OANDA rejected the candle request for ${instrument} (${timeframe}).`;
    case 401:
    case 403:
      return "OANDA authentication failed. Please verify your OANDA_API_KEY is valid.";
    case 404:
      return `Instrument "${instrument}" not found on OANDA.`;
    case 429:
      return "OANDA rate limit exceeded. Please wait before making more requests.";
    default:
      return `OANDA request failed with status ${statusCode}`;
  }
};

const toCandle = (value: unknown): Candle | null => {
  if (!isRecord(value)) {
    return null;
  }
  const { mid: prices, time } = value;
  if (!isRecord(prices) || typeof time !== "string") {
    return null;
  }
  const openTime = normalizeTimestamp(time);
  const open = toNumber(prices.o);
  const high = toNumber(prices.h);
  const low = toNumber(prices.l);
  const close = toNumber(prices.c);
  const volume = toNumber(value.volume);

  if (openTime === null || open === null || high === null || low === null || close === null) {
    return null;
  }

  return {
    openTime,
    open,
    high,
    low,
    close,
    complete: value.complete === true,
    ...(volume === null ? {} : { volume }),
  };
};
