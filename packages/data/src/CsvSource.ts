import { readFile } from "node:fs/promises";
import { join } from "node:path";

import {
  DataSourceError,
  describeError,
  type Candle,
  type ISODate,
  type Timeframe,
} from "@candle-sentry/sdk";

import type { ICandleSource } from "./ICandleSource.js";
import {
  filterCandlesInRange,
  normalizeSeries,
  normalizeTimestamp,
  slugify,
  toNumber,
} from "./internalUtils.js";

const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
}

/**
 * Offline candle series read from `<instrument>_<timeframe>.csv`
 * (`time,open,high,low,close[,complete]`, header row required).
 */
export class CsvSource implements ICandleSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
  }

  public async fetchLatest(
    instrument: string,
    timeframe: Timeframe,
    count: number,
  ): Promise<ReadonlyArray<Candle>> {
    const series = await this.loadSeries(instrument, timeframe);
    return count > 0 ? series.slice(-count) : [];
  }

  public async fetchRange(
    instrument: string,
    timeframe: Timeframe,
    start: ISODate,
    end: ISODate,
  ): Promise<ReadonlyArray<Candle>> {
    const series = await this.loadSeries(instrument, timeframe);
    return filterCandlesInRange(series, start, end);
  }

  public resolveDatasetPath(instrument: string, timeframe: Timeframe): string {
    return join(this.datasetsDir, `${slugify(instrument)}_${slugify(timeframe)}.csv`);
  }

  private async loadSeries(instrument: string, timeframe: Timeframe): Promise<Candle[]> {
    const datasetPath = this.resolveDatasetPath(instrument, timeframe);
    let content: string;
    try {
      content = await readFile(datasetPath, { encoding: "utf-8" });
    } catch (error) {
      throw new DataSourceError(`Unable to read dataset ${datasetPath}: ${describeError(error)}`, {
        instrument,
        timeframe,
        cause: error,
      });
    }
    return parseCsv(content);
  }
}

const parseCsv = (content: string): Candle[] => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  // Remove header row.
  const [, ...rows] = lines;
  const candles = rows.map(toCandle).filter((candle): candle is Candle => candle !== null);
  return normalizeSeries(candles);
};

const toCandle = (row: string): Candle | null => {
  const [time, openStr, highStr, lowStr, closeStr, completeStr] = row
    .split(",")
    .map((part) => part.trim());

  const openTime = time ? normalizeTimestamp(time) : null;
  const open = toNumber(openStr);
  const high = toNumber(highStr);
  const low = toNumber(lowStr);
  const close = toNumber(closeStr);

  if (openTime === null || open === null || high === null || low === null || close === null) {
    return null;
  }

  const flag = completeStr?.toLowerCase();
  return {
    openTime,
    open,
    high,
    low,
    close,
    complete: flag !== "false" && flag !== "0",
  };
};
