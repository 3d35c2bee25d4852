import type { Candle, ISODate, Timeframe } from "@candle-sentry/sdk";

/**
 * Upstream provider of candles. Both calls resolve to candles ordered by
 * `openTime` ascending; `complete` is true only for closed bars. Failures
 * reject with `DataSourceError`.
 */
export interface ICandleSource {
  readonly id: string;
  /** The newest `count` candles, the forming one included when present. */
  fetchLatest(instrument: string, timeframe: Timeframe, count: number): Promise<ReadonlyArray<Candle>>;
  /** Every candle whose open time falls inside `[start, end]`. */
  fetchRange(
    instrument: string,
    timeframe: Timeframe,
    start: ISODate,
    end: ISODate,
  ): Promise<ReadonlyArray<Candle>>;
}
