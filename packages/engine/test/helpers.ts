import {
  DeliveryError,
  DataSourceError,
  type AlertPayload,
  type AlertSink,
  type Candle,
  type ISODate,
  type Timeframe,
} from "@candle-sentry/sdk";
import type { ICandleSource } from "@candle-sentry/data";

const HALF_HOUR_MS = 30 * 60 * 1000;

export const bear = (openTime: ISODate, complete = true): Candle => ({
  openTime,
  open: 100,
  high: 100.5,
  low: 98.5,
  close: 99,
  complete,
});

export const bull = (openTime: ISODate, complete = true): Candle => ({
  openTime,
  open: 99,
  high: 101.5,
  low: 98.5,
  close: 101,
  complete,
});

/** Half-hour open times starting at `start`. */
export const halfHours = (start: ISODate, count: number): ISODate[] => {
  const origin = Date.parse(start);
  return Array.from({ length: count }, (_, index) =>
    new Date(origin + index * HALF_HOUR_MS).toISOString(),
  );
};

/**
 * Repeating bear, bear, bear, bull cycle; the bull body is twice the bear body.
 */
export const cycleSeries = (start: ISODate, count: number, offset = 0): Candle[] => {
  return halfHours(start, count).map((time, index) =>
    (index + offset) % 4 === 3 ? bull(time) : bear(time),
  );
};

/**
 * Candle source over an in-memory series. `visible` limits what the newest
 * fetch can see; the candle at `visible - 1` is reported as still forming
 * when `formingLast` is set.
 */
export class InMemoryCandleSource implements ICandleSource {
  public readonly id = "memory";
  public latestCalls: Array<{ instrument: string; timeframe: Timeframe; count: number }> = [];
  public rangeCalls = 0;
  public visible: number;
  public formingLast = false;
  public failWith: Error | null = null;

  public constructor(private readonly series: ReadonlyArray<Candle>) {
    this.visible = series.length;
  }

  public async fetchLatest(
    instrument: string,
    timeframe: Timeframe,
    count: number,
  ): Promise<ReadonlyArray<Candle>> {
    this.latestCalls.push({ instrument, timeframe, count });
    if (this.failWith) {
      throw this.failWith;
    }
    const shown = this.series.slice(0, this.visible).map((candle, index) =>
      this.formingLast && index === this.visible - 1 ? { ...candle, complete: false } : candle,
    );
    return shown.slice(-count);
  }

  public async fetchRange(): Promise<ReadonlyArray<Candle>> {
    this.rangeCalls += 1;
    return this.series;
  }
}

/** Source that fails for one instrument and serves `series` for the rest. */
export class PartlyFailingSource extends InMemoryCandleSource {
  public constructor(
    series: ReadonlyArray<Candle>,
    private readonly failingInstrument: string,
  ) {
    super(series);
  }

  public override async fetchLatest(
    instrument: string,
    timeframe: Timeframe,
    count: number,
  ): Promise<ReadonlyArray<Candle>> {
    if (instrument === this.failingInstrument) {
      throw new DataSourceError("OANDA request failed with status 500", {
        instrument,
        timeframe,
        statusCode: 500,
      });
    }
    return super.fetchLatest(instrument, timeframe, count);
  }
}

export class RecordingSink implements AlertSink {
  public readonly id = "recording";
  public delivered: AlertPayload[] = [];
  public attempts = 0;
  public failNext = 0;

  public async deliver(payload: AlertPayload): Promise<void> {
    this.attempts += 1;
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new DeliveryError("Webhook responded with status 502", {
        strategy: payload.strategy,
        statusCode: 502,
      });
    }
    this.delivered.push(payload);
  }
}
