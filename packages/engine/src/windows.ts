import type { Candle, CandleWindow, Timeframe } from "@candle-sentry/sdk";
import { completedOnly, normalizeSeries, type ICandleSource } from "@candle-sentry/data";

export interface WindowRequest {
  readonly instrument: string;
  readonly timeframe: Timeframe;
  /** Completed candles wanted; fewer is reported as insufficient. */
  readonly size: number;
}

export type WindowResult =
  | { readonly status: "ready"; readonly window: CandleWindow }
  | { readonly status: "insufficient"; readonly available: number };

export interface WindowProvider {
  getWindow(request: WindowRequest): Promise<WindowResult>;
}

/**
 * Provider used by the live runner: fetches once per instrument/timeframe per
 * tick, sized for the hungriest strategy on that combination.
 */
export interface TickWindowProvider extends WindowProvider {
  /** Ensures ticks fetch at least `size` completed candles for the combination. */
  reserve(instrument: string, timeframe: Timeframe, size: number): void;
  /** Drops the candles cached by the previous tick. */
  beginTick(): void;
}

const comboKey = (instrument: string, timeframe: Timeframe): string => `${instrument}|${timeframe}`;

interface CachedFetch {
  readonly count: number;
  readonly candles: Promise<ReadonlyArray<Candle>>;
}

/**
 * Window source whose cursor is "now". Asks for one candle more than needed
 * so the forming bar can be dropped without shrinking the window.
 */
export class LiveWindowProvider implements TickWindowProvider {
  private readonly reserved = new Map<string, number>();
  private cache = new Map<string, CachedFetch>();

  public constructor(private readonly source: ICandleSource) {}

  public reserve(instrument: string, timeframe: Timeframe, size: number): void {
    const key = comboKey(instrument, timeframe);
    this.reserved.set(key, Math.max(this.reserved.get(key) ?? 0, size));
  }

  public beginTick(): void {
    this.cache = new Map();
  }

  public async getWindow(request: WindowRequest): Promise<WindowResult> {
    const candles = await this.fetch(request);
    const completed = completedOnly(normalizeSeries(candles)).slice(-request.size);
    if (completed.length < request.size) {
      return { status: "insufficient", available: completed.length };
    }
    return { status: "ready", window: completed };
  }

  private fetch(request: WindowRequest): Promise<ReadonlyArray<Candle>> {
    const key = comboKey(request.instrument, request.timeframe);
    const count = Math.max(this.reserved.get(key) ?? 0, request.size) + 1;
    const cached = this.cache.get(key);
    if (cached && cached.count >= count) {
      return cached.candles;
    }
    const candles = this.source.fetchLatest(request.instrument, request.timeframe, count);
    this.cache.set(key, { count, candles });
    return candles;
  }
}

/**
 * Replays a pre-loaded series. The cursor only moves forward and the window
 * always ends at the cursor, so a strategy never sees a later candle.
 */
export class HistoricalWindowProvider implements WindowProvider {
  private cursor = -1;

  public constructor(private readonly series: ReadonlyArray<Candle>) {}

  public get length(): number {
    return this.series.length;
  }

  public get position(): number {
    return this.cursor;
  }

  public moveTo(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.series.length) {
      throw new RangeError(`cursor ${index} is outside a series of ${this.series.length}`);
    }
    if (index < this.cursor) {
      throw new RangeError(`cursor cannot move backwards from ${this.cursor} to ${index}`);
    }
    this.cursor = index;
  }

  public async getWindow(request: WindowRequest): Promise<WindowResult> {
    const available = this.cursor + 1;
    if (available < request.size) {
      return { status: "insufficient", available };
    }
    return {
      status: "ready",
      window: this.series.slice(available - request.size, available),
    };
  }
}
