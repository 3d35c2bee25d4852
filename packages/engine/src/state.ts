import type { ISODate, Strategy, Timeframe } from "@candle-sentry/sdk";

/**
 * Dedupe record for one (strategy, instrument, timeframe). Created with a
 * null timestamp and updated after every evaluation attempt.
 */
export interface StrategyState {
  readonly strategyId: string;
  readonly instrument: string;
  readonly timeframe: Timeframe;
  lastEvaluatedTimestamp: ISODate | null;
}

export const stateKey = (strategy: Pick<Strategy, "name" | "instrument" | "timeframe">): string =>
  `${strategy.name}|${strategy.instrument}|${strategy.timeframe}`;

/**
 * Orchestrator-owned dedupe state. A live runner keeps one store for its
 * lifetime; every backtest run starts from a fresh one.
 */
export class StrategyStateStore {
  private readonly states = new Map<string, StrategyState>();

  public get(strategy: Strategy): StrategyState {
    const key = stateKey(strategy);
    let state = this.states.get(key);
    if (!state) {
      state = {
        strategyId: strategy.name,
        instrument: strategy.instrument,
        timeframe: strategy.timeframe,
        lastEvaluatedTimestamp: null,
      };
      this.states.set(key, state);
    }
    return state;
  }

  public markEvaluated(strategy: Strategy, timestamp: ISODate): void {
    this.get(strategy).lastEvaluatedTimestamp = timestamp;
  }

  public get size(): number {
    return this.states.size;
  }

  /** Copies of every state, in creation order. */
  public snapshot(): StrategyState[] {
    return Array.from(this.states.values(), (state) => ({ ...state }));
  }
}
