import { describeError, type AlertPayload, type AlertSink, type Strategy } from "@candle-sentry/sdk";
import { createLogger, type Logger } from "@candle-sentry/logger";

import {
  evaluateUnit,
  unitErrorMeta,
  windowRequestFor,
  type UnitOutcome,
} from "./evaluation.js";
import { StrategyStateStore } from "./state.js";
import type { TickWindowProvider, WindowResult } from "./windows.js";

export type RunnerStatus = "idle" | "evaluating";

export interface StrategyRunnerOptions {
  /** Evaluation units in configuration order. */
  readonly strategies: ReadonlyArray<Strategy>;
  readonly windows: TickWindowProvider;
  readonly sink: AlertSink;
  readonly states?: StrategyStateStore;
  readonly logger?: Logger;
}

export interface TickSummary {
  readonly evaluated: number;
  readonly triggered: number;
  readonly duplicate: number;
  readonly insufficient: number;
  /** Units whose fetch, evaluation or delivery failed. */
  readonly failed: number;
  readonly alerts: ReadonlyArray<AlertPayload>;
}

/**
 * Live orchestrator. Each tick evaluates every unit once against the newest
 * completed candles and hands new positive verdicts to the sink.
 */
export class StrategyRunner {
  private readonly strategies: ReadonlyArray<Strategy>;
  private readonly windows: TickWindowProvider;
  private readonly sink: AlertSink;
  private readonly states: StrategyStateStore;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private currentStatus: RunnerStatus = "idle";

  public constructor(options: StrategyRunnerOptions) {
    this.strategies = options.strategies;
    this.windows = options.windows;
    this.sink = options.sink;
    this.states = options.states ?? new StrategyStateStore();
    this.logger = options.logger ?? createLogger("engine/runner");

    for (const strategy of this.strategies) {
      this.windows.reserve(strategy.instrument, strategy.timeframe, strategy.requiredCandles);
    }
  }

  public get status(): RunnerStatus {
    return this.currentStatus;
  }

  public get isScheduled(): boolean {
    return this.timer !== null;
  }

  public get stateStore(): StrategyStateStore {
    return this.states;
  }

  /**
   * Runs one pass over every unit. Resolves to null when a tick is already
   * in progress.
   */
  public async tick(): Promise<TickSummary | null> {
    if (this.currentStatus === "evaluating") {
      this.logger.warn("Previous tick still running; skipping");
      return null;
    }

    this.currentStatus = "evaluating";
    this.windows.beginTick();
    const counts = { evaluated: 0, triggered: 0, duplicate: 0, insufficient: 0, failed: 0 };
    const alerts: AlertPayload[] = [];

    try {
      for (const strategy of this.strategies) {
        let result: WindowResult;
        try {
          result = await this.windows.getWindow(windowRequestFor(strategy));
        } catch (error) {
          counts.failed += 1;
          this.logger.error("Candle fetch failed", unitErrorMeta(strategy, error));
          continue;
        }

        let outcome: UnitOutcome;
        try {
          outcome = evaluateUnit(strategy, result, this.states, this.logger);
        } catch (error) {
          counts.failed += 1;
          this.logger.error("Strategy evaluation failed", unitErrorMeta(strategy, error));
          continue;
        }

        if (outcome.kind !== "evaluated") {
          counts[outcome.kind] += 1;
          continue;
        }
        counts.evaluated += 1;
        if (!outcome.verdict.triggered) {
          continue;
        }
        counts.triggered += 1;

        const payload: AlertPayload = {
          strategy: strategy.name,
          instrument: strategy.instrument,
          timeframe: strategy.timeframe,
          timestamp: outcome.timestamp,
          reason: outcome.verdict.reason,
        };
        try {
          await this.sink.deliver(payload);
          alerts.push(payload);
        } catch (error) {
          counts.failed += 1;
          this.logger.error("Alert delivery failed", unitErrorMeta(strategy, error));
        }
      }
    } finally {
      this.currentStatus = "idle";
    }

    this.logger.info("Tick complete", { ...counts, alerts: alerts.length });
    return { ...counts, alerts };
  }

  /**
   * Runs a tick now and then once per interval until `stop()`.
   */
  public start(intervalMs: number): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setInterval(() => {
      void this.scheduledTick();
    }, intervalMs);
    void this.scheduledTick();
  }

  public stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async scheduledTick(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      this.logger.error("Tick failed", { error: describeError(error) });
    }
  }
}
