/**
 * Raised while assembling a run: unknown strategy names, malformed dates,
 * missing credentials. Fatal before any evaluation starts.
 */
export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface DataSourceErrorDetails {
  readonly instrument: string;
  readonly timeframe: string;
  readonly statusCode?: number;
  readonly cause?: unknown;
}

/**
 * Upstream candle fetch failed for one instrument/timeframe.
 */
export class DataSourceError extends Error {
  public readonly instrument: string;
  public readonly timeframe: string;
  public readonly statusCode?: number;

  public constructor(message: string, details: DataSourceErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "DataSourceError";
    this.instrument = details.instrument;
    this.timeframe = details.timeframe;
    this.statusCode = details.statusCode;
  }
}

/**
 * The alert sink could not deliver a payload. Never rolls back dedupe state.
 */
export class DeliveryError extends Error {
  public readonly strategy: string;
  public readonly statusCode?: number;

  public constructor(
    message: string,
    details: { readonly strategy: string; readonly statusCode?: number; readonly cause?: unknown },
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "DeliveryError";
    this.strategy = details.strategy;
    this.statusCode = details.statusCode;
  }
}

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
