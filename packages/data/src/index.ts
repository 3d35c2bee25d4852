export type { ICandleSource } from "./ICandleSource.js";
export { CsvSource, type CsvSourceOptions } from "./CsvSource.js";
export {
  OandaSource,
  type OandaEnvironment,
  type OandaSourceOptions,
} from "./OandaSource.js";
export {
  createHttpClient,
  type HttpClient,
  type HttpRequestOptions,
  type HttpResponse,
} from "./httpClient.js";
export {
  completedOnly,
  filterCandlesInRange,
  normalizeSeries,
  normalizeTimestamp,
  sanitizeCandle,
} from "./internalUtils.js";
