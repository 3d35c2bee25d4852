export { StrategyStateStore, stateKey, type StrategyState } from "./state.js";
export {
  HistoricalWindowProvider,
  LiveWindowProvider,
  type TickWindowProvider,
  type WindowProvider,
  type WindowRequest,
  type WindowResult,
} from "./windows.js";
export { evaluateUnit, windowRequestFor, type UnitOutcome } from "./evaluation.js";
export {
  StrategyRunner,
  type RunnerStatus,
  type StrategyRunnerOptions,
  type TickSummary,
} from "./runner.js";
export { makeRunId, runBacktest, type BacktestDependencies } from "./backtester.js";
export { buildReportMarkdown } from "./report.js";
export { writeBacktestArtifacts, type BacktestArtifacts } from "./persistence.js";
