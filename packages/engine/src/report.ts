import type { BacktestReport } from "@candle-sentry/sdk";

const escapeCell = (value: string): string => value.replace(/\|/g, "\\|");

/**
 * Markdown rendering of a backtest report. Depends only on the report, so
 * identical reports render identically.
 */
export const buildReportMarkdown = (report: BacktestReport): string => {
  const lines: string[] = [
    `# Backtest ${report.instrument} ${report.timeframe}`,
    "",
    `- Run: ${report.runId}`,
    `- Range: ${report.start} to ${report.end}`,
    `- Candles: ${report.candleCount}`,
    `- Strategies: ${report.strategies.join(", ")}`,
    "",
    "## Signal counts",
    "",
    "| Strategy | Signals |",
    "| --- | ---: |",
  ];

  for (const name of report.strategies) {
    lines.push(`| ${escapeCell(name)} | ${report.signalCounts[name] ?? 0} |`);
  }

  lines.push("", "## Signals", "");
  if (report.records.length === 0) {
    lines.push("No signals in range.");
  } else {
    lines.push("| Index | Candle time | Strategy | Reason |", "| ---: | --- | --- | --- |");
    for (const record of report.records) {
      lines.push(
        `| ${record.index} | ${record.timestamp} | ${escapeCell(record.strategy)} | ${escapeCell(record.reason)} |`,
      );
    }
  }

  return `${lines.join("\n")}\n`;
};
