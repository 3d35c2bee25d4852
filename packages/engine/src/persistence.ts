import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { BacktestReport } from "@candle-sentry/sdk";

import { buildReportMarkdown } from "./report.js";

export interface BacktestArtifacts {
  readonly reportJson: string;
  readonly reportMd: string;
}

export const writeBacktestArtifacts = async (
  runDir: string,
  report: BacktestReport,
): Promise<BacktestArtifacts> => {
  await mkdir(runDir, { recursive: true });

  const reportJson = join(runDir, "report.json");
  const reportMd = join(runDir, "report.md");
  await writeFile(reportJson, `${JSON.stringify(report, null, 2)}\n`, { encoding: "utf-8" });
  await writeFile(reportMd, buildReportMarkdown(report), { encoding: "utf-8" });

  return { reportJson, reportMd };
};
