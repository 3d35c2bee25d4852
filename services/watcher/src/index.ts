import { config as loadEnv } from "dotenv";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { ConfigurationError, describeError } from "@candle-sentry/sdk";
import { createLogger } from "@candle-sentry/logger";

import { runBacktestCommand, startLiveWatcher } from "./app.js";
import { loadConfig, parseCliArgs } from "./config.js";

const logger = createLogger("services/watcher");

const main = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));
  const config = loadConfig(process.env);
  const context = {
    config,
    rootDir: REPO_ROOT,
    logger: createLogger("services/watcher", { level: config.logLevel }),
  };

  if (cli.mode === "backtest") {
    await runBacktestCommand(cli, context);
    return;
  }

  const watcher = await startLiveWatcher(cli, context);
  const shutdown = (): void => {
    watcher.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

void main().catch((error) => {
  logger.error(error instanceof ConfigurationError ? "Configuration error" : "Watcher failed", {
    error: describeError(error),
  });
  process.exit(1);
});
