#!/usr/bin/env node
import { loadBotConfigFromEnv, parseCliOverrides } from "./config/bot-config";
import { ConfigurationError } from "./errors/app.errors";
import { createBotRuntime, createExecutionClient, logPreflight } from "./bot/runtime";
import { ConsoleLogger, LogBuffer } from "./utils/logger.util";
import { sanitizeErrorMessage } from "./utils/sanitize-axios-error.util";

async function main(): Promise<number> {
  const overrides = parseCliOverrides(process.argv.slice(2));
  const config = loadBotConfigFromEnv(overrides);
  const logs = new LogBuffer(config.control.logLinesMax);
  const logger = new ConsoleLogger(logs);

  if (config.preflightOnly) {
    const report = await createExecutionClient(config, logger).preflight();
    logPreflight(report, logger);
    return report.ok ? 0 : 1;
  }

  const runtime = createBotRuntime(config, logger, logs);
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`[Runtime] ${signal} received`);
    runtime.shutdown().catch((err: unknown) => {
      logger.error(`[Runtime] Shutdown failed: ${sanitizeErrorMessage(err)}`);
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  return runtime.run();
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(`Fatal: ${sanitizeErrorMessage(err)}`);
    }
    process.exit(1);
  });
