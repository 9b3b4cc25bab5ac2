import { loadBotConfigFromEnv, parseCliOverrides } from "../config/bot-config";
import { createExecutionClient, logPreflight } from "../bot/runtime";
import { ConsoleLogger } from "../utils/logger.util";
import { sanitizeErrorMessage } from "../utils/sanitize-axios-error.util";

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const config = loadBotConfigFromEnv(parseCliOverrides(process.argv.slice(2)));
  const client = createExecutionClient(config, logger);
  logger.info(`[Preflight] Checking ${client.mode} execution client`);
  const report = await client.preflight();
  logPreflight(report, logger);
  if (!report.ok) {
    process.exitCode = 1;
  }
}

main().catch((err) => {
  console.error(`[Preflight] Failed: ${sanitizeErrorMessage(err)}`);
  process.exit(1);
});
