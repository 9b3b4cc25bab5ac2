import { test } from "node:test";
import assert from "node:assert/strict";
import { createClobClient } from "../../../src/bot/executor/clob-client.factory";
import { loadBotConfig } from "../../../src/config/bot-config";
import { ConfigurationError } from "../../../src/errors/app.errors";

test("refuses to build a live client without a private key", async () => {
  const config = loadBotConfig({}, { BOT_BASE_URL: "http://feed.test", BOT_API_KEY: "test-key" });
  await assert.rejects(createClobClient(config.poly), ConfigurationError);
});
