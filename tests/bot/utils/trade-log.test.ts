import { test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { JsonlTradeLog, type TradeLogEntry } from "../../../src/bot/utils/trade-log";

const entry = (identity: string): TradeLogEntry => ({
  time: "2024-06-01T12:00:00.000Z",
  identity,
  decision: "dispatch",
  outcome: "simulated",
  stake: 12.5,
  mode: "paper",
});

test("appends one JSON line per entry, creating the directory", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "trade-log-"));
  try {
    const file = path.join(dir, "nested", "trades.jsonl");
    const log = new JsonlTradeLog(file);
    await log.append(entry("0xa:A"));
    await log.append(entry("0xb:B"));

    const lines = (await fs.readFile(file, "utf8")).trimEnd().split("\n");
    assert.deepEqual(
      lines.map((line) => JSON.parse(line)),
      [entry("0xa:A"), entry("0xb:B")],
    );
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("an empty path disables the log", async () => {
  await new JsonlTradeLog("").append(entry("0xa:A"));
});
