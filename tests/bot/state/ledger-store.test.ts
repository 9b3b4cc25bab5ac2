import { afterEach, beforeEach, describe, test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { decodeLedgerFile, JsonFileLedgerStore, legacyIdentities } from "../../../src/bot/state/ledger-store";
import { BASE_TIME, MemoryLogger } from "../../helpers/fakes";

describe("decodeLedgerFile", () => {
  test("migrates the legacy placedMeta layout", () => {
    const snapshot = decodeLedgerFile(
      {
        placed: ["0xc1:A"],
        placedMeta: { "0xc1:A": { placedAt: 1717243200, eventTime: "2024-06-01T18:00:00Z" } },
        bankroll: 812.5,
      },
      BASE_TIME + 5000,
    );
    assert.deepEqual(snapshot, {
      entries: [{ identity: "0xc1:A", actionTime: BASE_TIME, eventTime: Date.UTC(2024, 5, 1, 18) }],
      bankroll: 812.5,
    });
  });

  test("a bare placed list is stamped with the load time", () => {
    const snapshot = decodeLedgerFile({ placed: ["0xc1:A", "", 7] }, BASE_TIME);
    assert.deepEqual(snapshot, { entries: [{ identity: "0xc1:A", actionTime: BASE_TIME }], bankroll: undefined });
  });

  test("a bare condition id blocks both sides of the market", () => {
    const snapshot = decodeLedgerFile(
      { placed: ["0xc1"], placedMeta: { "0xc1": { placedAt: 1717243200 } } },
      BASE_TIME + 5000,
    );
    assert.deepEqual(snapshot.entries, [
      { identity: "0xc1:A", actionTime: BASE_TIME, eventTime: undefined },
      { identity: "0xc1:B", actionTime: BASE_TIME, eventTime: undefined },
    ]);
  });

  test("legacyIdentities keeps sided keys as they are", () => {
    assert.deepEqual(legacyIdentities("0xc1:B"), ["0xc1:B"]);
    assert.deepEqual(legacyIdentities("0xc2"), ["0xc2:A", "0xc2:B"]);
  });

  test("non-object documents decode to an empty ledger", () => {
    assert.deepEqual(decodeLedgerFile([1, 2], BASE_TIME), { entries: [] });
    assert.deepEqual(decodeLedgerFile("x", BASE_TIME), { entries: [] });
  });
});

describe("JsonFileLedgerStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ledger-store-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("round-trips entries and bankroll", async () => {
    const store = new JsonFileLedgerStore(path.join(dir, "nested", "state.json"));
    await store.save({
      entries: [
        { identity: "b:B", actionTime: BASE_TIME, expiresAt: BASE_TIME + 1000 },
        { identity: "a:A", actionTime: BASE_TIME, eventTime: BASE_TIME + 500, expiresAt: BASE_TIME + 2000 },
      ],
      bankroll: 975.25,
    });
    const loaded = await store.load(BASE_TIME);
    assert.equal(loaded.bankroll, 975.25);
    assert.deepEqual(loaded.entries, [
      { identity: "a:A", actionTime: BASE_TIME, eventTime: BASE_TIME + 500, expiresAt: BASE_TIME + 2000 },
      { identity: "b:B", actionTime: BASE_TIME, eventTime: undefined, expiresAt: BASE_TIME + 1000 },
    ]);
    const files = await fs.readdir(path.join(dir, "nested"));
    assert.deepEqual(files, ["state.json"]);
  });

  test("a missing file is an empty ledger", async () => {
    const store = new JsonFileLedgerStore(path.join(dir, "absent.json"));
    assert.deepEqual(await store.load(BASE_TIME), { entries: [] });
  });

  test("a corrupt file is logged and treated as empty", async () => {
    const file = path.join(dir, "state.json");
    await fs.writeFile(file, "{not json", "utf8");
    const logger = new MemoryLogger();
    const store = new JsonFileLedgerStore(file, logger);
    assert.deepEqual(await store.load(BASE_TIME), { entries: [] });
    assert.equal(logger.matching("WARN [Ledger]").length, 1);
  });
});
