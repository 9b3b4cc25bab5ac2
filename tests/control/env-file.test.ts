import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import dotenv from "dotenv";
import { ConfigurationError } from "../../src/errors/app.errors";
import {
  applyEnvUpdates,
  filterAllowed,
  isRepresentableEnvValue,
  readEnvFile,
  serializeEnvValue,
  updateEnvFile,
} from "../../src/control/env-file";

test("serializeEnvValue quotes only when needed", () => {
  assert.equal(serializeEnvValue("plain"), "plain");
  assert.equal(serializeEnvValue(""), '""');
  assert.equal(serializeEnvValue("two words"), "'two words'");
  assert.equal(serializeEnvValue('say "hi"'), "'say \"hi\"'");
  assert.equal(serializeEnvValue("a#b"), "'a#b'");
  assert.equal(serializeEnvValue("it's on"), "`it's on`");
  assert.equal(serializeEnvValue('a"b'), 'a"b');
});

test("written values read back unchanged through dotenv", () => {
  const values: Record<string, string> = {
    QUOTE: 'a"b',
    BACKSLASH: "C:\\new dir\\app",
    APOSTROPHE: "it's \"x\"",
    EMPTY: "",
    LEADING_QUOTE: '"wrapped"',
    HASH: "x # y",
  };
  assert.deepEqual(dotenv.parse(applyEnvUpdates("", values)), values);
});

test("values dotenv cannot hold are refused", () => {
  assert.equal(isRepresentableEnvValue("line\nbreak"), false);
  assert.equal(isRepresentableEnvValue("it's `x` \"y\""), false);
  assert.equal(isRepresentableEnvValue("it's `x` y"), true);
  assert.equal(isRepresentableEnvValue("C:\\new dir\\"), false);
  assert.equal(isRepresentableEnvValue("C:\\dir\\"), true);
  assert.throws(() => serializeEnvValue("line\nbreak"), ConfigurationError);
});

test("filterAllowed keeps allowlisted keys in sorted order", () => {
  assert.deepEqual(Object.entries(filterAllowed({ Z: "1", A: "2", SECRET: "3" }, ["Z", "A"])), [
    ["A", "2"],
    ["Z", "1"],
  ]);
});

describe("applyEnvUpdates", () => {
  test("rewrites existing keys in place and appends new ones", () => {
    const text = "# tuning\nBOT_MIN_GRADE=A\nexport BOT_MAX_BETS=5\nOTHER=1\n";
    assert.equal(
      applyEnvUpdates(text, { BOT_MAX_BETS: "3", BOT_POLL_SECONDS: "15" }),
      "# tuning\nBOT_MIN_GRADE=A\nBOT_MAX_BETS=3\nOTHER=1\nBOT_POLL_SECONDS=15\n",
    );
  });

  test("starts an empty file", () => {
    assert.equal(applyEnvUpdates("", { A: "1" }), "A=1\n");
  });
});

describe("env file on disk", () => {
  const allowlist = ["BOT_MIN_GRADE", "BOT_MAX_BETS"];

  test("a missing file reads as empty", async () => {
    assert.deepEqual(await readEnvFile(path.join(os.tmpdir(), "does-not-exist.env"), allowlist), {});
  });

  test("updates atomically and returns only allowlisted values", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "env-file-"));
    try {
      const file = path.join(dir, ".env");
      await fs.writeFile(file, "BOT_MIN_GRADE=A\nPOLY_PRIVATE_KEY=test-secret\n", "utf8");

      const result = await updateEnvFile(file, { BOT_MIN_GRADE: "B", BOT_MAX_BETS: "4" }, allowlist);

      assert.deepEqual(result, { BOT_MAX_BETS: "4", BOT_MIN_GRADE: "B" });
      assert.equal(
        await fs.readFile(file, "utf8"),
        "BOT_MIN_GRADE=B\nPOLY_PRIVATE_KEY=test-secret\nBOT_MAX_BETS=4\n",
      );
      assert.deepEqual(await fs.readdir(dir), [".env"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
