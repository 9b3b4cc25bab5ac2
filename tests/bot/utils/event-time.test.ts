import { test } from "node:test";
import assert from "node:assert/strict";
import { parseEventTimeMs } from "../../../src/bot/utils/event-time";

const NOON = Date.UTC(2024, 5, 1, 12, 0, 0);

test("epoch seconds and milliseconds", () => {
  assert.equal(parseEventTimeMs(1717243200), NOON);
  assert.equal(parseEventTimeMs(NOON), NOON);
  assert.equal(parseEventTimeMs("1717243200"), NOON);
  assert.equal(parseEventTimeMs(String(NOON)), NOON);
});

test("ISO strings without an offset are UTC", () => {
  assert.equal(parseEventTimeMs("2024-06-01T12:00:00"), NOON);
  assert.equal(parseEventTimeMs("2024-06-01 12:00:00"), NOON);
  assert.equal(parseEventTimeMs("2024-06-01T12:00:00Z"), NOON);
  assert.equal(parseEventTimeMs("2024-06-01T14:00:00+02:00"), NOON);
});

test("unusable values yield undefined", () => {
  assert.equal(parseEventTimeMs(undefined), undefined);
  assert.equal(parseEventTimeMs(null), undefined);
  assert.equal(parseEventTimeMs(0), undefined);
  assert.equal(parseEventTimeMs(""), undefined);
  assert.equal(parseEventTimeMs("soon"), undefined);
  assert.equal(parseEventTimeMs({}), undefined);
});
