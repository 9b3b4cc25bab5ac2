import { describe, test } from "node:test";
import assert from "node:assert/strict";
import {
  isWithinWindow,
  localMinutesOfDay,
  parseTimeOfDay,
  TimeGate,
  type RunWindow,
} from "../../../src/bot/utils/time-gate";

const overnight: RunWindow = { startMinutes: 22 * 60, endMinutes: 2 * 60, timeZone: "UTC" };

describe("isWithinWindow", () => {
  test("a window that wraps midnight is open on both sides of it", () => {
    assert.equal(isWithinWindow(23 * 60 + 30, overnight), true);
    assert.equal(isWithinWindow(60, overnight), true);
    assert.equal(isWithinWindow(12 * 60, overnight), false);
  });

  test("start is inclusive, end exclusive", () => {
    assert.equal(isWithinWindow(22 * 60, overnight), true);
    assert.equal(isWithinWindow(2 * 60, overnight), false);
    const day: RunWindow = { startMinutes: 9 * 60, endMinutes: 17 * 60, timeZone: "UTC" };
    assert.equal(isWithinWindow(9 * 60, day), true);
    assert.equal(isWithinWindow(17 * 60, day), false);
  });

  test("equal start and end means open all day", () => {
    const allDay: RunWindow = { startMinutes: 600, endMinutes: 600, timeZone: "UTC" };
    assert.equal(isWithinWindow(0, allDay), true);
    assert.equal(isWithinWindow(1439, allDay), true);
  });
});

describe("TimeGate", () => {
  test("reads wall-clock time in the configured zone", () => {
    const gate = new TimeGate(overnight);
    assert.equal(gate.isOpen(Date.UTC(2024, 0, 15, 23, 30)), true);
    assert.equal(gate.isOpen(Date.UTC(2024, 0, 16, 1, 0)), true);
    assert.equal(gate.isOpen(Date.UTC(2024, 0, 16, 12, 0)), false);
    assert.equal(gate.describe(), "22:00-02:00 UTC");
  });

  test("honours daylight saving in named zones", () => {
    assert.equal(localMinutesOfDay(Date.UTC(2024, 0, 15, 3, 30), "America/New_York"), 22 * 60 + 30);
    assert.equal(localMinutesOfDay(Date.UTC(2024, 6, 15, 3, 30), "America/New_York"), 23 * 60 + 30);
  });

  test("no window is always open", () => {
    const gate = new TimeGate();
    assert.equal(gate.isOpen(Date.UTC(2024, 0, 16, 12, 0)), true);
    assert.equal(gate.describe(), "always");
  });
});

test("parseTimeOfDay accepts HH:MM only", () => {
  assert.equal(parseTimeOfDay("7:05"), 425);
  assert.equal(parseTimeOfDay("23:59"), 1439);
  assert.equal(parseTimeOfDay("24:00"), undefined);
  assert.equal(parseTimeOfDay("12:60"), undefined);
  assert.equal(parseTimeOfDay("noon"), undefined);
});
