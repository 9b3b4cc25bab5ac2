import { describe, test } from "node:test";
import assert from "node:assert/strict";
import { computeStake, kellyFraction, type StakeParams } from "../../../src/bot/utils/staking";

const base: StakeParams = {
  bankroll: 1000,
  trueProb: 0.6,
  price: 0.5,
  kellyFraction: 0.25,
  minStake: 1,
  maxStake: 100,
  lowRoiThreshold: 0.72,
};

describe("kellyFraction", () => {
  test("even-money bet at 60% is a fifth of bankroll", () => {
    assert.ok(Math.abs(kellyFraction(0.6, 0.5) - 0.2) < 1e-12);
  });

  test("no edge yields zero", () => {
    assert.equal(kellyFraction(0.5, 0.6), 0);
    assert.equal(kellyFraction(0.5, 0.5), 0);
  });

  test("prices outside (0,1) yield zero", () => {
    assert.equal(kellyFraction(0.9, 0), 0);
    assert.equal(kellyFraction(0.9, 1), 0);
  });
});

describe("computeStake", () => {
  test("quarter Kelly on 1000 at 0.5 with p=0.6 accepts 50", () => {
    assert.deepEqual(computeStake(base), { kind: "accept", amount: 50 });
  });

  test("caps at maxStake", () => {
    assert.deepEqual(computeStake({ ...base, maxStake: 20 }), { kind: "accept", amount: 20 });
  });

  test("skips prices at or above the low-ROI threshold", () => {
    assert.deepEqual(computeStake({ ...base, price: 0.75 }), { kind: "skip", reason: "low_roi" });
    assert.deepEqual(computeStake({ ...base, price: 0.72 }), { kind: "skip", reason: "low_roi" });
  });

  test("skips when the edge is not positive", () => {
    assert.deepEqual(computeStake({ ...base, trueProb: 0.5, price: 0.6 }), {
      kind: "skip",
      reason: "negative_edge",
    });
  });

  test("skips amounts under the floor", () => {
    assert.deepEqual(computeStake({ ...base, bankroll: 10 }), { kind: "skip", reason: "below_floor" });
  });

  test("fixed stake replaces Kelly sizing", () => {
    assert.deepEqual(computeStake({ ...base, trueProb: 0.4, fixedStake: 7 }), { kind: "accept", amount: 7 });
    assert.deepEqual(computeStake({ ...base, fixedStake: 500 }), { kind: "accept", amount: 100 });
  });

  test("rejects invalid prices", () => {
    for (const price of [0, 1, -0.2, Number.NaN]) {
      assert.deepEqual(computeStake({ ...base, price }), { kind: "skip", reason: "invalid_price" });
    }
  });

  test("non-finite amounts are skipped", () => {
    assert.deepEqual(computeStake({ ...base, bankroll: Number.POSITIVE_INFINITY }), {
      kind: "skip",
      reason: "invalid_amount",
    });
  });

  test("accepted amounts stay within [minStake, maxStake]", () => {
    for (let bankroll = 0; bankroll <= 5000; bankroll += 250) {
      for (const price of [0.1, 0.3, 0.45, 0.6, 0.7]) {
        for (const trueProb of [0.5, 0.55, 0.65, 0.8]) {
          const decision = computeStake({ ...base, bankroll, price, trueProb, minStake: 2, maxStake: 40 });
          if (decision.kind === "accept") {
            assert.ok(decision.amount >= 2 && decision.amount <= 40, `${bankroll}/${price}/${trueProb}`);
          }
        }
      }
    }
  });
});
