import { test } from "node:test";
import assert from "node:assert/strict";
import {
  defaultProbabilityForGrade,
  gradeRank,
  meetsMinGrade,
} from "../../src/constants/grades.constants";

test("grades rank best first", () => {
  assert.deepEqual(["A+", "A", "B", "C", "D", "E"].map(gradeRank), [5, 4, 3, 2, 1, -1]);
});

test("meetsMinGrade normalizes labels and rejects unknown ones", () => {
  assert.equal(meetsMinGrade(" a+ ", "A"), true);
  assert.equal(meetsMinGrade("A", "A"), true);
  assert.equal(meetsMinGrade("B", "A"), false);
  assert.equal(meetsMinGrade("E", "D"), false);
});

test("default probabilities follow the grade", () => {
  assert.equal(defaultProbabilityForGrade("b"), 0.54);
  assert.equal(defaultProbabilityForGrade("unknown"), 0.5);
});
