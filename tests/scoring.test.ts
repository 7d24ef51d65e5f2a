import { describe, expect, test } from "vitest";
import { computeFinalScore, scoreBreakdown, weightsSumToOne } from "../src/validation/scoring.js";

const weights = { compilation: 0.5, pattern_match: 0.3, naming: 0.2 };

describe("computeFinalScore", () => {
  test("a perfect run scores 10", () => {
    expect(computeFinalScore(weights, true, 10, 1)).toBeCloseTo(10, 10);
  });

  test("weights each dimension", () => {
    expect(computeFinalScore(weights, false, 6.67, 0.5)).toBeCloseTo(3.001, 10);
    expect(computeFinalScore(weights, true, 0, 0)).toBeCloseTo(5, 10);
  });

  test("stays within 0..10 for valid inputs", () => {
    [true, false].forEach((compiles) => {
      [0, 3.33, 6.67, 10].forEach((pattern) => {
        [0, 0.25, 1].forEach((naming) => {
          const score = computeFinalScore(weights, compiles, pattern, naming);
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(10 + 1e-9);
        });
      });
    });
  });

  test("breakdown sums to the final score", () => {
    const parts = scoreBreakdown(weights, true, 6.67, 0.5);
    expect(parts.compile).toBeCloseTo(5, 10);
    expect(parts.compile + parts.pattern + parts.naming).toBeCloseTo(computeFinalScore(weights, true, 6.67, 0.5), 10);
  });
});

describe("weightsSumToOne", () => {
  test("accepts floating point noise", () => {
    expect(weightsSumToOne({ compilation: 0.1, pattern_match: 0.2, naming: 0.7 })).toBe(true);
  });

  test("rejects weights that do not sum to 1", () => {
    expect(weightsSumToOne({ compilation: 0.5, pattern_match: 0.5, naming: 0.1 })).toBe(false);
  });
});
