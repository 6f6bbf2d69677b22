/**
 * Grade mapping tests
 */

import { describe, expect, it } from "vitest";
import { InvalidInputError } from "@trend-evidence/core";
import { evidenceStrength, gradeForScore } from "./grade.js";

describe("gradeForScore", () => {
  it.each([
    [10, "A+"],
    [9.5, "A+"],
    [9.49999, "A"],
    [9.0, "A"],
    [8.99, "A-"],
    [8.5, "A-"],
    [8.0, "B+"],
    [7.99, "B"],
    [7.0, "B"],
    [6.0, "B-"],
    [5.0, "C+"],
    [4.0, "C"],
    [3.0, "C-"],
    [2.99, "D"],
    [2.0, "D"],
    [1.99, "F"],
    [0, "F"],
  ] as const)("maps %s to %s", (score, grade) => {
    expect(gradeForScore(score)).toBe(grade);
  });

  it("accepts custom thresholds", () => {
    const thresholds = [
      { min: 5, grade: "A" },
      { min: 1, grade: "C" },
    ] as const;

    expect(gradeForScore(6, thresholds)).toBe("A");
    expect(gradeForScore(1, thresholds)).toBe("C");
    expect(gradeForScore(0.5, thresholds)).toBe("F");
  });

  it.each([-0.1, 10.01, Number.NaN, Number.POSITIVE_INFINITY])(
    "rejects out-of-domain score %s",
    (score) => {
      expect(() => gradeForScore(score)).toThrow(InvalidInputError);
    }
  );
});

describe("evidenceStrength", () => {
  it("labels scores by band", () => {
    expect(evidenceStrength(8)).toBe("Strong evidence");
    expect(evidenceStrength(7.99)).toBe("Moderate evidence");
    expect(evidenceStrength(4)).toBe("Limited evidence");
    expect(evidenceStrength(3.9)).toBe("Weak evidence");
  });
});
