import { describe, expect, it } from "vitest";
import { InvalidInputError } from "@trend-evidence/core";
import { rollUpClaimScores } from "./rollup.js";

describe("rollUpClaimScores", () => {
  it("returns null when no claim is scored", () => {
    expect(rollUpClaimScores([])).toBeNull();
  });

  it("averages claim scores and grades the mean", () => {
    const rollUp = rollUpClaimScores([9.5, 8.0, 6.0]);

    expect(rollUp?.score).toBeCloseTo(7.8333, 3);
    expect(rollUp?.displayScore).toBe(7.8);
    expect(rollUp?.grade).toBe("B");
    expect(rollUp?.claimCount).toBe(3);
  });

  it("grades on the boundary", () => {
    expect(rollUpClaimScores([9, 10])).toEqual({
      score: 9.5,
      displayScore: 9.5,
      grade: "A+",
      claimCount: 2,
    });
  });

  it("rejects stored scores outside the scale", () => {
    expect(() => rollUpClaimScores([12])).toThrow(InvalidInputError);
  });
});
