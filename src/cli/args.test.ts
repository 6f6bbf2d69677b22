import { describe, expect, it } from "vitest";
import { InvalidInputError } from "@trend-evidence/core";
import { parseArgs, parseClaimId, parseScore } from "./args.js";

describe("parseArgs", () => {
  it("shows help without arguments", () => {
    expect(parseArgs([]).command).toBe("help");
    expect(parseArgs(["score", "--help"]).command).toBe("help");
  });

  it("reads count flags for the score command", () => {
    const args = parseArgs([
      "score",
      "--rcts", "5",
      "--meta", "1",
      "--other", "3",
      "--sample", "60",
      "--years", "2",
      "--contradicting", "1",
      "--replication", "2",
      "--json",
    ]);

    expect(args.command).toBe("score");
    expect(args.counts).toEqual({
      humanRcts: 5,
      metaAnalyses: 1,
      humanOther: 3,
      avgSampleSize: 60,
      yearsSinceLast: 2,
      contradicting: 1,
      replicationScore: 2,
    });
    expect(args.options.json).toBe(true);
  });

  it("treats bare count flags as the score command", () => {
    const args = parseArgs(["--animal", "4", "--in-vitro", "2"]);

    expect(args.command).toBe("score");
    expect(args.counts.animalStudies).toBe(4);
    expect(args.counts.inVitroStudies).toBe(2);
  });

  it("reads targets and pipeline options", () => {
    const args = parseArgs(["trend", "magnesium-glycinate", "--dry-run", "-c", "5", "--year", "2025", "-v"]);

    expect(args.command).toBe("trend");
    expect(args.target).toBe("magnesium-glycinate");
    expect(args.options).toEqual({
      json: false,
      verbose: true,
      dryRun: true,
      concurrency: 5,
      year: 2025,
    });
  });

  it("accepts a negative number as a target", () => {
    expect(parseArgs(["grade", "-1"]).target).toBe("-1");
  });

  it("collects every malformed flag into one error", () => {
    try {
      parseArgs(["score", "--rcts", "five", "--years", "--bogus"]);
      expect.unreachable("parseArgs should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues).toEqual([
          { path: "--rcts", message: 'expected a number, received "five"' },
          { path: "--years", message: 'expected a number, received "--bogus"' },
        ]);
      }
    }
  });

  it("rejects unknown options and missing targets", () => {
    expect(() => parseArgs(["score", "--rtcs", "1"])).toThrow("--rtcs: unknown option");
    expect(() => parseArgs(["claim"])).toThrow("<id>: the claim command needs <id>");
    expect(() => parseArgs(["file", "a.json", "b.json"])).toThrow("b.json: unexpected argument");
  });
});

describe("parseClaimId", () => {
  it("accepts positive integers only", () => {
    expect(parseClaimId("42")).toBe(42);
    expect(() => parseClaimId("0")).toThrow(InvalidInputError);
    expect(() => parseClaimId("4.2")).toThrow(InvalidInputError);
    expect(() => parseClaimId("abc")).toThrow(InvalidInputError);
  });
});

describe("parseScore", () => {
  it("parses finite numbers", () => {
    expect(parseScore("9.5")).toBe(9.5);
    expect(() => parseScore("")).toThrow(InvalidInputError);
    expect(() => parseScore("high")).toThrow(InvalidInputError);
  });
});
