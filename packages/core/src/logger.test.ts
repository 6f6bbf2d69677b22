import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { logger, type LogEntry } from "./logger.js";

let entries: LogEntry[];
let previousLevel: ReturnType<typeof logger.getLevel>;

beforeEach(() => {
  entries = [];
  previousLevel = logger.getLevel();
  logger.resetHandlers();
  logger.setLevel("error");
  logger.addHandler((entry) => entries.push(entry));
});

afterEach(() => {
  logger.resetHandlers();
  logger.setLevel(previousLevel);
});

describe("logger", () => {
  it("filters entries below the current level", () => {
    logger.warn("dropped");
    logger.error("kept");

    expect(entries.map((e) => e.message)).toEqual(["kept"]);
  });

  it("merges child context into every entry", () => {
    logger.setLevel("debug");
    const log = logger.child({ component: "scoring" }).child({ claimId: 7 });

    log.debug("computed", { phase: "quality" });

    expect(entries).toHaveLength(1);
    expect(entries[0].context).toEqual({ component: "scoring", claimId: 7, phase: "quality" });
  });

  it("attaches error details", () => {
    logger.error("failed", new Error("bad row"));

    expect(entries[0].error?.message).toBe("bad row");
    expect(entries[0].error?.name).toBe("Error");
  });

  it("formats metrics as info entries", () => {
    logger.setLevel("info");
    logger.metric("claims_scored", 3, { trendSlug: "creatine" });

    expect(entries[0].message).toBe("METRIC: claims_scored=3");
    expect(entries[0].context).toEqual({ trendSlug: "creatine", metric: "claims_scored", value: 3 });
  });
});
