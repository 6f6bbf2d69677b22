/**
 * Score report formatting tests
 */

import { describe, expect, it } from "vitest";
import { score, scoreFromCounts } from "./engine.js";
import { formatScoreReport, summarizeEvidence } from "./report.js";

describe("formatScoreReport", () => {
  it("renders the headline, counts and weighted components", () => {
    const report = scoreFromCounts({
      humanRcts: 5,
      metaAnalyses: 1,
      humanOther: 3,
      avgSampleSize: 60,
      yearsSinceLast: 2,
    });

    const lines = formatScoreReport(report).split("\n");

    expect(lines[0]).toBe("=".repeat(60));
    expect(lines[1]).toBe("EVIDENCE SCORE: 9.5/10 (A)");
    expect(lines).toContain("  - Qualifying studies: 9");
    expect(lines).toContain("  - Meta-analyses:      1");
    expect(lines).toContain("  - Human RCTs:         5");
    expect(lines).toContain("  - Avg sample size:    60");
    expect(lines).toContain("  - Years since last:   2");
    expect(lines).toContain("  - Quantity:    9.5/10 -> 2.36 of 2.50 (9 qualifying studies)");
    expect(lines).toContain(
      "  - Quality:     9.1/10 -> 3.62 of 4.00 (weighted strength 26.0 human/meta, 0.0 animal/in vitro)"
    );
    expect(lines).toContain("  - Consistency: 10.0/10 -> 2.00 of 2.00 (9 supporting vs 0 contradicting)");
    expect(lines).toContain("  - Recency:     10.0/10 -> 1.50 of 1.50 (2 years since the most recent study)");
    expect(lines).toContain("  - Base score:   9.49");
    expect(lines).not.toContain("Adjustments:");
    expect(lines).not.toContain("Defaults Applied:");
    expect(lines[lines.length - 1]).toBe("=".repeat(60));
  });

  it("lists adjustments with signed deltas", () => {
    const penalised = score({
      humanRcts: 2,
      metaAnalyses: 0,
      humanOther: 1,
      avgSampleSize: 20,
      supporting: 3,
      yearsSinceLast: 4,
    });
    const single = score({
      humanRcts: 1,
      metaAnalyses: 0,
      humanOther: 0,
      avgSampleSize: 500,
      supporting: 1,
      yearsSinceLast: 0,
    });

    expect(formatScoreReport(penalised).split("\n")).toContain(
      "  - sample_size_penalty -1.00: Average human sample size 20 is below 30"
    );
    expect(formatScoreReport(single).split("\n")).toContain(
      "  + single_study_ceiling +0.00: Only one qualifying study; score capped at 6.9"
    );
  });

  it("lists the defaults applied for missing signals", () => {
    const lines = formatScoreReport(score({ humanRcts: 0, metaAnalyses: 0, humanOther: 0 })).split("\n");

    expect(lines[1]).toBe("EVIDENCE SCORE: 1.0/10 (F)");
    expect(lines).not.toContain("  - Avg sample size:    0");
    expect(lines).toContain("  - consistency = 5.0: No supporting or contradicting studies; neutral midpoint used");
    expect(lines).toContain("  - recency = 0.0: No dated studies; recency floor used");
  });

  it("lists skipped records by id or position", () => {
    const report = score(
      [
        { studyType: "rct", isHuman: true, sampleSize: 80, publicationYear: 2023, supportsClaim: "yes" },
        { id: "PMID-1", studyType: "rct", isHuman: true, sampleSize: 50, publicationYear: 2030 },
        { studyType: "rct", isHuman: true, sampleSize: 0, publicationYear: 2020 },
      ],
      { currentYear: 2025 }
    );

    const lines = formatScoreReport(report).split("\n");
    expect(lines).toContain("Skipped Records: 2");
    expect(lines).toContain("  - PMID-1: publicationYear: 2030 is after 2025");
    expect(lines).toContain("  - #2: sampleSize: human rct study with sample size 0");
  });
});

describe("summarizeEvidence", () => {
  it("names the strongest study types", () => {
    const report = scoreFromCounts({
      humanRcts: 5,
      metaAnalyses: 1,
      humanOther: 3,
      avgSampleSize: 60,
      yearsSinceLast: 2,
    });
    expect(summarizeEvidence(report)).toBe("Strong evidence from 1 meta-analysis and 5 RCTs.");
  });

  it("pluralises and handles RCT-only evidence", () => {
    const report = scoreFromCounts({ humanRcts: 1, metaAnalyses: 0, humanOther: 0, yearsSinceLast: 0 });
    expect(summarizeEvidence(report)).toBe("Limited evidence from 1 RCT.");
  });

  it("falls back when no meta-analysis or RCT exists", () => {
    const report = score({ humanRcts: 0, metaAnalyses: 0, humanOther: 0 });
    expect(summarizeEvidence(report)).toBe("Weak evidence. Limited research available.");
  });
});
