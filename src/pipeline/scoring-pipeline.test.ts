/**
 * Scoring pipeline tests with the repositories replaced by in-memory fakes
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { DatabaseError, InvalidInputError, NotFoundError, resetBaseConfig } from "@trend-evidence/core";
import { claimRepo, studyRepo, trendRepo, type ClaimRow, type TrendRow } from "@trend-evidence/db";
import type { StudyRecordInput } from "@trend-evidence/scoring";
import { ScoringPipeline } from "./scoring-pipeline.js";

vi.mock("@trend-evidence/db", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@trend-evidence/db")>();
  return {
    ...actual,
    trendRepo: { getBySlug: vi.fn(), updateScore: vi.fn() },
    claimRepo: { get: vi.fn(), listForTrend: vi.fn(), listScores: vi.fn(), updateScore: vi.fn() },
    studyRepo: { listRecordsForClaim: vi.fn() },
  };
});

// ============================================================================
// FIXTURES
// ============================================================================

const TREND: TrendRow = {
  id: 3,
  name: "Magnesium glycinate",
  slug: "magnesium-glycinate",
  overall_score: null,
  evidence_grade: null,
  confidence_level: null,
  last_scored_at: null,
};

function claim(id: number, overrides: Partial<ClaimRow> = {}): ClaimRow {
  return {
    id,
    trend_id: TREND.id,
    claim_text: `Claim ${id}`,
    claim_slug: `claim-${id}`,
    evidence_score: null,
    evidence_grade: null,
    confidence_level: "auto",
    replication_score: null,
    is_primary_claim: id === 1,
    last_scored_at: null,
    ...overrides,
  };
}

const ONE_RCT: StudyRecordInput[] = [
  {
    id: "100001",
    studyType: "rct",
    isHuman: true,
    sampleSize: 80,
    publicationYear: 2023,
    supportsClaim: "yes",
  },
];

const CLAIMS = new Map<number, ClaimRow>([
  [1, claim(1)],
  [2, claim(2)],
  [3, claim(3)],
]);

beforeEach(() => {
  vi.clearAllMocks();

  vi.mocked(trendRepo.getBySlug).mockImplementation(async (slug) =>
    slug === TREND.slug ? TREND : null
  );
  vi.mocked(claimRepo.get).mockImplementation(async (id) => CLAIMS.get(id) ?? null);
  vi.mocked(claimRepo.listForTrend).mockResolvedValue([...CLAIMS.values()]);
  vi.mocked(claimRepo.listScores).mockResolvedValue([8, 6]);
  vi.mocked(claimRepo.updateScore).mockResolvedValue(undefined);
  vi.mocked(trendRepo.updateScore).mockResolvedValue(undefined);
  vi.mocked(studyRepo.listRecordsForClaim).mockImplementation(async (claimId) => {
    if (claimId === 1) return ONE_RCT;
    if (claimId === 2) return [];
    throw new DatabaseError("claim_studies listRecordsForClaim failed: timeout", "claim_studies", "listRecordsForClaim");
  });
});

// ============================================================================
// SINGLE CLAIM
// ============================================================================

describe("ScoringPipeline.scoreClaim", () => {
  it("scores a claim from its linked studies and persists the result", async () => {
    const pipeline = new ScoringPipeline();

    const result = await pipeline.scoreClaim(1, { currentYear: 2025 });

    expect(result.report.studyCount).toBe(1);
    expect(result.report.totalScore).toBeCloseTo(5.1441, 3);
    expect(result.report.grade).toBe("C+");
    expect(result.summary).toBe("Limited evidence from 1 RCT.");
    expect(result.persisted).toBe(true);
    expect(claimRepo.updateScore).toHaveBeenCalledWith(1, result.report, result.summary, "auto");
  });

  it("passes the stored replication score to the engine", async () => {
    CLAIMS.set(1, claim(1, { replication_score: 2 }));
    try {
      const result = await new ScoringPipeline().scoreClaim(1, { currentYear: 2025, dryRun: true });

      expect(result.report.totalScore).toBeCloseTo(5.4441, 3);
      expect(result.report.adjustments.map((a) => a.name)).toEqual([
        "replication_bonus",
        "single_study_ceiling",
      ]);
    } finally {
      CLAIMS.set(1, claim(1));
    }
  });

  it("falls back to the configured reference year", async () => {
    vi.stubEnv("SCORING_REFERENCE_YEAR", "2030");
    resetBaseConfig();
    try {
      const result = await new ScoringPipeline().scoreClaim(1, { dryRun: true });

      expect(result.report.inputs.yearsSinceLast).toBe(7);
    } finally {
      vi.unstubAllEnvs();
      resetBaseConfig();
    }
  });

  it("writes nothing on a dry run", async () => {
    const result = await new ScoringPipeline().scoreClaim(2, { dryRun: true, currentYear: 2025 });

    expect(result.report.totalScore).toBeCloseTo(1, 10);
    expect(result.persisted).toBe(false);
    expect(claimRepo.updateScore).not.toHaveBeenCalled();
  });

  it("fails with NotFoundError for an unknown claim", async () => {
    await expect(new ScoringPipeline().scoreClaim(99)).rejects.toThrow(NotFoundError);
    expect(studyRepo.listRecordsForClaim).not.toHaveBeenCalled();
  });
});

// ============================================================================
// TREND
// ============================================================================

describe("ScoringPipeline.scoreTrend", () => {
  it("keeps a failed claim as an error without stopping the others", async () => {
    const result = await new ScoringPipeline().scoreTrend(TREND.slug, {
      dryRun: true,
      concurrency: 2,
      currentYear: 2025,
    });

    expect(result.summary).toMatchObject({ claimsFound: 3, claimsScored: 2, claimsFailed: 1 });
    expect(result.claims.get(3)).toBeInstanceOf(DatabaseError);

    const first = result.claims.get(1);
    expect(first instanceof Error ? first.message : first?.report.displayScore).toBe(5.1);
  });

  it("rolls up in-memory scores on a dry run", async () => {
    const result = await new ScoringPipeline().scoreTrend(TREND.slug, { dryRun: true, currentYear: 2025 });

    expect(result.rollUp?.score).toBeCloseTo(3.05, 10);
    expect(result.rollUp?.grade).toBe("C-");
    expect(result.rollUp?.claimCount).toBe(2);
    expect(claimRepo.listScores).not.toHaveBeenCalled();
    expect(trendRepo.updateScore).not.toHaveBeenCalled();
    expect(claimRepo.updateScore).not.toHaveBeenCalled();
  });

  it("rolls up stored claim scores and persists the trend score", async () => {
    const result = await new ScoringPipeline().scoreTrend(TREND.slug, { currentYear: 2025 });

    const expected = { score: 7, displayScore: 7, grade: "B", claimCount: 2 };
    expect(result.rollUp).toEqual(expected);
    expect(claimRepo.updateScore).toHaveBeenCalledTimes(2);
    expect(trendRepo.updateScore).toHaveBeenCalledWith(TREND.id, expected, "auto");
  });

  it("leaves the trend untouched when no claim has a stored score", async () => {
    vi.mocked(claimRepo.listScores).mockResolvedValue([]);

    const result = await new ScoringPipeline().scoreTrend(TREND.slug, { currentYear: 2025 });

    expect(result.rollUp).toBeNull();
    expect(trendRepo.updateScore).not.toHaveBeenCalled();
  });

  it("fails with NotFoundError for an unknown trend", async () => {
    await expect(new ScoringPipeline().scoreTrend("unknown")).rejects.toThrow("Trend not found: unknown");
  });

  it("rejects a non-positive concurrency", async () => {
    await expect(
      new ScoringPipeline().scoreTrend(TREND.slug, { concurrency: 0 })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(trendRepo.getBySlug).not.toHaveBeenCalled();
  });
});
