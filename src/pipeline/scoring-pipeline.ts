/**
 * Scoring Pipeline - Main Orchestrator
 * Loads claims and their studies from the database, scores them and writes the
 * scores back, then rolls claim scores up into the trend score
 *
 * PIPELINE PHASES:
 * ================
 * Phase 1: LOAD
 *   - Look the trend up by slug (NotFoundError when missing)
 *   - List its claims, primary claim first
 *
 * Phase 2: SCORE CLAIMS (parallel, batched)
 *   - For each claim: load linked studies → aggregate → score → summarize
 *   - Persist score, grade and study counts unless dryRun
 *   - Processes in batches of `concurrency` (default: 3)
 *   - A failed claim is kept as an Error and does not stop the others
 *
 * Phase 3: ROLL UP
 *   - Mean of the stored claim scores (in-memory reports on a dry run)
 *   - Persist the trend score unless dryRun
 *
 * CALL FLOW:
 * ==========
 * index.ts → scoreTrend(slug, options)
 *                 ↓
 *           ScoringPipeline.scoreTrend()
 *                 ↓
 *           Phase 1 → Phase 2 (scoreClaim × N) → Phase 3 → Return results
 */

import { InvalidInputError, NotFoundError, getBaseConfig, logger } from "@trend-evidence/core";
import {
  claimRepo,
  rollUpClaimScores,
  studyRepo,
  trendRepo,
  type ClaimRollUp,
  type TrendRow,
} from "@trend-evidence/db";
import {
  createScorer,
  summarizeEvidence,
  type EvidenceScorer,
  type ScoreReport,
} from "@trend-evidence/scoring";

/**
 * Options for scoring a single claim
 */
export interface ClaimScoringOptions {
  /** Score without writing anything back */
  dryRun?: boolean;
  /** Year treated as "now" for recency; falls back to SCORING_REFERENCE_YEAR, then the clock */
  currentYear?: number;
  correlationId?: string;
}

/**
 * Options for scoring every claim of a trend
 */
export interface TrendScoringOptions extends Omit<ClaimScoringOptions, "correlationId"> {
  /** Claims scored in parallel */
  concurrency?: number;
}

/**
 * One scored claim
 */
export interface ClaimScoreResult {
  claimId: number;
  claimText: string;
  report: ScoreReport;
  summary: string;
  persisted: boolean;
}

/**
 * Trend pipeline summary
 */
export interface TrendScoringSummary {
  claimsFound: number;
  claimsScored: number;
  claimsFailed: number;
  totalDurationMs: number;
}

/**
 * Full trend pipeline result
 */
export interface TrendScoringResult {
  correlationId: string;
  trend: TrendRow;
  dryRun: boolean;
  claims: Map<number, ClaimScoreResult | Error>;
  rollUp: ClaimRollUp | null;
  summary: TrendScoringSummary;
}

const DEFAULT_CONCURRENCY = 3;

// ============================================================
// SCORING PIPELINE CLASS
// ============================================================

export class ScoringPipeline {
  private log = logger.child({ component: "pipeline" });

  constructor(private readonly scorer: EvidenceScorer = createScorer()) {}

  /**
   * Score one claim from its linked studies
   */
  async scoreClaim(claimId: number, options: ClaimScoringOptions = {}): Promise<ClaimScoreResult> {
    const correlationId = options.correlationId ?? crypto.randomUUID();
    const log = this.log.child({ correlationId, claimId });

    const claim = await claimRepo.get(claimId);
    if (!claim) {
      throw new NotFoundError("Claim", claimId);
    }

    const records = await studyRepo.listRecordsForClaim(claimId);
    log.debug(`Scoring ${records.length} study records`, { phase: "score" });

    const report = this.scorer.score(records, {
      currentYear: options.currentYear ?? getBaseConfig().scoring.referenceYear,
      replicationScore: claim.replication_score ?? undefined,
    });
    const summary = summarizeEvidence(report);

    if (!options.dryRun) {
      await claimRepo.updateScore(claimId, report, summary, "auto");
    }

    log.info(`Claim scored ${report.displayScore.toFixed(1)} (${report.grade})`, {
      studyCount: report.studyCount,
      skippedRecords: report.skippedRecords,
      persisted: !options.dryRun,
    });

    return {
      claimId,
      claimText: claim.claim_text,
      report,
      summary,
      persisted: !options.dryRun,
    };
  }

  /**
   * Score every claim of a trend and roll the scores up
   *
   * EXECUTION FLOW:
   * Phase 1: Load → Phase 2: Score claims → Phase 3: Roll up
   */
  async scoreTrend(slug: string, options: TrendScoringOptions = {}): Promise<TrendScoringResult> {
    const correlationId = crypto.randomUUID();
    const startTime = Date.now();
    const dryRun = options.dryRun ?? false;
    const concurrency = resolveConcurrency(options.concurrency);
    const log = this.log.child({ correlationId, trendSlug: slug });

    log.info("Pipeline started", { dryRun, concurrency });

    try {
      // ========================================================
      // PHASE 1: LOAD
      // ========================================================
      const trend = await trendRepo.getBySlug(slug);
      if (!trend) {
        throw new NotFoundError("Trend", slug);
      }

      const claims = await claimRepo.listForTrend(trend.id);
      log.info(`Found ${claims.length} claims`, { phase: "load" });

      const result: TrendScoringResult = {
        correlationId,
        trend,
        dryRun,
        claims: new Map(), // claimId → ClaimScoreResult or Error
        rollUp: null,
        summary: {
          claimsFound: claims.length,
          claimsScored: 0,
          claimsFailed: 0,
          totalDurationMs: 0,
        },
      };

      // ========================================================
      // PHASE 2: SCORE CLAIMS (parallel, batched)
      // ========================================================
      for (let i = 0; i < claims.length; i += concurrency) {
        const batch = claims.slice(i, i + concurrency);

        const batchResults = await Promise.allSettled(
          batch.map((claim) =>
            this.scoreClaim(claim.id, {
              dryRun,
              currentYear: options.currentYear,
              correlationId,
            })
          )
        );

        for (let j = 0; j < batch.length; j++) {
          const claimId = batch[j].id;
          const res = batchResults[j];

          if (res.status === "fulfilled") {
            result.claims.set(claimId, res.value);
            result.summary.claimsScored++;
          } else {
            const error = res.reason instanceof Error ? res.reason : new Error(String(res.reason));
            log.error(`Claim ${claimId} failed`, error, { claimId, phase: "score" });
            result.claims.set(claimId, error);
            result.summary.claimsFailed++;
          }
        }
      }

      log.metric("claims_scored", result.summary.claimsScored, { phase: "score" });

      // ========================================================
      // PHASE 3: ROLL UP
      // ========================================================
      if (dryRun) {
        const scores: number[] = [];
        for (const entry of result.claims.values()) {
          if (!(entry instanceof Error)) scores.push(entry.report.displayScore);
        }
        result.rollUp = rollUpClaimScores(scores);
      } else {
        result.rollUp = rollUpClaimScores(await claimRepo.listScores(trend.id));
        if (result.rollUp) {
          await trendRepo.updateScore(trend.id, result.rollUp, "auto");
        }
      }

      // ========================================================
      // FINALIZE
      // ========================================================
      result.summary.totalDurationMs = Date.now() - startTime;

      log.info("Pipeline complete", {
        summary: result.summary,
        trendScore: result.rollUp?.displayScore ?? null,
      });

      return result;
    } catch (error) {
      log.error("Pipeline failed", error);
      throw error;
    }
  }
}

function resolveConcurrency(concurrency: number | undefined): number {
  const value = concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(value) || value < 1) {
    throw InvalidInputError.fromIssues("pipeline options", [
      { path: "concurrency", message: `expected a positive integer, received ${value}` },
    ]);
  }
  return value;
}

/**
 * Score one claim with a default pipeline
 */
export async function scoreClaim(
  claimId: number,
  options?: ClaimScoringOptions
): Promise<ClaimScoreResult> {
  return new ScoringPipeline().scoreClaim(claimId, options);
}

/**
 * Score a trend with a default pipeline
 */
export async function scoreTrend(
  slug: string,
  options?: TrendScoringOptions
): Promise<TrendScoringResult> {
  return new ScoringPipeline().scoreTrend(slug, options);
}
