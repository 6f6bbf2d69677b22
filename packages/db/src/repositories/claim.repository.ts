/**
 * Claim Repository
 * Reads claims and writes their evidence scores
 */

import { DatabaseError } from "@trend-evidence/core";
import type { ScoreReport } from "@trend-evidence/scoring";
import { getSupabase, toDatabaseError } from "../supabase.js";
import {
  CLAIM_COLUMNS,
  ClaimRowSchema,
  type ClaimRow,
  type ClaimScoreUpdate,
  type ConfidenceLevel,
} from "../types.js";

export async function get(id: number): Promise<ClaimRow | null> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from("claims")
    .select(CLAIM_COLUMNS)
    .eq("id", id)
    .maybeSingle();

  if (error) throw toDatabaseError("claims", "get", error);
  if (!data) return null;

  return parseClaim(data, "get");
}

/**
 * Claims of a trend, primary claim first
 */
export async function listForTrend(trendId: number): Promise<ClaimRow[]> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from("claims")
    .select(CLAIM_COLUMNS)
    .eq("trend_id", trendId)
    .order("is_primary_claim", { ascending: false })
    .order("claim_text");

  if (error) throw toDatabaseError("claims", "listForTrend", error);

  return (data ?? []).map((row: unknown) => parseClaim(row, "listForTrend"));
}

/**
 * Stored scores of every scored claim of a trend
 */
export async function listScores(trendId: number): Promise<number[]> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from("claims")
    .select("evidence_score")
    .eq("trend_id", trendId)
    .not("evidence_score", "is", null);

  if (error) throw toDatabaseError("claims", "listScores", error);

  const scores: number[] = [];
  for (const row of data ?? []) {
    const score: unknown = row.evidence_score;
    if (typeof score === "number") scores.push(score);
  }
  return scores;
}

export async function updateScore(
  id: number,
  report: ScoreReport,
  summary: string,
  confidence: ConfidenceLevel = "auto"
): Promise<void> {
  const { inputs } = report;
  const now = new Date().toISOString();

  const update: ClaimScoreUpdate = {
    evidence_score: report.displayScore,
    evidence_grade: report.grade,
    confidence_level: confidence,
    num_human_rcts: inputs.humanRcts,
    num_meta_analyses: inputs.metaAnalyses,
    num_observational: inputs.humanOther,
    num_animal_studies: inputs.animalStudies,
    num_in_vitro: inputs.inVitroStudies,
    avg_sample_size: inputs.avgSampleSize === undefined ? null : Math.round(inputs.avgSampleSize),
    years_since_last_study: inputs.yearsSinceLast ?? null,
    summary,
    last_scored_at: now,
    updated_at: now,
  };

  const supabase = getSupabase();
  const { error } = await supabase.from("claims").update(update).eq("id", id);

  if (error) throw toDatabaseError("claims", "updateScore", error);
}

function parseClaim(row: unknown, operation: string): ClaimRow {
  const parsed = ClaimRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new DatabaseError("Malformed claims row", "claims", operation, {
      context: { issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
    });
  }
  return parsed.data;
}

export const claimRepo = {
  get,
  listForTrend,
  listScores,
  updateScore,
};
