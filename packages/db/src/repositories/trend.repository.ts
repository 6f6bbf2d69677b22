/**
 * Trend Repository
 * Lookups and aggregate score writes for the trends table
 */

import { DatabaseError } from "@trend-evidence/core";
import { getSupabase, toDatabaseError } from "../supabase.js";
import { TREND_COLUMNS, TrendRowSchema, type ConfidenceLevel, type TrendRow, type TrendScoreUpdate } from "../types.js";
import type { ClaimRollUp } from "../rollup.js";

export async function getBySlug(slug: string): Promise<TrendRow | null> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from("trends")
    .select(TREND_COLUMNS)
    .eq("slug", slug)
    .maybeSingle();

  if (error) throw toDatabaseError("trends", "getBySlug", error);
  if (!data) return null;

  const parsed = TrendRowSchema.safeParse(data);
  if (!parsed.success) {
    throw new DatabaseError(`Malformed trends row for slug ${slug}`, "trends", "getBySlug", {
      context: { issues: parsed.error.issues.map((i) => i.path.join(".")) },
    });
  }
  return parsed.data;
}

export async function updateScore(
  id: number,
  rollUp: ClaimRollUp,
  confidence: ConfidenceLevel = "auto"
): Promise<void> {
  const now = new Date().toISOString();
  const update: TrendScoreUpdate = {
    overall_score: rollUp.displayScore,
    evidence_grade: rollUp.grade,
    confidence_level: confidence,
    last_scored_at: now,
    updated_at: now,
  };

  const supabase = getSupabase();
  const { error } = await supabase.from("trends").update(update).eq("id", id);

  if (error) throw toDatabaseError("trends", "updateScore", error);
}

export const trendRepo = {
  getBySlug,
  updateScore,
};
