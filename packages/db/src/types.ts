/**
 * Database Types
 * Row schemas for the trends, claims, studies and claim_studies tables
 */

import { z } from "zod";

// ============================================================
// STATUS TYPES
// ============================================================

export const ConfidenceLevelSchema = z.enum(["auto", "reviewed", "expert_verified"]);

/** Who stands behind a stored score */
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

// ============================================================
// TRENDS
// ============================================================

export const TrendRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  slug: z.string(),
  overall_score: z.number().nullable(),
  evidence_grade: z.string().nullable(),
  confidence_level: z.string().nullable(),
  last_scored_at: z.string().nullable(),
});

export type TrendRow = z.infer<typeof TrendRowSchema>;

export const TREND_COLUMNS =
  "id, name, slug, overall_score, evidence_grade, confidence_level, last_scored_at";

export interface TrendScoreUpdate {
  overall_score: number;
  evidence_grade: string;
  confidence_level: ConfidenceLevel;
  last_scored_at: string;
  updated_at: string;
}

// ============================================================
// CLAIMS
// ============================================================

export const ClaimRowSchema = z.object({
  id: z.number().int(),
  trend_id: z.number().int(),
  claim_text: z.string(),
  claim_slug: z.string(),
  evidence_score: z.number().nullable(),
  evidence_grade: z.string().nullable(),
  confidence_level: z.string().nullable(),
  /** 0 none, 1 single lab, 2 multiple labs, 3 independent */
  replication_score: z.number().int().min(0).max(3).nullable(),
  is_primary_claim: z.boolean().nullable(),
  last_scored_at: z.string().nullable(),
});

export type ClaimRow = z.infer<typeof ClaimRowSchema>;

export const CLAIM_COLUMNS =
  "id, trend_id, claim_text, claim_slug, evidence_score, evidence_grade, confidence_level, " +
  "replication_score, is_primary_claim, last_scored_at";

export interface ClaimScoreUpdate {
  evidence_score: number;
  evidence_grade: string;
  confidence_level: ConfidenceLevel;
  num_human_rcts: number;
  num_meta_analyses: number;
  num_observational: number;
  num_animal_studies: number;
  num_in_vitro: number;
  avg_sample_size: number | null;
  years_since_last_study: number | null;
  summary: string;
  last_scored_at: string;
  updated_at: string;
}

// ============================================================
// STUDIES
// ============================================================

export const StudyRowSchema = z.object({
  id: z.number().int(),
  pubmed_id: z.string().nullable(),
  study_type: z.string(),
  is_human_study: z.boolean().nullable(),
  sample_size: z.number().int().nullable(),
  publication_year: z.number().int(),
  is_retracted: z.boolean().nullable(),
});

export type StudyRow = z.infer<typeof StudyRowSchema>;

/**
 * A claim_studies link with its study embedded
 */
export const ClaimStudyRowSchema = z.object({
  supports_claim: z.string().nullable(),
  studies: StudyRowSchema,
});

export type ClaimStudyRow = z.infer<typeof ClaimStudyRowSchema>;

export const CLAIM_STUDY_COLUMNS =
  "supports_claim, studies!inner(id, pubmed_id, study_type, is_human_study, sample_size, " +
  "publication_year, is_retracted)";
