/**
 * Scoring Types
 * Schemas for study records and scoring inputs, plus the score report shape
 */

import { z } from "zod";

// ============================================
// STUDY RECORDS
// ============================================

/**
 * Methodological category of a study, strongest evidence first
 */
export const StudyTypeSchema = z.enum([
  "meta_analysis",
  "systematic_review",
  "rct",
  "observational",
  "animal",
  "in_vitro",
  "case_study",
]);

export const SupportsClaimSchema = z.enum(["yes", "no", "mixed", "unknown"]);

/**
 * Study metadata as handed over by the retrieval layer
 */
export const StudyRecordSchema = z.object({
  /** Stable external identifier (e.g. PubMed id), used in warnings */
  id: z.string().optional(),
  studyType: StudyTypeSchema,
  isHuman: z.boolean(),
  /** null or absent when the sample size is unknown */
  sampleSize: z.number().int().min(0).nullish(),
  publicationYear: z.number().int(),
  supportsClaim: SupportsClaimSchema.default("unknown"),
  /** Allows a human study with no positive sample size */
  sampleSizeExempt: z.boolean().optional(),
});

export type StudyType = z.infer<typeof StudyTypeSchema>;
export type SupportsClaim = z.infer<typeof SupportsClaimSchema>;
export type StudyRecord = z.infer<typeof StudyRecordSchema>;

/**
 * Loose shape accepted by the aggregator before validation.
 * Rows read from storage may carry study types or directions outside the enums.
 */
export interface StudyRecordInput {
  id?: string;
  studyType: string;
  isHuman: boolean;
  sampleSize?: number | null;
  publicationYear: number;
  supportsClaim?: string;
  sampleSizeExempt?: boolean;
}

// ============================================
// SCORING INPUTS
// ============================================

const count = z.number().int().min(0);

export const ScoringInputsSchema = z.object({
  humanRcts: count,
  metaAnalyses: count,
  humanOther: count,
  animalStudies: count.default(0),
  inVitroStudies: count.default(0),
  /** Mean human sample size; absent or 0 when unknown */
  avgSampleSize: z.number().finite().min(0).optional(),
  /** Directions may include studies that fit no quantity/quality bucket */
  supporting: count.default(0),
  contradicting: count.default(0),
  /** Absent when there is no evidence at all */
  yearsSinceLast: z.number().int().min(0).optional(),
  /** 0 none, 1 single lab, 2 multiple labs, 3 independent */
  replicationScore: z.number().int().min(0).max(3).optional(),
});

/** What callers pass in; defaulted fields may be omitted */
export type ScoringInputs = z.input<typeof ScoringInputsSchema>;

/** Inputs after validation and defaulting */
export type ResolvedScoringInputs = z.output<typeof ScoringInputsSchema>;

/**
 * Explicit tallies for manual entry. Every tallied study is taken to support the
 * claim unless `contradicting` says otherwise.
 */
export const StudyCountsSchema = z.object({
  humanRcts: count,
  metaAnalyses: count,
  humanOther: count,
  animalStudies: count.default(0),
  inVitroStudies: count.default(0),
  avgSampleSize: z.number().finite().min(0).nullish(),
  yearsSinceLast: z.number().int().min(0).nullish(),
  contradicting: count.default(0),
  replicationScore: z.number().int().min(0).max(3).nullish(),
});

export type StudyCounts = z.input<typeof StudyCountsSchema>;

/**
 * Total qualifying studies (human, meta-analysis, animal and in-vitro)
 */
export function qualifyingStudyCount(inputs: {
  humanRcts: number;
  metaAnalyses: number;
  humanOther: number;
  animalStudies: number;
  inVitroStudies: number;
}): number {
  return (
    inputs.humanRcts +
    inputs.metaAnalyses +
    inputs.humanOther +
    inputs.animalStudies +
    inputs.inVitroStudies
  );
}

// ============================================
// AGGREGATION RESULT
// ============================================

/**
 * A study record skipped during aggregation. Non-fatal.
 */
export interface PartialDataWarning {
  /** Position of the record in the input sequence */
  index: number;
  id?: string;
  reason: string;
}

export interface AggregationResult {
  inputs: ResolvedScoringInputs;
  /** Qualifying studies that fed the inputs */
  studyCount: number;
  /** Records received, including skipped ones */
  totalRecords: number;
  /** Valid records that fit no component (e.g. non-human RCTs) */
  unclassified: number;
  largestSample?: number;
  mostRecentYear?: number;
  warnings: PartialDataWarning[];
}

// ============================================
// SCORE REPORT
// ============================================

export const EVIDENCE_GRADES = [
  "A+",
  "A",
  "A-",
  "B+",
  "B",
  "B-",
  "C+",
  "C",
  "C-",
  "D",
  "F",
] as const;

export type EvidenceGrade = (typeof EVIDENCE_GRADES)[number];

export type ComponentName = "quantity" | "quality" | "consistency" | "recency";

export interface ComponentScore {
  name: ComponentName;
  /** Unweighted score in [0, 10] */
  raw: number;
  weight: number;
  /** raw × weight, in [0, weight × 10] */
  score: number;
  detail: string;
}

export type AdjustmentName =
  | "sample_size_penalty"
  | "replication_bonus"
  | "single_study_ceiling";

/**
 * A bonus or penalty applied after the base composite
 */
export interface Adjustment {
  name: AdjustmentName;
  delta: number;
  reason: string;
}

/**
 * A component with no data behind it, resolved by a documented default
 */
export interface UndefinedSignal {
  component: ComponentName;
  value: number;
  reason: string;
}

export interface ScoreReport {
  /** Final score in [0, 10], full precision */
  totalScore: number;
  /** totalScore rounded to one decimal */
  displayScore: number;
  /** Derived from the unrounded totalScore */
  grade: EvidenceGrade;
  /** Weighted composite before adjustments */
  baseScore: number;
  components: Record<ComponentName, ComponentScore>;
  adjustments: Adjustment[];
  undefinedSignals: UndefinedSignal[];
  inputs: ResolvedScoringInputs;
  studyCount: number;
  skippedRecords: number;
  warnings: PartialDataWarning[];
}
