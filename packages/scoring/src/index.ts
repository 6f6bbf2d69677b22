/**
 * @trend-evidence/scoring
 * Evidence Aggregator and Evidence Scoring Engine
 */

// Types and schemas
export {
  StudyTypeSchema,
  SupportsClaimSchema,
  StudyRecordSchema,
  ScoringInputsSchema,
  StudyCountsSchema,
  EVIDENCE_GRADES,
  qualifyingStudyCount,
  type StudyType,
  type SupportsClaim,
  type StudyRecord,
  type StudyRecordInput,
  type ScoringInputs,
  type ResolvedScoringInputs,
  type StudyCounts,
  type AggregationResult,
  type PartialDataWarning,
  type EvidenceGrade,
  type ComponentName,
  type ComponentScore,
  type AdjustmentName,
  type Adjustment,
  type UndefinedSignal,
  type ScoreReport,
} from "./types.js";

// Model
export {
  DEFAULT_SCORING_MODEL,
  GRADE_THRESHOLDS,
  FLOOR_GRADE,
  MAX_SCORE,
  type ScoringModel,
  type GradeThreshold,
} from "./constants.js";

// Grades
export { gradeForScore, evidenceStrength, type EvidenceStrength } from "./grade.js";

// Aggregator
export {
  aggregateStudies,
  tallyCounts,
  classify,
  type AggregationOptions,
} from "./aggregator.js";

// Engine
export {
  EvidenceScorer,
  createScorer,
  score,
  scoreFromCounts,
  scoreQuantity,
  scoreQuality,
  scoreConsistency,
  scoreRecency,
  validateModel,
} from "./engine.js";

// Reports
export { formatScoreReport, summarizeEvidence } from "./report.js";
