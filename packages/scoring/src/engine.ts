/**
 * Evidence Scoring Engine
 * Deterministic mapping from scoring inputs to an explainable 0–10 score report
 *
 * SCORING FLOW:
 * =============
 * score(inputs | studies)
 *   ├─ studies? → aggregateStudies() → inputs (+ skipped-record warnings)
 *   ├─ validate inputs (InvalidInputError on any violation)
 *   ├─ four components, each 0–10 then weighted:
 *   │    quantity 25% · quality 40% · consistency 20% · recency 15%
 *   ├─ base composite, clamped to [0, 10]
 *   ├─ adjustments, each recorded as (name, delta, reason):
 *   │    sample-size penalty → replication bonus → single-study ceiling
 *   └─ grade from the unrounded total
 *
 * Nothing here holds state between calls; equal inputs give equal reports.
 */

import { ConfigError, InvalidInputError, logger } from "@trend-evidence/core";
import { aggregateStudies, tallyCounts, toIssues, type AggregationOptions } from "./aggregator.js";
import { DEFAULT_SCORING_MODEL, MAX_SCORE, type ScoringModel } from "./constants.js";
import { gradeForScore } from "./grade.js";
import {
  ScoringInputsSchema,
  qualifyingStudyCount,
  type Adjustment,
  type AggregationResult,
  type ComponentName,
  type ComponentScore,
  type PartialDataWarning,
  type ResolvedScoringInputs,
  type ScoreReport,
  type ScoringInputs,
  type StudyCounts,
  type StudyRecordInput,
  type UndefinedSignal,
} from "./types.js";

/**
 * Unweighted component value plus the default it fell back to, if any
 */
interface ComponentResult {
  raw: number;
  detail: string;
  undefinedSignal?: UndefinedSignal;
}

// ============================================================
// EVIDENCE SCORER
// ============================================================

export class EvidenceScorer {
  private readonly model: Readonly<ScoringModel>;
  private log = logger.child({ component: "scoring-engine" });

  constructor(model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL) {
    validateModel(model);
    this.model = model;
  }

  /**
   * Score pre-tallied inputs, or aggregate study records first
   */
  score(inputs: ScoringInputs): ScoreReport;
  score(studies: readonly StudyRecordInput[], options?: AggregationOptions): ScoreReport;
  score(
    input: ScoringInputs | readonly StudyRecordInput[],
    options?: AggregationOptions
  ): ScoreReport {
    if (isStudyList(input)) {
      return this.scoreAggregation(aggregateStudies(input, options));
    }
    return this.scoreInputs(input);
  }

  /**
   * Score the output of aggregateStudies(), carrying its warnings into the report
   */
  scoreAggregation(aggregation: AggregationResult): ScoreReport {
    return this.scoreInputs(aggregation.inputs, aggregation.warnings);
  }

  /**
   * Score explicit inputs
   */
  scoreInputs(inputs: ScoringInputs, warnings: PartialDataWarning[] = []): ScoreReport {
    const parsed = ScoringInputsSchema.safeParse(inputs);
    if (!parsed.success) {
      throw InvalidInputError.fromIssues("scoring inputs", toIssues(parsed.error));
    }

    const resolved = parsed.data;
    const model = this.model;
    const studyCount = qualifyingStudyCount(resolved);

    // --------------------------------------------------------
    // STEP 1: Components
    // --------------------------------------------------------
    const results: Record<ComponentName, ComponentResult> = {
      quantity: scoreQuantity(resolved, model),
      quality: scoreQuality(resolved, model),
      consistency: scoreConsistency(resolved, model),
      recency: scoreRecency(resolved, model),
    };

    const components = {
      quantity: weigh("quantity", results.quantity, model),
      quality: weigh("quality", results.quality, model),
      consistency: weigh("consistency", results.consistency, model),
      recency: weigh("recency", results.recency, model),
    };

    const undefinedSignals: UndefinedSignal[] = [];
    for (const result of Object.values(results)) {
      if (result.undefinedSignal) {
        undefinedSignals.push(result.undefinedSignal);
      }
    }

    // --------------------------------------------------------
    // STEP 2: Base composite
    // --------------------------------------------------------
    const baseScore = clamp(
      components.quantity.score +
        components.quality.score +
        components.consistency.score +
        components.recency.score
    );

    // --------------------------------------------------------
    // STEP 3: Adjustments
    // --------------------------------------------------------
    const { total, adjustments } = applyAdjustments(baseScore, resolved, studyCount, model);
    const totalScore = clamp(total);
    const grade = gradeForScore(totalScore, model.grades);

    this.log.debug("Scored evidence", {
      studyCount,
      baseScore,
      totalScore,
      grade,
      adjustments: adjustments.length,
    });

    return {
      totalScore,
      displayScore: Math.round(totalScore * 10) / 10,
      grade,
      baseScore,
      components,
      adjustments,
      undefinedSignals,
      inputs: resolved,
      studyCount,
      skippedRecords: warnings.length,
      warnings,
    };
  }
}

// ============================================================
// COMPONENTS
// ============================================================

/**
 * Diminishing returns over the qualifying study count
 */
export function scoreQuantity(
  inputs: ResolvedScoringInputs,
  model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL
): ComponentResult {
  const n = qualifyingStudyCount(inputs);
  return {
    raw: saturate(n, model.quantity.saturation),
    detail: `${n} qualifying ${n === 1 ? "study" : "studies"}`,
  };
}

/**
 * Strength-weighted study count. Strong evidence saturates towards 10; weak
 * (animal/in-vitro) evidence saturates towards the weak cap and only fills part
 * of the headroom strong evidence leaves.
 */
export function scoreQuality(
  inputs: ResolvedScoringInputs,
  model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL
): ComponentResult {
  const w = model.quality.typeWeights;
  const strong =
    w.metaAnalysis * inputs.metaAnalyses +
    w.humanRct * inputs.humanRcts +
    w.humanOther * inputs.humanOther;
  const weak = w.animal * inputs.animalStudies + w.inVitro * inputs.inVitroStudies;

  const strongScore = saturate(strong, model.quality.saturation);
  const weakScore =
    model.quality.weakEvidenceCap * (1 - Math.exp(-weak / model.quality.saturation));

  return {
    raw: strongScore + ((MAX_SCORE - strongScore) * weakScore) / MAX_SCORE,
    detail: `weighted strength ${strong.toFixed(1)} human/meta, ${weak.toFixed(1)} animal/in vitro`,
  };
}

/**
 * Agreement among studies with a known direction
 */
export function scoreConsistency(
  inputs: ResolvedScoringInputs,
  model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL
): ComponentResult {
  const directed = inputs.supporting + inputs.contradicting;

  if (directed === 0) {
    const value = model.consistency.neutralScore;
    return {
      raw: value,
      detail: "no study with a known direction",
      undefinedSignal: {
        component: "consistency",
        value,
        reason: "No supporting or contradicting studies; neutral midpoint used",
      },
    };
  }

  const ratio = inputs.supporting / directed;
  return {
    raw: MAX_SCORE * Math.pow(ratio, model.consistency.agreementExponent),
    detail: `${inputs.supporting} supporting vs ${inputs.contradicting} contradicting`,
  };
}

/**
 * Bounded decay over years since the most recent study
 */
export function scoreRecency(
  inputs: ResolvedScoringInputs,
  model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL
): ComponentResult {
  const r = model.recency;
  const years = inputs.yearsSinceLast;

  if (years === undefined) {
    return {
      raw: r.noEvidenceScore,
      detail: "no dated evidence",
      undefinedSignal: {
        component: "recency",
        value: r.noEvidenceScore,
        reason: "No dated studies; recency floor used",
      },
    };
  }

  let raw: number;
  if (years <= r.fullCreditYears) {
    raw = MAX_SCORE;
  } else if (years >= r.floorYears) {
    raw = r.floorScore;
  } else {
    const progress = (years - r.fullCreditYears) / (r.floorYears - r.fullCreditYears);
    raw = MAX_SCORE - progress * (MAX_SCORE - r.floorScore);
  }

  return {
    raw,
    detail: `${years} ${years === 1 ? "year" : "years"} since the most recent study`,
  };
}

// ============================================================
// ADJUSTMENTS
// ============================================================

function applyAdjustments(
  baseScore: number,
  inputs: ResolvedScoringInputs,
  studyCount: number,
  model: Readonly<ScoringModel>
): { total: number; adjustments: Adjustment[] } {
  const a = model.adjustments;
  const adjustments: Adjustment[] = [];
  let total = baseScore;

  // Small human trials
  const avg = inputs.avgSampleSize;
  if (avg !== undefined && avg > 0 && avg < a.minCredibleSampleSize) {
    const after = Math.max(0, total - a.smallSamplePenalty);
    adjustments.push({
      name: "sample_size_penalty",
      delta: after - total,
      reason: `Average human sample size ${formatNumber(avg)} is below ${a.minCredibleSampleSize}`,
    });
    total = after;
  }

  // Replication strength from upstream data
  const replication = inputs.replicationScore ?? 0;
  if (replication > 0) {
    const bonus = Math.min(a.replicationBonusPerLevel * replication, a.replicationBonusCap);
    const after = Math.min(MAX_SCORE, total + bonus);
    adjustments.push({
      name: "replication_bonus",
      delta: after - total,
      reason: `Replication strength ${replication} of 3`,
    });
    total = after;
  }

  // One study is never strong evidence
  if (studyCount === 1) {
    const after = Math.min(total, a.singleStudyCeiling);
    adjustments.push({
      name: "single_study_ceiling",
      delta: after - total,
      reason: `Only one qualifying study; score capped at ${a.singleStudyCeiling}`,
    });
    total = after;
  }

  return { total, adjustments };
}

// ============================================================
// HELPERS
// ============================================================

function weigh(
  name: ComponentName,
  result: ComponentResult,
  model: Readonly<ScoringModel>
): ComponentScore {
  const weight = model.weights[name];
  const raw = clamp(result.raw);
  return { name, raw, weight, score: raw * weight, detail: result.detail };
}

function saturate(value: number, saturation: number): number {
  return MAX_SCORE * (1 - Math.exp(-value / saturation));
}

function clamp(value: number): number {
  return Math.min(MAX_SCORE, Math.max(0, value));
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function isStudyList(
  input: ScoringInputs | readonly StudyRecordInput[]
): input is readonly StudyRecordInput[] {
  return Array.isArray(input);
}

/**
 * Reject models whose weights or curves would break the score bounds
 */
export function validateModel(model: Readonly<ScoringModel>): void {
  const problems: string[] = [];

  const weights = Object.values(model.weights);
  const sum = weights.reduce((s, w) => s + w, 0);
  if (weights.some((w) => w < 0) || Math.abs(sum - 1) > 1e-9) {
    problems.push(`weights must be non-negative and sum to 1 (sum is ${sum})`);
  }
  if (!(model.quantity.saturation > 0)) {
    problems.push("quantity.saturation must be positive");
  }
  if (!(model.quality.saturation > 0)) {
    problems.push("quality.saturation must be positive");
  }
  if (model.quality.weakEvidenceCap < 0 || model.quality.weakEvidenceCap > MAX_SCORE) {
    problems.push(`quality.weakEvidenceCap must lie in [0, ${MAX_SCORE}]`);
  }
  if (model.recency.floorYears <= model.recency.fullCreditYears) {
    problems.push("recency.floorYears must exceed recency.fullCreditYears");
  }
  for (let i = 1; i < model.grades.length; i++) {
    if (model.grades[i].min >= model.grades[i - 1].min) {
      problems.push("grades must be ordered from highest to lowest threshold");
      break;
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid scoring model: ${problems.join("; ")}`, { problems });
  }
}

// ============================================================
// CONVENIENCE FUNCTIONS
// ============================================================

const defaultScorer = new EvidenceScorer();

/**
 * Create a scorer bound to an alternative model
 */
export function createScorer(model: Readonly<ScoringModel> = DEFAULT_SCORING_MODEL): EvidenceScorer {
  return new EvidenceScorer(model);
}

/**
 * Score with the default model
 */
export function score(inputs: ScoringInputs): ScoreReport;
export function score(studies: readonly StudyRecordInput[], options?: AggregationOptions): ScoreReport;
export function score(
  input: ScoringInputs | readonly StudyRecordInput[],
  options?: AggregationOptions
): ScoreReport {
  if (isStudyList(input)) {
    return defaultScorer.score(input, options);
  }
  return defaultScorer.score(input);
}

/**
 * Quick scoring from manually entered counts
 */
export function scoreFromCounts(counts: StudyCounts): ScoreReport {
  return defaultScorer.score(tallyCounts(counts));
}
