/**
 * Evidence Aggregator
 * Reduces study records (or explicit tallies) to the inputs of the scoring engine
 */

import type { ZodError } from "zod";
import { InvalidInputError, logger, type InputIssue } from "@trend-evidence/core";
import {
  ScoringInputsSchema,
  StudyCountsSchema,
  StudyRecordSchema,
  qualifyingStudyCount,
  type AggregationResult,
  type PartialDataWarning,
  type ResolvedScoringInputs,
  type StudyCounts,
  type StudyRecord,
} from "./types.js";

export interface AggregationOptions {
  /** Year treated as "now"; defaults to the clock */
  currentYear?: number;
  /** Replication strength supplied by upstream data (0–3) */
  replicationScore?: number;
}

type Bucket = "humanRcts" | "metaAnalyses" | "humanOther" | "animalStudies" | "inVitroStudies";

const log = logger.child({ component: "aggregator" });

// ============================================
// STUDY RECORDS → INPUTS
// ============================================

/**
 * Aggregate study records into scoring inputs.
 *
 * Malformed records are skipped and reported as warnings; input that is not a
 * sequence at all fails the whole call with InvalidInputError.
 */
export function aggregateStudies(
  records: unknown,
  options: AggregationOptions = {}
): AggregationResult {
  if (!Array.isArray(records)) {
    throw InvalidInputError.fromIssues("study records", [
      { path: "", message: `expected an array of study records, received ${describeValue(records)}` },
    ]);
  }

  const currentYear = resolveCurrentYear(options.currentYear);
  const replicationScore = resolveReplicationScore(options.replicationScore);

  const counts: Record<Bucket, number> = {
    humanRcts: 0,
    metaAnalyses: 0,
    humanOther: 0,
    animalStudies: 0,
    inVitroStudies: 0,
  };
  const warnings: PartialDataWarning[] = [];
  const sampleSizes: number[] = [];
  let supporting = 0;
  let contradicting = 0;
  let unclassified = 0;
  let mostRecentYear: number | undefined;
  let largestSample: number | undefined;

  records.forEach((raw: unknown, index) => {
    const checked = checkRecord(raw, index, currentYear);
    if ("warning" in checked) {
      warnings.push(checked.warning);
      return;
    }

    const study = checked.study;

    // Recency and direction cover every valid study, classified or not
    if (mostRecentYear === undefined || study.publicationYear > mostRecentYear) {
      mostRecentYear = study.publicationYear;
    }

    if (study.supportsClaim === "yes") {
      supporting++;
    } else if (study.supportsClaim === "no" || study.supportsClaim === "mixed") {
      contradicting++;
    }

    const bucket = classify(study);
    if (!bucket) {
      unclassified++;
      return;
    }

    counts[bucket]++;

    if (study.isHuman && study.sampleSize != null && study.sampleSize > 0) {
      sampleSizes.push(study.sampleSize);
      if (largestSample === undefined || study.sampleSize > largestSample) {
        largestSample = study.sampleSize;
      }
    }
  });

  if (warnings.length > 0) {
    log.warn(`Skipped ${warnings.length} of ${records.length} study records`, {
      skipped: warnings.map((w) => w.id ?? `#${w.index}`),
    });
  }

  const inputs: ResolvedScoringInputs = {
    ...counts,
    avgSampleSize: sampleSizes.length > 0 ? mean(sampleSizes) : undefined,
    supporting,
    contradicting,
    yearsSinceLast: mostRecentYear === undefined ? undefined : currentYear - mostRecentYear,
    replicationScore,
  };

  return {
    inputs,
    studyCount: qualifyingStudyCount(counts),
    totalRecords: records.length,
    unclassified,
    largestSample,
    mostRecentYear,
    warnings,
  };
}

/**
 * Bucket a study counts toward, or null when it fits none
 */
export function classify(study: StudyRecord): Bucket | null {
  if (study.studyType === "meta_analysis" || study.studyType === "systematic_review") {
    return "metaAnalyses";
  }

  if (study.isHuman) {
    return study.studyType === "rct" ? "humanRcts" : "humanOther";
  }

  if (study.studyType === "animal") return "animalStudies";
  if (study.studyType === "in_vitro") return "inVitroStudies";

  return null;
}

function checkRecord(
  raw: unknown,
  index: number,
  currentYear: number
): { study: StudyRecord } | { warning: PartialDataWarning } {
  const id = extractId(raw);
  const parsed = StudyRecordSchema.safeParse(raw);

  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((i) => `${i.path.join(".") || "record"}: ${i.message}`)
      .join("; ");
    return { warning: { index, id, reason } };
  }

  const study = parsed.data;

  if (study.isHuman && !isSampleSizeExempt(study) && study.sampleSize != null && study.sampleSize <= 0) {
    return {
      warning: { index, id, reason: `sampleSize: human ${study.studyType} study with sample size ${study.sampleSize}` },
    };
  }

  if (study.publicationYear > currentYear) {
    return {
      warning: { index, id, reason: `publicationYear: ${study.publicationYear} is after ${currentYear}` },
    };
  }

  return { study };
}

function isSampleSizeExempt(study: StudyRecord): boolean {
  return (
    study.sampleSizeExempt === true ||
    study.studyType === "meta_analysis" ||
    study.studyType === "systematic_review"
  );
}

// ============================================
// EXPLICIT TALLIES → INPUTS
// ============================================

/**
 * Turn manually entered counts into scoring inputs.
 * Tallied studies support the claim unless counted as contradicting.
 */
export function tallyCounts(counts: StudyCounts): ResolvedScoringInputs {
  const parsed = StudyCountsSchema.safeParse(counts);
  if (!parsed.success) {
    throw InvalidInputError.fromIssues("study counts", toIssues(parsed.error));
  }

  const c = parsed.data;
  const studies = qualifyingStudyCount(c);

  if (c.contradicting > studies) {
    throw InvalidInputError.fromIssues("study counts", [
      {
        path: "contradicting",
        message: `${c.contradicting} contradicting studies exceed the ${studies} tallied`,
      },
    ]);
  }

  return ScoringInputsSchema.parse({
    humanRcts: c.humanRcts,
    metaAnalyses: c.metaAnalyses,
    humanOther: c.humanOther,
    animalStudies: c.animalStudies,
    inVitroStudies: c.inVitroStudies,
    avgSampleSize: c.avgSampleSize ? c.avgSampleSize : undefined,
    supporting: studies - c.contradicting,
    contradicting: c.contradicting,
    yearsSinceLast: c.yearsSinceLast ?? undefined,
    replicationScore: c.replicationScore ?? undefined,
  });
}

// ============================================
// HELPER FUNCTIONS
// ============================================

export function toIssues(error: ZodError): InputIssue[] {
  return error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

function resolveCurrentYear(year: number | undefined): number {
  const resolved = year ?? new Date().getFullYear();
  if (!Number.isInteger(resolved)) {
    throw InvalidInputError.fromIssues("aggregation options", [
      { path: "currentYear", message: `expected an integer year, received ${resolved}` },
    ]);
  }
  return resolved;
}

function resolveReplicationScore(score: number | undefined): number | undefined {
  if (score === undefined) return undefined;
  if (!Number.isInteger(score) || score < 0 || score > 3) {
    throw InvalidInputError.fromIssues("aggregation options", [
      { path: "replicationScore", message: `expected an integer in [0, 3], received ${score}` },
    ]);
  }
  return score;
}

function extractId(raw: unknown): string | undefined {
  if (raw !== null && typeof raw === "object" && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return undefined;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  return typeof value;
}
