/**
 * Grade Mapping
 * Pure score → letter grade lookup, usable on stored or external scores
 */

import { InvalidInputError } from "@trend-evidence/core";
import {
  FLOOR_GRADE,
  GRADE_THRESHOLDS,
  MAX_SCORE,
  type GradeThreshold,
} from "./constants.js";
import type { EvidenceGrade } from "./types.js";

export type EvidenceStrength =
  | "Strong evidence"
  | "Moderate evidence"
  | "Limited evidence"
  | "Weak evidence";

/**
 * Map a 0–10 score to its letter grade (inclusive lower bounds)
 */
export function gradeForScore(
  score: number,
  thresholds: readonly GradeThreshold[] = GRADE_THRESHOLDS
): EvidenceGrade {
  assertScore(score);

  for (const threshold of thresholds) {
    if (score >= threshold.min) {
      return threshold.grade;
    }
  }

  return FLOOR_GRADE;
}

/**
 * Coarse label used in one-line claim summaries
 */
export function evidenceStrength(score: number): EvidenceStrength {
  assertScore(score);

  if (score >= 8) return "Strong evidence";
  if (score >= 6) return "Moderate evidence";
  if (score >= 4) return "Limited evidence";
  return "Weak evidence";
}

function assertScore(score: number): void {
  if (!Number.isFinite(score) || score < 0 || score > MAX_SCORE) {
    throw InvalidInputError.fromIssues("score", [
      {
        path: "score",
        message: `expected a finite number in [0, ${MAX_SCORE}], received ${score}`,
      },
    ]);
  }
}
