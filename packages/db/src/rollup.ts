/**
 * Trend Roll-up
 * A trend's score is the mean of its claims' scores
 */

import { gradeForScore, type EvidenceGrade } from "@trend-evidence/scoring";

export interface ClaimRollUp {
  /** Mean claim score, full precision */
  score: number;
  /** Mean rounded to one decimal */
  displayScore: number;
  grade: EvidenceGrade;
  claimCount: number;
}

/**
 * Roll claim scores up into a trend score; null when no claim is scored
 */
export function rollUpClaimScores(scores: readonly number[]): ClaimRollUp | null {
  if (scores.length === 0) return null;

  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  return {
    score: mean,
    displayScore: Math.round(mean * 10) / 10,
    grade: gradeForScore(mean),
    claimCount: scores.length,
  };
}
