/**
 * Scoring Model
 * Every weight, curve constant and threshold used by the engine, in one frozen table
 */

import type { EvidenceGrade } from "./types.js";

export const MAX_SCORE = 10;

export interface GradeThreshold {
  /** Inclusive lower bound */
  min: number;
  grade: EvidenceGrade;
}

export interface ScoringModel {
  weights: {
    quantity: number;
    quality: number;
    consistency: number;
    recency: number;
  };

  quantity: {
    /** k in 10·(1 − e^(−n/k)) */
    saturation: number;
  };

  quality: {
    typeWeights: {
      metaAnalysis: number;
      humanRct: number;
      humanOther: number;
      animal: number;
      inVitro: number;
    };
    saturation: number;
    /** Ceiling for animal/in-vitro-only evidence */
    weakEvidenceCap: number;
  };

  consistency: {
    /** Score when no study has a known direction */
    neutralScore: number;
    /** Exponent applied to the supporting ratio */
    agreementExponent: number;
  };

  recency: {
    fullCreditYears: number;
    floorYears: number;
    floorScore: number;
    noEvidenceScore: number;
  };

  adjustments: {
    minCredibleSampleSize: number;
    smallSamplePenalty: number;
    singleStudyCeiling: number;
    replicationBonusPerLevel: number;
    replicationBonusCap: number;
  };

  /** Ordered highest to lowest */
  grades: readonly GradeThreshold[];
}

export const GRADE_THRESHOLDS: readonly GradeThreshold[] = deepFreeze<GradeThreshold[]>([
  { min: 9.5, grade: "A+" },
  { min: 9.0, grade: "A" },
  { min: 8.5, grade: "A-" },
  { min: 8.0, grade: "B+" },
  { min: 7.0, grade: "B" },
  { min: 6.0, grade: "B-" },
  { min: 5.0, grade: "C+" },
  { min: 4.0, grade: "C" },
  { min: 3.0, grade: "C-" },
  { min: 2.0, grade: "D" },
]);

/** Grade for anything below the lowest threshold */
export const FLOOR_GRADE: EvidenceGrade = "F";

export const DEFAULT_SCORING_MODEL: Readonly<ScoringModel> = deepFreeze({
  weights: {
    quantity: 0.25,
    quality: 0.4,
    consistency: 0.2,
    recency: 0.15,
  },

  // 5 studies reach ~80% of the ceiling, 15 reach ~99%
  quantity: {
    saturation: 3.1,
  },

  quality: {
    typeWeights: {
      metaAnalysis: 5,
      humanRct: 3,
      humanOther: 2,
      animal: 1,
      inVitro: 0.5,
    },
    saturation: 11,
    weakEvidenceCap: 4,
  },

  consistency: {
    neutralScore: 5,
    agreementExponent: 3,
  },

  recency: {
    fullCreditYears: 2,
    floorYears: 10,
    floorScore: 2,
    noEvidenceScore: 0,
  },

  adjustments: {
    minCredibleSampleSize: 30,
    smallSamplePenalty: 1,
    singleStudyCeiling: 6.9,
    replicationBonusPerLevel: 0.15,
    replicationBonusCap: 0.5,
  },

  grades: GRADE_THRESHOLDS,
});

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
