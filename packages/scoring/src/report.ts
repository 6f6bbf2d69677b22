/**
 * Score Report Formatting
 * Plain-text rendering and one-line summaries of a ScoreReport
 */

import { evidenceStrength } from "./grade.js";
import type { ComponentName, ScoreReport } from "./types.js";

const RULE = "=".repeat(60);

const COMPONENT_LABELS: Record<ComponentName, string> = {
  quantity: "Quantity:   ",
  quality: "Quality:    ",
  consistency: "Consistency:",
  recency: "Recency:    ",
};

/**
 * Render a report for terminal output
 */
export function formatScoreReport(report: ScoreReport): string {
  const { inputs } = report;
  const lines: string[] = [
    RULE,
    `EVIDENCE SCORE: ${report.displayScore.toFixed(1)}/10 (${report.grade})`,
    RULE,
    "",
    "Study Counts:",
    `  - Qualifying studies: ${report.studyCount}`,
    `  - Meta-analyses:      ${inputs.metaAnalyses}`,
    `  - Human RCTs:         ${inputs.humanRcts}`,
    `  - Other human:        ${inputs.humanOther}`,
    `  - Animal:             ${inputs.animalStudies}`,
    `  - In vitro:           ${inputs.inVitroStudies}`,
  ];

  if (inputs.avgSampleSize !== undefined) {
    lines.push(`  - Avg sample size:    ${Math.round(inputs.avgSampleSize)}`);
  }
  if (inputs.yearsSinceLast !== undefined) {
    lines.push(`  - Years since last:   ${inputs.yearsSinceLast}`);
  }

  lines.push("", "Component Scores:");
  for (const component of Object.values(report.components)) {
    lines.push(
      `  - ${COMPONENT_LABELS[component.name]} ${component.raw.toFixed(1)}/10` +
        ` -> ${component.score.toFixed(2)} of ${(component.weight * 10).toFixed(2)}` +
        ` (${component.detail})`
    );
  }
  lines.push(`  - Base score:   ${report.baseScore.toFixed(2)}`);

  if (report.adjustments.length > 0) {
    lines.push("", "Adjustments:");
    for (const adjustment of report.adjustments) {
      const sign = adjustment.delta >= 0 ? "+" : "-";
      lines.push(
        `  ${sign} ${adjustment.name} ${sign}${Math.abs(adjustment.delta).toFixed(2)}: ${adjustment.reason}`
      );
    }
  }

  if (report.undefinedSignals.length > 0) {
    lines.push("", "Defaults Applied:");
    for (const signal of report.undefinedSignals) {
      lines.push(`  - ${signal.component} = ${signal.value.toFixed(1)}: ${signal.reason}`);
    }
  }

  if (report.skippedRecords > 0) {
    lines.push("", `Skipped Records: ${report.skippedRecords}`);
    for (const warning of report.warnings) {
      lines.push(`  - ${warning.id ?? `#${warning.index}`}: ${warning.reason}`);
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}

/**
 * One-line claim summary, e.g. "Strong evidence from 1 meta-analysis and 5 RCTs."
 */
export function summarizeEvidence(report: ScoreReport): string {
  const strength = evidenceStrength(report.totalScore);
  const parts: string[] = [];

  const { metaAnalyses, humanRcts } = report.inputs;
  if (metaAnalyses > 0) {
    parts.push(`${metaAnalyses} ${metaAnalyses === 1 ? "meta-analysis" : "meta-analyses"}`);
  }
  if (humanRcts > 0) {
    parts.push(`${humanRcts} ${humanRcts === 1 ? "RCT" : "RCTs"}`);
  }

  if (parts.length === 0) {
    return `${strength}. Limited research available.`;
  }
  return `${strength} from ${parts.join(" and ")}.`;
}
