/**
 * Study Repository
 * Loads the studies linked to a claim as scoring records
 */

import { logger } from "@trend-evidence/core";
import type { StudyRecordInput } from "@trend-evidence/scoring";
import { getSupabase, toDatabaseError } from "../supabase.js";
import { CLAIM_STUDY_COLUMNS, ClaimStudyRowSchema, type ClaimStudyRow } from "../types.js";

const log = logger.child({ component: "study-repo" });

/**
 * Study records for a claim, newest first. Retracted studies are left out;
 * rows that do not match the table shape are skipped with a warning.
 */
export async function listRecordsForClaim(claimId: number): Promise<StudyRecordInput[]> {
  const supabase = getSupabase();
  const { data, error } = await supabase
    .from("claim_studies")
    .select(CLAIM_STUDY_COLUMNS)
    .eq("claim_id", claimId);

  if (error) throw toDatabaseError("claim_studies", "listRecordsForClaim", error);

  const records: StudyRecordInput[] = [];
  let retracted = 0;

  for (const row of data ?? []) {
    const parsed = ClaimStudyRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn("Skipping malformed study row", {
        claimId,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      continue;
    }

    if (parsed.data.studies.is_retracted) {
      retracted++;
      continue;
    }

    records.push(toStudyRecord(parsed.data));
  }

  log.debug(`Loaded ${records.length} study records`, { claimId, retracted });
  return records.sort((a, b) => b.publicationYear - a.publicationYear);
}

/**
 * Map a joined row to the aggregator's record shape
 */
export function toStudyRecord(row: ClaimStudyRow): StudyRecordInput {
  const study = row.studies;
  return {
    id: study.pubmed_id ?? `study-${study.id}`,
    studyType: study.study_type,
    isHuman: study.is_human_study ?? false,
    sampleSize: study.sample_size,
    publicationYear: study.publication_year,
    supportsClaim: row.supports_claim ?? "unknown",
  };
}

export const studyRepo = {
  listRecordsForClaim,
};
