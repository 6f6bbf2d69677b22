/**
 * @trend-evidence/db
 * Database client and repositories for trends, claims and studies
 */

// Supabase client
export {
  getSupabase,
  isSupabaseConfigured,
  resetSupabase,
  toDatabaseError,
} from "./supabase.js";

// Types
export * from "./types.js";

// Repositories
export { trendRepo, claimRepo, studyRepo, toStudyRecord } from "./repositories/index.js";

// Roll-up
export { rollUpClaimScores, type ClaimRollUp } from "./rollup.js";
