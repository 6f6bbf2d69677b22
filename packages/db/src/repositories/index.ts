/**
 * Repository Exports
 */

export { trendRepo } from "./trend.repository.js";
export { claimRepo } from "./claim.repository.js";
export { studyRepo, toStudyRecord } from "./study.repository.js";
