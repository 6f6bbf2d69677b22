/**
 * @trend-evidence/core
 * Core utilities shared by the scoring, persistence and CLI packages
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  EvidenceError,
  ConfigError,
  InvalidInputError,
  DatabaseError,
  NotFoundError,
  isEvidenceError,
  wrapError,
  type InputIssue,
} from "./errors.js";
