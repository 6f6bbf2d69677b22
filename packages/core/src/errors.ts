/**
 * Custom Error Types
 * Structured errors for scoring, configuration and persistence failures
 */

/**
 * A single violated constraint on an input
 */
export interface InputIssue {
  /** Dotted path to the offending field ("" for the input itself) */
  path: string;
  message: string;
}

/**
 * Base error class for all trend-evidence errors
 */
export class EvidenceError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = "EvidenceError";
    this.code = code;
    this.context = options?.context;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors (environment, scoring model)
 */
export class ConfigError extends EvidenceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context });
    this.name = "ConfigError";
  }
}

/**
 * Malformed or out-of-domain counts/records. Rejects the whole call.
 */
export class InvalidInputError extends EvidenceError {
  public readonly issues: InputIssue[];

  constructor(message: string, issues: InputIssue[] = []) {
    super(message, "INVALID_INPUT", { context: { issues } });
    this.name = "InvalidInputError";
    this.issues = issues;
  }

  /**
   * Build from a list of issues, naming each one in the message
   */
  static fromIssues(subject: string, issues: InputIssue[]): InvalidInputError {
    const detail = issues
      .map((i) => `  - ${i.path || "(input)"}: ${i.message}`)
      .join("\n");
    return new InvalidInputError(`Invalid ${subject}:\n${detail}`, issues);
  }
}

/**
 * Supabase query failures
 */
export class DatabaseError extends EvidenceError {
  public readonly table: string;
  public readonly operation: string;

  constructor(
    message: string,
    table: string,
    operation: string,
    options?: { cause?: Error; context?: Record<string, unknown> }
  ) {
    super(message, "DATABASE_ERROR", {
      cause: options?.cause,
      context: { table, operation, ...options?.context },
    });
    this.name = "DatabaseError";
    this.table = table;
    this.operation = operation;
  }
}

/**
 * A trend or claim addressed by id/slug does not exist
 */
export class NotFoundError extends EvidenceError {
  public readonly entity: string;
  public readonly key: string;

  constructor(entity: string, key: string | number) {
    super(`${entity} not found: ${key}`, "NOT_FOUND", {
      context: { entity, key: String(key) },
    });
    this.name = "NotFoundError";
    this.entity = entity;
    this.key = String(key);
  }
}

/**
 * Type guard to check if error is one of ours
 */
export function isEvidenceError(error: unknown): error is EvidenceError {
  return error instanceof EvidenceError;
}

/**
 * Wrap an unknown error into an EvidenceError
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): EvidenceError {
  if (isEvidenceError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new EvidenceError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new EvidenceError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
