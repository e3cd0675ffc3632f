/**
 * Error Classes for access-lens
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_NOT_FOUND = "E1001",

  // Snapshot errors (2xxx)
  SNAPSHOT_NOT_FOUND = "E2000",
  SNAPSHOT_UNREADABLE = "E2001",
  SNAPSHOT_SCHEMA_INVALID = "E2002",
  SNAPSHOT_DANGLING_REFERENCE = "E2003",
  SNAPSHOT_CONTAINMENT_CYCLE = "E2004",

  // Analysis errors (3xxx)
  ANALYSIS_FAILED = "E3000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
}

/**
 * Base error class for all access-lens errors
 */
export class AccessLensError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AccessLensError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigurationError extends AccessLensError {
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.issues = context?.issues ?? [];
  }

  override toString(): string {
    const details = this.issues.length > 0 ? `\n  ${this.issues.join("\n  ")}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${details}`;
  }
}

/**
 * A codebase snapshot that cannot be loaded
 */
export class SnapshotError extends AccessLensError {
  public readonly filePath?: string;
  public readonly issues: string[];

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SNAPSHOT_SCHEMA_INVALID,
    context?: Record<string, unknown> & { filePath?: string; issues?: string[] }
  ) {
    super(message, code, context);
    this.name = "SnapshotError";
    this.filePath = context?.filePath;
    this.issues = context?.issues ?? [];
  }

  override toString(): string {
    const location = this.filePath ? ` at ${this.filePath}` : "";
    const details = this.issues.length > 0 ? `\n  ${this.issues.join("\n  ")}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}${details}`;
  }
}

/**
 * Failures of an analysis run as a whole
 */
export class AnalysisError extends AccessLensError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ANALYSIS_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "AnalysisError";
  }
}
