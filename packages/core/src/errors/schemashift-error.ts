/**
 * Error type shared by all schemashift packages
 *
 * Only I/O-adjacent failures raise these. Matching and substitution are
 * total functions and never throw.
 */

export type ErrorCode =
  | 'ARCHIVE_READ_FAILED'
  | 'ARCHIVE_WRITE_FAILED'
  | 'DECODE_FAILED'
  | 'MAPPING_LOAD_FAILED'
  | 'MAPPING_SAVE_FAILED'
  | 'EMPTY_MAPPING'
  | 'UNSUPPORTED_FILE'
  | 'CONFIGURATION_ERROR'
  | 'INPUT_NOT_FOUND'
  | 'TIMEOUT'
  | 'UNKNOWN';

export interface SchemashiftErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** File the error relates to */
  filePath?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SchemashiftError extends Error {
  readonly code: ErrorCode;
  readonly filePath?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SchemashiftErrorDetails) {
    super(details.message);
    this.name = 'SchemashiftError';
    this.code = details.code;
    this.filePath = details.filePath;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, SchemashiftError);
  }

  /**
   * Format the error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.filePath) {
      parts.push(`File: ${this.filePath}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      filePath: this.filePath,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as SchemashiftError
 */
export function wrapError(
  error: unknown,
  filePath?: string,
  defaultCode: ErrorCode = 'UNKNOWN'
): SchemashiftError {
  if (error instanceof SchemashiftError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new SchemashiftError({
    code: defaultCode,
    message,
    filePath,
    cause,
  });
}
