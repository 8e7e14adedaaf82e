/**
 * Error types for the record accessor
 *
 * Accessor operations never throw for data-shape problems; these errors
 * describe why an operation degraded to an absent result.
 */

export type ErrorCode =
  | 'UNKNOWN_FIELD'
  | 'FIELD_NOT_READABLE'
  | 'FIELD_READ_ONLY'
  | 'COERCION_FAILED'
  | 'CONSTRUCTION_FAILED'
  | 'TRANSCODE_FAILED'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN';

export interface AccessorErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Record type the error relates to */
  recordType?: string;
  /** Field the error relates to */
  field?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class AccessorError extends Error {
  readonly code: ErrorCode;
  readonly recordType?: string;
  readonly field?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: AccessorErrorDetails) {
    super(details.message);
    this.name = 'AccessorError';
    this.code = details.code;
    this.recordType = details.recordType;
    this.field = details.field;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, AccessorError);
  }

  /**
   * Format the error as a single report line block
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.recordType || this.field) {
      parts.push(`Field: ${[this.recordType, this.field].filter(Boolean).join('.')}`);
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
      recordType: this.recordType,
      field: this.field,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as AccessorError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN',
  location: { recordType?: string; field?: string } = {}
): AccessorError {
  if (error instanceof AccessorError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new AccessorError({
    code: defaultCode,
    message,
    cause,
    ...location,
  });
}
