/**
 * Error taxonomy for the resolution engine.
 * Fatal errors abort a run; recoverable ones are turned into data by the caller.
 */

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'REFERENCE_LOAD_FAILED'
  | 'SUGGESTION_FAILED'
  | 'LEDGER_SEALED'
  | 'LEDGER_INTEGRITY'
  | 'QUALITY_CONFIG_INVALID'
  | 'QUALITY_CHECK_FAILED'
  | 'UNKNOWN';

export interface CausewayErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

type ErrorInit = Omit<CausewayErrorDetails, 'code'>;

export class CausewayError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: CausewayErrorDetails) {
    super(details.message);
    this.name = 'CausewayError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, new.target);
  }

  /**
   * Whether the error must abort the run
   */
  get fatal(): boolean {
    return this.code !== 'SUGGESTION_FAILED';
  }

  /**
   * Format error as a structured, actionable message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

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
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/** Unknown strategy or check name, missing threshold, invalid version pin */
export class ConfigError extends CausewayError {
  constructor(details: ErrorInit) {
    super({ ...details, code: 'CONFIG_INVALID' });
    this.name = 'ConfigError';
  }
}

/** Reference table version absent, malformed or ambiguous */
export class ReferenceLoadError extends CausewayError {
  constructor(details: ErrorInit) {
    super({ ...details, code: 'REFERENCE_LOAD_FAILED' });
    this.name = 'ReferenceLoadError';
  }
}

/** Suggestion service timeout or transport failure; recovered as "no candidate" */
export class SuggestionServiceError extends CausewayError {
  readonly kind: 'timeout' | 'transport';

  constructor(details: ErrorInit & { kind: 'timeout' | 'transport' }) {
    super({ ...details, code: 'SUGGESTION_FAILED' });
    this.name = 'SuggestionServiceError';
    this.kind = details.kind;
  }
}

/** Append attempted after the ledger was finalized */
export class LedgerSealedError extends CausewayError {
  constructor(details: ErrorInit) {
    super({ ...details, code: 'LEDGER_SEALED' });
    this.name = 'LedgerSealedError';
  }
}

/** Unknown check name or invalid check parameters */
export class QualityConfigError extends CausewayError {
  constructor(details: ErrorInit) {
    super({ ...details, code: 'QUALITY_CONFIG_INVALID' });
    this.name = 'QualityConfigError';
  }
}

/** A check could not run against the dataset (e.g. missing column) */
export class QualityCheckRuntimeError extends CausewayError {
  constructor(details: ErrorInit) {
    super({ ...details, code: 'QUALITY_CHECK_FAILED' });
    this.name = 'QualityCheckRuntimeError';
  }
}

/**
 * Helper to wrap unknown errors as CausewayError
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN'
): CausewayError {
  if (error instanceof CausewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new CausewayError({
    code: defaultCode,
    message,
    cause,
  });
}
