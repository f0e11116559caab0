/**
 * Error types for hr-synth
 */

export class HrSynthError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HrSynthError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid request or configuration: bad employee count, inverted date range,
 * malformed bands, or minimums that cannot be met at the requested scale.
 */
export class ConfigurationError extends HrSynthError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, { ...context, issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * The reference catalogs cannot satisfy job–org family alignment.
 */
export class AlignmentError extends HrSynthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.ALIGNMENT_ERROR, context);
    this.name = 'AlignmentError';
  }
}

export interface IntegrityViolation {
  rule: IntegrityRule;
  table: string;
  employeeId?: string;
  message: string;
}

export type IntegrityRule =
  | 'single-root'
  | 'manager-reference'
  | 'manager-seniority'
  | 'chain-contiguity'
  | 'seniority-monotonicity'
  | 'salary-monotonicity'
  | 'salary-band'
  | 'foreign-key'
  | 'job-org-alignment'
  | 'review-uniqueness';

/**
 * Raised by the post-generation validation pass. Signals a generator defect,
 * never bad input.
 */
export class DataIntegrityError extends HrSynthError {
  public readonly violations: IntegrityViolation[];

  constructor(violations: IntegrityViolation[]) {
    const preview = violations
      .slice(0, 5)
      .map((v) => `[${v.rule}] ${v.message}`)
      .join('; ');
    const more = violations.length > 5 ? ` (+${violations.length - 5} more)` : '';
    super(
      `Generated dataset failed ${violations.length} integrity check(s): ${preview}${more}`,
      ErrorCodes.DATA_INTEGRITY_ERROR,
      { count: violations.length }
    );
    this.name = 'DataIntegrityError';
    this.violations = violations;
  }
}

/**
 * Error code constants
 */
export const ErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  ALIGNMENT_ERROR: 'ALIGNMENT_ERROR',
  DATA_INTEGRITY_ERROR: 'DATA_INTEGRITY_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
