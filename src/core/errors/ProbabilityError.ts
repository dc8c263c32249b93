/**
 * Core error handling for binomial-kit
 *
 * Every failure raised by the library is a ProbabilityError with:
 * - A structured error code separating type errors from value errors
 * - Context preservation for debugging
 * - Proper stack trace handling
 */

/**
 * Error codes for the failures the library can raise
 */
export enum ErrorCode {
  // Argument is not an integral/numeric value where one is required
  INVALID_TYPE = 'INVALID_TYPE',

  // Argument is outside its valid domain
  INVALID_VALUE = 'INVALID_VALUE',

  // Statistic has no finite value for the given parameters
  UNDEFINED_STATISTIC = 'UNDEFINED_STATISTIC',
}

/**
 * Error class with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new ProbabilityError(
 *   ErrorCode.INVALID_VALUE,
 *   'k must be less than or equal to n',
 *   { k: 12, n: 10 }
 * );
 * ```
 */
export class ProbabilityError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProbabilityError';

    // V8 only (Node.js/Chrome)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProbabilityError);
    }
  }

  /**
   * Formatted representation including code and context
   */
  override toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Type guard to check if an error is a ProbabilityError
 */
export function isProbabilityError(error: unknown): error is ProbabilityError {
  return error instanceof ProbabilityError;
}
