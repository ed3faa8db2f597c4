/**
 * Core Error Classes
 *
 * This package has zero dependencies on other @expsync packages,
 * so we define minimal error classes here rather than importing from utils.
 */

/**
 * Validation error - for domain invariant violations
 *
 * Compatible with @expsync/utils ValidationError (same name and code)
 * but defined here to keep @expsync/core dependency-free.
 */
export class ValidationError extends Error {
  public readonly code = 'VALIDATION_ERROR';
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}
