/**
 * Error Handler Utility
 *
 * Provides standardized error handling across the model.
 * Errors are categorised along the taxonomy of the calculation pipeline:
 * argument, validation, data integrity and computation failures.
 */

import { Logger } from './logger';

/**
 * Error categories for better error handling
 */
export enum ErrorCategory {
  ARGUMENT = 'ARGUMENT',
  VALIDATION = 'VALIDATION',
  DATA_INTEGRITY = 'DATA_INTEGRITY',
  COMPUTATION = 'COMPUTATION',
  INTERNAL = 'INTERNAL',
  UNKNOWN = 'UNKNOWN'
}

/**
 * Process exit code for each category
 */
export const EXIT_CODES: Record<ErrorCategory, number> = {
  [ErrorCategory.ARGUMENT]: 2,
  [ErrorCategory.VALIDATION]: 3,
  [ErrorCategory.DATA_INTEGRITY]: 4,
  [ErrorCategory.COMPUTATION]: 5,
  [ErrorCategory.INTERNAL]: 1,
  [ErrorCategory.UNKNOWN]: 1
};

/**
 * A single rule violation found while validating an input.
 */
export interface Violation {
  /** Offending field, e.g. `scenario.active_measures[Offices].cooking` */
  path: string;
  /** Rule identifier, e.g. `required`, `range`, `sum-to-one` */
  rule: string;
  message: string;
}

/**
 * Extended Error class with additional properties
 */
export class AppError extends Error {
  category: ErrorCategory;
  originalError?: Error | unknown;
  context?: Record<string, unknown>;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    originalError?: Error | unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.category = category;
    this.originalError = originalError;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

/**
 * Raised when an input fails one or more rules. Carries every violation found.
 */
export class ValidationError extends AppError {
  readonly violations: Violation[];

  constructor(
    message: string,
    violations: Violation[],
    category: ErrorCategory = ErrorCategory.VALIDATION
  ) {
    super(`${message}: ${violations.map(v => `${v.path} (${v.rule}) ${v.message}`).join('; ')}`, category, undefined, {
      violations: violations.length
    });
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

export function isValidationError(value: unknown): value is ValidationError {
  return value instanceof ValidationError;
}

/**
 * Shorthand for throwing a computation failure from inside the model.
 */
export function computationError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCategory.COMPUTATION, undefined, context);
}

/**
 * Shorthand for a data-integrity failure (database or CSV inputs).
 */
export function dataIntegrityError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCategory.DATA_INTEGRITY, undefined, context);
}

/**
 * Error handler utility class
 */
export class ErrorHandler {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Categorize an error raised outside the model's own checks
   */
  categorizeError(error: unknown): ErrorCategory {
    if (isAppError(error)) {
      return error.category;
    }

    if (!isError(error)) {
      return ErrorCategory.UNKNOWN;
    }

    if (error instanceof SyntaxError) {
      return ErrorCategory.VALIDATION;
    }

    const errorMessage = error.message.toLowerCase();

    if (errorMessage.includes('enoent') || errorMessage.includes('eacces')) {
      return ErrorCategory.DATA_INTEGRITY;
    }

    return ErrorCategory.INTERNAL;
  }

  /**
   * Create a standardized AppError from any error
   * @param error Original error
   * @param context Additional context information
   * @param message Optional custom message
   */
  createAppError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    if (isAppError(error)) {
      if (context) {
        error.context = { ...error.context, ...context };
      }
      return error;
    }

    const category = this.categorizeError(error);
    const errorMessage = isError(error)
      ? message || error.message
      : message || String(error);

    return new AppError(errorMessage, category, error, context);
  }

  /**
   * Log an error with standardized format
   * @returns The AppError that was logged
   */
  logError(
    error: unknown,
    context?: Record<string, unknown>,
    message?: string
  ): AppError {
    const appError = this.createAppError(error, context, message);

    switch (appError.category) {
      case ErrorCategory.ARGUMENT:
        this.logger.error(`Argument Error: ${appError.message}`);
        break;
      case ErrorCategory.VALIDATION:
        if (isValidationError(appError)) {
          this.logger.validation(`Validation Error: ${appError.violations.length} violation(s)`);
          for (const violation of appError.violations) {
            this.logger.error(`  ${violation.path} [${violation.rule}]: ${violation.message}`);
          }
        } else {
          this.logger.error(`Validation Error: ${appError.message}`);
        }
        break;
      case ErrorCategory.DATA_INTEGRITY:
        if (isValidationError(appError)) {
          this.logger.error(`Data Integrity Error: ${appError.violations.length} violation(s)`);
          for (const violation of appError.violations) {
            this.logger.error(`  ${violation.path} [${violation.rule}]: ${violation.message}`);
          }
        } else {
          this.logger.error(`Data Integrity Error: ${appError.message}`, appError.context);
        }
        break;
      default:
        this.logger.error(`${appError.category} Error: ${appError.message}`, appError.originalError);
    }

    return appError;
  }

  /**
   * Log an error and return the process exit code that reports it
   */
  handleFatal(error: unknown, context?: Record<string, unknown>): number {
    const appError = this.logError(error, context);
    return EXIT_CODES[appError.category];
  }
}
