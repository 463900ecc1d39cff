// src/utils/errors.ts
import type { ZodIssue } from 'zod';

/**
 * Type for structured error context that's more specific than 'any'
 */
export type ErrorContext = Record<string, unknown>;

/**
 * Base class for specific application errors, allowing for additional context
 * and tracking of the original error if applicable.
 */
export class AppError extends Error {
  /** Optional additional context related to the error. */
  public readonly context?: ErrorContext;
  /** Optional original error that caused this AppError. */
  public readonly originalError?: Error;

  /**
   * @param message The error message.
   * @param context Optional additional context.
   * @param originalError Optional original error.
   */
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.originalError = originalError;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Represents an error related to input validation, typically using Zod.
 * Can include the specific validation issues found.
 */
export class ValidationError extends AppError {
  /** Array of validation issues (using Zod's own type). */
  public readonly validationIssues?: ZodIssue[];

  constructor(message: string, validationIssues?: ZodIssue[], context?: ErrorContext) {
    const errorContext = { ...(context || {}), validationIssues };
    super(message, errorContext);
    this.name = 'ValidationError';
    this.validationIssues = validationIssues;
  }
}

/**
 * Represents an error related to application configuration issues,
 * such as invalid environment variables or an unreadable workflows.yaml.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by `raceWithTimeout` when the wrapped operation does not settle in time.
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
