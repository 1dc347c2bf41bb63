/**
 * Serving error utilities.
 *
 * Provides a consistent error type for every public surface of the serving
 * core and helpers to convert lower-level failures (aborts, loader crashes,
 * schema violations) into ServingError instances callers can branch on.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 *
 * The first four form the request-path taxonomy; the remaining codes cover
 * input validation and startup-time corruption of persisted state.
 */
export type ServingErrorCode =
  | 'NotFound'
  | 'Conflict'
  | 'Unavailable'
  | 'Timeout'
  | 'InvalidParams'
  | 'StateCorrupted'
  | 'ReferenceCorrupted';

/**
 * Plain error shape used for JSON responses and telemetry.
 */
export interface ServingErrorShape {
  code: ServingErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation thrown by the serving core.
 */
export class ServingError extends Error implements ServingErrorShape {
  public readonly code: ServingErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ServingErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServingError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/telemetry).
   */
  public toObject(): ServingErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard that also narrows on a specific code.
 */
export function isServingError(error: unknown, code?: ServingErrorCode): error is ServingError {
  return error instanceof ServingError && (code === undefined || error.code === code);
}

/**
 * Map unknown errors into ServingError instances.
 *
 * @param error - Error thrown by a loader, model or store
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toServingError(
  error: unknown,
  fallbackCode: ServingErrorCode = 'Unavailable'
): ServingError {
  if (error instanceof ServingError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new ServingError('Timeout', error.message || 'Operation aborted by caller', undefined, {
        cause: error,
      });
    }

    return new ServingError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new ServingError(fallbackCode, 'Unknown serving error', { value: String(error) });
}

/**
 * Unknown model name or version.
 */
export function createNotFoundError(
  message: string,
  details?: Record<string, unknown>
): ServingError {
  return new ServingError('NotFound', message, details);
}

/**
 * Illegal state transition (duplicate registration, empty rollback history).
 */
export function createConflictError(
  message: string,
  details?: Record<string, unknown>
): ServingError {
  return new ServingError('Conflict', message, details);
}

/**
 * Timeout error with additional context
 */
export class TimeoutError extends ServingError {
  public readonly operation: string;
  public readonly timeout: number;

  constructor(message: string, details: { operation: string; timeout: number; modelName?: string }) {
    super('Timeout', message, details);
    this.name = 'TimeoutError';
    this.operation = details.operation;
    this.timeout = details.timeout;
  }
}

/**
 * Convenience helper to create timeout errors
 */
export function createTimeoutError(
  operation: string,
  timeout: number,
  modelName?: string
): TimeoutError {
  const message = `Request timed out after ${timeout}ms: ${operation}${modelName ? ` (model: ${modelName})` : ''}`;
  return new TimeoutError(message, { operation, timeout, modelName });
}

/**
 * Convert Zod validation error to ServingError
 *
 * @example
 * ```typescript
 * const result = FeatureVectorSchema.safeParse([1, 'x']);
 * if (!result.success) {
 *   throw zodErrorToServingError(result.error);
 * }
 * // Throws: "Validation error on field '1': Expected number, received string"
 * ```
 */
export function zodErrorToServingError(
  error: ZodError,
  code: ServingErrorCode = 'InvalidParams'
): ServingError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new ServingError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
