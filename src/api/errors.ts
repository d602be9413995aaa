/**
 * Control-system error utilities.
 *
 * Provides a consistent error type for every public operation and a
 * helper to convert validation and runtime failures into
 * ControlSystemError instances that callers can reason about.
 */

import { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 *
 * Algebraic and realization faults are raised eagerly at construction
 * time; NumericalInstability is raised by the integrator.
 */
export type ControlErrorCode =
  | 'InvalidConfiguration'
  | 'ComplexConjugateMismatch'
  | 'DegenerateFeedback'
  | 'NonCausalSystem'
  | 'NumericalInstability';

/**
 * Plain error shape for JSON responses and logs
 */
export interface ControlErrorShape {
  code: ControlErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error raised by the algebra, realization, simulation and validation layers.
 */
export class ControlSystemError extends Error implements ControlErrorShape {
  public readonly code: ControlErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ControlErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ControlSystemError';
    this.code = code;
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ControlSystemError);
    }
  }

  /**
   * Serialize error into plain shape (for JSON responses/logging).
   */
  public toObject(): ControlErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard for ControlSystemError, optionally narrowed to one code.
 */
export function isControlSystemError(
  error: unknown,
  code?: ControlErrorCode
): error is ControlSystemError {
  return error instanceof ControlSystemError && (code === undefined || error.code === code);
}

/**
 * Shorthand for InvalidConfiguration errors.
 */
export function invalidConfiguration(
  message: string,
  details?: Record<string, unknown>
): ControlSystemError {
  return new ControlSystemError('InvalidConfiguration', message, details);
}

/**
 * Format zod issues as `path message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Map unknown errors into ControlSystemError instances.
 *
 * @param error - Error thrown by validation or numerical code
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toControlSystemError(
  error: unknown,
  fallbackCode: ControlErrorCode = 'InvalidConfiguration'
): ControlSystemError {
  if (error instanceof ControlSystemError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new ControlSystemError(
      'InvalidConfiguration',
      `Validation failed: ${formatZodIssues(error).join('; ')}`,
      { issues: error.issues }
    );
  }

  if (error instanceof Error) {
    return new ControlSystemError(fallbackCode, error.message);
  }

  return new ControlSystemError(fallbackCode, 'Unknown control-system error');
}
