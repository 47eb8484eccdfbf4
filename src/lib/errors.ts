/**
 * Structured error classes
 *
 * Thrown failures outside the renderer: unreadable metadata, invalid charm
 * configuration, cluster calls. Render failures are values, see
 * domain/types/render-errors.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  METADATA_INVALID: 'METADATA_INVALID',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',

  // Kubernetes errors
  KUBERNETES_CONNECTION_FAILED: 'KUBERNETES_CONNECTION_FAILED',
  KUBERNETES_APPLY_FAILED: 'KUBERNETES_APPLY_FAILED',
  CONTAINER_NOT_FOUND: 'CONTAINER_NOT_FOUND',

  // Generic errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all operator errors
 */
export class OperatorError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'OperatorError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }
}

/**
 * Charm configuration or metadata that does not validate
 */
export class ConfigurationError extends OperatorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.CONFIG_INVALID,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Kubernetes API failures
 */
export class KubernetesError extends OperatorError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.KUBERNETES_APPLY_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, details, cause);
    this.name = 'KubernetesError';
  }
}

export function isOperatorError(error: unknown): error is OperatorError {
  return error instanceof OperatorError;
}

/**
 * Message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
