/**
 * Centralized error type definitions for Proofline
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  STAGE_EXECUTION_ERROR = 'STAGE_EXECUTION_ERROR',
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  RECONSTRUCTION_ERROR = 'RECONSTRUCTION_ERROR',
  STAGE_UNAVAILABLE = 'STAGE_UNAVAILABLE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input cannot be read or decoded into the expected structural form.
 * Raised before any stage runs.
 */
export class ParseError extends AppError {
  constructor(sourcePath: string, reason: string, cause?: unknown) {
    super(`Failed to parse ${sourcePath}: ${reason}`, ErrorCode.PARSE_ERROR, true, { sourcePath }, { cause });
  }
}

/**
 * A stage failed internally. Recoverable according to the failure policy.
 */
export class StageExecutionError extends AppError {
  public readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Stage '${stage}' failed: ${reason}`, ErrorCode.STAGE_EXECUTION_ERROR, true, { stage }, { cause });
    this.stage = stage;
  }
}

/**
 * A stage returned blocks that no longer line up with the parsed structure.
 * Never recoverable: it means a collaborator is broken.
 */
export class InvariantViolationError extends AppError {
  public readonly stage: string;

  constructor(stage: string, message: string, context?: Record<string, unknown>) {
    super(`Stage '${stage}' violated block invariants: ${message}`, ErrorCode.INVARIANT_VIOLATION, false, {
      stage,
      ...context,
    });
    this.stage = stage;
  }
}

/**
 * A block's back-reference does not resolve against its tree at render time.
 */
export class ReconstructionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.RECONSTRUCTION_ERROR, false, context);
  }
}

export class StageUnavailableError extends AppError {
  constructor(stage: string, reason: string) {
    super(`Stage '${stage}' is unavailable: ${reason}`, ErrorCode.STAGE_UNAVAILABLE, true, { stage });
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      true,
      { service, ...context },
      { cause }
    );
  }
}

/**
 * Type guard for errors raised by a cancelled or timed-out run
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return (
    error.name === 'AbortError' ||
    error.name === 'CanceledError' ||
    error.name === 'TimeoutError' ||
    code === 'ERR_CANCELED' ||
    code === 'ABORT_ERR'
  );
}
