import { ErrorCode } from '../types/errors';

/**
 * Base class for failures raised inside the correlation and logging pipeline.
 *
 * Only the construction-time checks (ValidationFailedError, InvalidArgumentError)
 * ever reach application code; the others are caught where they occur and turned
 * into a degraded outcome plus a diagnostic.
 */
export class PipelineError extends Error {
  readonly errorCode: ErrorCode;
  readonly isOperational: boolean;

  constructor(errorCode: ErrorCode, message: string, options?: { cause?: unknown; isOperational?: boolean }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.isOperational = options?.isOperational ?? true;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * Blank or malformed identifier at construction time
 */
export class ValidationFailedError extends PipelineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(ErrorCode.VALIDATION_FAILED, message);
    this.field = field;
  }

  static blank(field: string, label: string): ValidationFailedError {
    return new ValidationFailedError(field, `${label} cannot be empty`);
  }
}

/**
 * Bad input to the correlation id generator
 */
export class InvalidArgumentError extends PipelineError {
  constructor(message: string) {
    super(ErrorCode.INVALID_ARGUMENT, message);
  }
}

/**
 * Host identity lookup failed; recovered with sentinel values
 */
export class ResolutionFailedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.RESOLUTION_FAILED, message, { cause });
  }
}

/**
 * A record could not be assembled or serialized; recovered with a plain-text line
 */
export class SerializationDegradedError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.SERIALIZATION_DEGRADED, message, { cause, isOperational: false });
  }
}

/**
 * Short, never-throwing description of an unknown error value
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'unknown error';
  }
};

/**
 * The layered configuration could not be read or modified as requested
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.CONFIGURATION_ERROR, message, { cause });
  }
}
