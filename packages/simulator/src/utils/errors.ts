import { ErrorCode } from '@student-sim/shared';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

// Malformed input or configuration. Fatal, raised before any model call.
export class ValidationError extends AppError {
  readonly code = ErrorCode.VALIDATION_ERROR;
}

// The model capability failed or returned nothing, after retries.
export class ModelError extends AppError {
  readonly code = ErrorCode.MODEL_ERROR;
}

export class SessionStateError extends AppError {
  readonly code = ErrorCode.SESSION_STATE_ERROR;
}
