/**
 * Error taxonomy for the assessment service.
 *
 * Every AppError carries a stable `code` and the HTTP status the routes
 * answer with. Anything that is not an AppError is reported as a 500.
 */

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class DataLoadError extends AppError {
  constructor(message: string) {
    super(message, 'DATA_LOAD_ERROR', 500);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class InvalidDomainError extends AppError {
  constructor(domain: string) {
    super(`No controls found for domain: ${domain}`, 'INVALID_DOMAIN', 400);
  }
}

export class InvalidStateError extends AppError {
  readonly currentStatus: string;

  constructor(operation: string, currentStatus: string) {
    super(`Cannot ${operation} (current status: ${currentStatus})`, 'INVALID_STATE', 409);
    this.currentStatus = currentStatus;
  }
}

export class AlreadyStartedError extends AppError {
  constructor(assessmentId: string) {
    super(`Assessment ${assessmentId} has already been started`, 'ALREADY_STARTED', 409);
  }
}

export class ControlMismatchError extends AppError {
  constructor(expected: string, received: string) {
    super(`Expected a response for control ${expected}, received ${received}`, 'CONTROL_MISMATCH', 409);
  }
}

export class NotCompletedError extends AppError {
  constructor(assessmentId: string) {
    super(`Assessment ${assessmentId} not completed. Complete all controls first.`, 'NOT_COMPLETED', 409);
  }
}

export class EmptyHistoryError extends AppError {
  constructor(assessmentId: string) {
    super(`No responses found for assessment ${assessmentId}`, 'EMPTY_HISTORY', 404);
  }
}

export class AssessmentNotFoundError extends AppError {
  constructor(assessmentId: string) {
    super(`Assessment not found: ${assessmentId}`, 'ASSESSMENT_NOT_FOUND', 404);
  }
}

export class ControlNotFoundError extends AppError {
  constructor(controlId: string) {
    super(`Control not found: ${controlId}`, 'CONTROL_NOT_FOUND', 404);
  }
}

/** Raised inside classifier adapters; never escapes classifyWithFallback. */
export class ClassifierFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassifierFailure';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
