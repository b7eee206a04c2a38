// Error taxonomy. Client errors surface as 4xx; the rest stay internal.

export class InvalidLocationError extends Error {
  constructor(
    message: string,
    public readonly location?: string
  ) {
    super(message);
    this.name = 'InvalidLocationError';
  }
}

export class InvalidDateError extends Error {
  constructor(
    message: string,
    public readonly date: string
  ) {
    super(message);
    this.name = 'InvalidDateError';
  }
}

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class RequestCancelledError extends Error {
  constructor(message = 'Request was cancelled by the caller') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

/** Assessor timed out, failed, or replied with data that did not validate. Never leaves the core. */
export class AssessorUnavailableError extends Error {
  constructor(
    message: string,
    public readonly lastError?: Error
  ) {
    super(message);
    this.name = 'AssessorUnavailableError';
  }
}

export class DataIntegrityError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export function isClientError(error: unknown): error is InvalidLocationError | InvalidDateError | RequestValidationError {
  return (
    error instanceof InvalidLocationError ||
    error instanceof InvalidDateError ||
    error instanceof RequestValidationError
  );
}
