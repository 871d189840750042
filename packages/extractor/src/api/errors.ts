export interface ErrorDetails {
  statusCode?: number;
  context?: string;
  field?: string;
  suggestion?: string;
  apiResponse?: string;
  [key: string]: unknown;
}

export class DriverError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  override toString(): string {
    return `${this.name}: ${this.message}`;
  }
}

/** Missing or rejected credentials. */
export class AuthenticationError extends DriverError {}

/** API unreachable, 5xx after retries, or a response body that cannot be read. */
export class ConnectionError extends DriverError {}

export class ObjectNotFoundError extends DriverError {}

export class FieldNotFoundError extends DriverError {}

export class QuerySyntaxError extends DriverError {}

/**
 * Raised only once transport retries are exhausted.
 * `retryAfter` is in seconds.
 */
export class RateLimitError extends DriverError {
  readonly retryAfter: number;

  constructor(message: string, retryAfter: number, details: ErrorDetails = {}) {
    super(message, { ...details, retryAfter });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends DriverError {}

export class TimeoutError extends DriverError {}

export class PayloadTooLargeError extends DriverError {}

export function isDriverError(value: unknown): value is DriverError {
  return value instanceof DriverError;
}
