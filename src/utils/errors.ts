/**
 * Base error for everything the poller reports.
 */
export class PollerError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid constructor argument or configuration value
 */
export class ValidationError extends PollerError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_FAILED');
    this.field = field;
  }
}

/**
 * The fetcher's lookup failed (network, auth, not found, decode)
 */
export class FetchError extends PollerError {
  public readonly cause: unknown;

  constructor(cause: unknown) {
    super(`Fetch failed: ${describeError(cause)}`, 'FETCH_FAILED');
    this.cause = cause;
  }
}

/**
 * The resource never reached a terminal state within the attempt budget
 */
export class AttemptsExceededError<R = unknown> extends PollerError {
  public readonly attempts: number;
  public readonly lastResource: R | null;

  constructor(attempts: number, lastResource: R | null) {
    super(`Resource not terminal after ${attempts} attempts`, 'ATTEMPTS_EXCEEDED');
    this.attempts = attempts;
    this.lastResource = lastResource;
  }
}

/**
 * Polling was abandoned through an AbortSignal
 */
export class PollAbortedError extends PollerError {
  constructor(message = 'Polling aborted') {
    super(message, 'POLL_ABORTED');
  }
}

/**
 * One-line description of any thrown value, for messages and log fields.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error === undefined || error === null) {
    return 'Unknown error';
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Wrap a fetcher failure unless it already is one.
 */
export function toFetchError(error: unknown): FetchError {
  return error instanceof FetchError ? error : new FetchError(error);
}
