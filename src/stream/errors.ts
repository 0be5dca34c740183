/**
 * @fileoverview Error taxonomy for log streaming and matching
 * @module stream/errors
 */

/**
 * Base error with a machine-readable code and diagnostic context
 */
export class DocksideError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocksideError';
    Object.setPrototypeOf(this, DocksideError.prototype);
  }
}

/**
 * The remote end of a byte source closed before the requested bytes arrived.
 *
 * Flow-control signal only: `streamLogs` turns it into normal termination.
 */
export class StreamClosedError extends DocksideError {
  constructor(
    public readonly received: number = 0,
    public readonly expected: number = 0
  ) {
    super(
      `Stream closed after ${received} of ${expected} bytes`,
      'STREAM_CLOSED',
      { received, expected }
    );
    this.name = 'StreamClosedError';
    Object.setPrototypeOf(this, StreamClosedError.prototype);
  }
}

/**
 * A wall-clock deadline elapsed before the requested data arrived.
 *
 * `name` is `'TimeoutError'` so callers can branch on it the same way they
 * would on an aborted fetch.
 */
export class LogTimeoutError extends DocksideError {
  constructor(message: string = 'Timeout waiting for container logs.', context?: Record<string, unknown>) {
    super(message, 'TIMEOUT', context);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, LogTimeoutError.prototype);
  }
}

/**
 * The log stream ended normally without the matcher ever matching
 */
export class LogsNotFoundError extends DocksideError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'LOGS_NOT_FOUND', context);
    this.name = 'LogsNotFoundError';
    Object.setPrototypeOf(this, LogsNotFoundError.prototype);
  }
}

/**
 * A stateful combination matcher was called after it had fully matched
 */
export class MatcherExhaustedError extends DocksideError {
  constructor(matcher: string) {
    super('Matcher exhausted, no more matchers to use', 'MATCHER_EXHAUSTED', { matcher });
    this.name = 'MatcherExhaustedError';
    Object.setPrototypeOf(this, MatcherExhaustedError.prototype);
  }
}

/**
 * Type guard for timeout errors raised anywhere in the stream stack
 */
export function isTimeoutError(error: unknown): error is LogTimeoutError {
  return error instanceof LogTimeoutError;
}
