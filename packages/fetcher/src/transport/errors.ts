/**
 * The attempt did not finish within its timeout.
 */
class TransportTimeoutError extends Error {
  readonly timeoutMs: number | undefined;

  constructor(url: string, timeoutMs?: number) {
    super(
      timeoutMs === undefined
        ? `Request to ${url} timed out`
        : `Request to ${url} timed out after ${timeoutMs}ms`,
    );
    this.name = 'TransportTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Socket-level failure before a response arrived: refused, reset, DNS, TLS.
 */
class TransportConnectionError extends Error {
  readonly code: string | undefined;

  constructor(message: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportConnectionError';
    this.code = code;
  }
}

/**
 * The batch was aborted because another task failed.
 */
class TransportAbortedError extends Error {
  constructor(url: string) {
    super(`Request to ${url} was aborted`);
    this.name = 'TransportAbortedError';
  }
}

export { TransportAbortedError, TransportConnectionError, TransportTimeoutError };
