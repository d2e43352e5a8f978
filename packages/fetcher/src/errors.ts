type FetchErrorKind = 'network' | 'receive';

const describeOriginal = (error: unknown): string => {
  if (error === undefined || error === null) {
    return '';
  }

  if (error instanceof Error) {
    return error.message || error.name;
  }

  return String(error);
};

/**
 * Base class of the errors a batch can raise. `kind` is the tag callers
 * switch on.
 */
abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;
  readonly serviceName: string;
  readonly originalError: unknown;

  constructor(message: string, serviceName: string, originalError: unknown) {
    super(message);
    this.serviceName = serviceName;
    this.originalError = originalError;
  }
}

type NetworkErrorInit = {
  serviceName: string;
  url: string;
  originalError?: unknown;
  retriesLeft: number;
  maxRetries: number;
  /** 0 when no response was received */
  responseCode: number;
};

class NetworkError extends FetchError {
  readonly kind = 'network' as const;
  readonly url: string;
  readonly retriesLeft: number;
  readonly maxRetries: number;
  readonly responseCode: number;

  constructor(init: NetworkErrorInit) {
    super(
      `Network issue while requesting \`${init.serviceName}\` service data from url \`${init.url}\` ` +
        `[${init.retriesLeft} of ${init.maxRetries} left]. Last response code: ${init.responseCode}. ` +
        `Original exception: \`${describeOriginal(init.originalError)}\`.`,
      init.serviceName,
      init.originalError,
    );
    this.name = 'NetworkError';
    this.url = init.url;
    this.retriesLeft = init.retriesLeft;
    this.maxRetries = init.maxRetries;
    this.responseCode = init.responseCode;
  }
}

class ReceiveError extends FetchError {
  readonly kind = 'receive' as const;

  constructor(serviceName: string, originalError?: unknown) {
    super(
      `Failed to receive data from \`${serviceName}\` service. Original exception: \`${describeOriginal(originalError)}\`.`,
      serviceName,
      originalError,
    );
    this.name = 'ReceiveError';
  }
}

class TaskBuildError extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Cannot build task for url "${url}": ${reason}`);
    this.name = 'TaskBuildError';
    this.url = url;
  }
}

function isFetchError(value: unknown): value is NetworkError | ReceiveError {
  return value instanceof NetworkError || value instanceof ReceiveError;
}

export { FetchError, NetworkError, ReceiveError, TaskBuildError, isFetchError };
export type { FetchErrorKind, NetworkErrorInit };
