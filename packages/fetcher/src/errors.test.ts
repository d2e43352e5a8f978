import { describe, it, expect } from 'vitest';
import {
  FetchError,
  NetworkError,
  ReceiveError,
  TaskBuildError,
  isFetchError,
} from './errors.js';

describe('NetworkError', () => {
  it('describes the attempt budget and last response code', () => {
    const error = new NetworkError({
      serviceName: 'billing',
      url: 'https://billing.test/invoices',
      originalError: new Error('socket hang up'),
      retriesLeft: 0,
      maxRetries: 3,
      responseCode: 0,
    });

    expect(error.message).toBe(
      'Network issue while requesting `billing` service data from url ' +
        '`https://billing.test/invoices` [0 of 3 left]. Last response code: 0. ' +
        'Original exception: `socket hang up`.',
    );
    expect(error.kind).toBe('network');
    expect(error.name).toBe('NetworkError');
    expect(error).toBeInstanceOf(FetchError);
  });

  it('leaves the original exception blank for status failures', () => {
    const error = new NetworkError({
      serviceName: 'api',
      url: 'https://api.test/x',
      retriesLeft: 1,
      maxRetries: 2,
      responseCode: 502,
    });

    expect(error.message).toBe(
      'Network issue while requesting `api` service data from url `https://api.test/x` ' +
        '[1 of 2 left]. Last response code: 502. Original exception: ``.',
    );
  });
});

describe('ReceiveError', () => {
  it('wraps the original exception', () => {
    const cause = new SyntaxError('Unexpected token o in JSON');
    const error = new ReceiveError('billing', cause);

    expect(error.message).toBe(
      'Failed to receive data from `billing` service. Original exception: `Unexpected token o in JSON`.',
    );
    expect(error.kind).toBe('receive');
    expect(error.originalError).toBe(cause);
    expect(error.serviceName).toBe('billing');
  });

  it('stringifies non-error originals', () => {
    expect(new ReceiveError('api', 'gone').message).toBe(
      'Failed to receive data from `api` service. Original exception: `gone`.',
    );
  });
});

describe('isFetchError', () => {
  it('narrows to the fetch error taxonomy', () => {
    expect(isFetchError(new ReceiveError('api'))).toBe(true);
    expect(
      isFetchError(
        new NetworkError({
          serviceName: 'api',
          url: 'https://api.test',
          retriesLeft: 0,
          maxRetries: 1,
          responseCode: 504,
        }),
      ),
    ).toBe(true);
    expect(isFetchError(new TaskBuildError('x', 'bad'))).toBe(false);
    expect(isFetchError(new Error('plain'))).toBe(false);
  });
});
