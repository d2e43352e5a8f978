import { describe, it, expect } from 'vitest';
import {
  TransportAbortedError,
  TransportConnectionError,
  TransportTimeoutError,
} from '../transport/errors.js';
import { RETRYABLE_STATUS_CODES, RetryPolicy } from './retry-policy.js';

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({ defaultRetries: 3, retryDelayMs: 250 });

  it('uses the task budget when it is set', () => {
    expect(policy.attemptBudget(5)).toBe(5);
    expect(policy.attemptBudget(2)).toBe(2);
  });

  it('falls back to the default budget for -1', () => {
    expect(policy.attemptBudget(-1)).toBe(3);
  });

  it('always allows one attempt', () => {
    expect(policy.attemptBudget(0)).toBe(1);
    expect(new RetryPolicy({ defaultRetries: 0 }).attemptBudget(-1)).toBe(1);
  });

  it('collapses every budget to one attempt when retries are skipped', () => {
    const skipping = new RetryPolicy({ defaultRetries: 3, skipRetries: true });

    expect(skipping.attemptBudget(5)).toBe(1);
    expect(skipping.attemptBudget(-1)).toBe(1);
  });

  it('classifies gateway and timeout statuses as retryable', () => {
    for (const status of [524, 504, 502, 408]) {
      expect(policy.classify({ type: 'response', status })).toBe('retryable-status');
    }
    expect([...RETRYABLE_STATUS_CODES].sort()).toEqual([408, 502, 504, 524]);
  });

  it('delivers every other status', () => {
    for (const status of [200, 301, 404, 429, 500, 503]) {
      expect(policy.classify({ type: 'response', status })).toBe('deliver');
    }
  });

  it('classifies timeouts and connection failures as network', () => {
    expect(
      policy.classify({
        type: 'error',
        error: new TransportTimeoutError('https://api.test', 100),
      }),
    ).toBe('network');
    expect(
      policy.classify({
        type: 'error',
        error: new TransportConnectionError('connect ECONNREFUSED', 'ECONNREFUSED'),
      }),
    ).toBe('network');
  });

  it('classifies anything else as unexpected', () => {
    expect(
      policy.classify({ type: 'error', error: new SyntaxError('Unexpected end of JSON input') }),
    ).toBe('unexpected');
    expect(
      policy.classify({ type: 'error', error: new TransportAbortedError('https://api.test') }),
    ).toBe('unexpected');
  });

  it('retries transient outcomes after the fixed delay while attempts remain', () => {
    expect(policy.decide('network', 2)).toEqual({
      shouldRetry: true,
      delayMs: 250,
      outcomeClass: 'network',
    });
    expect(policy.decide('retryable-status', 1)).toEqual({
      shouldRetry: true,
      delayMs: 250,
      outcomeClass: 'retryable-status',
    });
  });

  it('does not wait after the last attempt', () => {
    expect(policy.decide('retryable-status', 0)).toEqual({
      shouldRetry: false,
      delayMs: 0,
      outcomeClass: 'retryable-status',
    });
  });

  it('never retries delivered or unexpected outcomes', () => {
    expect(policy.decide('deliver', 3).shouldRetry).toBe(false);
    expect(policy.decide('unexpected', 3).shouldRetry).toBe(false);
  });
});
