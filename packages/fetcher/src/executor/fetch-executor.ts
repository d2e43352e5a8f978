import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, type Logger } from '@workspace/logger';
import { NetworkError, ReceiveError } from '../errors.js';
import type { FetchMetrics } from '../observability/metrics.js';
import { FetchResult } from '../result/fetch-result.js';
import type { ResponseDecoding, TaskDescriptor } from '../task/types.js';
import { TransportTimeoutError } from '../transport/errors.js';
import type { Transport, TransportResponse } from '../transport/types.js';
import { RetryPolicy } from './retry-policy.js';

type FetchExecutorConfig = {
  /** Per-attempt timeout when the task sets none */
  timeoutMs: number;
  /** Attempt budget when the task sets none */
  numRetries: number;
  retryDelayMs: number;
  /** Service label carried by raised errors */
  serviceName: string;
  skipRetries: boolean;
};

type FetchExecutorDeps = {
  metrics?: FetchMetrics;
  logger?: Logger;
};

type AttemptResult =
  | { type: 'delivered'; result: FetchResult }
  | { type: 'detached' }
  | { type: 'retryable-status'; status: number }
  | { type: 'failed'; error: unknown }
  | { type: 'aborted'; error: unknown };

const DEFAULT_FETCH_EXECUTOR_CONFIG: FetchExecutorConfig = {
  timeoutMs: 10_000,
  numRetries: 0,
  retryDelayMs: 1_000,
  serviceName: 'api',
  skipRetries: false,
};

async function decodeBody(
  response: TransportResponse,
  decoding: ResponseDecoding,
): Promise<unknown> {
  switch (decoding) {
    case 'json':
      // Non-JSON content types decode as text
      return response.contentType.includes('json')
        ? response.json()
        : response.text();
    case 'text':
      return response.text();
    case 'raw':
      return response.raw();
  }
}

/**
 * Runs one task to completion: attempts, timeouts, classification and the
 * fixed-delay retry loop.
 */
export class FetchExecutor {
  private readonly config: FetchExecutorConfig;
  private readonly policy: RetryPolicy;
  private readonly metrics: FetchMetrics | undefined;
  private readonly logger: Logger;

  constructor(config?: Partial<FetchExecutorConfig>, deps?: FetchExecutorDeps) {
    this.config = { ...DEFAULT_FETCH_EXECUTOR_CONFIG, ...config };
    this.policy = new RetryPolicy({
      defaultRetries: this.config.numRetries,
      retryDelayMs: this.config.retryDelayMs,
      skipRetries: this.config.skipRetries,
    });
    this.metrics = deps?.metrics;
    this.logger = deps?.logger ?? createLogger('fetch-executor');
  }

  /**
   * @param signal aborts in-flight attempts and retry waits of this task
   * @throws NetworkError once the attempt budget is exhausted, unless the
   * task fails silently
   * @throws ReceiveError when a response cannot be decoded
   */
  async execute(
    transport: Transport,
    task: TaskDescriptor,
    signal?: AbortSignal,
  ): Promise<FetchResult> {
    const maxRetries = this.policy.attemptBudget(task.numRetries);
    const timeoutMs = task.timeoutMs ?? this.config.timeoutMs;
    let attemptsLeft = maxRetries;
    let lastError: NetworkError | undefined;

    this.metrics?.increment('tasks.started');

    while (attemptsLeft > 0) {
      attemptsLeft -= 1;
      const attempt = await this.attempt(transport, task, timeoutMs, signal);

      switch (attempt.type) {
        case 'delivered':
          this.metrics?.increment('tasks.completed');
          return attempt.result;

        case 'detached':
          this.metrics?.increment('tasks.detached');
          return FetchResult.empty();

        case 'aborted':
          throw attempt.error;

        case 'retryable-status':
        case 'failed': {
          const outcomeClass = this.policy.classify(
            attempt.type === 'failed'
              ? { type: 'error', error: attempt.error }
              : { type: 'response', status: attempt.status },
          );

          if (outcomeClass === 'unexpected' && attempt.type === 'failed') {
            this.metrics?.increment('tasks.failed');
            throw new ReceiveError(this.config.serviceName, attempt.error);
          }

          lastError = new NetworkError({
            serviceName: this.config.serviceName,
            url: task.url,
            originalError: attempt.type === 'failed' ? attempt.error : undefined,
            retriesLeft: attemptsLeft,
            maxRetries,
            responseCode: attempt.type === 'retryable-status' ? attempt.status : 0,
          });

          const decision = this.policy.decide(outcomeClass, attemptsLeft);
          if (decision.shouldRetry) {
            this.metrics?.increment('attempts.retried');
            this.logger.warn('Attempt failed, retrying', {
              url: task.url,
              attempt: maxRetries - attemptsLeft,
              retriesLeft: attemptsLeft,
              responseCode: lastError.responseCode,
              delayMs: decision.delayMs,
            });
            if (decision.delayMs > 0) {
              await sleep(decision.delayMs, undefined, { signal });
            }
          }
          break;
        }
      }
    }

    if (task.failSilently) {
      this.metrics?.increment('tasks.silenced');
      this.logger.debug('Attempts exhausted, failing silently', {
        url: task.url,
        maxRetries,
      });
      return FetchResult.empty();
    }

    this.metrics?.increment('tasks.failed');
    const error =
      lastError ??
      new NetworkError({
        serviceName: this.config.serviceName,
        url: task.url,
        retriesLeft: 0,
        maxRetries,
        responseCode: 0,
      });
    this.logger.error('Attempts exhausted', {
      url: task.url,
      maxRetries,
      responseCode: error.responseCode,
    });
    throw error;
  }

  private async attempt(
    transport: Transport,
    task: TaskDescriptor,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<AttemptResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const startedAt = performance.now();

    this.metrics?.increment('attempts.total');

    try {
      if (signal?.aborted) {
        controller.abort();
      }

      const response = await transport.request({
        method: task.method,
        url: task.url,
        headers: { ...task.headers },
        body: task.body,
        signal: controller.signal,
      });
      this.metrics?.recordStatus(response.status);

      if (task.doNotWait) {
        await response.release();
        return { type: 'detached' };
      }

      const outcomeClass = this.policy.classify({
        type: 'response',
        status: response.status,
      });
      if (outcomeClass === 'retryable-status') {
        await response.release();
        return { type: 'retryable-status', status: response.status };
      }

      const body = await decodeBody(response, task.responseDecoding);
      return {
        type: 'delivered',
        result: new FetchResult({
          status: response.status,
          headers: response.headers,
          body,
        }),
      };
    } catch (error) {
      if (signal?.aborted) {
        return { type: 'aborted', error };
      }

      if (task.doNotWait) {
        this.logger.debug('Fire-and-forget request failed', {
          url: task.url,
          err: error,
        });
        return { type: 'detached' };
      }

      return {
        type: 'failed',
        error: timedOut ? new TransportTimeoutError(task.url, timeoutMs) : error,
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.metrics?.recordDuration(performance.now() - startedAt);
    }
  }
}

export { DEFAULT_FETCH_EXECUTOR_CONFIG };
export type { FetchExecutorConfig, FetchExecutorDeps };
