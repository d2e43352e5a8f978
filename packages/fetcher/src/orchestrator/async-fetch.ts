import { createLogger, type Logger } from '@workspace/logger';
import {
  resolveFetcherSettings,
  type FetcherSettings,
  type FetcherSettingsInput,
} from '../config.js';
import { ReceiveError, isFetchError } from '../errors.js';
import { FetchExecutor } from '../executor/fetch-executor.js';
import { FetchMetrics } from '../observability/metrics.js';
import type { ConnectionPool } from '../pool/connection-pool.js';
import { ConnectionPoolManager } from '../pool/pool-manager.js';
import type { FetchResult } from '../result/fetch-result.js';
import { buildTask } from '../task/task-builder.js';
import type { TaskDescriptor, TaskMap } from '../task/types.js';
import { createAxiosTransport } from '../transport/axios-transport.js';
import type { TransportFactory } from '../transport/types.js';

type AsyncFetchOptions = FetcherSettingsInput & {
  /** Externally owned pool; borrowed, never closed */
  pool?: ConnectionPool;
  transportFactory?: TransportFactory;
  logger?: Logger;
};

type FetchResults = Map<string, FetchResult>;

function isMapOfTasks(
  taskMap: TaskMap,
): taskMap is ReadonlyMap<string, TaskDescriptor> {
  return taskMap instanceof Map;
}

function toEntries(taskMap: TaskMap): Array<[string, TaskDescriptor]> {
  if (isMapOfTasks(taskMap)) {
    return [...taskMap.entries()];
  }
  return Object.entries(taskMap);
}

/**
 * Runs a named batch of tasks concurrently over one connection pool and
 * returns their results keyed and ordered like the input.
 *
 * @example
 * ```typescript
 * const fetcher = new AsyncFetch(
 *   new Map([
 *     ['profile', AsyncFetch.mkTask('https://accounts.internal/v1/me', { apiKey: 'test-key' })],
 *     ['orders', AsyncFetch.mkTask('https://orders.internal/v1/orders', { query: { limit: 10 } })],
 *   ]),
 *   { numRetries: 2, retryDelayMs: 200, serviceName: 'storefront' },
 * );
 *
 * const results = await fetcher.go();
 * results.get('profile')?.status; // 200
 * ```
 */
export class AsyncFetch {
  static readonly mkTask = buildTask;

  readonly metrics: FetchMetrics;
  private readonly taskMap: TaskMap;
  private readonly settings: FetcherSettings;
  private readonly poolManager: ConnectionPoolManager;
  private readonly transportFactory: TransportFactory;
  private readonly executor: FetchExecutor;
  private readonly logger: Logger;

  constructor(taskMap: TaskMap = new Map(), options: AsyncFetchOptions = {}) {
    const { pool, transportFactory, logger, ...settings } = options;

    this.taskMap = taskMap;
    this.settings = resolveFetcherSettings(settings);
    this.poolManager = new ConnectionPoolManager({
      pool,
      caFile: this.settings.caFile,
      keepAliveTimeoutMs: this.settings.keepAliveTimeoutMs,
      maxSockets: this.settings.maxSockets,
    });
    this.transportFactory = transportFactory ?? createAxiosTransport;
    this.logger = logger ?? createLogger('async-fetch');
    this.metrics = new FetchMetrics();
    this.executor = new FetchExecutor(
      {
        timeoutMs: this.settings.timeoutMs,
        numRetries: this.settings.numRetries,
        retryDelayMs: this.settings.retryDelayMs,
        serviceName: this.settings.serviceName,
        skipRetries: this.settings.skipRetries,
      },
      { metrics: this.metrics, logger },
    );
  }

  get ownsPool(): boolean {
    return this.poolManager.owned;
  }

  /**
   * The pool the next batch will use, created now if this instance owns it.
   */
  acquirePool(): ConnectionPool {
    return this.poolManager.open();
  }

  /**
   * Runs the task map given at construction.
   *
   * @throws NetworkError when a task exhausts its attempts without `failSilently`
   * @throws ReceiveError when a result cannot be assembled
   */
  go(): Promise<FetchResults> {
    return this.run(this.taskMap);
  }

  async run(taskMap: TaskMap): Promise<FetchResults> {
    const entries = toEntries(taskMap);
    const pool = this.poolManager.acquire();
    const batch = new AbortController();
    const startedAt = performance.now();

    this.logger.debug('Batch started', {
      tasks: entries.length,
      ownsPool: this.poolManager.owned,
    });

    try {
      const transport = this.transportFactory(pool);
      // Rejections in the order they happened; the first one aborts the rest
      const failures: unknown[] = [];

      const settled = await Promise.allSettled(
        entries.map(([name, task]) =>
          this.executor.execute(transport, task, batch.signal).catch((error: unknown) => {
            failures.push(error);
            if (failures.length === 1) {
              this.logger.debug('Task failed, aborting batch', { name });
              batch.abort();
            }
            throw error;
          }),
        ),
      );

      if (failures.length > 0) {
        const [firstError] = failures;
        throw isFetchError(firstError)
          ? firstError
          : new ReceiveError(this.settings.serviceName, firstError);
      }

      const results: FetchResults = new Map();
      settled.forEach((outcome, index) => {
        const entry = entries[index];
        if (!entry || outcome.status !== 'fulfilled') {
          throw new ReceiveError(
            this.settings.serviceName,
            new Error(`Missing result for task #${index}`),
          );
        }
        results.set(entry[0], outcome.value);
      });

      this.logger.debug('Batch finished', {
        tasks: entries.length,
        durationMs: Math.round(performance.now() - startedAt),
      });
      return results;
    } finally {
      this.poolManager.release();
      this.metrics.log(this.logger);
    }
  }

  /**
   * Closes the pool if this instance owns it, even under batches still in
   * flight. Idempotent.
   */
  close(): void {
    this.poolManager.close();
  }
}

/**
 * One-shot batch: runs `taskMap` and tears the orchestrator down.
 */
export async function fetchAll(
  taskMap: TaskMap,
  options?: AsyncFetchOptions,
): Promise<FetchResults> {
  const fetcher = new AsyncFetch(taskMap, options);
  try {
    return await fetcher.go();
  } finally {
    fetcher.close();
  }
}

export type { AsyncFetchOptions, FetchResults };
