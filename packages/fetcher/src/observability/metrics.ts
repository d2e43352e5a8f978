import type { Logger } from '@workspace/logger';

type StatusFamily = 'none' | '1xx' | '2xx' | '3xx' | '4xx' | '5xx' | 'other';

type MetricSnapshot = {
  counters: Record<string, number>;
  statusFamilies: Partial<Record<StatusFamily, number>>;
  durations: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

function statusFamily(status: number): StatusFamily {
  switch (Math.floor(status / 100)) {
    case 0:
      return status === 0 ? 'none' : 'other';
    case 1:
      return '1xx';
    case 2:
      return '2xx';
    case 3:
      return '3xx';
    case 4:
      return '4xx';
    case 5:
      return '5xx';
    default:
      return 'other';
  }
}

type DurationStats = MetricSnapshot['durations'];

function emptyDurations(): DurationStats {
  return { count: 0, min: 0, max: 0, avg: 0, total: 0 };
}

/**
 * Counters and attempt timings of every batch run by one orchestrator,
 * accumulated until `reset()`. Durations keep running aggregates only.
 *
 * Counter names: `tasks.started`, `tasks.completed`, `tasks.silenced`,
 * `tasks.failed`, `tasks.detached`, `attempts.total`, `attempts.retried`.
 */
export class FetchMetrics {
  private readonly counters: Map<string, number>;
  private readonly families: Map<StatusFamily, number>;
  private durations: DurationStats;

  constructor() {
    this.counters = new Map();
    this.families = new Map();
    this.durations = emptyDurations();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  recordStatus(status: number): void {
    const family = statusFamily(status);
    this.families.set(family, (this.families.get(family) ?? 0) + 1);
  }

  recordDuration(ms: number): void {
    const { count, min, max, total } = this.durations;
    this.durations = {
      count: count + 1,
      min: count === 0 ? ms : Math.min(min, ms),
      max: count === 0 ? ms : Math.max(max, ms),
      avg: (total + ms) / (count + 1),
      total: total + ms,
    };
  }

  snapshot(): MetricSnapshot {
    return {
      counters: Object.fromEntries(this.counters),
      statusFamilies: Object.fromEntries(this.families),
      durations: { ...this.durations },
    };
  }

  log(logger: Pick<Logger, 'debug'>): void {
    logger.debug('Cumulative fetch metrics', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.families.clear();
    this.durations = emptyDurations();
  }
}

export type { MetricSnapshot, StatusFamily };
