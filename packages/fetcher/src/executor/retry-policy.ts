import {
  TransportConnectionError,
  TransportTimeoutError,
} from '../transport/errors.js';

/**
 * Gateway and timeout statuses treated as transient.
 */
const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([524, 504, 502, 408]);

type AttemptOutcome =
  | { type: 'response'; status: number }
  | { type: 'error'; error: unknown };

type OutcomeClass = 'deliver' | 'retryable-status' | 'network' | 'unexpected';

type RetryPolicyConfig = {
  /** Attempts per task when the task does not set its own */
  defaultRetries: number;
  /** Fixed wait between attempts */
  retryDelayMs: number;
  /** Collapses every budget to a single attempt */
  skipRetries: boolean;
};

type RetryDecision = {
  shouldRetry: boolean;
  delayMs: number;
  outcomeClass: OutcomeClass;
};

const DEFAULT_RETRY_POLICY_CONFIG: RetryPolicyConfig = {
  defaultRetries: 0,
  retryDelayMs: 1_000,
  skipRetries: false,
};

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...DEFAULT_RETRY_POLICY_CONFIG, ...config };
  }

  get retryDelayMs(): number {
    return this.config.retryDelayMs;
  }

  /**
   * Attempts available to a task: its own `numRetries` when >= 0, the
   * configured default otherwise, never fewer than one.
   */
  attemptBudget(numRetries: number): number {
    if (this.config.skipRetries) {
      return 1;
    }

    const requested = numRetries >= 0 ? numRetries : this.config.defaultRetries;
    return Math.max(requested, 1);
  }

  classify(outcome: AttemptOutcome): OutcomeClass {
    if (outcome.type === 'response') {
      return RETRYABLE_STATUS_CODES.has(outcome.status)
        ? 'retryable-status'
        : 'deliver';
    }

    if (
      outcome.error instanceof TransportTimeoutError ||
      outcome.error instanceof TransportConnectionError
    ) {
      return 'network';
    }

    return 'unexpected';
  }

  decide(outcomeClass: OutcomeClass, attemptsLeft: number): RetryDecision {
    switch (outcomeClass) {
      case 'retryable-status':
      case 'network':
        return {
          shouldRetry: attemptsLeft > 0,
          delayMs: attemptsLeft > 0 ? this.config.retryDelayMs : 0,
          outcomeClass,
        };

      case 'deliver':
      case 'unexpected':
        return { shouldRetry: false, delayMs: 0, outcomeClass };
    }
  }
}

export { DEFAULT_RETRY_POLICY_CONFIG, RETRYABLE_STATUS_CODES };
export type { AttemptOutcome, OutcomeClass, RetryDecision, RetryPolicyConfig };
