import { ConnectionPool, type ConnectionPoolConfig } from './connection-pool.js';

type PoolManagerOptions = Partial<ConnectionPoolConfig> & {
  /** Borrowed pool; the manager never closes it */
  pool?: ConnectionPool;
};

/**
 * Owns or borrows the connection pool of one orchestrator.
 *
 * Every batch leases the pool with `acquire()` and hands it back with
 * `release()`. An owned pool is created lazily, shared by all leases in
 * flight, and closed when the last lease is released; the next `acquire()`
 * builds a fresh one. Borrowing managers hand out the supplied pool and never
 * close it.
 */
export class ConnectionPoolManager {
  readonly owned: boolean;
  private readonly config: Partial<ConnectionPoolConfig>;
  private pool: ConnectionPool | undefined;
  private leases = 0;

  constructor(options: PoolManagerOptions = {}) {
    const { pool, ...config } = options;
    this.owned = pool === undefined;
    this.pool = pool;
    this.config = config;
  }

  get current(): ConnectionPool | undefined {
    return this.pool;
  }

  get activeLeases(): number {
    return this.leases;
  }

  /**
   * The pool without taking a lease, created now if owned and not open.
   */
  open(): ConnectionPool {
    if (!this.owned && this.pool) {
      return this.pool;
    }

    if (this.pool && !this.pool.closed) {
      return this.pool;
    }

    // Synchronous construction: no other task can interleave before memoizing
    this.pool = new ConnectionPool(this.config);
    return this.pool;
  }

  acquire(): ConnectionPool {
    const pool = this.open();
    this.leases += 1;
    return pool;
  }

  release(): void {
    if (this.leases > 0) {
      this.leases -= 1;
    }

    if (this.leases === 0) {
      this.closeOwned();
    }
  }

  /** Closes an owned pool even while leases are out. Idempotent. */
  close(): void {
    this.leases = 0;
    this.closeOwned();
  }

  private closeOwned(): void {
    if (this.owned && this.pool && !this.pool.closed) {
      this.pool.close();
    }
  }
}

export type { PoolManagerOptions };
