import { readFileSync } from 'node:fs';
import http from 'node:http';
import https from 'node:https';

type ConnectionPoolConfig = {
  /** PEM bundle of extra trusted CAs */
  caFile?: string;
  /** Idle keep-alive sockets are closed after this long */
  keepAliveTimeoutMs: number;
  /** Per-origin socket limit */
  maxSockets: number;
};

const DEFAULT_CONNECTION_POOL_CONFIG: ConnectionPoolConfig = {
  keepAliveTimeoutMs: 15_000,
  maxSockets: 100,
};

/**
 * Keep-alive HTTP and HTTPS agents shared by every request of a batch.
 */
export class ConnectionPool {
  readonly httpAgent: http.Agent;
  readonly httpsAgent: https.Agent;
  private isClosed: boolean;

  constructor(config?: Partial<ConnectionPoolConfig>) {
    const agentOptions: http.AgentOptions = {
      keepAlive: true,
      timeout:
        config?.keepAliveTimeoutMs ??
        DEFAULT_CONNECTION_POOL_CONFIG.keepAliveTimeoutMs,
      maxSockets:
        config?.maxSockets ?? DEFAULT_CONNECTION_POOL_CONFIG.maxSockets,
    };
    const caFile = config?.caFile;

    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent({
      ...agentOptions,
      ca: caFile ? readFileSync(caFile) : undefined,
    });
    this.isClosed = false;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Destroys every socket of both agents. Safe to call more than once. */
  close(): void {
    if (this.isClosed) {
      return;
    }

    this.isClosed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export { DEFAULT_CONNECTION_POOL_CONFIG };
export type { ConnectionPoolConfig };
