import type { ConnectionPool } from '../pool/connection-pool.js';
import type { HttpMethod, TaskPayload } from '../task/types.js';

type TransportRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: TaskPayload;
  /** Aborts the request and any pending body read. */
  signal: AbortSignal;
};

type TransportResponse = {
  status: number;
  headers: Record<string, string>;
  /** Declared media type, lower-cased, without parameters; '' when absent. */
  contentType: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
  raw(): Promise<Buffer>;
  /** Discards the body without reading it. */
  release(): Promise<void>;
};

type Transport = {
  request(request: TransportRequest): Promise<TransportResponse>;
};

type TransportFactory = (pool: ConnectionPool) => Transport;

export type { Transport, TransportFactory, TransportRequest, TransportResponse };
