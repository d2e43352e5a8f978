import { isDeepStrictEqual } from 'node:util';
import { isPlainObject } from '../utils/json.js';

type ResponseHeaders = Record<string, string>;

type FetchResultInit = {
  status: number;
  headers?: ResponseHeaders | null;
  body?: unknown;
};

/**
 * Outcome of one task. `status` is the HTTP status, except for JSON-RPC
 * envelopes carrying an `error`, where it is `error.code`.
 */
export class FetchResult {
  readonly rawStatus: number;
  readonly headers: ResponseHeaders | null;
  readonly body: unknown;

  constructor(init: FetchResultInit) {
    this.rawStatus = init.status;
    this.headers = init.headers ?? null;
    this.body = init.body ?? {};
  }

  /** Result of a fire-and-forget task or of a silently failed one. */
  static empty(): FetchResult {
    return new FetchResult({ status: 0, headers: null, body: {} });
  }

  get status(): number {
    const code = this.jsonRpcErrorCode();
    return code ?? this.rawStatus;
  }

  /** Truthiness of the result: a 2xx status. */
  get ok(): boolean {
    return this.isSuccess();
  }

  isJsonRpc(): boolean {
    return isPlainObject(this.body) && 'jsonrpc' in this.body;
  }

  isInformational(): boolean {
    return this.status >= 100 && this.status <= 199;
  }

  isSuccess(): boolean {
    return this.status >= 200 && this.status <= 299;
  }

  isRedirect(): boolean {
    return this.status >= 300 && this.status <= 399;
  }

  isClientError(): boolean {
    return this.status >= 400 && this.status <= 499;
  }

  isServerError(): boolean {
    return this.status >= 500 && this.status <= 599;
  }

  equals(other: FetchResult): boolean {
    return (
      this.status === other.status &&
      isDeepStrictEqual(this.headers, other.headers) &&
      isDeepStrictEqual(this.body, other.body)
    );
  }

  toJSON(): { status: number; headers: ResponseHeaders | null; body: unknown } {
    return { status: this.status, headers: this.headers, body: this.body };
  }

  toString(): string {
    return `FetchResult(status=${this.status}, headers=${JSON.stringify(this.headers)}, body=${describeBody(this.body)})`;
  }

  private jsonRpcErrorCode(): number | undefined {
    if (!isPlainObject(this.body) || !('jsonrpc' in this.body)) {
      return undefined;
    }

    const error = this.body.error;
    if (!isPlainObject(error) || typeof error.code !== 'number') {
      return undefined;
    }

    return error.code;
  }
}

function describeBody(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }

  if (Buffer.isBuffer(body)) {
    return `<${body.length} bytes>`;
  }

  return JSON.stringify(body);
}

export type { FetchResultInit, ResponseHeaders };
