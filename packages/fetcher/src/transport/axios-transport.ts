import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { Readable } from 'node:stream';
import type { ConnectionPool } from '../pool/connection-pool.js';
import {
  TransportAbortedError,
  TransportConnectionError,
  TransportTimeoutError,
} from './errors.js';
import type {
  Transport,
  TransportFactory,
  TransportRequest,
  TransportResponse,
} from './types.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

function normalizeHeaders(
  headers: AxiosResponse['headers'],
): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) {
      continue;
    }
    normalized[key.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : String(value);
  }

  return normalized;
}

function parseContentType(headers: Record<string, string>): {
  mediaType: string;
  charset: string | undefined;
} {
  const [mediaType = '', ...params] = (headers['content-type'] ?? '').split(';');
  const charsetParam = params
    .map((param) => param.trim())
    .find((param) => param.toLowerCase().startsWith('charset='));

  return {
    mediaType: mediaType.trim().toLowerCase(),
    charset: charsetParam?.slice('charset='.length).replace(/"/g, ''),
  };
}

function decodeText(buffer: Buffer, charset: string | undefined): string {
  try {
    return new TextDecoder(charset ?? 'utf-8').decode(buffer);
  } catch {
    // Unknown charset label
    return new TextDecoder('utf-8').decode(buffer);
  }
}

function readStream(
  stream: Readable,
  signal: AbortSignal,
  url: string,
): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];

    const onAbort = () => {
      stream.destroy();
      reject(new TransportAbortedError(url));
    };

    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });

    stream.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });
    stream.once('end', () => {
      signal.removeEventListener('abort', onAbort);
      resolve(Buffer.concat(chunks));
    });
    stream.once('error', (error: Error) => {
      signal.removeEventListener('abort', onAbort);
      reject(
        new TransportConnectionError(error.message, undefined, {
          cause: error,
        }),
      );
    });
  });
}

class StreamedResponse implements TransportResponse {
  readonly status: number;
  readonly headers: Record<string, string>;
  readonly contentType: string;
  private readonly charset: string | undefined;
  private readonly stream: Readable;
  private readonly signal: AbortSignal;
  private readonly url: string;
  private body: Promise<Buffer> | undefined;

  constructor(response: AxiosResponse<Readable>, request: TransportRequest) {
    this.status = response.status;
    this.headers = normalizeHeaders(response.headers);
    const { mediaType, charset } = parseContentType(this.headers);
    this.contentType = mediaType;
    this.charset = charset;
    this.stream = response.data;
    this.signal = request.signal;
    this.url = request.url;
  }

  raw(): Promise<Buffer> {
    this.body ??= readStream(this.stream, this.signal, this.url);
    return this.body;
  }

  async text(): Promise<string> {
    return decodeText(await this.raw(), this.charset);
  }

  async json(): Promise<unknown> {
    const text = await this.text();
    if (text.trim().length === 0) {
      return undefined;
    }
    return JSON.parse(text);
  }

  async release(): Promise<void> {
    if (!this.body) {
      this.stream.destroy();
    }
  }
}

/**
 * axios transport bound to the agents of one connection pool.
 * Statuses never reject; bodies are streamed so they can be released unread.
 */
export class AxiosTransport implements Transport {
  private readonly axiosInstance: AxiosInstance;

  constructor(pool: ConnectionPool) {
    this.axiosInstance = axios.create({
      httpAgent: pool.httpAgent,
      httpsAgent: pool.httpsAgent,
      validateStatus: () => true,
      responseType: 'stream',
      maxRedirects: 5,
      // Proxy environment variables must not reroute pooled connections
      proxy: false,
    });
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.axiosInstance.request<Readable>({
        url: request.url,
        method: request.method,
        headers: request.headers,
        data: request.body,
        signal: request.signal,
      });

      return new StreamedResponse(response, request);
    } catch (error) {
      throw toTransportError(error, request);
    }
  }
}

function toTransportError(error: unknown, request: TransportRequest): unknown {
  if (request.signal.aborted || axios.isCancel(error)) {
    return new TransportAbortedError(request.url);
  }

  if (!axios.isAxiosError(error) || error.response) {
    return error;
  }

  if (error.code && TIMEOUT_CODES.has(error.code)) {
    return new TransportTimeoutError(request.url);
  }

  return new TransportConnectionError(error.message, error.code, {
    cause: error,
  });
}

export const createAxiosTransport: TransportFactory = (pool) =>
  new AxiosTransport(pool);
