import { TaskBuildError } from '../errors.js';
import { encodeJson, isPlainObject } from '../utils/json.js';
import { isValidUrl, mergeQuery } from '../utils/url.js';
import type {
  BuildTaskOptions,
  HttpMethod,
  TaskDescriptor,
  TaskPayload,
} from './types.js';

const CONTENT_TYPE = 'content-type';
const API_KEY = 'api-key';
const ACCEPT_LANGUAGE = 'accept-language';

function isTaskPayload(value: unknown): value is TaskPayload {
  return (
    typeof value === 'string' ||
    value instanceof Uint8Array ||
    value instanceof ArrayBuffer ||
    value instanceof URLSearchParams ||
    value instanceof FormData
  );
}

function findHeader(
  headers: Record<string, string>,
  name: string,
): string | undefined {
  return Object.keys(headers).find((key) => key.toLowerCase() === name);
}

function replaceHeader(
  headers: Record<string, string>,
  name: string,
  value: string,
): void {
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === name) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

function detectContentType(body: unknown): string | undefined {
  if (isPlainObject(body)) {
    return 'application/json';
  }

  if (typeof body === 'string') {
    return 'text/html';
  }

  return undefined;
}

function normalizeMethod(method: BuildTaskOptions['method']): HttpMethod {
  return method === undefined ? 'get' : toLowerMethod(method);
}

function toLowerMethod(method: HttpMethod | Uppercase<HttpMethod>): HttpMethod {
  switch (method) {
    case 'GET':
      return 'get';
    case 'HEAD':
      return 'head';
    case 'OPTIONS':
      return 'options';
    case 'POST':
      return 'post';
    case 'PUT':
      return 'put';
    case 'PATCH':
      return 'patch';
    case 'DELETE':
      return 'delete';
    default:
      return method;
  }
}

/**
 * Builds the immutable descriptor of one request. No I/O happens here.
 *
 * Rules, in order: merge `query` into the URL; when `autodetectContentType`
 * is on and no `content-type` header is given, pick one from the body;
 * serialize non-payload bodies to JSON; set `api-key`; set
 * `accept-language`.
 *
 * @example
 * ```typescript
 * buildTask('https://accounts.internal/v1/users/me', {
 *   apiKey: 'test-key',
 *   query: { expand: true },
 * });
 * // {
 * //   method: 'get',
 * //   url: 'https://accounts.internal/v1/users/me?expand=True',
 * //   headers: { 'api-key': 'test-key' },
 * //   ...
 * // }
 * ```
 */
export function buildTask(
  url: string,
  options: BuildTaskOptions = {},
): TaskDescriptor {
  if (!isValidUrl(url)) {
    throw new TaskBuildError(url, 'not an absolute URL');
  }

  if (
    options.timeoutMs !== undefined &&
    !(Number.isInteger(options.timeoutMs) && options.timeoutMs > 0)
  ) {
    throw new TaskBuildError(url, `timeoutMs must be a positive integer, got ${options.timeoutMs}`);
  }

  if (
    options.numRetries !== undefined &&
    !(Number.isInteger(options.numRetries) && options.numRetries >= -1)
  ) {
    throw new TaskBuildError(url, `numRetries must be an integer >= -1, got ${options.numRetries}`);
  }

  const encoder = options.encoder ?? encodeJson;
  const headers: Record<string, string> = { ...options.headers };
  const autodetectContentType = options.autodetectContentType ?? true;

  const targetUrl = options.query ? mergeQuery(url, options.query) : url;

  if (autodetectContentType && !findHeader(headers, CONTENT_TYPE)) {
    const contentType = detectContentType(options.body);
    if (contentType) {
      headers[CONTENT_TYPE] = contentType;
    }
  }

  let body: TaskPayload | undefined;
  if (options.body === undefined || options.body === null) {
    body = undefined;
  } else if (isTaskPayload(options.body)) {
    body = options.body;
  } else {
    body = encoder(options.body);
  }

  if (options.apiKey) {
    replaceHeader(headers, API_KEY, options.apiKey);
  }

  if (options.languageCode) {
    replaceHeader(headers, ACCEPT_LANGUAGE, options.languageCode);
  }

  return Object.freeze({
    method: normalizeMethod(options.method),
    url: targetUrl,
    body,
    headers: Object.freeze(headers),
    responseDecoding: options.responseDecoding ?? 'json',
    timeoutMs: options.timeoutMs,
    doNotWait: options.doNotWait ?? false,
    numRetries: options.numRetries ?? -1,
    failSilently: options.failSilently ?? false,
  });
}
