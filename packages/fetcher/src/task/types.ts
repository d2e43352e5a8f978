type HttpMethod =
  | 'get'
  | 'head'
  | 'options'
  | 'post'
  | 'put'
  | 'patch'
  | 'delete';

type ResponseDecoding = 'json' | 'text' | 'raw';

type BinaryPayload = Buffer | Uint8Array | ArrayBuffer;

/**
 * Request bodies the transport sends as they are.
 */
type TaskPayload = string | BinaryPayload | URLSearchParams | FormData;

type QueryValue = string | number | boolean | null | undefined;

type QueryParams = Record<string, QueryValue | readonly QueryValue[]>;

type TaskDescriptor = Readonly<{
  method: HttpMethod;
  url: string;
  body: TaskPayload | undefined;
  headers: Readonly<Record<string, string>>;
  responseDecoding: ResponseDecoding;
  timeoutMs: number | undefined;
  doNotWait: boolean;
  /** -1 defers to the executor default */
  numRetries: number;
  failSilently: boolean;
}>;

type JsonEncoder = (value: unknown) => string;

type BuildTaskOptions = {
  method?: HttpMethod | Uppercase<HttpMethod>;
  body?: unknown;
  headers?: Record<string, string>;
  apiKey?: string;
  responseDecoding?: ResponseDecoding;
  languageCode?: string;
  timeoutMs?: number;
  query?: QueryParams;
  doNotWait?: boolean;
  numRetries?: number;
  failSilently?: boolean;
  autodetectContentType?: boolean;
  encoder?: JsonEncoder;
};

type TaskMap =
  | ReadonlyMap<string, TaskDescriptor>
  | Readonly<Record<string, TaskDescriptor>>;

const HTTP_METHODS = [
  'get',
  'head',
  'options',
  'post',
  'put',
  'patch',
  'delete',
] as const satisfies readonly HttpMethod[];

const RESPONSE_DECODINGS = ['json', 'text', 'raw'] as const satisfies readonly ResponseDecoding[];

export type {
  BinaryPayload,
  BuildTaskOptions,
  HttpMethod,
  JsonEncoder,
  QueryParams,
  QueryValue,
  ResponseDecoding,
  TaskDescriptor,
  TaskMap,
  TaskPayload,
};
export { HTTP_METHODS, RESPONSE_DECODINGS };
