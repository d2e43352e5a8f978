export { AsyncFetch, fetchAll, type AsyncFetchOptions, type FetchResults } from './orchestrator/async-fetch.js';
export { buildTask } from './task/task-builder.js';
export {
  HTTP_METHODS,
  RESPONSE_DECODINGS,
  type BinaryPayload,
  type BuildTaskOptions,
  type HttpMethod,
  type JsonEncoder,
  type QueryParams,
  type QueryValue,
  type ResponseDecoding,
  type TaskDescriptor,
  type TaskMap,
  type TaskPayload
} from './task/types.js';
export { FetchResult, type FetchResultInit, type ResponseHeaders } from './result/fetch-result.js';
export {
  FetchError,
  NetworkError,
  ReceiveError,
  TaskBuildError,
  isFetchError,
  type FetchErrorKind
} from './errors.js';
export {
  TransportAbortedError,
  TransportConnectionError,
  TransportTimeoutError
} from './transport/errors.js';
export { AxiosTransport, createAxiosTransport } from './transport/axios-transport.js';
export type {
  Transport,
  TransportFactory,
  TransportRequest,
  TransportResponse
} from './transport/types.js';
export { ConnectionPool, type ConnectionPoolConfig } from './pool/connection-pool.js';
export { ConnectionPoolManager, type PoolManagerOptions } from './pool/pool-manager.js';
export { FetchExecutor, type FetchExecutorConfig } from './executor/fetch-executor.js';
export { RetryPolicy, RETRYABLE_STATUS_CODES, type OutcomeClass } from './executor/retry-policy.js';
export { FetchMetrics, type MetricSnapshot } from './observability/metrics.js';
export {
  fetcherOptionsFromEnv,
  resolveFetcherSettings,
  type FetcherSettings,
  type FetcherSettingsInput
} from './config.js';
export { encodeJson } from './utils/json.js';
