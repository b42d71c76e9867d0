/**
 * @libs/dispatch-http-core
 *
 * Request building, bounded transport execution and response classification
 * shared by dispatcher backends.
 */
export * from './types';
export * from './errors';
export { ConsoleLogger, noopLogger } from './logger';
export { buildRequest, buildUrl, encodeSegment, RESOURCE_ROUTES, type ResourceRoute } from './requestBuilder';
export { WorkerPool, type WorkerPoolStats } from './workerPool';
export {
  TransportBridge,
  DEFAULT_MAX_IN_FLIGHT,
  DEFAULT_TIMEOUT_MS,
  type TransportBridgeConfig,
} from './transportBridge';
export {
  bodyText,
  extractBackendMessage,
  mapEmptyResponse,
  mapJsonResponse,
  mapTextResponse,
  type ResponseContext,
} from './responseMapper';
export { retryWithBackoff, computeBackoff, type RetryPolicy } from './retry';
export { createFetchTransport, createDispatcher, type FetchTransportOptions } from './transport/fetchTransport';
