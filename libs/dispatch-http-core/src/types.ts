export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | readonly (string | number)[] | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Resource kinds exposed by the OCHAMI services. Each kind owns a fixed,
 * versioned route (see RESOURCE_ROUTES in requestBuilder.ts).
 */
export type ResourceKind =
  | 'group'
  | 'component'
  | 'hardware-inventory'
  | 'hardware-query'
  | 'redfish-endpoint'
  | 'ethernet-interface'
  | 'boot-parameters'
  | 'power-transition'
  | 'power-status';

/**
 * Describes one logical HTTP call before it is turned into a request.
 * Created per call and discarded after dispatch.
 */
export interface RequestDescriptor {
  operation: string;
  method: HttpMethod;
  resource: ResourceKind;
  /** Identifier appended to the resource route, e.g. a group label or xname. */
  id?: string;
  /** Fixed sub-resource below the identifier, e.g. "members". */
  subresource?: string;
  subId?: string;
  query?: QueryParams;
  body?: unknown;
}

/** A fully formed request, ready for the transport. */
export interface HttpRequest {
  operation: string;
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Executes a request. The signal is a cooperative hint: the bridge aborts it on
 * timeout or cancellation but never waits for the transport to honour it.
 */
export interface HttpTransport {
  (request: HttpRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export interface TlsOptions {
  /** PEM-encoded root certificate(s) trusted in addition to the system store. */
  rootCertificate?: string;
  /** Set to false to skip server certificate verification. */
  verify: boolean;
}

/**
 * Process-wide endpoint configuration. Built once at client construction and
 * frozen; every dispatch call reads it concurrently.
 */
export interface EndpointConfig {
  readonly baseUrl: string;
  readonly accessToken: string;
  readonly tls: Readonly<TlsOptions>;
  readonly proxyUrl?: string;
  readonly timeoutMs: number;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Overrides the bridge's default per-request timeout. */
  timeoutMs?: number;
}
