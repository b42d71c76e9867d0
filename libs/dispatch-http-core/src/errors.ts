import type { HttpMethod } from './types';

/**
 * Error kinds raised by the dispatch layer.
 *
 * - 'invalid_argument': malformed input, caught before any I/O
 * - 'parse_error': hostlist grammar violation
 * - 'encoding_error': request body could not be serialized
 * - 'timeout': per-request deadline exceeded in the transport bridge
 * - 'transport_error': network/TLS failure before a response was received
 * - 'client_error': 4xx response
 * - 'server_error': 5xx (or otherwise unexpected) response
 * - 'decode_error': 2xx response whose body does not match the expected shape
 * - 'canceled': the caller aborted the operation
 */
export type DispatchErrorKind =
  | 'invalid_argument'
  | 'parse_error'
  | 'encoding_error'
  | 'timeout'
  | 'transport_error'
  | 'client_error'
  | 'server_error'
  | 'decode_error'
  | 'canceled';

export interface DispatchErrorOptions {
  status?: number;
  bodySnippet?: string;
  backendMessage?: string;
  operation?: string;
  method?: HttpMethod;
  url?: string;
  host?: string;
  cause?: unknown;
}

export const BODY_SNIPPET_LIMIT = 512;

export class DispatchError extends Error {
  readonly kind: DispatchErrorKind;
  readonly status?: number;
  readonly bodySnippet?: string;
  readonly backendMessage?: string;
  readonly operation?: string;
  readonly method?: HttpMethod;
  readonly url?: string;
  readonly host?: string;

  constructor(kind: DispatchErrorKind, message: string, options: DispatchErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'DispatchError';
    this.kind = kind;
    this.status = options.status;
    this.bodySnippet = options.bodySnippet;
    this.backendMessage = options.backendMessage;
    this.operation = options.operation;
    this.method = options.method;
    this.url = options.url;
    this.host = options.host;
  }

  /** Copy of this error attributed to a single host of a fanned-out batch. */
  forHost(host: string): DispatchError {
    return new DispatchError(this.kind, this.message, {
      status: this.status,
      bodySnippet: this.bodySnippet,
      backendMessage: this.backendMessage,
      operation: this.operation,
      method: this.method,
      url: this.url,
      host,
      cause: this.cause,
    });
  }
}

export function isDispatchError(value: unknown, kind?: DispatchErrorKind): value is DispatchError {
  if (!(value instanceof DispatchError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

/**
 * Normalizes anything thrown below the dispatcher into a DispatchError.
 * Errors that are not already classified are reported as transport failures.
 */
export function toDispatchError(value: unknown, context: DispatchErrorOptions = {}): DispatchError {
  if (value instanceof DispatchError) {
    return value;
  }
  const message = value instanceof Error ? value.message : String(value);
  return new DispatchError('transport_error', message, { ...context, cause: value });
}

export const invalidArgument = (message: string, options?: DispatchErrorOptions): DispatchError =>
  new DispatchError('invalid_argument', message, options);

export const parseError = (message: string, options?: DispatchErrorOptions): DispatchError =>
  new DispatchError('parse_error', message, options);

export function truncateBody(text: string, limit: number = BODY_SNIPPET_LIMIT): string {
  return text.length > limit ? `${text.slice(0, limit)}…` : text;
}
