import { DispatchError, toDispatchError } from './errors';
import { noopLogger } from './logger';
import type { ExecuteOptions, HttpRequest, HttpTransport, Logger, RawHttpResponse } from './types';
import { WorkerPool } from './workerPool';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_IN_FLIGHT = 10;

export interface TransportBridgeConfig {
  transport: HttpTransport;
  timeoutMs?: number;
  /** Shared pool; when omitted the bridge creates one with `maxInFlight` slots. */
  pool?: WorkerPool;
  maxInFlight?: number;
  logger?: Logger;
}

/**
 * Runs transport calls on a bounded worker pool and hands the result back to
 * the awaiting caller exactly once.
 *
 * A call that outlives its deadline or its caller is abandoned: the
 * transport's abort signal is raised, the caller is released with
 * `timeout` / `canceled`, and the pool slot is freed for the next queued
 * request. Whatever the transport eventually produces is dropped.
 */
export class TransportBridge {
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;

  constructor(config: TransportBridgeConfig) {
    this.transport = config.transport;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.pool = config.pool ?? new WorkerPool(config.maxInFlight ?? DEFAULT_MAX_IN_FLIGHT);
    this.logger = config.logger ?? noopLogger;
  }

  get poolStats() {
    return this.pool.stats;
  }

  execute(request: HttpRequest, options: ExecuteOptions = {}): Promise<RawHttpResponse> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const { signal } = options;
    const logMeta = { operation: request.operation, method: request.method, url: request.url };

    if (signal?.aborted) {
      return Promise.reject(this.canceled(request));
    }

    return new Promise<RawHttpResponse>((resolve, reject) => {
      const controller = new AbortController();
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      let startedAt = Date.now();
      let releaseSlot: (() => void) | undefined;

      const settle = (complete: () => void): boolean => {
        if (settled) {
          return false;
        }
        settled = true;
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onCallerAbort);
        complete();
        return true;
      };

      const abandon = (error: DispatchError): boolean => {
        if (!settle(() => reject(error))) {
          return false;
        }
        // Aborting also drops the request from the pool queue if it never started.
        controller.abort();
        releaseSlot?.();
        return true;
      };

      const onCallerAbort = () => {
        abandon(this.canceled(request));
      };
      signal?.addEventListener('abort', onCallerAbort, { once: true });

      const onStart = () => {
        startedAt = Date.now();
        this.logger.debug('dispatch.request', { ...logMeta, timeoutMs });
        timer = setTimeout(() => {
          const timedOut = abandon(
            new DispatchError('timeout', `Request timed out after ${timeoutMs}ms`, {
              operation: request.operation,
              method: request.method,
              url: request.url,
            }),
          );
          if (timedOut) {
            this.logger.warn('dispatch.timeout', { ...logMeta, timeoutMs });
          }
        }, timeoutMs);
      };

      const onResponse = (response: RawHttpResponse) => {
        const delivered = settle(() => resolve(response));
        if (delivered) {
          this.logger.debug('dispatch.response', {
            ...logMeta,
            status: response.status,
            durationMs: Date.now() - startedAt,
          });
        } else {
          this.logger.debug('dispatch.late_result_discarded', { ...logMeta, status: response.status });
        }
      };

      const onFailure = (error: unknown) => {
        const failure = toDispatchError(error, {
          operation: request.operation,
          method: request.method,
          url: request.url,
        });
        if (settle(() => reject(failure))) {
          this.logger.warn('dispatch.failed', { ...logMeta, kind: failure.kind, error: failure.message });
        } else {
          this.logger.debug('dispatch.late_result_discarded', { ...logMeta, error: failure.message });
        }
      };

      // The slot is held until the transport settles or the call is abandoned,
      // whichever comes first.
      const task = () =>
        new Promise<void>((release) => {
          releaseSlot = release;
          let call: Promise<RawHttpResponse>;
          try {
            call = this.transport(request, controller.signal);
          } catch (error) {
            call = Promise.reject(error);
          }
          void call.then(onResponse, onFailure).finally(release);
        });

      // The pool only rejects when the request is aborted while still queued,
      // and `abandon` has settled the caller by then.
      void this.pool.run(task, controller.signal, onStart).catch((error: unknown) => {
        settle(() => reject(toDispatchError(error, logMeta)));
      });
    });
  }

  private canceled(request: HttpRequest): DispatchError {
    return new DispatchError('canceled', 'Operation canceled by caller', {
      operation: request.operation,
      method: request.method,
      url: request.url,
    });
  }
}
