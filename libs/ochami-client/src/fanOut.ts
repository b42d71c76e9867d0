import { DispatchError, toDispatchError, type Logger } from '@libs/dispatch-http-core';
import { aggregateOutcomes, type BatchResult, type HostOutcome } from '@libs/backend-dispatcher';

export interface FanOutContext {
  operation: string;
  logger: Logger;
  signal?: AbortSignal;
}

/** Values keyed by host; a DispatchError marks a host the backend reported as failed. */
export type HostValues<T> = Map<string, T | DispatchError>;

/**
 * One request per host. Every host gets its own outcome; a failing host never
 * cancels its siblings.
 */
export async function dispatchPerHost<T>(
  hosts: readonly string[],
  context: FanOutContext,
  task: (host: string) => Promise<T>,
): Promise<BatchResult<T>> {
  const outcomes = await Promise.all(
    hosts.map(async (host): Promise<HostOutcome<T>> => {
      try {
        return { host, ok: true, value: await task(host) };
      } catch (error) {
        return { host, ok: false, error: attribute(error, host, context.operation) };
      }
    }),
  );
  return finish(outcomes, context);
}

/**
 * Splits hosts into batches of `batchSize` and sends one request per batch.
 * A failed batch fails each of its hosts with the same error; a host the
 * backend left out of a successful answer fails with `decode_error`.
 */
export async function dispatchInBatches<T>(
  hosts: readonly string[],
  batchSize: number,
  context: FanOutContext,
  task: (batch: string[]) => Promise<HostValues<T>>,
): Promise<BatchResult<T>> {
  const batches = chunk(hosts, batchSize);
  const perBatch = await Promise.all(
    batches.map(async (batch): Promise<HostOutcome<T>[]> => {
      let values: HostValues<T>;
      try {
        values = await task(batch);
      } catch (error) {
        const failure = toDispatchError(error, { operation: context.operation });
        return batch.map((host): HostOutcome<T> => ({ host, ok: false, error: failure.forHost(host) }));
      }

      return batch.map((host): HostOutcome<T> => {
        const value = values.get(host);
        if (value === undefined) {
          return {
            host,
            ok: false,
            error: new DispatchError('decode_error', `${context.operation} response has no entry for ${host}`, {
              operation: context.operation,
              host,
            }),
          };
        }
        if (value instanceof DispatchError) {
          return { host, ok: false, error: attribute(value, host, context.operation) };
        }
        return { host, ok: true, value };
      });
    }),
  );
  return finish(perBatch.flat(), context);
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

function attribute(error: unknown, host: string, operation: string): DispatchError {
  const failure = toDispatchError(error, { operation, host });
  return failure.host === host ? failure : failure.forHost(host);
}

function finish<T>(outcomes: HostOutcome<T>[], context: FanOutContext): BatchResult<T> {
  if (context.signal?.aborted) {
    throw new DispatchError('canceled', 'Operation canceled by caller', { operation: context.operation });
  }

  const result = aggregateOutcomes(outcomes);
  if (result.status !== 'success') {
    const failed = result.outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.host);
    context.logger.warn('ochami.batch.partial', {
      operation: context.operation,
      status: result.status,
      hosts: outcomes.length,
      failed,
    });
  }
  return result;
}
