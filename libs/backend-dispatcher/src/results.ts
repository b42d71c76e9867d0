import type { DispatchError } from '@libs/dispatch-http-core';

export type HostOutcome<T> =
  | { host: string; ok: true; value: T }
  | { host: string; ok: false; error: DispatchError };

/**
 * Result of an operation fanned out over a host set.
 *
 * `success` carries the values in host order. `partial` and `failure` carry
 * one outcome per host, so a caller can always tell "nothing worked" from
 * "some hosts worked".
 */
export type BatchResult<T> =
  | { status: 'success'; hosts: string[]; values: T[] }
  | { status: 'partial'; outcomes: HostOutcome<T>[] }
  | { status: 'failure'; outcomes: HostOutcome<T>[] };

export function aggregateOutcomes<T>(outcomes: HostOutcome<T>[]): BatchResult<T> {
  const hosts: string[] = [];
  const values: T[] = [];
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      hosts.push(outcome.host);
      values.push(outcome.value);
    } else {
      failed += 1;
    }
  }

  if (failed === 0) {
    return { status: 'success', hosts, values };
  }
  return { status: failed === outcomes.length ? 'failure' : 'partial', outcomes };
}

/** Per-host view of any batch result, in host order. */
export function outcomesOf<T>(result: BatchResult<T>): HostOutcome<T>[] {
  if (result.status !== 'success') {
    return result.outcomes;
  }
  return result.hosts.map((host, index): HostOutcome<T> => ({ host, ok: true, value: result.values[index] }));
}

export function failedHosts<T>(result: BatchResult<T>): Array<{ host: string; error: DispatchError }> {
  const failures: Array<{ host: string; error: DispatchError }> = [];
  for (const outcome of outcomesOf(result)) {
    if (!outcome.ok) {
      failures.push({ host: outcome.host, error: outcome.error });
    }
  }
  return failures;
}
