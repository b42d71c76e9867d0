import { invalidArgument } from '@libs/dispatch-http-core';
import { expandHostlist, type ExpandOptions } from './hostlist';

/** A hostlist expression or an explicit list of host identifiers. */
export type NodeSelector = string | readonly string[];

/**
 * Resolves a selector into an ordered, duplicate-free host list.
 *
 * Strings go through the hostlist grammar. Arrays are taken literally: each
 * entry is trimmed but never expanded.
 */
export function resolveSelector(selector: NodeSelector, options: ExpandOptions = {}): string[] {
  if (typeof selector === 'string') {
    if (selector.trim() === '') {
      throw invalidArgument('Node selector must not be empty');
    }
    return expandHostlist(selector, options);
  }

  if (selector.length === 0) {
    throw invalidArgument('Node selector must list at least one host');
  }
  const seen = new Set<string>();
  const hosts: string[] = [];
  for (const entry of selector) {
    const host = entry.trim();
    if (host === '') {
      throw invalidArgument('Node selector contains an empty host identifier');
    }
    if (!seen.has(host)) {
      seen.add(host);
      hosts.push(host);
    }
  }
  return hosts;
}
