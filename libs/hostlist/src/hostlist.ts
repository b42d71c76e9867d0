import { invalidArgument, parseError } from '@libs/dispatch-http-core';

export const DEFAULT_MAX_HOSTS = 100_000;

export interface ExpandOptions {
  /** Upper bound on the number of hosts a single expression may produce. */
  maxHosts?: number;
}

interface RangeItem {
  low: number;
  high: number;
  width: number;
}

type Part = { kind: 'text'; value: string } | { kind: 'ranges'; items: RangeItem[] };

/**
 * Expands range-list notation into individual host names.
 *
 * ```
 * expandHostlist('nid[001-003,007]')   // ['nid001', 'nid002', 'nid003', 'nid007']
 * expandHostlist('x1000c[0-1]s0b0n[0-1]')
 * // ['x1000c0s0b0n0', 'x1000c0s0b0n1', 'x1000c1s0b0n0', 'x1000c1s0b0n1']
 * ```
 *
 * Duplicates are dropped, keeping the first occurrence. The size of the
 * expansion is checked before any host name is built.
 */
export function expandHostlist(expression: string, options: ExpandOptions = {}): string[] {
  const maxHosts = options.maxHosts ?? DEFAULT_MAX_HOSTS;
  const items = splitTopLevel(expression);
  const parsed = items.map((item) => parseItem(item, expression));

  let total = 0;
  for (const parts of parsed) {
    total += countHosts(parts, maxHosts, expression);
    if (total > maxHosts) {
      throw parseError(`Hostlist "${expression}" expands to more than ${maxHosts} hosts`);
    }
  }

  const seen = new Set<string>();
  const hosts: string[] = [];
  for (const parts of parsed) {
    for (const host of expandParts(parts)) {
      if (!seen.has(host)) {
        seen.add(host);
        hosts.push(host);
      }
    }
  }
  return hosts;
}

/**
 * Produces a compact range-list expression for a set of host names.
 *
 * Hosts that differ in a single run of digits are merged into one bracketed
 * range. Runs are folded from the last to the first, and the passes repeat
 * until nothing more merges, so `x1000c[0-1]s0b0n[0-1]` comes back from its
 * four expanded names. The result re-expands to the same set, not
 * necessarily in the original order.
 */
export function compressHostlist(ids: readonly string[]): string {
  let entries = ids.map((raw) => {
    const id = raw.trim();
    if (id === '') {
      throw invalidArgument('Host identifiers must not be empty');
    }
    if (/[[\],\s]/.test(id)) {
      throw invalidArgument(`Host identifier "${id}" cannot be written in range-list notation`);
    }
    return segmentsOf(id);
  });

  const width = entries.reduce((widest, segments) => Math.max(widest, segments.length), 0);
  let folded = true;
  while (folded) {
    folded = false;
    for (let position = width - 1; position >= 0; position -= 1) {
      const next = foldAt(entries, position);
      if (next.length < entries.length) {
        folded = true;
      }
      entries = next;
    }
  }

  return entries.map((segments) => segments.map(renderSegment).join('')).join(',');
}

// ---------------------------------------------------------------------------
// Compression
// ---------------------------------------------------------------------------

interface Member {
  n: number;
  digits: string;
}

type Segment = { kind: 'text'; value: string } | { kind: 'number'; members: Map<string, Member> };

function segmentsOf(id: string): Segment[] {
  const segments: Segment[] = [];
  for (const [token] of id.matchAll(/\d+|\D+/g)) {
    const n = Number(token);
    if (/^\d/.test(token) && Number.isSafeInteger(n)) {
      segments.push({ kind: 'number', members: new Map([[token, { n, digits: token }]]) });
      continue;
    }
    const last = segments[segments.length - 1];
    if (last !== undefined && last.kind === 'text') {
      last.value += token;
    } else {
      segments.push({ kind: 'text', value: token });
    }
  }
  return segments;
}

/** Merges entries that are identical except for the number at `position`. */
function foldAt(entries: Segment[][], position: number): Segment[][] {
  const byKey = new Map<string, Segment[]>();
  const result: Segment[][] = [];
  for (const segments of entries) {
    const segment = segments[position];
    if (segment === undefined || segment.kind !== 'number') {
      result.push(segments);
      continue;
    }
    const key = segments
      .map((other, index) => (index === position ? '' : `${other.kind}:${renderSegment(other)}`))
      .join('\u0000');
    const target = byKey.get(key)?.[position];
    if (target !== undefined && target.kind === 'number') {
      for (const [digits, member] of segment.members) {
        target.members.set(digits, member);
      }
      continue;
    }
    byKey.set(key, segments);
    result.push(segments);
  }
  return result;
}

function renderSegment(segment: Segment): string {
  if (segment.kind === 'text') {
    return segment.value;
  }

  const members = [...segment.members.values()].sort((a, b) => a.n - b.n || a.digits.length - b.digits.length);
  const runs: Array<{ start: Member; end: Member }> = [];
  for (const member of members) {
    const run = runs[runs.length - 1];
    if (run && member.n === run.end.n + 1 && pad(member.n, run.start.digits.length) === member.digits) {
      run.end = member;
    } else {
      runs.push({ start: member, end: member });
    }
  }

  if (runs.length === 1 && runs[0].start === runs[0].end) {
    return runs[0].start.digits;
  }
  const ranges = runs.map(({ start, end }) => (start === end ? start.digits : `${start.digits}-${end.digits}`));
  return `[${ranges.join(',')}]`;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function splitTopLevel(expression: string): string[] {
  if (expression.trim() === '') {
    throw parseError('Hostlist expression is empty');
  }

  const items: string[] = [];
  let depth = 0;
  let current = '';
  for (const char of expression) {
    if (char === '[') {
      if (depth > 0) {
        throw parseError(`Nested brackets are not allowed in "${expression}"`);
      }
      depth += 1;
    } else if (char === ']') {
      if (depth === 0) {
        throw parseError(`Unbalanced "]" in "${expression}"`);
      }
      depth -= 1;
    } else if (char === ',' && depth === 0) {
      items.push(current);
      current = '';
      continue;
    }
    current += char;
  }
  if (depth !== 0) {
    throw parseError(`Unbalanced "[" in "${expression}"`);
  }
  items.push(current);

  return items.map((item) => {
    const trimmed = item.trim();
    if (trimmed === '') {
      throw parseError(`Empty host entry in "${expression}"`);
    }
    return trimmed;
  });
}

function parseItem(item: string, expression: string): Part[] {
  const parts: Part[] = [];
  let rest = item;
  while (rest.length > 0) {
    const open = rest.indexOf('[');
    if (open < 0) {
      parts.push({ kind: 'text', value: rest });
      break;
    }
    if (open > 0) {
      parts.push({ kind: 'text', value: rest.slice(0, open) });
    }
    const close = rest.indexOf(']', open);
    const body = rest.slice(open + 1, close);
    parts.push({ kind: 'ranges', items: parseRanges(body, expression) });
    rest = rest.slice(close + 1);
  }
  return parts;
}

function parseRanges(body: string, expression: string): RangeItem[] {
  if (body.trim() === '') {
    throw parseError(`Empty range "[]" in "${expression}"`);
  }
  return body.split(',').map((raw) => {
    const token = raw.trim();
    if (token === '') {
      throw parseError(`Empty range entry in "${expression}"`);
    }
    const match = /^(\d+)(?:-(\d+))?$/.exec(token);
    if (!match) {
      throw parseError(`Range "${token}" in "${expression}" is not numeric`);
    }
    const [, lowText, highText] = match;
    const low = Number(lowText);
    const high = highText === undefined ? low : Number(highText);
    if (!Number.isSafeInteger(low) || !Number.isSafeInteger(high)) {
      throw parseError(`Range "${token}" in "${expression}" is out of bounds`);
    }
    if (high < low) {
      throw parseError(`Range "${token}" in "${expression}" is descending`);
    }
    return { low, high, width: lowText.length };
  });
}

function countHosts(parts: Part[], maxHosts: number, expression: string): number {
  let count = 1;
  for (const part of parts) {
    if (part.kind === 'text') {
      continue;
    }
    const size = part.items.reduce((sum, item) => sum + (item.high - item.low + 1), 0);
    count *= size;
    if (count > maxHosts) {
      throw parseError(`Hostlist "${expression}" expands to more than ${maxHosts} hosts`);
    }
  }
  return count;
}

function expandParts(parts: Part[]): string[] {
  let acc = [''];
  for (const part of parts) {
    if (part.kind === 'text') {
      acc = acc.map((prefix) => prefix + part.value);
      continue;
    }
    const next: string[] = [];
    for (const prefix of acc) {
      for (const item of part.items) {
        for (let n = item.low; n <= item.high; n += 1) {
          next.push(prefix + pad(n, item.width));
        }
      }
    }
    acc = next;
  }
  return acc;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}
