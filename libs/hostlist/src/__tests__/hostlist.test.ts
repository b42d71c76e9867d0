import { describe, expect, it } from 'vitest';
import { DispatchError } from '@libs/dispatch-http-core';
import { compressHostlist, expandHostlist, resolveSelector } from '../index';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('expandHostlist', () => {
  it('expands numeric ranges keeping the low bound padding', () => {
    expect(expandHostlist('nid[001-003,007]')).toEqual(['nid001', 'nid002', 'nid003', 'nid007']);
    expect(expandHostlist('n[8-10]')).toEqual(['n8', 'n9', 'n10']);
  });

  it('expands several bracket groups with the leftmost varying slowest', () => {
    expect(expandHostlist('x1000c[0-1]s0b0n[0-1]')).toEqual([
      'x1000c0s0b0n0',
      'x1000c0s0b0n1',
      'x1000c1s0b0n0',
      'x1000c1s0b0n1',
    ]);
  });

  it('trims items and drops duplicates keeping the first occurrence', () => {
    expect(expandHostlist(' a , b,a ')).toEqual(['a', 'b']);
    expect(expandHostlist('n[1-3],n2,n[3-4]')).toEqual(['n1', 'n2', 'n3', 'n4']);
  });

  it('passes plain host names through', () => {
    expect(expandHostlist('x3000c0s1b0n0')).toEqual(['x3000c0s1b0n0']);
  });

  it.each([
    ['nid[01-', 'Unbalanced "["'],
    ['nid[10-05]', 'descending'],
    ['nid[]', 'Empty range'],
    ['a,,b', 'Empty host entry'],
    ['a,', 'Empty host entry'],
    ['n[1-2]]', 'Unbalanced "]"'],
    ['n[[1]]', 'Nested brackets'],
    ['n[a-b]', 'not numeric'],
    ['n[1-]', 'not numeric'],
    ['n[1,,2]', 'Empty range entry'],
    ['   ', 'empty'],
  ])('rejects %s with a parse error', (expression, fragment) => {
    const error = captureError(() => expandHostlist(expression));
    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({ kind: 'parse_error', message: expect.stringContaining(fragment) });
  });

  it('rejects expansions above the host limit before building them', () => {
    expect(captureError(() => expandHostlist('n[1-10]', { maxHosts: 5 }))).toMatchObject({ kind: 'parse_error' });
    expect(captureError(() => expandHostlist('a[1-3],b[1-3]', { maxHosts: 5 }))).toMatchObject({
      kind: 'parse_error',
    });
    expect(captureError(() => expandHostlist('n[0-99999]x[0-9]'))).toMatchObject({ kind: 'parse_error' });
    expect(expandHostlist('a[1-3],b[1-2]', { maxHosts: 5 })).toHaveLength(5);
  });
});

describe('compressHostlist', () => {
  it('merges consecutive numbers into ranges', () => {
    expect(compressHostlist(['nid001', 'nid002', 'nid003', 'nid007'])).toBe('nid[001-003,007]');
    expect(compressHostlist(['node10', 'node9'])).toBe('node[9-10]');
    expect(compressHostlist(['n08', 'n10', 'n09'])).toBe('n[08-10]');
  });

  it('keeps differently padded numbers apart', () => {
    expect(compressHostlist(['n9', 'n010'])).toBe('n[9,010]');
  });

  it('keeps hosts apart when they differ in more than one run, in first-seen order', () => {
    expect(compressHostlist(['x1000c0s0b0n0', 'x1000c0s0b0n1', 'x1000c1s0b0n0'])).toBe(
      'x1000c0s0b0n[0-1],x1000c1s0b0n0',
    );
  });

  it('folds earlier digit runs once the later ones match', () => {
    expect(compressHostlist(expandHostlist('x1000c[0-1]s0b0n[0-1]'))).toBe('x1000c[0-1]s0b0n[0-1]');
    expect(compressHostlist(expandHostlist('x1000c[0-3]s[0-1]b0n[0-1]'))).toBe('x1000c[0-3]s[0-1]b0n[0-1]');
    expect(compressHostlist(['a1b1', 'a2b2', 'a2b1', 'a1b2'])).toBe('a[1-2]b[1-2]');
  });

  it('passes identifiers without digits through', () => {
    expect(compressHostlist(['login', 'nid1'])).toBe('login,nid1');
  });

  it('rejects identifiers that collide with the grammar', () => {
    expect(captureError(() => compressHostlist(['a,b']))).toMatchObject({ kind: 'invalid_argument' });
    expect(captureError(() => compressHostlist(['n[1]']))).toMatchObject({ kind: 'invalid_argument' });
    expect(captureError(() => compressHostlist(['']))).toMatchObject({ kind: 'invalid_argument' });
  });

  it.each(['nid[001-003,007]', 'x1000c[0-3]s[0-1]b0n[0-1]', 'a,b[1-2],c', 'n[7-12],n[098-101]'])(
    're-expands %s to the same host set',
    (expression) => {
      const hosts = expandHostlist(expression);
      const roundTrip = expandHostlist(compressHostlist(hosts));
      expect(new Set(roundTrip)).toEqual(new Set(hosts));
      expect(roundTrip).toHaveLength(hosts.length);
    },
  );
});

describe('resolveSelector', () => {
  it('expands expressions', () => {
    expect(resolveSelector('nid[1-2]')).toEqual(['nid1', 'nid2']);
  });

  it('takes explicit lists literally, trimmed and deduplicated', () => {
    expect(resolveSelector([' a', 'b', 'a ', 'n[1-2]'])).toEqual(['a', 'b', 'n[1-2]']);
  });

  it.each<[string, string | string[]]>([
    ['an empty expression', ''],
    ['an empty list', []],
    ['a blank entry', ['a', ' ']],
  ])('rejects %s as an invalid argument', (_label, selector) => {
    expect(captureError(() => resolveSelector(selector))).toMatchObject({ kind: 'invalid_argument' });
  });
});
