import { describe, expect, it } from 'vitest';
import { buildRequest, buildUrl, DispatchError, type EndpointConfig, type RequestDescriptor } from '../index';

const config: EndpointConfig = {
  baseUrl: 'https://ochami.test/',
  accessToken: 'test-token',
  tls: { verify: true },
  timeoutMs: 1_000,
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('buildRequest', () => {
  it('builds a GET with only the authorization header', () => {
    const request = buildRequest({ operation: 'getGroup', method: 'GET', resource: 'group', id: 'compute' }, config);

    expect(request).toEqual({
      operation: 'getGroup',
      method: 'GET',
      url: 'https://ochami.test/smd/hsm/v2/groups/compute',
      headers: { Authorization: 'Bearer test-token' },
    });
  });

  it('serializes bodies as JSON and sets the content type', () => {
    const request = buildRequest(
      {
        operation: 'addMembersToGroup',
        method: 'POST',
        resource: 'group',
        id: 'compute',
        subresource: 'members',
        body: { id: 'x1000c0s0b0n0' },
      },
      config,
    );

    expect(request.url).toBe('https://ochami.test/smd/hsm/v2/groups/compute/members');
    expect(request.body).toBe('{"id":"x1000c0s0b0n0"}');
    expect(request.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
  });

  it('routes each service under its own prefix and version', () => {
    expect(buildUrl({ operation: 'op', method: 'GET', resource: 'boot-parameters' }, config.baseUrl)).toBe(
      'https://ochami.test/boot/v1/bootparameters',
    );
    expect(
      buildUrl({ operation: 'op', method: 'GET', resource: 'power-transition', id: 'abc-123' }, config.baseUrl),
    ).toBe('https://ochami.test/power-control/v1/transitions/abc-123');
    expect(
      buildUrl({ operation: 'op', method: 'GET', resource: 'hardware-query', id: 'x1000' }, 'https://ochami.test/apis'),
    ).toBe('https://ochami.test/apis/smd/hsm/v2/Inventory/Hardware/Query/x1000');
  });

  it('emits defined query values in key order, repeating array keys', () => {
    const url = buildUrl(
      {
        operation: 'getComponents',
        method: 'GET',
        resource: 'component',
        query: { type: 'Node', nid: [1, 2], enabled: false, arch: undefined },
      },
      config.baseUrl,
    );

    expect(url).toBe('https://ochami.test/smd/hsm/v2/State/Components?enabled=false&nid=1&nid=2&type=Node');
  });

  it('percent-encodes identifiers', () => {
    expect(buildUrl({ operation: 'op', method: 'GET', resource: 'group', id: 'blue team' }, config.baseUrl)).toBe(
      'https://ochami.test/smd/hsm/v2/groups/blue%20team',
    );
  });

  it.each(['', '  ', 'a/b', 'a\\b', '.', '..'])('rejects the identifier %j', (id) => {
    const error = captureError(() => buildRequest({ operation: 'getGroup', method: 'GET', resource: 'group', id }, config));
    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({ kind: 'invalid_argument', operation: 'getGroup' });
  });

  it('rejects a sub-resource without an identifier', () => {
    const descriptor: RequestDescriptor = { operation: 'op', method: 'GET', resource: 'group', subresource: 'members' };
    expect(captureError(() => buildRequest(descriptor, config))).toMatchObject({ kind: 'invalid_argument' });
  });

  it('reports bodies that cannot be serialized as encoding errors', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    for (const body of [{ count: 10n }, cyclic, () => 'nope']) {
      const error = captureError(() =>
        buildRequest({ operation: 'addGroup', method: 'POST', resource: 'group', body }, config),
      );
      expect(error).toMatchObject({ kind: 'encoding_error', operation: 'addGroup' });
    }
  });
});
