import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  DispatchError,
  extractBackendMessage,
  mapEmptyResponse,
  mapJsonResponse,
  mapTextResponse,
  type RawHttpResponse,
  type ResponseContext,
} from '../index';

const context: ResponseContext = {
  operation: 'getComponents',
  method: 'GET',
  url: 'https://ochami.test/smd/hsm/v2/State/Components',
};

const schema = z.array(z.object({ id: z.string() }));

const raw = (status: number, body: string): RawHttpResponse => ({
  status,
  headers: {},
  body: new TextEncoder().encode(body),
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('mapJsonResponse', () => {
  it('validates and returns 2xx payloads', () => {
    expect(mapJsonResponse(raw(200, '[{"id":"x1"}]'), schema, context)).toEqual([{ id: 'x1' }]);
  });

  it('reports malformed JSON as a decode error', () => {
    const error = captureError(() => mapJsonResponse(raw(200, '[{"id"'), schema, context));
    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({
      kind: 'decode_error',
      message: 'Response body is not valid JSON for getComponents',
      status: 200,
      bodySnippet: '[{"id"',
    });
  });

  it('reports a body of the wrong shape as a decode error', () => {
    const error = captureError(() => mapJsonResponse(raw(200, '[{"id":1}]'), schema, context));
    expect(error).toMatchObject({
      kind: 'decode_error',
      message: expect.stringContaining('Unexpected response shape for getComponents at 0.id'),
      url: context.url,
    });
  });

  it('truncates long bodies in the snippet', () => {
    const error = captureError(() => mapJsonResponse(raw(200, 'x'.repeat(600)), schema, context));
    expect(error).toMatchObject({ bodySnippet: `${'x'.repeat(512)}…` });
  });

  it('maps 4xx to client errors with the backend message', () => {
    const body = JSON.stringify({ type: 'about:blank', title: 'Not Found', detail: 'no such xname', status: 404 });
    const error = captureError(() => mapJsonResponse(raw(404, body), schema, context));
    expect(error).toMatchObject({
      kind: 'client_error',
      status: 404,
      backendMessage: 'no such xname',
      message: 'getComponents rejected with status 404: no such xname',
    });
  });

  it('maps 5xx to server errors', () => {
    const error = captureError(() => mapJsonResponse(raw(503, 'upstream down'), schema, context));
    expect(error).toMatchObject({
      kind: 'server_error',
      status: 503,
      message: 'getComponents failed with status 503',
      bodySnippet: 'upstream down',
    });
  });

  it('treats other statuses as unexpected server errors', () => {
    const error = captureError(() => mapJsonResponse(raw(302, ''), schema, context));
    expect(error).toMatchObject({ kind: 'server_error', message: 'getComponents returned unexpected status 302' });
  });
});

describe('mapEmptyResponse and mapTextResponse', () => {
  it('accepts any 2xx acknowledgement', () => {
    expect(() => mapEmptyResponse(raw(204, ''), context)).not.toThrow();
    expect(mapTextResponse(raw(200, 'done'), context)).toBe('done');
  });

  it('still classifies failures', () => {
    expect(captureError(() => mapEmptyResponse(raw(409, '{"message":"exists"}'), context))).toMatchObject({
      kind: 'client_error',
      backendMessage: 'exists',
    });
  });
});

describe('extractBackendMessage', () => {
  it('prefers detail over title', () => {
    expect(extractBackendMessage('{"title":"Bad Request","detail":"bad xname"}')).toBe('bad xname');
    expect(extractBackendMessage('{"title":"Bad Request"}')).toBe('Bad Request');
  });

  it('ignores bodies that are not JSON objects', () => {
    expect(extractBackendMessage('oops')).toBeUndefined();
    expect(extractBackendMessage('["a"]')).toBeUndefined();
    expect(extractBackendMessage('')).toBeUndefined();
  });
});
