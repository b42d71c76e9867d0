import type { ZodTypeAny, output } from 'zod';
import { DispatchError, truncateBody } from './errors';
import type { HttpMethod, RawHttpResponse } from './types';

export interface ResponseContext {
  operation: string;
  method: HttpMethod;
  url: string;
}

const decoder = new TextDecoder();

export function bodyText(raw: RawHttpResponse): string {
  return decoder.decode(raw.body);
}

/**
 * Maps a response whose 2xx body is JSON of a known shape.
 *
 * The schema both validates and converts the wire payload into the domain
 * type, so the result is the schema's output type.
 */
export function mapJsonResponse<S extends ZodTypeAny>(
  raw: RawHttpResponse,
  schema: S,
  context: ResponseContext,
): output<S> {
  const text = bodyText(raw);
  assertSuccess(raw, text, context);

  let payload: unknown;
  if (text.trim() === '') {
    payload = undefined;
  } else {
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new DispatchError('decode_error', `Response body is not valid JSON for ${context.operation}`, {
        ...context,
        status: raw.status,
        bodySnippet: truncateBody(text),
        cause: error,
      });
    }
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new DispatchError(
      'decode_error',
      `Unexpected response shape for ${context.operation}${where}: ${issue?.message ?? 'invalid payload'}`,
      {
        ...context,
        status: raw.status,
        bodySnippet: truncateBody(text),
        cause: parsed.error,
      },
    );
  }
  return parsed.data;
}

/** Maps an acknowledgement whose body carries nothing the caller needs. */
export function mapEmptyResponse(raw: RawHttpResponse, context: ResponseContext): void {
  assertSuccess(raw, bodyText(raw), context);
}

export function mapTextResponse(raw: RawHttpResponse, context: ResponseContext): string {
  const text = bodyText(raw);
  assertSuccess(raw, text, context);
  return text;
}

function assertSuccess(raw: RawHttpResponse, text: string, context: ResponseContext): void {
  const { status } = raw;
  if (status >= 200 && status < 300) {
    return;
  }

  const backendMessage = extractBackendMessage(text);
  const options = {
    ...context,
    status,
    backendMessage,
    bodySnippet: truncateBody(text),
  };
  const suffix = backendMessage ? `: ${backendMessage}` : '';

  if (status >= 400 && status < 500) {
    throw new DispatchError('client_error', `${context.operation} rejected with status ${status}${suffix}`, options);
  }
  if (status >= 500 && status < 600) {
    throw new DispatchError('server_error', `${context.operation} failed with status ${status}${suffix}`, options);
  }
  throw new DispatchError(
    'server_error',
    `${context.operation} returned unexpected status ${status}${suffix}`,
    options,
  );
}

/**
 * Pulls a human readable message out of an error body. SMD and BSS answer
 * with RFC 7807 problem documents; PCS uses the same fields.
 */
export function extractBackendMessage(text: string): string | undefined {
  if (!text.trim()) {
    return undefined;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof payload !== 'object' || payload === null) {
    return undefined;
  }
  for (const key of ['detail', 'title', 'message', 'error']) {
    const value: unknown = Reflect.get(payload, key);
    if (typeof value === 'string' && value.trim() !== '') {
      return value;
    }
  }
  return undefined;
}
