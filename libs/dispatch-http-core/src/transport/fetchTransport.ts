import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { socksDispatcher } from 'fetch-socks';
import { invalidArgument } from '../errors';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TlsOptions } from '../types';

export interface FetchTransportOptions {
  tls: TlsOptions;
  proxyUrl?: string;
}

/**
 * undici-based HTTP transport.
 *
 * One dispatcher (connection pool) is created per transport and shared by
 * every request, carrying the TLS trust settings and the optional proxy.
 */
export function createFetchTransport(options: FetchTransportOptions): HttpTransport {
  const dispatcher = createDispatcher(options);

  return async (req, signal): Promise<RawHttpResponse> => {
    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
      dispatcher,
    });
    const body = new Uint8Array(await response.arrayBuffer());

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body,
    };
  };
}

export function createDispatcher(options: FetchTransportOptions): Dispatcher {
  const tls = {
    ...(options.tls.rootCertificate ? { ca: options.tls.rootCertificate } : undefined),
    rejectUnauthorized: options.tls.verify,
  };

  if (!options.proxyUrl) {
    return new Agent({ connect: tls });
  }

  let proxy: URL;
  try {
    proxy = new URL(options.proxyUrl);
  } catch (error) {
    throw invalidArgument(`Invalid proxy URL: ${options.proxyUrl}`, { cause: error });
  }

  switch (proxy.protocol) {
    case 'http:':
    case 'https:':
      return new ProxyAgent({ uri: proxy.toString(), requestTls: tls });
    case 'socks:':
    case 'socks5:':
    case 'socks5h:':
    case 'socks4:': {
      const port = Number(proxy.port || 1080);
      return socksDispatcher(
        {
          type: proxy.protocol === 'socks4:' ? 4 : 5,
          host: proxy.hostname,
          port,
          ...(proxy.username ? { userId: decodeURIComponent(proxy.username) } : undefined),
          ...(proxy.password ? { password: decodeURIComponent(proxy.password) } : undefined),
        },
        { connect: tls },
      );
    }
    default:
      throw invalidArgument(`Unsupported proxy protocol "${proxy.protocol}" in ${options.proxyUrl}`);
  }
}
