import { DispatchError, invalidArgument } from './errors';
import type {
  EndpointConfig,
  HttpHeaders,
  HttpRequest,
  QueryParams,
  RequestDescriptor,
  ResourceKind,
} from './types';

export interface ResourceRoute {
  service: string;
  version: string;
  path: string;
}

const SMD: Pick<ResourceRoute, 'service' | 'version'> = { service: 'smd/hsm', version: 'v2' };
const BSS: Pick<ResourceRoute, 'service' | 'version'> = { service: 'boot', version: 'v1' };
const PCS: Pick<ResourceRoute, 'service' | 'version'> = { service: 'power-control', version: 'v1' };

export const RESOURCE_ROUTES: Readonly<Record<ResourceKind, ResourceRoute>> = {
  group: { ...SMD, path: 'groups' },
  component: { ...SMD, path: 'State/Components' },
  'hardware-inventory': { ...SMD, path: 'Inventory/Hardware' },
  'hardware-query': { ...SMD, path: 'Inventory/Hardware/Query' },
  'redfish-endpoint': { ...SMD, path: 'Inventory/RedfishEndpoints' },
  'ethernet-interface': { ...SMD, path: 'Inventory/EthernetInterfaces' },
  'boot-parameters': { ...BSS, path: 'bootparameters' },
  'power-transition': { ...PCS, path: 'transitions' },
  'power-status': { ...PCS, path: 'power-status' },
};

/**
 * Turns a request descriptor into a concrete HTTP request.
 *
 * Performs no I/O. Identifier, query and body problems are reported as
 * `invalid_argument` / `encoding_error` before anything reaches the transport.
 */
export function buildRequest(descriptor: RequestDescriptor, config: EndpointConfig): HttpRequest {
  const url = buildUrl(descriptor, config.baseUrl);
  const headers: HttpHeaders = {
    Authorization: `Bearer ${config.accessToken}`,
  };

  let body: string | undefined;
  if (descriptor.body !== undefined) {
    body = encodeJsonBody(descriptor.body, descriptor.operation);
    headers['Content-Type'] = 'application/json';
  }

  return {
    operation: descriptor.operation,
    method: descriptor.method,
    url,
    headers,
    ...(body !== undefined ? { body } : undefined),
  };
}

export function buildUrl(descriptor: RequestDescriptor, baseUrl: string): string {
  const route = RESOURCE_ROUTES[descriptor.resource];
  const segments = [route.service, route.version, route.path];

  if (descriptor.id !== undefined) {
    segments.push(encodeSegment(descriptor.id, 'id', descriptor.operation));
  }
  if (descriptor.subresource !== undefined) {
    if (descriptor.id === undefined) {
      throw invalidArgument(`Sub-resource "${descriptor.subresource}" requires an identifier`, {
        operation: descriptor.operation,
      });
    }
    segments.push(descriptor.subresource);
    if (descriptor.subId !== undefined) {
      segments.push(encodeSegment(descriptor.subId, 'subId', descriptor.operation));
    }
  }

  const normalizedBase = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const url = new URL(`${normalizedBase}/${segments.join('/')}`);
  appendQuery(url, descriptor.query);
  return url.toString();
}

/**
 * Validates and percent-encodes one path segment.
 */
export function encodeSegment(value: string, field: string, operation?: string): string {
  if (value.trim() === '') {
    throw invalidArgument(`Identifier "${field}" must not be empty`, { operation });
  }
  if (value.includes('/') || value.includes('\\')) {
    throw invalidArgument(`Identifier "${field}" must not contain path separators: ${value}`, { operation });
  }
  if (value === '.' || value === '..') {
    throw invalidArgument(`Identifier "${field}" must not be a relative path segment`, { operation });
  }
  return encodeURIComponent(value);
}

function appendQuery(url: URL, query?: QueryParams): void {
  if (!query) {
    return;
  }
  const entries = Object.entries(query).filter(([, value]) => value !== undefined);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, value] of entries) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        url.searchParams.append(key, String(item));
      }
    } else {
      url.searchParams.append(key, String(value));
    }
  }
}

function encodeJsonBody(payload: unknown, operation: string): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(payload);
  } catch (error) {
    throw new DispatchError('encoding_error', `Failed to serialize request body: ${describe(error)}`, {
      operation,
      cause: error,
    });
  }
  // JSON.stringify returns undefined for functions, symbols and undefined itself
  if (encoded === undefined) {
    throw new DispatchError('encoding_error', `Request body of type ${typeof payload} is not representable as JSON`, {
      operation,
    });
  }
  return encoded;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
