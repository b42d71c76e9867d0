import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { HttpTransport } from '@libs/dispatch-http-core';
import { createOchamiDispatcherFromEnv, ochamiConfigFromEnv, resolveOchamiSettings } from '../index';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('resolveOchamiSettings', () => {
  it('applies defaults and freezes the result', () => {
    const settings = resolveOchamiSettings({ baseUrl: 'https://ochami.test/', accessToken: 'test-token' });

    expect(settings).toMatchObject({
      insecureTls: false,
      timeoutMs: 30_000,
      maxInFlight: 10,
      batchSize: 100,
      powerPollIntervalMs: 2_000,
      powerPollMaxAttempts: 150,
      maxHosts: 100_000,
    });
    expect(settings.endpoint).toEqual({
      baseUrl: 'https://ochami.test',
      accessToken: 'test-token',
      tls: { verify: true },
      timeoutMs: 30_000,
    });
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.endpoint)).toBe(true);
    expect(Object.isFrozen(settings.endpoint.tls)).toBe(true);
  });

  it('turns insecureTls into a disabled verification flag', () => {
    const settings = resolveOchamiSettings({
      baseUrl: 'https://ochami.test',
      accessToken: 'test-token',
      insecureTls: true,
      rootCertificate: 'test-ca-pem',
    });
    expect(settings.endpoint.tls).toEqual({ rootCertificate: 'test-ca-pem', verify: false });
  });

  it.each([
    [{ baseUrl: 'ochami.test' }, 'baseUrl'],
    [{ baseUrl: 'ftp://ochami.test' }, 'baseUrl must be an http(s) URL'],
    [{ accessToken: '  ' }, 'accessToken'],
    [{ batchSize: 0 }, 'batchSize'],
    [{ timeoutMs: 1.5 }, 'timeoutMs'],
    [{ proxyUrl: 'not a url' }, 'proxyUrl'],
  ])('rejects %j naming the field', (override, fragment) => {
    const error = captureError(() =>
      resolveOchamiSettings({ baseUrl: 'https://ochami.test', accessToken: 'test-token', ...override }),
    );
    expect(error).toMatchObject({ kind: 'invalid_argument', message: expect.stringContaining(fragment) });
    expect(error).not.toMatchObject({ message: expect.stringContaining('test-token') });
  });
});

describe('ochamiConfigFromEnv', () => {
  it('prefers overrides, then environment values', () => {
    const config = ochamiConfigFromEnv(
      { baseUrl: 'https://override.test', batchSize: 50 },
      {
        OCHAMI_BASE_URL: 'https://env.test',
        ACCESS_TOKEN: 'env-token',
        OCHAMI_TIMEOUT_MS: '5000',
        OCHAMI_BATCH_SIZE: '25',
        OCHAMI_MAX_IN_FLIGHT: 'many',
        OCHAMI_INSECURE_TLS: 'true',
        SOCKS5: 'socks5://socks.test:1080',
      },
    );

    expect(config).toMatchObject({
      baseUrl: 'https://override.test',
      accessToken: 'env-token',
      timeoutMs: 5_000,
      batchSize: 50,
      insecureTls: true,
      proxyUrl: 'socks5://socks.test:1080',
    });
    expect(config.maxInFlight).toBeUndefined();
  });

  it('requires a base URL and an access token', () => {
    expect(captureError(() => ochamiConfigFromEnv({}, {}))).toMatchObject({
      kind: 'invalid_argument',
      message: 'OCHAMI_BASE_URL environment variable is required',
    });
    expect(captureError(() => ochamiConfigFromEnv({}, { OCHAMI_BASE_URL: 'https://env.test' }))).toMatchObject({
      message: 'ACCESS_TOKEN environment variable is required',
    });
  });

  it('reads the root certificate from the configured path', () => {
    const dir = mkdtempSync(join(tmpdir(), 'ochami-config-'));
    const certPath = join(dir, 'root.pem');
    writeFileSync(certPath, 'test-ca-pem\n');

    const config = ochamiConfigFromEnv(
      {},
      { OCHAMI_BASE_URL: 'https://env.test', ACCESS_TOKEN: 'env-token', OCHAMI_ROOT_CERT: certPath },
    );
    expect(config.rootCertificate).toBe('test-ca-pem\n');

    const missing = join(dir, 'missing.pem');
    expect(
      captureError(() =>
        ochamiConfigFromEnv({}, { OCHAMI_BASE_URL: 'https://env.test', ACCESS_TOKEN: 'env-token', OCHAMI_ROOT_CERT: missing }),
      ),
    ).toMatchObject({ kind: 'invalid_argument', message: `Unable to read root certificate from ${missing}` });
  });
});

describe('createOchamiDispatcherFromEnv', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env.OCHAMI_BASE_URL = 'https://env.test';
    process.env.ACCESS_TOKEN = 'env-token';
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('builds a dispatcher from the process environment', async () => {
    const transport = vi.fn<HttpTransport>(async () => ({
      status: 200,
      headers: {},
      body: new TextEncoder().encode('[]'),
    }));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const dispatcher = createOchamiDispatcherFromEnv({ transport, logger });

    expect(dispatcher.backendName).toBe('ochami');
    await expect(dispatcher.getAllGroups()).resolves.toEqual([]);
    expect(transport).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://env.test/smd/hsm/v2/groups',
        headers: { Authorization: 'Bearer env-token' },
      }),
      expect.any(AbortSignal),
    );
  });
});
