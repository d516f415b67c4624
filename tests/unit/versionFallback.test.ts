import pino from 'pino';
import { describe, expect, test, vi } from 'vitest';

import { MenderApiError } from '../../src/errors.js';
import { resolveWithVersionFallback, type VersionFallbackStrategy } from '../../src/mender/versionFallback.js';

const logger = pino({ level: 'silent' });

function notFound(): MenderApiError {
  return new MenderApiError('NOT_FOUND', 'Requested resource not found.', { statusCode: 404 });
}

function strategy(overrides: Partial<VersionFallbackStrategy<unknown, string>> = {}): VersionFallbackStrategy<unknown, string> {
  return {
    operation: 'release.get',
    v2: { path: '/v2/releases/r1', normalize: (raw) => `v2:${String(raw)}` },
    v1: { path: '/v1/releases/r1', normalize: (raw) => `v1:${String(raw)}` },
    ...overrides
  };
}

describe('resolveWithVersionFallback', () => {
  test('returns the v2 result without touching v1', async () => {
    const request = vi.fn(async (path: string) => `body of ${path}`);

    await expect(resolveWithVersionFallback(request, strategy(), logger)).resolves.toEqual({
      value: 'v2:body of /v2/releases/r1',
      source: 'v2'
    });
    expect(request).toHaveBeenCalledTimes(1);
  });

  test('falls back to v1 when v2 is not found', async () => {
    const request = vi.fn(async (path: string) => {
      if (path.startsWith('/v2')) {
        throw notFound();
      }
      return 'legacy';
    });

    await expect(resolveWithVersionFallback(request, strategy(), logger)).resolves.toEqual({
      value: 'v1:legacy',
      source: 'v1'
    });
    expect(request.mock.calls.map(([path]) => path)).toEqual(['/v2/releases/r1', '/v1/releases/r1']);
  });

  test('rethrows non-not-found failures from v2 immediately', async () => {
    const forbidden = new MenderApiError('FORBIDDEN', 'Access denied', { statusCode: 403 });
    const request = vi.fn(async () => {
      throw forbidden;
    });

    await expect(resolveWithVersionFallback(request, strategy(), logger)).rejects.toBe(forbidden);
    expect(request).toHaveBeenCalledTimes(1);
  });

  test('rethrows the v1 not-found when there is no scan', async () => {
    const v1Error = notFound();
    const request = vi.fn(async (path: string) => {
      throw path.startsWith('/v2') ? notFound() : v1Error;
    });

    await expect(resolveWithVersionFallback(request, strategy(), logger)).rejects.toBe(v1Error);
  });

  test('runs the scan after both versions are not found', async () => {
    const request = vi.fn(async () => {
      throw notFound();
    });
    const linearScan = vi.fn(async () => 'scanned');

    await expect(resolveWithVersionFallback(request, strategy({ linearScan }), logger)).resolves.toEqual({
      value: 'scanned',
      source: 'scan'
    });
    expect(request).toHaveBeenCalledTimes(2);
    expect(linearScan).toHaveBeenCalledTimes(1);
  });

  test('honours a custom not-found predicate', async () => {
    const request = vi.fn(async (path: string) => {
      if (path.startsWith('/v2')) {
        throw new Error('gone');
      }
      return 'legacy';
    });
    const isNotFound = (error: unknown) => error instanceof Error && error.message === 'gone';

    await expect(resolveWithVersionFallback(request, strategy({ isNotFound }), logger)).resolves.toEqual({
      value: 'v1:legacy',
      source: 'v1'
    });
  });
});
