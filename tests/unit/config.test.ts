import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, test } from 'vitest';

import { DEFAULT_DEPLOYMENT_LOG_ENDPOINTS, loadConfig } from '../../src/config.js';

const tempDirs: string[] = [];

function tokenFile(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'mcp-mender-config-'));
  tempDirs.push(dir);
  const file = join(dir, 'token');
  writeFileSync(file, contents, 'utf8');
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadConfig', () => {
  test('applies defaults', () => {
    expect(loadConfig({ MENDER_ACCESS_TOKEN: 'test-secret' })).toEqual({
      serverUrl: 'https://hosted.mender.io',
      accessToken: 'test-secret',
      requestTimeoutMs: 30_000,
      deploymentLogEndpoints: DEFAULT_DEPLOYMENT_LOG_ENDPOINTS,
      logLevel: 'info',
      logPretty: false
    });
  });

  test('strips trailing slashes and URL credentials', () => {
    const config = loadConfig({
      MENDER_SERVER_URL: 'https://admin:pw@mender.example.com/base/',
      MENDER_ACCESS_TOKEN: 'test-secret'
    });

    expect(config.serverUrl).toBe('https://mender.example.com/base');
  });

  test('rejects plain http unless explicitly allowed', () => {
    expect(() => loadConfig({ MENDER_SERVER_URL: 'http://localhost:8080', MENDER_ACCESS_TOKEN: 'test-secret' })).toThrow(
      'MENDER_SERVER_URL must use https (got http:). Set MENDER_ALLOW_INSECURE_HTTP=true for a local http server.'
    );

    const config = loadConfig({
      MENDER_SERVER_URL: 'http://localhost:8080',
      MENDER_ALLOW_INSECURE_HTTP: 'true',
      MENDER_ACCESS_TOKEN: 'test-secret'
    });
    expect(config.serverUrl).toBe('http://localhost:8080');
  });

  test('rejects an unparseable URL', () => {
    expect(() => loadConfig({ MENDER_SERVER_URL: 'not a url', MENDER_ACCESS_TOKEN: 'test-secret' })).toThrow(
      'Invalid MENDER_SERVER_URL: not a url'
    );
  });

  test('requires a token', () => {
    expect(() => loadConfig({})).toThrow(
      'A Mender access token is required. Set MENDER_ACCESS_TOKEN or MENDER_TOKEN_FILE.'
    );
    expect(() => loadConfig({ MENDER_ACCESS_TOKEN: '   ' })).toThrow('A Mender access token is required.');
  });

  test('reads and trims the token file', () => {
    const file = tokenFile('test-secret\n');

    expect(loadConfig({ MENDER_TOKEN_FILE: file }).accessToken).toBe('test-secret');
  });

  test('prefers the inline token over the file', () => {
    const file = tokenFile('file-secret');

    expect(loadConfig({ MENDER_ACCESS_TOKEN: 'test-secret', MENDER_TOKEN_FILE: file }).accessToken).toBe('test-secret');
  });

  test('reports an unreadable token file', () => {
    expect(() => loadConfig({ MENDER_TOKEN_FILE: join(tmpdir(), 'mcp-mender-missing', 'token') })).toThrow(
      /^Unable to read MENDER_TOKEN_FILE: /
    );
  });

  test('treats an empty token file as missing', () => {
    const file = tokenFile('   \n');

    expect(() => loadConfig({ MENDER_TOKEN_FILE: file })).toThrow('A Mender access token is required.');
  });

  test.each([
    ['5000', 5000],
    ['10', 1000],
    ['9999999', 300_000],
    ['abc', 30_000],
    ['', 30_000]
  ])('clamps MENDER_TIMEOUT_MS=%j to %d', (raw, expected) => {
    expect(loadConfig({ MENDER_ACCESS_TOKEN: 'test-secret', MENDER_TIMEOUT_MS: raw }).requestTimeoutMs).toBe(expected);
  });

  test('accepts custom deployment log paths', () => {
    const config = loadConfig({
      MENDER_ACCESS_TOKEN: 'test-secret',
      MENDER_DEPLOYMENT_LOG_V2_PATH: 'custom/{deploymentId}/{deviceId}',
      MENDER_DEPLOYMENT_LOG_V1_PATH: '  '
    });

    expect(config.deploymentLogEndpoints).toEqual({
      v2: '/custom/{deploymentId}/{deviceId}',
      v1: DEFAULT_DEPLOYMENT_LOG_ENDPOINTS.v1
    });
  });

  test('reads logging settings', () => {
    const config = loadConfig({ MENDER_ACCESS_TOKEN: 'test-secret', MCP_LOG_LEVEL: 'debug', MCP_LOG_PRETTY: 'yes' });

    expect(config.logLevel).toBe('debug');
    expect(config.logPretty).toBe(true);
  });
});
