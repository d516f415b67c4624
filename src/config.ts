import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';

import { z } from 'zod/v4';

import { sanitizeMessage } from './security/redaction.js';

export interface DeploymentLogEndpoints {
  v2: string;
  v1: string;
}

export interface AppConfig {
  serverUrl: string;
  accessToken: string;
  requestTimeoutMs: number;
  deploymentLogEndpoints: DeploymentLogEndpoints;
  logLevel: string;
  logPretty: boolean;
}

export const DEFAULT_SERVER_URL = 'https://hosted.mender.io';

export const DEFAULT_DEPLOYMENT_LOG_ENDPOINTS: DeploymentLogEndpoints = {
  v2: '/api/management/v2/deployments/deployments/{deploymentId}/devices/{deviceId}/log',
  v1: '/api/management/v1/deployments/deployments/{deploymentId}/devices/{deviceId}/log'
};

const envSchema = z.object({
  MENDER_SERVER_URL: z.string().optional(),
  MENDER_ALLOW_INSECURE_HTTP: z.string().optional(),
  MENDER_ACCESS_TOKEN: z.string().optional(),
  MENDER_TOKEN_FILE: z.string().optional(),
  MENDER_TIMEOUT_MS: z.string().optional(),
  MENDER_DEPLOYMENT_LOG_V2_PATH: z.string().optional(),
  MENDER_DEPLOYMENT_LOG_V1_PATH: z.string().optional(),

  MCP_LOG_LEVEL: z.string().optional(),
  MCP_LOG_PRETTY: z.string().optional()
});

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

function normalizeServerUrl(raw: string | undefined, allowInsecureHttp: boolean): string {
  const value = parseOptionalString(raw) ?? DEFAULT_SERVER_URL;

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`Invalid MENDER_SERVER_URL: ${sanitizeMessage(value)}`);
  }

  // Credentials belong in MENDER_ACCESS_TOKEN, never in the URL.
  parsed.username = '';
  parsed.password = '';

  if (parsed.protocol !== 'https:' && !(allowInsecureHttp && parsed.protocol === 'http:')) {
    throw new Error(
      `MENDER_SERVER_URL must use https (got ${parsed.protocol}). Set MENDER_ALLOW_INSECURE_HTTP=true for a local http server.`
    );
  }

  return parsed.toString().replace(/\/+$/, '');
}

function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function readTokenFile(path: string): string {
  try {
    return readFileSync(expandHome(path), 'utf8').trim();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read MENDER_TOKEN_FILE: ${sanitizeMessage(reason)}`, { cause: error });
  }
}

function resolveAccessToken(inline: string | undefined, tokenFile: string | undefined): string {
  const direct = parseOptionalString(inline);
  if (direct) {
    return direct;
  }

  const file = parseOptionalString(tokenFile);
  const fromFile = file ? readTokenFile(file) : '';
  if (fromFile) {
    return fromFile;
  }

  throw new Error('A Mender access token is required. Set MENDER_ACCESS_TOKEN or MENDER_TOKEN_FILE.');
}

function parseEndpointTemplate(raw: string | undefined, fallback: string): string {
  const value = parseOptionalString(raw);
  if (!value) {
    return fallback;
  }
  return value.startsWith('/') ? value : `/${value}`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    serverUrl: normalizeServerUrl(parsed.MENDER_SERVER_URL, parseBoolean(parsed.MENDER_ALLOW_INSECURE_HTTP, false)),
    accessToken: resolveAccessToken(parsed.MENDER_ACCESS_TOKEN, parsed.MENDER_TOKEN_FILE),
    requestTimeoutMs: parseNumber(parsed.MENDER_TIMEOUT_MS, 30_000, 1_000, 300_000),
    deploymentLogEndpoints: {
      v2: parseEndpointTemplate(parsed.MENDER_DEPLOYMENT_LOG_V2_PATH, DEFAULT_DEPLOYMENT_LOG_ENDPOINTS.v2),
      v1: parseEndpointTemplate(parsed.MENDER_DEPLOYMENT_LOG_V1_PATH, DEFAULT_DEPLOYMENT_LOG_ENDPOINTS.v1)
    },
    logLevel: parsed.MCP_LOG_LEVEL?.trim() || 'info',
    logPretty: parseBoolean(parsed.MCP_LOG_PRETTY, false)
  };
}
