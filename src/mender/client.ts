import type { Logger } from 'pino';

import { DEFAULT_DEPLOYMENT_LOG_ENDPOINTS, type DeploymentLogEndpoints } from '../config.js';
import { isNotFoundError, MenderApiError } from '../errors.js';
import { describeHttpFailure, errorCodeForStatus } from '../security/httpErrors.js';
import { maskToken, sanitizeMessage, sanitizeUrlForLog, truncateForLog } from '../security/redaction.js';
import { decodeResponseBody, expectJson } from './decode.js';
import {
  deploymentDeviceIds,
  expectList,
  expectRecord,
  normalizeArtifact,
  normalizeDeployment,
  normalizeDevice,
  normalizeDeviceInventory,
  normalizeInventoryGroups,
  parseAuditLogs,
  parseDeploymentLog,
  releaseFromV1Data,
  releaseFromV2Data
} from './normalizer.js';
import type {
  Artifact,
  AuditLogEntry,
  DecodedBody,
  Deployment,
  DeploymentLog,
  Device,
  DeviceInventory,
  InventoryGroup,
  Release
} from './types.js';
import { resolveWithVersionFallback } from './versionFallback.js';

export interface MenderClientOptions {
  serverUrl: string;
  accessToken: string;
  timeoutMs?: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
  endpoints?: Partial<DeploymentLogEndpoints>;
}

type QueryValue = string | number | boolean | undefined | null;
type Query = Record<string, QueryValue>;

export interface ListDevicesParams {
  status?: string;
  deviceType?: string;
  limit?: number;
  skip?: number;
}

export interface ListDeploymentsParams {
  status?: string;
  limit?: number;
  skip?: number;
}

export interface ListReleasesParams {
  name?: string;
  tag?: string;
  limit?: number;
  skip?: number;
}

export interface ListInventoryParams {
  limit?: number;
  hasAttribute?: string;
}

export interface AuditLogFilters {
  user?: string;
  action?: string;
  objectType?: string;
  startDate?: string;
  endDate?: string;
  limit?: number;
}

export interface ServerInfo {
  serverUrl: string;
  accessTokenMasked: string;
  timeoutMs: number;
  deploymentLogEndpoints: DeploymentLogEndpoints;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_PAGE_SIZE = 20;

export const AUDIT_LOG_PATHS = [
  '/api/management/v2/auditlogs/logs',
  '/api/management/v1/auditlogs/logs',
  '/api/management/v2/auditlogs',
  '/api/management/v1/auditlogs',
  '/api/management/v1/auditlogs/logs/export',
  '/api/management/v1/audit/logs'
] as const;

const DEVICES_PATH = '/api/management/v2/devauth/devices';
const DEPLOYMENTS_V1_PATH = '/api/management/v1/deployments/deployments';
const DEPLOYMENTS_V2_PATH = '/api/management/v2/deployments/deployments';
const ARTIFACTS_PATH = '/api/management/v1/deployments/artifacts';
const INVENTORY_DEVICES_PATH = '/api/management/v1/inventory/devices';
const INVENTORY_GROUPS_PATH = '/api/management/v1/inventory/groups';

function segment(value: string): string {
  return encodeURIComponent(value);
}

function pageFor(skip: number | undefined, limit: number | undefined): number | undefined {
  if (!skip || skip <= 0) {
    return undefined;
  }
  return Math.floor(skip / (limit || DEFAULT_PAGE_SIZE)) + 1;
}

function toUnixSeconds(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? Math.floor(parsed / 1000) : undefined;
}

function includesIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : segment(value);
  });
}

// Settles with `work`, or rejects with an AbortError once `signal` fires,
// whichever comes first. A body stream that ignores the signal cannot stall us.
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      const abortError = new Error('The operation was aborted.');
      abortError.name = 'AbortError';
      reject(abortError);
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class MenderClient {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logEndpoints: DeploymentLogEndpoints;
  private readonly logger: Logger;

  constructor(private readonly options: MenderClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    this.logEndpoints = {
      v2: options.endpoints?.v2 ?? DEFAULT_DEPLOYMENT_LOG_ENDPOINTS.v2,
      v1: options.endpoints?.v1 ?? DEFAULT_DEPLOYMENT_LOG_ENDPOINTS.v1
    };
  }

  private buildUrl(path: string, query: Query = {}): URL {
    const url = new URL(`${this.options.serverUrl.replace(/\/+$/, '')}${path}`);

    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null || value === '') {
        continue;
      }
      url.searchParams.set(key, String(value));
    }

    return url;
  }

  /**
   * Runs `work` under the client timeout. The deadline covers the whole
   * exchange, body included; transport failures become TIMEOUT or NETWORK.
   */
  private async withDeadline<T>(url: URL, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await raceAbort(work(controller.signal), controller.signal);
    } catch (error) {
      if (error instanceof MenderApiError) {
        throw error;
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.debug(
        { url: sanitizeUrlForLog(url), errorName: err.name, reason: sanitizeMessage(err.message) },
        'Mender request failed in transport'
      );
      if (err.name === 'AbortError' || err.name === 'TimeoutError') {
        throw new MenderApiError('TIMEOUT', 'Network error: the request to the Mender server timed out.', {
          cause: err
        });
      }
      throw new MenderApiError('NETWORK', 'Network error: could not reach the Mender server.', { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readErrorBody(response: Response): Promise<string> {
    try {
      return truncateForLog(sanitizeMessage(await response.text()));
    } catch (error) {
      return `[unreadable body: ${error instanceof Error ? error.name : 'unknown'}]`;
    }
  }

  /**
   * One GET against the management API. Returns the decoded body, or throws a
   * MenderApiError whose message is built from the status and path only.
   */
  async request(path: string, query: Query = {}): Promise<DecodedBody> {
    const url = this.buildUrl(path, query);

    this.logger.debug({ url: sanitizeUrlForLog(url) }, 'Mender request');

    return this.withDeadline(url, async (signal) => {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json, text/plain, */*',
          Authorization: `Bearer ${this.options.accessToken}`
        },
        signal
      });

      if (!response.ok) {
        const body = await this.readErrorBody(response);
        this.logger.debug({ path, statusCode: response.status, body }, 'Mender request returned an error status');
        throw new MenderApiError(errorCodeForStatus(response.status), describeHttpFailure(response.status, path), {
          statusCode: response.status
        });
      }

      return decodeResponseBody(response);
    });
  }

  private async requestJson(path: string, query: Query = {}): Promise<unknown> {
    return expectJson(await this.request(path, query));
  }

  getServerInfo(): ServerInfo {
    return {
      serverUrl: this.options.serverUrl,
      accessTokenMasked: maskToken(this.options.accessToken),
      timeoutMs: this.timeoutMs,
      deploymentLogEndpoints: { ...this.logEndpoints }
    };
  }

  async getDevices(params: ListDevicesParams = {}): Promise<Device[]> {
    const payload = await this.requestJson(DEVICES_PATH, {
      status: params.status,
      device_type: params.deviceType,
      per_page: params.limit,
      page: pageFor(params.skip, params.limit)
    });
    return expectList(payload, ['devices']).map((item) => normalizeDevice(item));
  }

  async getDevice(deviceId: string): Promise<Device> {
    return normalizeDevice(await this.requestJson(`${DEVICES_PATH}/${segment(deviceId)}`));
  }

  async getDeployments(params: ListDeploymentsParams = {}): Promise<Deployment[]> {
    const payload = await this.requestJson(DEPLOYMENTS_V1_PATH, {
      status: params.status,
      per_page: params.limit,
      page: pageFor(params.skip, params.limit)
    });
    return expectList(payload, ['deployments']).map((item) => normalizeDeployment(item));
  }

  async getDeployment(deploymentId: string): Promise<Deployment> {
    return normalizeDeployment(await this.requestJson(`${DEPLOYMENTS_V1_PATH}/${segment(deploymentId)}`));
  }

  async getArtifacts(): Promise<Artifact[]> {
    const payload = await this.requestJson(ARTIFACTS_PATH);
    return expectList(payload, ['artifacts']).map((item) => normalizeArtifact(item));
  }

  async getArtifact(artifactId: string): Promise<Artifact> {
    return normalizeArtifact(await this.requestJson(`${ARTIFACTS_PATH}/${segment(artifactId)}`));
  }

  async getReleases(params: ListReleasesParams = {}): Promise<Release[]> {
    const query: Query = {
      per_page: params.limit,
      page: pageFor(params.skip, params.limit)
    };

    const { value: releases } = await resolveWithVersionFallback(
      (path) => this.request(path, query),
      {
        operation: 'getReleases',
        v2: {
          path: `${DEPLOYMENTS_V2_PATH}/releases`,
          normalize: (body) => expectList(expectJson(body), ['releases']).map((item) => releaseFromV2Data(item))
        },
        v1: {
          path: `${DEPLOYMENTS_V1_PATH}/releases`,
          normalize: (body) => expectList(expectJson(body), ['releases']).map((item) => releaseFromV1Data(item))
        }
      },
      this.logger
    );

    const { name, tag } = params;
    return releases.filter((release) => {
      if (name && !includesIgnoreCase(release.name, name)) {
        return false;
      }
      if (tag && !release.tags.some((entry) => includesIgnoreCase(entry.key, tag) || includesIgnoreCase(entry.value, tag))) {
        return false;
      }
      return true;
    });
  }

  async getRelease(releaseName: string): Promise<Release> {
    const encoded = segment(releaseName);

    const { value } = await resolveWithVersionFallback(
      (path) => this.request(path),
      {
        operation: 'getRelease',
        v2: {
          path: `${DEPLOYMENTS_V2_PATH}/releases/${encoded}`,
          normalize: (body) => releaseFromV2Data(expectJson(body))
        },
        v1: {
          path: `${DEPLOYMENTS_V1_PATH}/releases/${encoded}`,
          normalize: (body) => releaseFromV1Data(expectJson(body))
        },
        linearScan: async () => {
          const releases = await this.getReleases();
          const match = releases.find((release) => release.name === releaseName);
          if (!match) {
            throw new MenderApiError('NOT_FOUND', `Release '${releaseName}' not found.`, { statusCode: 404 });
          }
          return match;
        }
      },
      this.logger
    );

    return value;
  }

  async getDeviceInventory(deviceId: string): Promise<DeviceInventory> {
    const payload = await this.requestJson(`${INVENTORY_DEVICES_PATH}/${segment(deviceId)}`);
    return normalizeDeviceInventory(payload, deviceId);
  }

  async getDevicesInventory(params: ListInventoryParams = {}): Promise<DeviceInventory[]> {
    const payload = await this.requestJson(INVENTORY_DEVICES_PATH, {
      per_page: params.limit,
      has_attribute: params.hasAttribute
    });
    return expectList(payload, ['devices']).map((item) => normalizeDeviceInventory(item));
  }

  async getInventoryGroups(): Promise<InventoryGroup[]> {
    return normalizeInventoryGroups(await this.requestJson(INVENTORY_GROUPS_PATH));
  }

  /** Group the device belongs to, or `null` when it is in none. */
  async getDeviceGroup(deviceId: string): Promise<string | null> {
    try {
      const payload = await this.requestJson(`${INVENTORY_DEVICES_PATH}/${segment(deviceId)}/group`);
      if (payload === undefined) {
        return null;
      }
      const group = expectRecord(payload, 'device group').group;
      return typeof group === 'string' && group ? group : null;
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async getDeploymentDeviceLog(deploymentId: string, deviceId: string): Promise<DeploymentLog> {
    const ids = { deploymentId, deviceId };

    const { value } = await resolveWithVersionFallback(
      (path) => this.request(path),
      {
        operation: 'getDeploymentDeviceLog',
        v2: {
          path: fillTemplate(this.logEndpoints.v2, ids),
          normalize: (body) => parseDeploymentLog(body, deploymentId, deviceId)
        },
        v1: {
          path: fillTemplate(this.logEndpoints.v1, ids),
          normalize: (body) => parseDeploymentLog(body, deploymentId, deviceId)
        }
      },
      this.logger
    );

    return value;
  }

  private async getDeploymentDeviceIds(deploymentId: string): Promise<string[]> {
    const encoded = segment(deploymentId);
    try {
      const { value } = await resolveWithVersionFallback(
        (path) => this.request(path),
        {
          operation: 'getDeploymentDevices',
          v2: {
            path: `${DEPLOYMENTS_V2_PATH}/${encoded}/devices`,
            normalize: (body) => deploymentDeviceIds(expectJson(body))
          },
          v1: {
            path: `${DEPLOYMENTS_V1_PATH}/${encoded}/devices`,
            normalize: (body) => deploymentDeviceIds(expectJson(body))
          }
        },
        this.logger
      );
      return value;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info({ deploymentId }, 'Deployment device list is not available');
        return [];
      }
      throw error;
    }
  }

  /**
   * Logs for every device in a deployment, fetched one device at a time.
   * Devices whose log cannot be retrieved are left out.
   */
  async getDeploymentLogs(deploymentId: string): Promise<DeploymentLog[]> {
    await this.getDeployment(deploymentId);

    const logs: DeploymentLog[] = [];
    for (const deviceId of await this.getDeploymentDeviceIds(deploymentId)) {
      try {
        logs.push(await this.getDeploymentDeviceLog(deploymentId, deviceId));
      } catch (error) {
        const reason = error instanceof MenderApiError ? error.code : 'INTERNAL';
        this.logger.warn({ deploymentId, deviceId, reason }, 'Skipping device without a retrievable deployment log');
      }
    }
    return logs;
  }

  /**
   * Audit logs live under different paths depending on the Mender version and
   * plan. Candidates are tried in order and the first one that exists answers.
   */
  async getAuditLogs(filters: AuditLogFilters = {}): Promise<AuditLogEntry[]> {
    const user = filters.user;
    const query: Query = {
      object_type: filters.objectType,
      action: filters.action,
      created_after: toUnixSeconds(filters.startDate),
      created_before: toUnixSeconds(filters.endDate),
      per_page: filters.limit
    };
    if (user) {
      query[user.includes('@') ? 'actor.email' : 'actor.id'] = user;
    }

    let lastNotFound: unknown;
    for (const path of AUDIT_LOG_PATHS) {
      try {
        return parseAuditLogs(await this.request(path, query));
      } catch (error) {
        if (!isNotFoundError(error)) {
          throw error;
        }
        lastNotFound = error;
        this.logger.debug({ path }, 'Audit log endpoint not found, trying next candidate');
      }
    }

    throw lastNotFound instanceof MenderApiError
      ? lastNotFound
      : new MenderApiError('NOT_FOUND', describeHttpFailure(404, AUDIT_LOG_PATHS[0]), { statusCode: 404 });
  }
}
