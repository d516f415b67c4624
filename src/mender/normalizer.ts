import { MenderApiError } from '../errors.js';
import { DEVICE_STATUSES, type DeviceStatus } from '../security/validation.js';
import type {
  Artifact,
  AuditLogEntry,
  DecodedBody,
  Deployment,
  DeploymentLog,
  DeploymentLogEntry,
  DeploymentStatistics,
  Device,
  DeviceInventory,
  InventoryGroup,
  InventoryItem,
  LogLevel,
  Release,
  ReleaseTag
} from './types.js';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function getPath(input: unknown, path: string): unknown {
  const parts = path.split('.');
  let current: unknown = input;
  for (const part of parts) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

function firstDefined(input: unknown, paths: string[]): unknown {
  for (const path of paths) {
    const candidate = getPath(input, path);
    if (candidate !== undefined && candidate !== null) {
      return candidate;
    }
  }
  return undefined;
}

function firstArray(input: unknown, paths: string[]): unknown[] {
  for (const path of paths) {
    const candidate = getPath(input, path);
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return [];
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== 'string' || !value.trim()) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toOptionalNumber(value: unknown): number | undefined {
  const parsed = toNumber(value);
  return parsed === null ? undefined : parsed;
}

function toCount(value: unknown): number {
  const parsed = toNumber(value);
  return parsed === null || parsed < 0 ? 0 : Math.floor(parsed);
}

function toStringValue(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function toOptionalString(value: unknown): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  return toStringValue(value);
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
  }
  return value === 1;
}

function requireId(record: JsonRecord, kind: string, keys: string[] = ['id']): string {
  const id = toOptionalString(firstDefined(record, keys));
  if (!id) {
    throw new MenderApiError('INVALID_RESPONSE', `Invalid response format from the Mender server: ${kind} without an ID.`);
  }
  return id;
}

/** Rejects anything that is not a JSON object; `undefined` (empty body) included. */
export function expectRecord(value: unknown, kind: string): JsonRecord {
  if (!isRecord(value)) {
    throw new MenderApiError('INVALID_RESPONSE', `Invalid response format from the Mender server: expected a ${kind} object.`);
  }
  return value;
}

/** Lists may arrive bare or wrapped; an empty body is an empty list. */
export function expectList(value: unknown, wrapperKeys: string[] = []): unknown[] {
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    for (const key of wrapperKeys) {
      const nested = value[key];
      if (Array.isArray(nested)) {
        return nested;
      }
    }
  }
  throw new MenderApiError('INVALID_RESPONSE', 'Invalid response format from the Mender server: expected a list.');
}

const KNOWN_DEVICE_STATUSES = new Set<string>(DEVICE_STATUSES);

function isDeviceStatus(value: string): value is DeviceStatus {
  return KNOWN_DEVICE_STATUSES.has(value);
}

function attributeValue(attributes: unknown[], name: string): unknown {
  for (const attribute of attributes) {
    if (isRecord(attribute) && attribute.name === name) {
      return attribute.value;
    }
  }
  return undefined;
}

export function normalizeDevice(raw: unknown): Device {
  const record = expectRecord(raw, 'device');
  const rawStatus = toStringValue(record.status);
  const status = rawStatus.trim().toLowerCase();
  const attributes = firstArray(record, ['attributes']);
  const identity = firstDefined(record, ['identity_data', 'identity']);

  return {
    id: requireId(record, 'device'),
    status: isDeviceStatus(status) ? status : 'unknown',
    rawStatus,
    deviceType: toOptionalString(
      firstDefined(record, ['device_type', 'identity_data.device_type']) ?? attributeValue(attributes, 'device_type')
    ),
    createdTs: toOptionalString(record.created_ts),
    updatedTs: toOptionalString(record.updated_ts),
    lastSeen: toOptionalString(firstDefined(record, ['check_in_time', 'last_seen', 'last_checkin'])),
    decommissioning: toBoolean(record.decommissioning),
    authSetCount: firstArray(record, ['auth_sets']).length,
    identity: isRecord(identity) ? { ...identity } : {}
  };
}

const IN_PROGRESS_STATES = ['inprogress', 'downloading', 'installing', 'rebooting'];
const OTHER_STATES = ['noartifact', 'already-installed', 'decommissioned'];

function normalizeStatistics(raw: unknown): DeploymentStatistics {
  const counts = isRecord(getPath(raw, 'status')) ? getPath(raw, 'status') : raw;
  const pick = (key: string): number => toCount(isRecord(counts) ? counts[key] : undefined);
  const sum = (keys: string[]): number => keys.reduce((total, key) => total + pick(key), 0);

  const pausedKeys = isRecord(counts) ? Object.keys(counts).filter((key) => key.startsWith('pause')) : [];

  return {
    success: pick('success'),
    failure: pick('failure'),
    pending: pick('pending'),
    aborted: pick('aborted'),
    inprogress: sum([...IN_PROGRESS_STATES, ...pausedKeys]),
    other: sum(OTHER_STATES)
  };
}

export function normalizeDeployment(raw: unknown): Deployment {
  const record = expectRecord(raw, 'deployment');
  return {
    id: requireId(record, 'deployment'),
    name: toStringValue(record.name),
    artifactName: toStringValue(record.artifact_name),
    status: toStringValue(record.status),
    created: toOptionalString(record.created),
    finished: toOptionalString(record.finished),
    deviceCount: toOptionalNumber(record.device_count),
    maxDevices: toOptionalNumber(record.max_devices),
    statistics: normalizeStatistics(record.statistics)
  };
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((item) => toStringValue(item)).filter(Boolean) : [];
}

export function normalizeArtifact(raw: unknown): Artifact {
  const record = expectRecord(raw, 'artifact');
  return {
    id: toStringValue(record.id),
    name: toStringValue(firstDefined(record, ['name', 'artifact_name'])),
    description: toOptionalString(record.description),
    deviceTypesCompatible: stringList(record.device_types_compatible),
    signed: toBoolean(record.signed),
    size: toOptionalNumber(record.size),
    modified: toOptionalString(record.modified)
  };
}

function normalizeTags(value: unknown): ReleaseTag[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const tags: ReleaseTag[] = [];
  for (const tag of value) {
    if (typeof tag === 'string') {
      tags.push({ key: tag, value: '' });
      continue;
    }
    if (isRecord(tag)) {
      const key = toStringValue(tag.key);
      if (key) {
        tags.push({ key, value: toStringValue(tag.value) });
      }
    }
  }
  return tags;
}

function releaseArtifacts(record: JsonRecord): Artifact[] {
  return firstArray(record, ['artifacts'])
    .filter(isRecord)
    .map((artifact) => normalizeArtifact(artifact));
}

/** v1 releases carry no artifact count, tags or notes of their own. */
export function releaseFromV1Data(raw: unknown): Release {
  const record = expectRecord(raw, 'release');
  const artifacts = releaseArtifacts(record);
  return {
    name: toStringValue(firstDefined(record, ['name', 'Name'])),
    modified: toOptionalString(record.modified),
    artifacts,
    artifactsCount: artifacts.length,
    tags: normalizeTags(record.tags),
    notes: toOptionalString(record.notes)
  };
}

export function releaseFromV2Data(raw: unknown): Release {
  const record = expectRecord(raw, 'release');
  const artifacts = releaseArtifacts(record);
  const declaredCount = toNumber(record.artifacts_count);
  return {
    name: toStringValue(record.name),
    modified: toOptionalString(record.modified),
    artifacts,
    artifactsCount: declaredCount === null ? artifacts.length : Math.max(0, Math.floor(declaredCount)),
    tags: normalizeTags(record.tags),
    notes: toOptionalString(record.notes)
  };
}

export function normalizeDeviceInventory(raw: unknown, fallbackDeviceId?: string): DeviceInventory {
  const record = expectRecord(raw ?? {}, 'inventory');
  const attributes: InventoryItem[] = [];

  if (Array.isArray(record.attributes)) {
    for (const attribute of record.attributes) {
      if (isRecord(attribute) && 'name' in attribute && 'value' in attribute) {
        attributes.push({
          name: toStringValue(attribute.name),
          value: attribute.value,
          description: toOptionalString(attribute.scope)
        });
      }
    }
  } else {
    for (const [key, value] of Object.entries(record)) {
      if (key !== 'id' && key !== 'updated_ts') {
        attributes.push({ name: key, value });
      }
    }
  }

  return {
    deviceId: toOptionalString(record.id) ?? fallbackDeviceId ?? 'unknown',
    attributes,
    updatedTs: toOptionalString(record.updated_ts)
  };
}

export function normalizeInventoryGroups(raw: unknown): InventoryGroup[] {
  const groups: InventoryGroup[] = [];
  for (const item of expectList(raw, ['groups'])) {
    if (typeof item === 'string' && item) {
      groups.push({ group: item });
      continue;
    }
    if (isRecord(item)) {
      const group = toOptionalString(firstDefined(item, ['group', 'name']));
      if (group) {
        groups.push({ group, deviceCount: toOptionalNumber(item.device_count) });
      }
    }
  }
  return groups;
}

const TIMESTAMP_PATTERN = /(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)/;
const LEVEL_PATTERN = /\b(TRACE|DEBUG|INFO|WARNING|WARN|ERROR|FATAL)\b/i;

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/;

/** Timestamps without a zone are read as UTC. */
function toIsoTimestamp(value: string): string | undefined {
  const normalized = value.trim().replace(' ', 'T');
  const parsed = Date.parse(ZONE_SUFFIX.test(normalized) ? normalized : `${normalized}Z`);
  return Number.isFinite(parsed) ? new Date(parsed).toISOString() : undefined;
}

function toLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = value.trim().match(LEVEL_PATTERN);
  const level = match?.[1]?.toUpperCase();
  switch (level) {
    case 'TRACE':
    case 'DEBUG':
    case 'INFO':
    case 'WARN':
    case 'WARNING':
    case 'ERROR':
    case 'FATAL':
      return level;
    default:
      return undefined;
  }
}

/**
 * Best-effort split of a plain-text log line into timestamp, level and
 * message, e.g. `2024-03-01T10:00:00Z ERROR: download failed`.
 */
export function parseLogLine(line: string): DeploymentLogEntry {
  const original = line.trim();
  let message = original;
  let timestamp: string | undefined;

  const timestampMatch = original.match(TIMESTAMP_PATTERN);
  const rawTimestamp = timestampMatch?.[1];
  if (rawTimestamp) {
    timestamp = toIsoTimestamp(rawTimestamp);
    if (timestamp) {
      message = message.replace(rawTimestamp, '').trim();
    }
  }

  const levelMatch = message.match(LEVEL_PATTERN);
  const level = toLogLevel(levelMatch?.[1]);
  if (level && levelMatch?.[1]) {
    message = message.replace(new RegExp(`\\b${levelMatch[1]}\\b\\s*:?\\s*`, 'i'), '').trim();
  }

  return {
    timestamp,
    level,
    message: message || original
  };
}

function entryFromRecord(record: JsonRecord): DeploymentLogEntry {
  const timestampValue = toOptionalString(firstDefined(record, ['timestamp', 'time', 'ts']));
  const message = firstDefined(record, ['message', 'msg']);
  return {
    timestamp: timestampValue ? toIsoTimestamp(timestampValue) ?? timestampValue : undefined,
    level: toLogLevel(record.level),
    message: message === undefined ? JSON.stringify(record) : toStringValue(message)
  };
}

function entriesFromJson(value: unknown): DeploymentLogEntry[] {
  if (Array.isArray(value)) {
    return value.map((item) => (isRecord(item) ? entryFromRecord(item) : { message: toStringValue(item) }));
  }

  if (isRecord(value)) {
    if (Array.isArray(value.entries)) {
      return entriesFromJson(value.entries);
    }
    if (Array.isArray(value.messages)) {
      return value.messages.map((item) => (isRecord(item) ? entryFromRecord(item) : { message: toStringValue(item) }));
    }
    if (typeof value.log === 'string') {
      return entriesFromText(value.log);
    }
    return [{ message: JSON.stringify(value) }];
  }

  return [{ message: toStringValue(value) }];
}

function entriesFromText(text: string): DeploymentLogEntry[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim())
    .map((line) => parseLogLine(line));
}

export function parseDeploymentLog(
  body: DecodedBody,
  deploymentId: string,
  deviceId: string,
  retrievedAt: Date = new Date()
): DeploymentLog {
  let entries: DeploymentLogEntry[];
  switch (body.format) {
    case 'empty':
      entries = [];
      break;
    case 'json':
      entries = entriesFromJson(body.value);
      break;
    case 'text':
      entries = entriesFromText(body.text);
      break;
    case 'binary':
      entries = [{ message: `Binary content (${body.size} bytes): ${body.preview}` }];
      break;
  }

  return {
    deploymentId,
    deviceId,
    format: body.format,
    entries,
    retrievedAt: retrievedAt.toISOString()
  };
}

export function deploymentDeviceIds(raw: unknown): string[] {
  return expectList(raw, ['devices'])
    .filter(isRecord)
    .map((device) => toOptionalString(device.id))
    .filter((id): id is string => Boolean(id));
}

function epochToIso(value: unknown): string | undefined {
  const numeric = toNumber(value);
  if (numeric === null) {
    return toOptionalString(value);
  }
  const millis = numeric < 1e12 ? numeric * 1000 : numeric;
  const date = new Date(millis);
  // Outside the Date range: keep the upstream value as text.
  return Number.isNaN(date.getTime()) ? toOptionalString(value) : date.toISOString();
}

export function normalizeAuditLogEntry(raw: unknown): AuditLogEntry {
  const record = expectRecord(raw, 'audit log entry');
  const actor = isRecord(record.actor) ? record.actor : {};
  const object = isRecord(record.object) ? record.object : {};
  const meta = isRecord(record.meta) ? record.meta : {};

  const details: Record<string, unknown> = {};
  if (record.change !== undefined) {
    details.change = record.change;
  }
  for (const [key, value] of Object.entries(isRecord(record.details) ? record.details : {})) {
    details[key] = value;
  }
  for (const [key, value] of Object.entries(meta)) {
    details[key] = value;
  }

  const ipAddress = toOptionalString(firstDefined(actor, ['ip_address', 'ip']));
  const userAgent = toOptionalString(firstDefined(record, ['user_agent', 'actor.user_agent']));

  return {
    timestamp: epochToIso(firstDefined(record, ['time', 'timestamp', 'created_ts'])) ?? '',
    user: toStringValue(firstDefined(actor, ['email', 'id']) ?? record.user),
    action: toStringValue(record.action),
    objectType: toStringValue(firstDefined(object, ['type']) ?? record.object_type),
    objectId: toStringValue(firstDefined(object, ['id']) ?? record.object_id),
    result: toStringValue(firstDefined(record, ['result', 'status']) ?? 'success'),
    details,
    ...(ipAddress || userAgent ? { network: { ipAddress, userAgent } } : {})
  };
}

export function parseAuditLogs(body: DecodedBody): AuditLogEntry[] {
  switch (body.format) {
    case 'empty':
      return [];
    case 'json':
      return expectList(body.value, ['logs', 'items', 'data']).map((item) => normalizeAuditLogEntry(item));
    case 'text':
      return body.text
        .split(/\r?\n/)
        .filter((line) => line.trim())
        .map((line) => {
          try {
            return normalizeAuditLogEntry(JSON.parse(line) as unknown);
          } catch {
            throw new MenderApiError('INVALID_RESPONSE', 'Invalid response format from the Mender server: unreadable audit log line.');
          }
        });
    case 'binary':
      throw new MenderApiError('INVALID_RESPONSE', 'Invalid response format from the Mender server.');
  }
}
