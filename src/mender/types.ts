import type { DeviceStatus } from '../security/validation.js';

export interface Device {
  readonly id: string;
  readonly status: DeviceStatus | 'unknown';
  readonly rawStatus: string;
  readonly deviceType?: string;
  readonly createdTs?: string;
  readonly updatedTs?: string;
  readonly lastSeen?: string;
  readonly decommissioning: boolean;
  readonly authSetCount: number;
  readonly identity: Readonly<Record<string, unknown>>;
}

export interface DeploymentStatistics {
  readonly success: number;
  readonly failure: number;
  readonly pending: number;
  readonly aborted: number;
  readonly inprogress: number;
  readonly other: number;
}

export interface Deployment {
  readonly id: string;
  readonly name: string;
  readonly artifactName: string;
  readonly status: string;
  readonly created?: string;
  readonly finished?: string;
  readonly deviceCount?: number;
  readonly maxDevices?: number;
  readonly statistics: DeploymentStatistics;
}

export interface Artifact {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  readonly deviceTypesCompatible: readonly string[];
  readonly signed: boolean;
  readonly size?: number;
  readonly modified?: string;
}

export interface ReleaseTag {
  readonly key: string;
  readonly value: string;
}

export interface Release {
  readonly name: string;
  readonly modified?: string;
  readonly artifacts: readonly Artifact[];
  readonly artifactsCount: number;
  readonly tags: readonly ReleaseTag[];
  readonly notes?: string;
}

export interface InventoryItem {
  readonly name: string;
  readonly value: unknown;
  readonly description?: string;
}

export interface DeviceInventory {
  readonly deviceId: string;
  readonly attributes: readonly InventoryItem[];
  readonly updatedTs?: string;
}

export interface InventoryGroup {
  readonly group: string;
  readonly deviceCount?: number;
}

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'WARNING' | 'ERROR' | 'FATAL';

export interface DeploymentLogEntry {
  readonly timestamp?: string;
  readonly level?: LogLevel;
  readonly message: string;
}

export interface DeploymentLog {
  readonly deploymentId: string;
  readonly deviceId: string;
  readonly format: BodyFormat;
  readonly entries: readonly DeploymentLogEntry[];
  readonly retrievedAt: string;
}

export interface AuditLogNetworkContext {
  readonly ipAddress?: string;
  readonly userAgent?: string;
}

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly user: string;
  readonly action: string;
  readonly objectType: string;
  readonly objectId: string;
  readonly result: string;
  readonly details: Readonly<Record<string, unknown>>;
  readonly network?: AuditLogNetworkContext;
}

export type BodyFormat = 'empty' | 'json' | 'text' | 'binary';

/** Response body after content-type driven decoding. */
export type DecodedBody =
  | { readonly format: 'empty' }
  | { readonly format: 'json'; readonly value: unknown }
  | { readonly format: 'text'; readonly text: string }
  | { readonly format: 'binary'; readonly size: number; readonly preview: string };

export type ApiVersion = 'v1' | 'v2';
