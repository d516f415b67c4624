import type { Logger } from 'pino';

import { isNotFoundError } from '../errors.js';
import type { ApiVersion } from './types.js';

export interface VersionedEndpoint<TRaw, T> {
  path: string;
  normalize: (raw: TRaw) => T;
}

export interface VersionFallbackStrategy<TRaw, T> {
  operation: string;
  v2: VersionedEndpoint<TRaw, T>;
  v1: VersionedEndpoint<TRaw, T>;
  /** Last resort once both versions answered not-found. */
  linearScan?: () => Promise<T>;
  isNotFound?: (error: unknown) => boolean;
}

export interface VersionFallbackResult<T> {
  value: T;
  source: ApiVersion | 'scan';
}

/**
 * Runs a dual-version read: v2 first, then v1, then the optional scan. Only a
 * not-found failure moves on to the next step; anything else is rethrown as is.
 */
export async function resolveWithVersionFallback<TRaw, T>(
  request: (path: string) => Promise<TRaw>,
  strategy: VersionFallbackStrategy<TRaw, T>,
  logger: Logger
): Promise<VersionFallbackResult<T>> {
  const isNotFound = strategy.isNotFound ?? isNotFoundError;
  const { linearScan } = strategy;

  try {
    const raw = await request(strategy.v2.path);
    return { value: strategy.v2.normalize(raw), source: 'v2' };
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
    logger.debug({ operation: strategy.operation, path: strategy.v2.path }, 'v2 endpoint not found, trying v1');
  }

  try {
    const raw = await request(strategy.v1.path);
    return { value: strategy.v1.normalize(raw), source: 'v1' };
  } catch (error) {
    if (!isNotFound(error) || !linearScan) {
      throw error;
    }
    logger.debug({ operation: strategy.operation, path: strategy.v1.path }, 'v1 endpoint not found, scanning');
  }

  return { value: await linearScan(), source: 'scan' };
}
