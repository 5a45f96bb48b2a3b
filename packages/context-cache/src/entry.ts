/**
 * Entry helpers — construction and the validity rules applied on access.
 */

import type { CacheEntry, CacheVersion } from './types.js';

/** Current unix time in seconds. */
export function currentUnixTime(): number {
  return Date.now() / 1000;
}

export function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

export function buildEntry<T>(
  value: T,
  version: CacheVersion | null,
  expiresIn: number | null,
  now: number = currentUnixTime(),
): CacheEntry<T> {
  return {
    value,
    version,
    expiresIn,
    createdAt: now,
  };
}

/** An entry without `expiresIn` never expires. The boundary instant counts as expired. */
export function isExpired(entry: CacheEntry, now: number = currentUnixTime()): boolean {
  return entry.expiresIn !== null && entry.createdAt + entry.expiresIn <= now;
}

/** Unversioned entries and unversioned reads always match. */
export function isMismatched(entry: CacheEntry, version: CacheVersion | null): boolean {
  return entry.version !== null && version !== null && entry.version !== version;
}

/**
 * Integer view of a stored counter value. Numbers are truncated, strings
 * are parsed by their leading integer, everything else counts as 0.
 */
export function toInteger(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}
