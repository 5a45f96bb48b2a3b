/**
 * Option resolution. Omitted or `undefined` options take the cache's
 * defaults; an explicit `null` is kept (no version, no expiry).
 */

import type { ContextCacheConfig } from './config.js';
import type { CacheVersion, FetchMultiOptions, FetchOptions, PerKey, ResolvedOptions } from './types.js';

type Defaults = Pick<ContextCacheConfig, 'expiresIn' | 'skipNil'>;

export function resolveOptions(options: FetchOptions, defaults: Defaults): ResolvedOptions {
  return {
    force: options.force ?? false,
    version: options.version ?? null,
    expiresIn: options.expiresIn === undefined ? defaults.expiresIn : options.expiresIn,
    skipNil: options.skipNil ?? defaults.skipNil,
  };
}

function isOrdered<V>(option: PerKey<V>): option is ReadonlyArray<V | undefined> {
  return Array.isArray(option);
}

function isKeyed<V>(option: PerKey<V>): option is Readonly<Record<string, V | undefined>> {
  return typeof option === 'object' && option !== null && !Array.isArray(option);
}

/** The value a batch option holds for the key at `index`, or `fallback`. */
export function pickForKey<V>(option: PerKey<V> | undefined, key: string, index: number, fallback: V): V {
  if (option === undefined) return fallback;

  let value: V | undefined;
  if (isOrdered(option)) {
    value = option[index];
  } else if (isKeyed(option)) {
    value = Object.hasOwn(option, key) ? option[key] : undefined;
  } else {
    value = option;
  }

  return value === undefined ? fallback : value;
}

/** Resolve one option set per key, in key order. */
export function resolveMultiOptions(
  keys: readonly string[],
  options: FetchMultiOptions,
  defaults: Defaults,
): ResolvedOptions[] {
  return keys.map((key, index) => ({
    force: pickForKey<boolean>(options.force, key, index, false),
    version: pickForKey<CacheVersion | null>(options.version, key, index, null),
    expiresIn: pickForKey<number | null>(options.expiresIn, key, index, defaults.expiresIn),
    skipNil: pickForKey<boolean>(options.skipNil, key, index, defaults.skipNil),
  }));
}
