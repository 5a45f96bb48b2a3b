/**
 * Shared types for the context cache.
 */

/** Opaque version tag, compared with strict equality. */
export type CacheVersion = string | number;

/** A stored value with its version and expiration metadata. */
export interface CacheEntry<T = unknown> {
  value: T;
  version: CacheVersion | null;
  /** Seconds after `createdAt` at which the entry expires; null never expires. */
  expiresIn: number | null;
  /** Unix time in seconds (fractional). */
  createdAt: number;
}

/** The mapping owned by one namespace in one execution context. */
export type CacheDataStore = Map<string, CacheEntry>;

export type CacheNamespace = string | symbol;

export interface ReadOptions {
  version?: CacheVersion | null | undefined;
}

export interface WriteOptions {
  version?: CacheVersion | null | undefined;
  expiresIn?: number | null | undefined;
  skipNil?: boolean | undefined;
}

export interface FetchOptions extends WriteOptions {
  /** Call the producer and write its result even when a valid value exists. */
  force?: boolean | undefined;
}

/** Options after defaults have been applied. */
export interface ResolvedOptions {
  force: boolean;
  version: CacheVersion | null;
  expiresIn: number | null;
  skipNil: boolean;
}

/**
 * A batch option: one value for every key, an ordered array matched to the
 * keys by position, or a record keyed by cache key.
 */
export type PerKey<V> = V | ReadonlyArray<V | undefined> | Readonly<Record<string, V | undefined>>;

export interface ReadMultiOptions {
  version?: PerKey<CacheVersion | null> | undefined;
}

export interface WriteMultiOptions {
  version?: PerKey<CacheVersion | null> | undefined;
  expiresIn?: PerKey<number | null> | undefined;
  skipNil?: PerKey<boolean> | undefined;
}

export interface FetchMultiOptions extends WriteMultiOptions {
  force?: PerKey<boolean> | undefined;
}

export type Producer<T> = (key: string) => T;

export type KeyPattern = RegExp | string;

export interface CacheLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
}
