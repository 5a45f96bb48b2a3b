/**
 * ContextCache — key-value cache scoped to the calling execution context.
 *
 * - Entries carry an optional version tag and an optional lifetime in seconds
 * - Expired or version-mismatched entries are dropped lazily, when accessed
 * - Each execution context (see context_scope.ts) has its own mapping per
 *   namespace, so caches never see each other's writes across contexts
 * - Values are stored by reference; nothing is cloned or serialized
 */

import { resolveConfig, type ContextCacheConfig, type ContextCacheOptions } from './config.js';
import { getContextStore } from './context_scope.js';
import { buildEntry, currentUnixTime, isExpired, isMismatched, isNil, toInteger } from './entry.js';
import { ContextCacheError } from './errors.js';
import { resolveLogger } from './logger.js';
import { resolveMultiOptions, resolveOptions } from './options.js';
import { keyMatcher } from './pattern.js';
import type {
  CacheDataStore,
  CacheEntry,
  CacheLogger,
  CacheNamespace,
  CacheVersion,
  FetchMultiOptions,
  FetchOptions,
  KeyPattern,
  Producer,
  ReadMultiOptions,
  ReadOptions,
  ResolvedOptions,
  WriteMultiOptions,
  WriteOptions,
} from './types.js';

type Validation =
  | { valid: true; value: unknown }
  | { valid: false; reason: 'missing' | 'expired' | 'mismatched' };

type WriteMultiInput = Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>;

function isMap(entries: WriteMultiInput): entries is ReadonlyMap<string, unknown> {
  return entries instanceof Map;
}

function isProducer<T>(value: object | Producer<T>): value is Producer<T> {
  return typeof value === 'function';
}

/** Accept both `(key, producer)` and `(key, options, producer)` call shapes. */
function splitFetchArgs<O extends object, T>(
  optionsOrProducer: O | Producer<T>,
  producer: Producer<T> | undefined,
): [O | Record<string, never>, Producer<T>] {
  if (isProducer(optionsOrProducer)) {
    return [{}, optionsOrProducer];
  }
  if (!producer) {
    throw new TypeError('A producer function is required');
  }
  return [optionsOrProducer, producer];
}

export class ContextCache {
  private readonly config: ContextCacheConfig;
  private readonly logger: CacheLogger;

  constructor(options: ContextCacheOptions = {}) {
    this.config = resolveConfig(options);
    this.logger = resolveLogger(options.logger, this.config.verbose);

    // Create the calling context's mapping up front; an existing one is kept.
    getContextStore(this.config.namespace);
  }

  get namespace(): CacheNamespace {
    return this.config.namespace;
  }

  /** Effective defaults after env overrides and explicit options. */
  get settings(): Readonly<ContextCacheConfig> {
    return this.config;
  }

  /** Number of stored entries in the calling context, valid or not. */
  get size(): number {
    return this.dataStore.size;
  }

  clear(): void {
    const store = this.dataStore;
    const count = store.size;
    store.clear();
    this.logger.debug('cleared namespace', { namespace: this.config.namespace, entries: count });
  }

  /** Whether an entry is stored for `key`. Does not check validity. */
  exist(key: string): boolean {
    return this.dataStore.has(key);
  }

  /**
   * Store `value` under `key`. Returns the value, or null when a nil value
   * was skipped.
   */
  write<T>(key: string, value: T, options: WriteOptions = {}): T | null {
    return this.performWrite(key, value, resolveOptions(options, this.config));
  }

  /** The value stored under `key`, or null when missing, expired or mismatched. */
  read<T = unknown>(key: string, options: ReadOptions = {}): T | null {
    const { version } = resolveOptions(options, this.config);
    const result = this.validate(key, this.dataStore.get(key), version, currentUnixTime());
    return result.valid ? (result.value as T) : null;
  }

  /**
   * Read `key`; on a miss, call `producer` and write what it returns with
   * the same options. `force` skips the read.
   */
  fetch<T>(key: string, producer: Producer<T>): T | null;
  fetch<T>(key: string, options: FetchOptions, producer: Producer<T>): T | null;
  fetch<T>(key: string, optionsOrProducer: FetchOptions | Producer<T>, maybeProducer?: Producer<T>): T | null {
    const [options, producer] = splitFetchArgs(optionsOrProducer, maybeProducer);
    return this.performFetch(key, resolveOptions(options, this.config), producer);
  }

  /** Remove `key`. Returns whether an entry existed. */
  delete(key: string): boolean {
    return this.dataStore.delete(key);
  }

  /**
   * Write every pair with per-key options. Returns `entries`.
   *
   * Array options follow the iteration order of `entries`. Plain objects list
   * integer-like keys first, so pass a Map when the order must match.
   */
  writeMulti<E extends WriteMultiInput>(entries: E, options: WriteMultiOptions = {}): E {
    const pairs = isMap(entries) ? [...entries] : Object.entries(entries);
    const keys = pairs.map(([key]) => key);
    const resolved = resolveMultiOptions(keys, options, this.config);

    pairs.forEach(([key, value], index) => {
      const keyOptions = resolved[index];
      if (keyOptions) {
        this.performWrite(key, value, keyOptions);
      }
    });

    return entries;
  }

  /** Read every key with its own version. Every requested key is present in the result. */
  readMulti<T = unknown>(keys: readonly string[], options: ReadMultiOptions = {}): Record<string, T | null> {
    const resolved = resolveMultiOptions(keys, options, this.config);
    const store = this.dataStore;
    const now = currentUnixTime();

    return Object.fromEntries(
      keys.map((key, index) => {
        const result = this.validate(key, store.get(key), resolved[index]?.version ?? null, now);
        return [key, result.valid ? (result.value as T) : null];
      }),
    );
  }

  fetchMulti<T>(keys: readonly string[], producer: Producer<T>): Record<string, T | null>;
  fetchMulti<T>(keys: readonly string[], options: FetchMultiOptions, producer: Producer<T>): Record<string, T | null>;
  fetchMulti<T>(
    keys: readonly string[],
    optionsOrProducer: FetchMultiOptions | Producer<T>,
    maybeProducer?: Producer<T>,
  ): Record<string, T | null> {
    const [options, producer] = splitFetchArgs(optionsOrProducer, maybeProducer);
    const resolved = resolveMultiOptions(keys, options, this.config);

    return Object.fromEntries(
      keys.map((key, index) => {
        const keyOptions = resolved[index] ?? resolveOptions({}, this.config);
        return [key, this.performFetch(key, keyOptions, producer)];
      }),
    );
  }

  deleteMulti(keys: readonly string[]): boolean[] {
    return keys.map((key) => this.delete(key));
  }

  /** Remove every key matching `pattern`. Returns the removed keys in insertion order. */
  deleteMatched(pattern: KeyPattern): string[] {
    const matches = keyMatcher(pattern);
    const store = this.dataStore;
    const removed: string[] = [];

    for (const key of [...store.keys()]) {
      if (matches(key)) {
        store.delete(key);
        removed.push(key);
      }
    }

    this.logger.debug('deleted matching keys', { pattern: String(pattern), removed: removed.length });
    return removed;
  }

  /**
   * Validate every entry against the clock and `options.version`, dropping
   * the invalid ones. Returns the dropped keys in insertion order.
   */
  cleanup(options: ReadOptions = {}): string[] {
    const { version } = resolveOptions(options, this.config);
    const store = this.dataStore;
    const now = currentUnixTime();
    const removed: string[] = [];

    for (const [key, entry] of [...store.entries()]) {
      if (!this.validate(key, entry, version, now).valid) {
        removed.push(key);
      }
    }

    this.logger.debug('cleanup swept entries', { removed: removed.length, remaining: store.size });
    return removed;
  }

  increment(key: string, amount = 1, options: WriteOptions = {}): number {
    return this.performAdd(key, amount, resolveOptions(options, this.config));
  }

  decrement(key: string, amount = 1, options: WriteOptions = {}): number {
    return this.performAdd(key, -amount, resolveOptions(options, this.config));
  }

  // ==========================================================================
  // Aliases
  // ==========================================================================

  exists(key: string): boolean {
    return this.exist(key);
  }

  set<T>(key: string, value: T, options: WriteOptions = {}): T | null {
    return this.write(key, value, options);
  }

  setMulti<E extends WriteMultiInput>(entries: E, options: WriteMultiOptions = {}): E {
    return this.writeMulti(entries, options);
  }

  get<T = unknown>(key: string, options: ReadOptions = {}): T | null {
    return this.read<T>(key, options);
  }

  getMulti<T = unknown>(keys: readonly string[], options: ReadMultiOptions = {}): Record<string, T | null> {
    return this.readMulti<T>(keys, options);
  }

  remove(key: string): boolean {
    return this.delete(key);
  }

  removeMulti(keys: readonly string[]): boolean[] {
    return this.deleteMulti(keys);
  }

  removeMatched(pattern: KeyPattern): string[] {
    return this.deleteMatched(pattern);
  }

  incr(key: string, amount = 1, options: WriteOptions = {}): number {
    return this.increment(key, amount, options);
  }

  decr(key: string, amount = 1, options: WriteOptions = {}): number {
    return this.decrement(key, amount, options);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private get dataStore(): CacheDataStore {
    return getContextStore(this.config.namespace);
  }

  private performWrite<T>(key: string, value: T, options: ResolvedOptions): T | null {
    if (isNil(value) && options.skipNil) return null;

    this.dataStore.set(key, buildEntry(value, options.version, options.expiresIn));
    return value;
  }

  private performFetch<T>(key: string, options: ResolvedOptions, producer: Producer<T>): T | null {
    if (!options.force) {
      const result = this.validate(key, this.dataStore.get(key), options.version, currentUnixTime());
      if (result.valid) return result.value as T;
    }

    return this.performWrite(key, producer(key), options);
  }

  private performAdd(key: string, amount: number, options: ResolvedOptions): number {
    if (!Number.isFinite(amount)) {
      throw new ContextCacheError('INVALID_AMOUNT', `Counter amount must be a finite number, got ${String(amount)}`);
    }

    const result = this.validate(key, this.dataStore.get(key), options.version, currentUnixTime());
    const current = result.valid ? toInteger(result.value) : 0;
    const next = current + amount;

    this.dataStore.set(key, buildEntry(next, options.version, options.expiresIn));
    return next;
  }

  /** Check an entry, deleting it when expired or mismatched. */
  private validate(
    key: string,
    entry: CacheEntry | undefined,
    version: CacheVersion | null,
    now: number,
  ): Validation {
    if (!entry) return { valid: false, reason: 'missing' };

    const reason = isExpired(entry, now) ? 'expired' : isMismatched(entry, version) ? 'mismatched' : null;
    if (reason) {
      this.dataStore.delete(key);
      this.logger.debug('dropped invalid entry', { key, reason });
      return { valid: false, reason };
    }

    return { valid: true, value: entry.value };
  }
}

/** Convenience factory mirroring `new ContextCache(options)`. */
export function createContextCache(options: ContextCacheOptions = {}): ContextCache {
  return new ContextCache(options);
}
