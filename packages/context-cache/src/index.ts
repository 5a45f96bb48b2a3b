/**
 * context-cache — per-execution-context key-value cache with expiration
 * and optimistic versioning.
 */

export { ContextCache, createContextCache } from './cache.js';

export { resolveConfig, DEFAULT_CONFIG, ENV_VARS } from './config.js';
export type { ContextCacheConfig, ContextCacheOptions } from './config.js';

export {
  runWithCacheContext,
  inCacheContext,
  getContextStore,
  hasContextStore,
  resetContextStore,
} from './context_scope.js';

export { buildEntry, currentUnixTime, isExpired, isMismatched, toInteger } from './entry.js';

export { ContextCacheError, isContextCacheError } from './errors.js';
export type { ContextCacheErrorCode, ConfigIssue } from './errors.js';

export { createConsoleLogger } from './logger.js';

export { keyMatcher } from './pattern.js';

export type {
  CacheDataStore,
  CacheEntry,
  CacheLogger,
  CacheNamespace,
  CacheVersion,
  FetchMultiOptions,
  FetchOptions,
  KeyPattern,
  PerKey,
  Producer,
  ReadMultiOptions,
  ReadOptions,
  ResolvedOptions,
  WriteMultiOptions,
  WriteOptions,
} from './types.js';
