/**
 * Config — instance defaults for a ContextCache.
 *
 * Resolution order: built-in defaults, then CONTEXT_CACHE_* environment
 * variables, then the options passed to the constructor. Explicit options
 * are validated; environment values that do not parse are ignored.
 */

import { z } from 'zod';

import { ContextCacheError, type ConfigIssue } from './errors.js';
import type { CacheLogger, CacheNamespace } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface ContextCacheOptions {
  /** Name of the per-context mapping this cache reads and writes. */
  namespace?: CacheNamespace | undefined;
  /** Default lifetime in seconds; null keeps entries until deleted. */
  expiresIn?: number | null | undefined;
  /** Whether writes of null/undefined are skipped by default. */
  skipNil?: boolean | undefined;
  /** Log cache maintenance to the console when no logger is given. */
  verbose?: boolean | undefined;
  logger?: CacheLogger | undefined;
  /** Environment to read overrides from (default: process.env). */
  env?: Readonly<Record<string, string | undefined>> | undefined;
}

export interface ContextCacheConfig {
  namespace: CacheNamespace;
  expiresIn: number | null;
  skipNil: boolean;
  verbose: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG: Readonly<ContextCacheConfig> = {
  namespace: 'context_cache',
  expiresIn: 60,
  skipNil: false,
  verbose: false,
};

const ENV_PREFIX = 'CONTEXT_CACHE_';

export const ENV_VARS = {
  NAMESPACE: `${ENV_PREFIX}NAMESPACE`,
  EXPIRES_IN: `${ENV_PREFIX}EXPIRES_IN`,
  SKIP_NIL: `${ENV_PREFIX}SKIP_NIL`,
  VERBOSE: `${ENV_PREFIX}VERBOSE`,
} as const;

const optionsSchema = z.object({
  namespace: z.union([z.string().min(1), z.symbol()]).optional(),
  expiresIn: z.number().finite().nullable().optional(),
  skipNil: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type ValidatedOptions = z.infer<typeof optionsSchema>;

// ============================================================================
// Env parsing
// ============================================================================

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  return undefined;
}

/** `none` and `never` disable expiry; anything else must be a number of seconds. */
function parseEnvExpiresIn(value: string | undefined): number | null | undefined {
  if (value === undefined) return undefined;
  const lower = value.trim().toLowerCase();
  if (lower === 'none' || lower === 'never') return null;
  if (lower === '') return undefined;
  const num = Number(lower);
  return Number.isFinite(num) ? num : undefined;
}

function getEnvOverrides(env: Readonly<Record<string, string | undefined>>): Partial<ContextCacheConfig> {
  const overrides: Partial<ContextCacheConfig> = {};

  const namespace = env[ENV_VARS.NAMESPACE]?.trim();
  if (namespace) {
    overrides.namespace = namespace;
  }

  const expiresIn = parseEnvExpiresIn(env[ENV_VARS.EXPIRES_IN]);
  if (expiresIn !== undefined) {
    overrides.expiresIn = expiresIn;
  }

  const skipNil = parseEnvBoolean(env[ENV_VARS.SKIP_NIL]);
  if (skipNil !== undefined) {
    overrides.skipNil = skipNil;
  }

  const verbose = parseEnvBoolean(env[ENV_VARS.VERBOSE]);
  if (verbose !== undefined) {
    overrides.verbose = verbose;
  }

  return overrides;
}

// ============================================================================
// Resolution
// ============================================================================

function validateOptions(options: ContextCacheOptions): ValidatedOptions {
  const result = optionsSchema.safeParse({
    namespace: options.namespace,
    expiresIn: options.expiresIn,
    skipNil: options.skipNil,
    verbose: options.verbose,
  });

  if (!result.success) {
    const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ContextCacheError(
      'INVALID_CONFIG',
      `Invalid cache options: ${issues.map((issue) => issue.path).join(', ')}`,
      issues,
    );
  }

  return result.data;
}

/** Resolve the effective configuration for a cache instance. */
export function resolveConfig(options: ContextCacheOptions = {}): ContextCacheConfig {
  const explicit = validateOptions(options);
  const config: ContextCacheConfig = {
    ...DEFAULT_CONFIG,
    ...getEnvOverrides(options.env ?? process.env),
  };

  if (explicit.namespace !== undefined) config.namespace = explicit.namespace;
  if (explicit.expiresIn !== undefined) config.expiresIn = explicit.expiresIn;
  if (explicit.skipNil !== undefined) config.skipNil = explicit.skipNil;
  if (explicit.verbose !== undefined) config.verbose = explicit.verbose;

  return config;
}
