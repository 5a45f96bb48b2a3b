/**
 * ContextCacheError — the only error type the cache throws itself.
 *
 * Misses never throw; these cover misuse (bad configuration, non-numeric
 * counter amounts). Errors raised by a fetch producer are not wrapped.
 */

export type ContextCacheErrorCode = 'INVALID_CONFIG' | 'INVALID_AMOUNT';

export interface ConfigIssue {
  /** Dotted path of the offending option, e.g. `expiresIn`. */
  path: string;
  message: string;
}

export class ContextCacheError extends Error {
  public readonly code: ContextCacheErrorCode;
  public readonly issues: readonly ConfigIssue[];

  constructor(code: ContextCacheErrorCode, message: string, issues: readonly ConfigIssue[] = []) {
    super(`[${code}] ${message}`);
    this.name = 'ContextCacheError';
    this.code = code;
    this.issues = issues;
  }

  /** Format the issues as one line per option. */
  formatIssues(): string {
    return this.issues.map((issue) => `  - ${issue.path || '(root)'}: ${issue.message}`).join('\n');
  }
}

export function isContextCacheError(error: unknown): error is ContextCacheError {
  return error instanceof ContextCacheError;
}
