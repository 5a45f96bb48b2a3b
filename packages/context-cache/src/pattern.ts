import type { KeyPattern } from './types.js';

/**
 * Build a key predicate. Strings are compiled as regular expressions; both
 * forms search anywhere in the key, regardless of `lastIndex`.
 */
export function keyMatcher(pattern: KeyPattern): (key: string) => boolean {
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  return (key) => key.search(regex) !== -1;
}
