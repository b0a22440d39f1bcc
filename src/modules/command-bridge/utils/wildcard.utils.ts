import { ValidationError } from '../errors';

/**
 * Locator path without leading or trailing separators
 */
export function normalizePath(path: string): string {
  return path.trim().replace(/^\/+|\/+$/g, '');
}

export function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

/**
 * Anchored, case-insensitive expression for a `*` / `?` pattern
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = normalizePath(pattern)
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Predicate over locator paths.
 *
 * - `useRegex`: the pattern is a case-insensitive expression searched anywhere in the path
 * - wildcards: the whole path must match, case-insensitively
 * - otherwise: exact path equality
 */
export function createPathMatcher(pattern: string, useRegex = false): (path: string) => boolean {
  if (useRegex) {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern, 'i');
    } catch (error: unknown) {
      throw new ValidationError(`Invalid regex pattern: ${pattern}. Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return (path: string) => regex.test(path);
  }

  if (hasWildcard(pattern)) {
    const regex = wildcardToRegExp(pattern);
    return (path: string) => regex.test(normalizePath(path));
  }

  const exact = normalizePath(pattern);
  return (path: string) => normalizePath(path) === exact;
}
