/**
 * Wildcard matching for display names (`*` any run, `?` one character),
 * anchored and case-insensitive like PowerShell's -like
 */

function escapeRegExp(value: string): string {
  return value.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

export function wildcardToRegExp(pattern: string): RegExp {
  const source = escapeRegExp(pattern)
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${source}$`, 'i');
}

export function matchesWildcard(value: string, pattern: string): boolean {
  return wildcardToRegExp(pattern).test(value.trim());
}
