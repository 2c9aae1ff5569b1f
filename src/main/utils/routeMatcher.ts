/**
 * Matching of request paths against permission patterns.
 *
 * - '*' matches exactly one path segment
 * - '**' matches any number of trailing segments, including none
 *
 * '/organizations/*' matches '/organizations/abc' but not '/organizations/abc/members';
 * '/research/**' matches '/research', '/research/labs' and '/research/labs/7'.
 */

function segments(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0);
}

/**
 * Leading slash, no trailing slash (except for the root path).
 */
export function normalizePath(path: string): string {
  return '/' + segments(path).join('/');
}

export function matchPath(pattern: string, path: string): boolean {
  const patternSegments = segments(pattern);
  const pathSegments = segments(path);

  const last = patternSegments[patternSegments.length - 1];
  if (last === '**') {
    const prefix = patternSegments.slice(0, -1);
    if (pathSegments.length < prefix.length) {
      return false;
    }
    return prefix.every((segment, i) => segment === '*' || segment === pathSegments[i]);
  }

  if (patternSegments.length !== pathSegments.length) {
    return false;
  }

  return patternSegments.every((segment, i) => segment === '*' || segment === pathSegments[i]);
}

/**
 * First pattern in `patterns` that matches `path`, or null.
 */
export function findMatchingPattern(patterns: string[], path: string): string | null {
  return patterns.find(pattern => matchPath(pattern, path)) ?? null;
}

/**
 * Strips the versioned API prefix, so '/api/v1/projects/3' becomes '/projects/3'.
 * Paths outside the prefix are returned normalized but otherwise untouched.
 */
export function extractApiPath(fullPath: string, baseUrlPath?: string): string {
  const normalized = normalizePath(fullPath);
  if (!baseUrlPath) {
    return normalized;
  }

  const base = normalizePath(baseUrlPath);
  if (base === '/') {
    return normalized;
  }
  if (normalized === base) {
    return '/';
  }
  if (normalized.startsWith(base + '/')) {
    return normalized.slice(base.length);
  }
  return normalized;
}
