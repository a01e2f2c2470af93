/**
 * Path exclusion by segment.
 *
 * An entry matches when it equals one path segment (`node_modules`) or, for
 * multi-segment entries (`target/debug`), a run of consecutive segments.
 * Matching works at any depth.
 */

/** Directories that never hold hand-maintained sources */
export const DEFAULT_EXCLUDE: readonly string[] = [
  'node_modules',
  '.git',
  '.svn',
  '.hg',
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.tox',
  'target',
  'build',
  'dist',
  '.next',
  '.nuxt',
  'vendor',
  '.venv',
  'venv',
  'env',
  '.env',
  '.idea',
  '.vscode',
  'coverage',
  '.coverage',
  'htmlcov',
];

export type ExcludeMatcher = (relativePath: string) => boolean;

function splitSegments(p: string): string[] {
  return p.split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
}

/**
 * Parse a comma-separated exclude list (`--exclude a,b/c`).
 */
export function parseExcludeList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

/**
 * Build a matcher for the given entries. The returned function takes a path
 * relative to the project root, with either separator.
 */
export function createExcludeMatcher(entries: readonly string[]): ExcludeMatcher {
  const patterns = entries.map(splitSegments).filter((segments) => segments.length > 0);

  return (relativePath: string): boolean => {
    const segments = splitSegments(relativePath);
    return patterns.some((pattern) => containsRun(segments, pattern));
  };
}

function containsRun(segments: string[], pattern: string[]): boolean {
  for (let i = 0; i + pattern.length <= segments.length; i++) {
    if (pattern.every((part, j) => segments[i + j] === part)) {
      return true;
    }
  }
  return false;
}
