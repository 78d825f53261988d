import { Minimatch } from 'minimatch';

interface CompiledPattern {
  source: string;
  /** Patterns without a slash are tested against single path segments. */
  segmentOnly: boolean;
  matcher: Minimatch;
}

function compile(pattern: string): CompiledPattern | null {
  let normalized = pattern.trim().replace(/\\/g, '/');
  if (normalized.startsWith('./')) normalized = normalized.slice(2);
  if (normalized.startsWith('/')) normalized = normalized.slice(1);
  while (normalized.endsWith('/')) normalized = normalized.slice(0, -1);
  if (!normalized) return null;

  return {
    source: pattern,
    segmentOnly: !normalized.includes('/'),
    matcher: new Minimatch(normalized, { dot: true }),
  };
}

/**
 * Glob-based exclusion set evaluated against relative paths.
 *
 * - `*.log`, `node_modules`: no slash, matches any single path segment.
 * - `build/**`, `docs/private`: matched against the relative path and each
 *   of its ancestor directories, so excluding a directory excludes its
 *   contents.
 */
export class ExclusionMatcher {
  readonly patterns: readonly string[];
  readonly #compiled: CompiledPattern[];

  constructor(patterns: readonly string[] = []) {
    this.patterns = [...patterns];
    this.#compiled = patterns
      .map((pattern) => compile(pattern))
      .filter((entry): entry is CompiledPattern => entry !== null);
  }

  get isEmpty(): boolean {
    return this.#compiled.length === 0;
  }

  /** Whether the path itself matches, without looking at its ancestors. */
  matchesSelf(relativePath: string): boolean {
    if (this.#compiled.length === 0) return false;
    const segments = relativePath.split('/');
    const basename = segments[segments.length - 1] ?? relativePath;
    return this.#compiled.some((pattern) =>
      pattern.segmentOnly ? pattern.matcher.match(basename) : pattern.matcher.match(relativePath),
    );
  }

  /** Whether the path or any ancestor directory is excluded. */
  isExcluded(relativePath: string): boolean {
    if (this.#compiled.length === 0) return false;
    const segments = relativePath.split('/');
    for (let depth = 1; depth <= segments.length; depth++) {
      if (this.matchesSelf(segments.slice(0, depth).join('/'))) {
        return true;
      }
    }
    return false;
  }
}
