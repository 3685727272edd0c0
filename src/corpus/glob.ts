import { minimatch } from "minimatch";

const RECURSIVE_PREFIX = "**/";

/**
 * Expand the first `{a,b,c}` group of a pattern into one pattern per
 * alternative. Only a single, non-nested group is expanded; a `{` without a
 * later `}` leaves the pattern literal.
 */
export function expandBraces(pattern: string): string[] {
  const open = pattern.indexOf("{");
  if (open === -1) return [pattern];
  const close = pattern.indexOf("}", open + 1);
  if (close === -1) return [pattern];

  const prefix = pattern.slice(0, open);
  const suffix = pattern.slice(close + 1);
  return pattern
    .slice(open + 1, close)
    .split(",")
    .map((alternative) => prefix + alternative + suffix);
}

/**
 * Expand a glob into the ordered set of concrete patterns it stands for.
 * Every expansion starting with `**\/` is followed by a copy without that
 * prefix, so "anywhere" patterns also reach top-level files.
 */
export function expandGlobPattern(pattern: string): string[] {
  const out: string[] = [];
  for (const expanded of expandBraces(pattern)) {
    out.push(expanded);
    if (expanded.startsWith(RECURSIVE_PREFIX)) {
      out.push(expanded.slice(RECURSIVE_PREFIX.length));
    }
  }
  return out;
}

/**
 * Check whether a forward-slash relative path matches a glob pattern.
 * `*` stays within one segment, `**` crosses segments, matching is
 * case-sensitive and includes dotfiles. An empty pattern matches nothing.
 */
export function matchesGlob(candidate: string, pattern: string): boolean {
  if (pattern.length === 0) return false;
  return expandGlobPattern(pattern).some((concrete) =>
    minimatch(candidate, concrete, { dot: true, nobrace: true }),
  );
}

/**
 * Check if a path matches any of the given glob patterns.
 */
export function pathMatchesAny(candidate: string, patterns: string[]): boolean {
  return patterns.some((pattern) => matchesGlob(candidate, pattern));
}

/**
 * Filter used by the list and scan operations: an absent or empty pattern
 * selects everything.
 */
export function selectsPath(candidate: string, pattern: string | undefined): boolean {
  if (!pattern) return true;
  return matchesGlob(candidate, pattern);
}
