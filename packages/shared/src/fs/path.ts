import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, which is the standard for mender.
 * Issue maps are keyed by these paths on every platform.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Converts a detector-reported path into a repository-relative POSIX path.
 * Absolute paths are made relative to `repoRoot`; a leading `./` is dropped.
 */
export function toRepoRelative(repoRoot: string, p: string): string {
  const rel = path.isAbsolute(p) ? relative(repoRoot, p) : normalizePath(p);
  return rel.startsWith('./') ? rel.slice(2) : rel;
}

/**
 * Returns the extension of a path without its leading dot, or `txt` when there is none.
 * Used as the language tag of fenced code blocks.
 */
export function fenceLanguage(p: string): string {
  const ext = path.extname(p).replace(/^\./, '');
  return ext || 'txt';
}
