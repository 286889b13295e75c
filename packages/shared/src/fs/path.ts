import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, which is the form snakify reports
 * and journals paths in regardless of platform.
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
