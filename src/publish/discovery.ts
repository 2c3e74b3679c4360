/**
 * Filesystem discovery helpers.
 *
 * Patterns are single-segment shell globs where `*` matches any run of
 * characters except `/`. As in a shell, `*` skips dotfiles unless the pattern
 * itself starts with a dot. Results are sorted so runs are reproducible.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AmbiguousMatchError, NotFoundError, hasErrorCode } from './errors.js';

export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^/]*');
  return new RegExp(`^${escaped}$`);
}

async function readDirSafe(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) {
      return [];
    }
    throw err;
  }
}

/**
 * Entries of `dir` whose names match `pattern`, as absolute paths.
 */
export async function listMatches(dir: string, pattern: string): Promise<string[]> {
  const re = globToRegExp(pattern);
  const names = await readDirSafe(dir);
  const includeHidden = pattern.startsWith('.');
  return names
    .filter((name) => (includeHidden || !name.startsWith('.')) && re.test(name))
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * Matches of `<dir>/*\/<pattern>`: one level of arbitrary directories, then the pattern.
 */
export async function listNestedMatches(dir: string, pattern: string): Promise<string[]> {
  const results: string[] = [];
  for (const parent of await listMatches(dir, '*')) {
    results.push(...(await listMatches(parent, pattern)));
  }
  return results.sort();
}

/**
 * Every entry of `dir`; at least one must exist.
 */
export async function listRequired(dir: string): Promise<string[]> {
  const matches = await listMatches(dir, '*');
  if (matches.length === 0) {
    throw new NotFoundError(path.join(dir, '*'));
  }
  return matches;
}

/**
 * Exactly one match, or a DiscoveryError telling "none" and "too many" apart.
 */
export function expectOne(matches: string[], pattern: string, what?: string): string {
  const [first, ...rest] = matches;
  if (first === undefined) {
    throw new NotFoundError(pattern, what);
  }
  if (rest.length > 0) {
    throw new AmbiguousMatchError(pattern, matches);
  }
  return first;
}

/**
 * Regular files below `dir` (recursively) whose names end with `suffix`.
 */
export async function findFilesRecursive(dir: string, suffix: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const results: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      results.push(...(await findFilesRecursive(full, suffix)));
    } else if (entry.isFile() && entry.name.endsWith(suffix)) {
      results.push(full);
    }
  }
  return results.sort();
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR', 'ELOOP')) return false;
    throw err;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) return false;
    throw err;
  }
}
