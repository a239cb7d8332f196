/**
 * Path canonicalization for tree roots and working directories.
 */

import { realpath } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { PathError } from '../errors.js';

/**
 * Absolute, normalized form of `path` with symlinks resolved. When `path`
 * does not exist, its deepest existing ancestor is resolved and the missing
 * components are appended, so two spellings of one location map to the
 * same string either way.
 */
export async function canonicalizePath(path: string, base: string = process.cwd()): Promise<string> {
  const missing: string[] = [];
  let current = resolve(base, path);
  for (;;) {
    try {
      return join(await realpath(current), ...missing.reverse());
    } catch (err) {
      const parent = dirname(current);
      if (!isMissingPathError(err) || parent === current) {
        throw err;
      }
      missing.push(basename(current));
      current = parent;
    }
  }
}

/**
 * `dir` followed by each of its parents, ending at the filesystem root.
 */
export function ancestorsOf(dir: string): string[] {
  const chain: string[] = [];
  let current = dir;
  for (;;) {
    chain.push(current);
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return chain;
}

/**
 * True when `dir` is `root` or lies below it. Compares whole path
 * components, so `/a/bc` is not within `/a/b`.
 */
export function isWithin(root: string, dir: string): boolean {
  if (dir === root) return true;
  const prefix = root.endsWith(sep) ? root : `${root}${sep}`;
  return dir.startsWith(prefix);
}

function isMissingPathError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Name under which a file below `root` is stored: its path relative to the
 * root, with `/` separators. Throws PathError when `path` is outside the root.
 */
export function treeRelativeName(root: string, path: string): string {
  const rel = relative(root, path);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
    throw new PathError(`${path} is not a file inside the tree at ${root}`, path);
  }
  return rel.split(sep).join('/');
}
