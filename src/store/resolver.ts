/**
 * Maps a working directory to the registered tree that governs it.
 */

import type { Transaction } from '@libsql/client';
import type { TreeRecord } from '../types.js';
import { ancestorsOf, isWithin } from './paths.js';
import type { TreeRegistry } from './trees.js';

/**
 * Pick the tree whose root is `dir` or its deepest registered ancestor.
 * With roots `/a` and `/a/b`, `/a/b/c` resolves to `/a/b`.
 */
export function selectGoverningTree<T extends { root: string }>(
  dir: string,
  trees: readonly T[],
): T | undefined {
  let best: T | undefined;
  for (const tree of trees) {
    if (!isWithin(tree.root, dir)) continue;
    if (!best || tree.root.length > best.root.length) {
      best = tree;
    }
  }
  return best;
}

export class TreeResolver {
  private readonly registry: TreeRegistry;

  constructor(registry: TreeRegistry) {
    this.registry = registry;
  }

  /**
   * `dir` must already be canonical. Read-only.
   */
  async resolve(tx: Transaction, dir: string): Promise<TreeRecord | undefined> {
    const candidates = await this.registry.findByRoots(tx, ancestorsOf(dir));
    return selectGoverningTree(dir, candidates);
  }
}
