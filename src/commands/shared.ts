/**
 * Helpers shared by the treekeep commands
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { databasePath, loadConfig } from '../config.js';
import { NotFoundError, StorageError, errorMessage } from '../errors.js';
import { Keeper } from '../keeper.js';
import { KeepDatabase } from '../store/index.js';
import type { TreeRecord } from '../types.js';

/**
 * Open the configured database, hand a Keeper to `fn`, and close the
 * database afterwards.
 */
export async function withKeeper<T>(fn: (keeper: Keeper) => Promise<T>): Promise<T> {
  const config = await loadConfig();
  const db = await KeepDatabase.open(databasePath(config), {
    busyTimeout: config.database.busyTimeout,
  });
  try {
    return await fn(new Keeper(db, {
      overwrite: config.add.overwrite,
      onConflict: config.clone.onConflict,
    }));
  } finally {
    db.close();
  }
}

/**
 * Run a command body; on failure print what went wrong and exit with 1.
 */
export async function runKeeperCommand<T>(action: string, fn: (keeper: Keeper) => Promise<T>): Promise<T> {
  try {
    return await withKeeper(fn);
  } catch (err) {
    console.error(chalk.red(`✗ ${action}`));
    console.error(chalk.red(`  ${errorMessage(err)}`));
    if (err instanceof NotFoundError && err.subject === 'tree') {
      console.error(chalk.dim('  To establish one, run `treekeep establish` in the tree root.'));
      await printEstablishedTrees();
    } else if (err instanceof StorageError && err.retryable) {
      console.error(chalk.dim('  The database is busy. Try again in a moment.'));
    }
    console.error();
    process.exit(1);
  }
}

export async function printEstablishedTrees(): Promise<void> {
  const trees = await withKeeper((keeper) => keeper.listTrees());
  if (trees.length === 0) {
    return;
  }
  console.error();
  console.error(chalk.dim('  The following trees are established:'));
  for (const tree of trees) {
    console.error(`    ${chalk.cyan(tree.root)}`);
  }
}

/**
 * A script argument is a path to read, or with --inline the script text.
 */
export async function readScriptSource(script: string, inline?: boolean): Promise<Buffer> {
  if (inline) {
    return Buffer.from(script, 'utf-8');
  }
  return readFile(resolve(process.cwd(), script));
}

export function describeTree(tree: TreeRecord): string {
  return chalk.cyan(tree.root);
}
