/**
 * treekeep save / restore — keep loose files of a working tree
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import chalk from 'chalk';
import { canonicalizePath, treeRelativeName } from '../store/index.js';
import { printAssociations } from './list.js';
import { describeTree, runKeeperCommand } from './shared.js';

interface SaveOptions {
  description?: string;
}

export async function saveCommand(path: string, options: SaveOptions): Promise<void> {
  await runKeeperCommand('File save failed', async (keeper) => {
    const cwd = process.cwd();
    const body = await readFile(resolve(cwd, path));

    // A file saved outside any tree makes the current directory the root
    const result = await keeper.saveFile(cwd, path, body, { description: options.description });
    if (result.treeCreated) {
      console.log(chalk.dim(`  Established ${result.tree.root}`));
    }
    console.log(chalk.green(`✓ Saved ${chalk.cyan(result.name)} for ${describeTree(result.tree)}`));
  });
}

export async function restoreCommand(path: string | undefined): Promise<void> {
  await runKeeperCommand('File restore failed', async (keeper) => {
    const cwd = process.cwd();

    if (path === undefined) {
      const { associations } = await keeper.list(cwd, 'file');
      printAssociations('file', associations);
      return;
    }

    const tree = await keeper.requireTree(cwd);
    const name = treeRelativeName(tree.root, await canonicalizePath(path, cwd));
    const { body } = await keeper.lookup('file', cwd, name);

    const target = join(tree.root, ...name.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, body);
    console.log(chalk.green(`✓ Restored ${chalk.cyan(name)} to ${target}`));
  });
}
