/**
 * treekeep add / update / mod / remove / rename / checkout / cat
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import type { AssociationKind } from '../types.js';
import { describeTree, readScriptSource, runKeeperCommand } from './shared.js';

interface AddOptions {
  inline?: boolean;
  description?: string;
  force?: boolean;
}

interface UpdateOptions {
  inline?: boolean;
}

interface ModOptions {
  clear?: boolean;
}

interface KindOptions {
  file?: boolean;
}

export async function addCommand(name: string, script: string, options: AddOptions): Promise<void> {
  await runKeeperCommand('Failed to add script', async (keeper) => {
    const body = await readScriptSource(script, options.inline);
    const result = await keeper.add('script', process.cwd(), name, body, {
      description: options.description,
      overwrite: options.force ? true : undefined,
    });

    if (result.treeCreated) {
      console.log(chalk.dim(`  Established ${result.tree.root}`));
    }
    const verb = result.replaced ? 'Replaced' : 'Added';
    console.log(chalk.green(`✓ ${verb} script ${chalk.cyan(name)} for ${describeTree(result.tree)}`));
  });
}

export async function updateCommand(name: string, script: string, options: UpdateOptions): Promise<void> {
  await runKeeperCommand('Update failed', async (keeper) => {
    const body = await readScriptSource(script, options.inline);
    const tree = await keeper.update('script', process.cwd(), name, body);
    console.log(chalk.green(`✓ Updated script ${chalk.cyan(name)} for ${describeTree(tree)}`));
  });
}

export async function modCommand(name: string, description: string | undefined, options: ModOptions): Promise<void> {
  await runKeeperCommand('Mod command failed', async (keeper) => {
    if (options.clear) {
      await keeper.describe('script', process.cwd(), name, null);
      console.log(`${chalk.cyan(name)} ${chalk.dim('=> (no description)')}`);
      return;
    }
    if (description === undefined) {
      console.log(chalk.yellow('No modification option given, did nothing.'));
      return;
    }
    await keeper.describe('script', process.cwd(), name, description);
    console.log(`${chalk.cyan(name)} => ${description}`);
  });
}

export async function removeCommand(name: string, options: KindOptions): Promise<void> {
  const kind = kindOf(options);
  await runKeeperCommand(`Failed to remove ${kind}`, async (keeper) => {
    if (await keeper.remove(kind, process.cwd(), name)) {
      console.log(chalk.green(`✓ Removed ${kind} '${name}'`));
    } else {
      console.log(chalk.yellow(`Didn't remove anything. '${name}' probably doesn't exist.`));
    }
  });
}

export async function renameCommand(current: string, next: string, options: KindOptions): Promise<void> {
  const kind = kindOf(options);
  await runKeeperCommand(`Failed to rename ${kind}`, async (keeper) => {
    await keeper.rename(kind, process.cwd(), current, next);
    console.log(chalk.green(`✓ Renamed ${kind} '${current}' to '${next}'`));
  });
}

/**
 * Write a copy of a script into the current directory.
 */
export async function checkoutCommand(name: string): Promise<void> {
  await runKeeperCommand('Checkout failed', async (keeper) => {
    const { body } = await keeper.lookup('script', process.cwd(), name);
    const target = resolve(process.cwd(), name);
    await writeFile(target, body);
    console.log(chalk.green(`✓ Checked out ${chalk.cyan(name)} to ${target}`));
  });
}

export async function catCommand(name: string): Promise<void> {
  await runKeeperCommand('Cat failed', async (keeper) => {
    const { body } = await keeper.cat(process.cwd(), name);
    process.stdout.write(body);
  });
}

function kindOf(options: KindOptions): AssociationKind {
  return options.file ? 'file' : 'script';
}
