/**
 * treekeep establish / unestablish / list-trees / clone
 */

import chalk from 'chalk';
import ora from 'ora';
import { canonicalizePath } from '../store/index.js';
import { describeTree, runKeeperCommand } from './shared.js';

interface ListTreesOptions {
  json?: boolean;
}

interface CloneOptions {
  skipConflicts?: boolean;
}

export async function establishCommand(): Promise<void> {
  await runKeeperCommand('Failed to establish tree root', async (keeper) => {
    const tree = await keeper.establish(process.cwd());
    console.log(chalk.green(`✓ Established ${describeTree(tree)}`));
  });
}

export async function unestablishCommand(): Promise<void> {
  await runKeeperCommand('Failed to unestablish current directory', async (keeper) => {
    const cwd = await canonicalizePath(process.cwd());
    const tree = await keeper.requireTree(cwd);

    // Only the root itself may be unestablished
    if (tree.root !== cwd) {
      console.log(chalk.yellow('The current directory is not the root.'));
      console.log(chalk.dim(`Go to ${tree.root}`));
      console.log(chalk.dim('Then run this command again if you really want to unestablish.'));
      return;
    }

    const removed = await keeper.unestablish(cwd);
    console.log(chalk.green(`✓ Unestablished ${describeTree(removed)}`));
  });
}

export async function listTreesCommand(options: ListTreesOptions): Promise<void> {
  await runKeeperCommand('Failed to list trees', async (keeper) => {
    const trees = await keeper.listTrees();

    if (options.json) {
      console.log(JSON.stringify(trees.map((tree) => tree.root), null, 2));
      return;
    }

    console.log();
    if (trees.length === 0) {
      console.log(chalk.dim('  Looks like no trees have been added yet.'));
      console.log(chalk.dim('  Find a tree you\'d like to add and type `treekeep establish`.'));
      console.log();
      return;
    }

    console.log(chalk.bold('🌳 Trees'));
    for (const tree of trees) {
      console.log(`  ${chalk.cyan(tree.root)}`);
    }
    console.log();
    console.log(chalk.dim(`  ${trees.length} tree${trees.length !== 1 ? 's' : ''}`));
    console.log();
  });
}

/**
 * Copy all scripts and files of the tree at `source` into the current tree.
 */
export async function cloneCommand(source: string, options: CloneOptions): Promise<void> {
  await runKeeperCommand('Clone failed', async (keeper) => {
    const spinner = ora(`Cloning associations from ${source}...`).start();
    const outcome = await keeper
      .clone(source, process.cwd(), options.skipConflicts ? 'skip' : undefined)
      .catch((err: unknown) => {
        spinner.fail('Clone aborted');
        throw err;
      });

    const { copied, skipped } = outcome.result;
    spinner.succeed(`Cloned ${copied.script} script(s) and ${copied.file} file(s)`);
    console.log(`  ${chalk.dim('From:')} ${describeTree(outcome.source)}`);
    console.log(`  ${chalk.dim('To:')}   ${describeTree(outcome.destination)}`);
    if (outcome.destinationCreated) {
      console.log(chalk.dim(`  Established ${outcome.destination.root}`));
    }
    if (skipped.length > 0) {
      console.log(chalk.yellow(`  Skipped ${skipped.length} existing name(s):`));
      for (const ref of skipped) {
        console.log(`    • ${ref.kind} ${chalk.cyan(ref.name)}`);
      }
    }
    console.log();
  });
}
