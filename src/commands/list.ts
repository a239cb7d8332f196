/**
 * treekeep list — scripts and files of the current tree
 */

import chalk from 'chalk';
import { ASSOCIATION_KINDS, type Association, type AssociationKind } from '../types.js';
import { runKeeperCommand } from './shared.js';

interface ListOptions {
  json?: boolean;
}

interface ListedAssociation {
  name: string;
  description: string | null;
}

const HEADINGS: Record<AssociationKind, { title: string; empty: string }> = {
  script: {
    title: '📜 Scripts (trun <name>)',
    empty: 'No scripts have been added yet. To add one, use `treekeep add`.',
  },
  file: {
    title: '📁 Files (treekeep restore <path>)',
    empty: 'No files have been saved yet. To add one, use `treekeep save`.',
  },
};

export async function listCommand(options: ListOptions): Promise<void> {
  await runKeeperCommand('List failed', async (keeper) => {
    const cwd = process.cwd();
    const scripts = await keeper.list(cwd, 'script');
    const files = await keeper.list(cwd, 'file');

    if (options.json) {
      console.log(JSON.stringify({
        tree: scripts.tree.root,
        scripts: scripts.associations.map(toListed),
        files: files.associations.map(toListed),
      }, null, 2));
      return;
    }

    console.log();
    console.log(chalk.bold(`🌳 ${scripts.tree.root}`));
    console.log();
    printAssociations('script', scripts.associations);
    printAssociations('file', files.associations);
  });
}

/**
 * What `treekeep` prints without a subcommand: the current tree's
 * associations, or the established trees when none governs the directory.
 */
export async function overviewCommand(): Promise<void> {
  await runKeeperCommand('Listing failed', async (keeper) => {
    const cwd = process.cwd();
    const tree = await keeper.findTree(cwd);

    console.log();
    if (!tree) {
      const trees = await keeper.listTrees();
      if (trees.length === 0) {
        console.log(chalk.dim('  Looks like no trees have been added yet.'));
        console.log(chalk.dim('  Find a tree you\'d like to add and type `treekeep establish`.'));
      } else {
        console.log(chalk.bold('🌳 The following trees are available:'));
        for (const t of trees) {
          console.log(`  ${chalk.cyan(t.root)}`);
        }
      }
    } else {
      console.log(chalk.bold(`🌳 ${tree.root}`));
      console.log();
      for (const kind of ASSOCIATION_KINDS) {
        const { associations } = await keeper.list(cwd, kind);
        printAssociations(kind, associations);
      }
    }
    console.log(chalk.dim('Type treekeep --help for help.'));
    console.log();
  });
}

type LogFn = (message?: string) => void;

/**
 * Print one kind of association as a heading and an aligned name column.
 * `log` defaults to stdout; the runner passes stderr.
 */
export function printAssociations(
  kind: AssociationKind,
  associations: readonly Association[],
  log: LogFn = console.log,
): void {
  const heading = HEADINGS[kind];
  if (associations.length === 0) {
    log(chalk.dim(`  ${heading.empty}`));
    log();
    return;
  }

  log(chalk.bold(heading.title));
  const nameWidth = Math.max(4, ...associations.map((a) => a.name.length));
  for (const association of associations) {
    const description = association.description
      ? `  ${chalk.dim('-')} ${association.description}`
      : '';
    log(`  ${chalk.cyan(association.name.padEnd(nameWidth))}${description}`);
  }
  log();
}

function toListed(association: Association): ListedAssociation {
  return { name: association.name, description: association.description };
}
