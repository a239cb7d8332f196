/**
 * trun / treekeep run — run a script of the current tree
 */

import chalk from 'chalk';
import { NotFoundError, errorMessage } from '../errors.js';
import { runScript } from '../run.js';
import { printAssociations } from './list.js';
import { runKeeperCommand } from './shared.js';

/**
 * Look the script up, then run it with the database already closed.
 * Exits with the script's exit code, or 1 when there is nothing to run.
 */
export async function runCommand(name: string | undefined, args: string[] = []): Promise<void> {
  const script = await runKeeperCommand('Failed to run script', async (keeper) => {
    const cwd = process.cwd();

    if (name === undefined) {
      const { associations } = await keeper.list(cwd, 'script');
      printAssociations('script', associations, console.error);
      console.error(chalk.dim('For more options, try treekeep'));
      return undefined;
    }

    try {
      const found = await keeper.runLookup(cwd, name);
      return { body: found.body, root: found.tree.root };
    } catch (err) {
      if (!(err instanceof NotFoundError) || err.subject !== 'script') {
        throw err;
      }
      console.error(chalk.red(`✗ No script named '${name}' for the current tree.`));
      console.error();
      const { associations } = await keeper.list(cwd, 'script');
      printAssociations('script', associations, console.error);
      console.error(chalk.dim('For more options, try treekeep'));
      return undefined;
    }
  });

  if (!script) {
    process.exit(1);
  }

  try {
    const code = await runScript(script.body, args, script.root);
    process.exit(code);
  } catch (err) {
    console.error(chalk.red(`✗ Failed to run script '${name ?? ''}'`));
    console.error(chalk.red(`  ${errorMessage(err)}`));
    process.exit(1);
  }
}
