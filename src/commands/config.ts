/**
 * treekeep config — View/edit configuration
 */

import chalk from 'chalk';
import { applySetting, configPath, databasePath, loadConfig, saveConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { TreekeepConfig } from '../types.js';

interface ConfigOptions {
  set?: string;
  json?: boolean;
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  let config: TreekeepConfig;
  try {
    config = await loadConfig();
    if (options.set) {
      config = applySetting(config, options.set);
      await saveConfig(config);
    }
  } catch (err) {
    console.error(chalk.red('✗ Config failed'));
    console.error(chalk.red(`  ${errorMessage(err)}`));
    process.exit(1);
  }

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  console.log();
  if (options.set) {
    console.log(chalk.green(`✓ Set ${options.set}`));
    console.log();
  }

  console.log(chalk.bold('⚙️  treekeep Configuration'));
  console.log(chalk.dim(`   ${configPath()}`));
  console.log();
  console.log(`  ${chalk.dim('Version:')}           ${config.version}`);
  console.log(`  ${chalk.dim('Database:')}          ${databasePath(config)}`);
  console.log(`  ${chalk.dim('Lock wait:')}         ${config.database.busyTimeout} ms`);
  console.log(`  ${chalk.dim('Overwrite on add:')}  ${config.add.overwrite ? chalk.green('yes') : chalk.yellow('no')}`);
  console.log(`  ${chalk.dim('Clone conflicts:')}   ${config.clone.onConflict}`);
  console.log();
}
