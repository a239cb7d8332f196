#!/usr/bin/env node

/**
 * trun — run a script kept for the current tree
 *
 * Usage:
 *   trun                 List the scripts of the current tree
 *   trun <name> [args]   Run a script; everything after the name is passed on
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { runCommand } from './commands/run.js';

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('trun')
  .description('Run a script kept for the current tree')
  .version(version)
  .argument('[name]', 'Name of the script')
  .argument('[args...]', 'Arguments passed to the script')
  .passThroughOptions()
  .allowUnknownOption()
  .action((name: string | undefined, args: string[]) => runCommand(name, args));

await program.parseAsync();
