#!/usr/bin/env node

/**
 * treekeep CLI
 *
 * Keep personal scripts and files beside a working tree.
 *
 * Usage:
 *   treekeep                          List scripts and files of the current tree
 *   treekeep add <name> <script>      Add a script for the current tree
 *   treekeep run <name> [args...]     Run a script (same as trun)
 *   treekeep save <path>              Save a file from the working tree
 *   treekeep restore [path]           Restore a saved file
 *   treekeep clone <tree>             Copy another tree's scripts and files here
 *   treekeep list-trees               List all established trees
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  addCommand,
  updateCommand,
  modCommand,
  removeCommand,
  renameCommand,
  checkoutCommand,
  catCommand,
  saveCommand,
  restoreCommand,
  establishCommand,
  unestablishCommand,
  listTreesCommand,
  cloneCommand,
  listCommand,
  overviewCommand,
  configCommand,
  runCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('treekeep')
  .description('Keep personal scripts and files beside a working tree.')
  .version(version)
  .enablePositionalOptions()
  .action(overviewCommand);

// ─── Scripts ─────────────────────────────────────────────────

program
  .command('add <name> <script>')
  .description('Add a script for the current tree')
  .option('-i, --inline', 'Add an inline script instead of loading from a file')
  .option('-d, --description <text>', 'Description shown in listings')
  .option('-f, --force', 'Replace an existing script even if overwriting is disabled')
  .action(addCommand);

program
  .command('update <name> <script>')
  .description('Update a script with new contents')
  .option('-i, --inline', 'Use an inline script instead of loading from a file')
  .action(updateCommand);

program
  .command('mod <name> [description]')
  .description('Set the description of a script')
  .option('--clear', 'Remove the description')
  .action(modCommand);

program
  .command('remove <name>')
  .alias('rm')
  .description('Remove a script')
  .option('--file', 'Remove a saved file instead')
  .action(removeCommand);

program
  .command('rename <current> <new>')
  .description('Rename a script')
  .option('--file', 'Rename a saved file instead')
  .action(renameCommand);

program
  .command('checkout <name>')
  .description('Check out a copy of a script as a file')
  .action(checkoutCommand);

program
  .command('cat <name>')
  .description('Write a script (or saved file) to standard out')
  .action(catCommand);

program
  .command('run <name> [args...]')
  .description('Run a script of the current tree')
  .passThroughOptions()
  .allowUnknownOption()
  .action((name: string, args: string[]) => runCommand(name, args));

// ─── Files ───────────────────────────────────────────────────

program
  .command('save <path>')
  .description('Save a file from the working tree')
  .option('-d, --description <text>', 'Description shown in listings')
  .action(saveCommand);

program
  .command('restore [path]')
  .description('Restore a saved file to the working tree (lists files without a path)')
  .action((path: string | undefined) => restoreCommand(path));

// ─── Trees ───────────────────────────────────────────────────

program
  .command('establish')
  .description('Establish the current directory as a tree root')
  .action(establishCommand);

program
  .command('unestablish')
  .description('Unestablish the current directory as a tree root')
  .action(unestablishCommand);

program
  .command('list-trees')
  .description('List all the trees kept in the database')
  .option('--json', 'Output as JSON')
  .action(listTreesCommand);

program
  .command('list')
  .alias('ls')
  .description('List scripts and files of the current tree')
  .option('--json', 'Output as JSON')
  .action(listCommand);

program
  .command('clone <tree>')
  .description('Clone all scripts and files from another tree')
  .option('--skip-conflicts', 'Keep existing names instead of failing')
  .action(cloneCommand);

// ─── Config ──────────────────────────────────────────────────

program
  .command('config')
  .description('View/edit treekeep configuration')
  .option('--set <key=value>', 'Set a config value')
  .option('--json', 'Output as JSON')
  .action(configCommand);

// ─── Parse & run ─────────────────────────────────────────────

await program.parseAsync();
