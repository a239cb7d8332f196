/**
 * treekeep Configuration
 *
 * Manages config.json in the treekeep home directory
 * ($TREEKEEP_HOME, or ~/.treekeep).
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { DB_FILENAME } from './store/database.js';
import { TreekeepConfigSchema, type TreekeepConfig } from './types.js';

/** Environment variable overriding the home directory */
export const TREEKEEP_HOME_ENV = 'TREEKEEP_HOME';

/** Config filename */
export const CONFIG_FILE = 'config.json';

/** Keys accepted by `treekeep config --set` */
export const SETTABLE_KEYS = [
  'database.path',
  'database.busyTimeout',
  'add.overwrite',
  'clone.onConflict',
] as const;

export type SettableKey = (typeof SETTABLE_KEYS)[number];

/**
 * Resolve the treekeep home directory.
 */
export function treekeepHome(): string {
  return process.env[TREEKEEP_HOME_ENV] || join(homedir(), '.treekeep');
}

export function configPath(home: string = treekeepHome()): string {
  return join(home, CONFIG_FILE);
}

/**
 * Default configuration.
 */
export function defaultConfig(): TreekeepConfig {
  return TreekeepConfigSchema.parse({});
}

/**
 * Load and validate config.json. A missing file yields the defaults.
 */
export async function loadConfig(home: string = treekeepHome()): Promise<TreekeepConfig> {
  const path = configPath(home);
  if (!existsSync(path)) {
    return defaultConfig();
  }

  const raw = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = TreekeepConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config in ${path}: ${issues}`);
  }
  return result.data;
}

export async function saveConfig(config: TreekeepConfig, home: string = treekeepHome()): Promise<void> {
  await mkdir(home, { recursive: true });
  await writeFile(configPath(home), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Absolute path of the database file.
 */
export function databasePath(config: TreekeepConfig, home: string = treekeepHome()): string {
  return resolve(home, config.database.path ?? DB_FILENAME);
}

export function isSettableKey(key: string): key is SettableKey {
  return (SETTABLE_KEYS as readonly string[]).includes(key);
}

/**
 * Apply `key=value` to a config, validating the result.
 */
export function applySetting(config: TreekeepConfig, assignment: string): TreekeepConfig {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    throw new Error(`Expected key=value, got "${assignment}"`);
  }
  const key = assignment.slice(0, eq).trim();
  const value = assignment.slice(eq + 1).trim();

  if (!isSettableKey(key)) {
    throw new Error(`Unknown config key "${key}". Settable: ${SETTABLE_KEYS.join(', ')}`);
  }

  const next = {
    ...config,
    database: { ...config.database },
    add: { ...config.add },
    clone: { ...config.clone },
  };
  switch (key) {
    case 'database.path':
      next.database.path = value;
      break;
    case 'database.busyTimeout': {
      const ms = Number(value);
      if (!/^\d+$/.test(value) || !Number.isSafeInteger(ms)) {
        throw new Error(`database.busyTimeout must be a whole number of milliseconds, got "${value}"`);
      }
      next.database.busyTimeout = ms;
      break;
    }
    case 'add.overwrite':
      if (value !== 'true' && value !== 'false') {
        throw new Error(`add.overwrite must be true or false, got "${value}"`);
      }
      next.add.overwrite = value === 'true';
      break;
    case 'clone.onConflict':
      if (value !== 'fail' && value !== 'skip') {
        throw new Error(`clone.onConflict must be fail or skip, got "${value}"`);
      }
      next.clone.onConflict = value;
      break;
  }
  return TreekeepConfigSchema.parse(next);
}
