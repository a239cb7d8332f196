/**
 * treekeep — library entry point
 */

export { Keeper } from './keeper.js';
export type {
  KeeperOptions,
  AddOptions,
  AddResult,
  SaveResult,
  AssociationLookup,
  TreeListing,
  CloneOutcome,
} from './keeper.js';
export * from './store/index.js';
export * from './errors.js';
export * from './types.js';
export {
  loadConfig,
  saveConfig,
  defaultConfig,
  databasePath,
  treekeepHome,
  applySetting,
} from './config.js';
export { runScript, stageScript, TREE_ROOT_ENV } from './run.js';
export type { StagedScript } from './run.js';
