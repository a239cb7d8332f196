/**
 * Command re-exports
 */

export {
  addCommand,
  updateCommand,
  modCommand,
  removeCommand,
  renameCommand,
  checkoutCommand,
  catCommand,
} from './scripts.js';
export { saveCommand, restoreCommand } from './files.js';
export { establishCommand, unestablishCommand, listTreesCommand, cloneCommand } from './trees.js';
export { listCommand, overviewCommand } from './list.js';
export { configCommand } from './config.js';
export { runCommand } from './run.js';
