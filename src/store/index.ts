/**
 * Store module re-exports
 */

export { KeepDatabase, DB_FILENAME, toStorageError } from './database.js';
export type { KeepDatabaseOptions } from './database.js';
export { BlobStore } from './blobs.js';
export { TreeRegistry } from './trees.js';
export { AssociationTable } from './associations.js';
export type { AssociationInput, CopyOptions } from './associations.js';
export { TreeResolver, selectGoverningTree } from './resolver.js';
export { TreeCloner } from './cloner.js';
export { canonicalizePath, ancestorsOf, isWithin, treeRelativeName } from './paths.js';
