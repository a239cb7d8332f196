/**
 * Keeper
 *
 * The operations the CLI consumes: add, run lookup, list and clone, plus
 * tree and association maintenance. Every operation canonicalizes its
 * directories first and then runs in exactly one transaction.
 */

import type { Transaction } from '@libsql/client';
import { ConflictError, NotFoundError, StorageError } from './errors.js';
import {
  AssociationTable,
  BlobStore,
  KeepDatabase,
  TreeCloner,
  TreeRegistry,
  TreeResolver,
  canonicalizePath,
  treeRelativeName,
} from './store/index.js';
import {
  ASSOCIATION_KINDS,
  type Association,
  type AssociationKind,
  type CloneResult,
  type ConflictPolicy,
  type TreeRecord,
} from './types.js';

export interface KeeperOptions {
  /** Default for `add` when a name already exists (default: true) */
  overwrite?: boolean;
  /** Default clone conflict policy (default: 'fail') */
  onConflict?: ConflictPolicy;
}

export interface AddOptions {
  description?: string;
  overwrite?: boolean;
}

export interface AddResult {
  tree: TreeRecord;
  /** The tree was registered by this add */
  treeCreated: boolean;
  /** An existing association of the same name was replaced */
  replaced: boolean;
}

export interface SaveResult extends AddResult {
  /** Name the file is stored under, relative to the tree root */
  name: string;
}

export interface AssociationLookup {
  tree: TreeRecord;
  association: Association;
  body: Buffer;
}

export interface TreeListing {
  tree: TreeRecord;
  associations: Association[];
}

export interface CloneOutcome {
  source: TreeRecord;
  destination: TreeRecord;
  destinationCreated: boolean;
  result: CloneResult;
}

export class Keeper {
  private readonly db: KeepDatabase;
  private readonly overwrite: boolean;
  private readonly onConflict: ConflictPolicy;
  private readonly blobs = new BlobStore();
  private readonly trees = new TreeRegistry();
  private readonly resolver = new TreeResolver(this.trees);
  private readonly tables: Record<AssociationKind, AssociationTable> = {
    script: new AssociationTable('script'),
    file: new AssociationTable('file'),
  };
  private readonly cloner = new TreeCloner([this.tables.script, this.tables.file]);

  constructor(db: KeepDatabase, options: KeeperOptions = {}) {
    this.db = db;
    this.overwrite = options.overwrite ?? true;
    this.onConflict = options.onConflict ?? 'fail';
  }

  // ─── Trees ─────────────────────────────────────────────────

  /**
   * The tree governing `dir`, if any.
   */
  async findTree(dir: string): Promise<TreeRecord | undefined> {
    const canonical = await canonicalizePath(dir);
    return this.db.read((tx) => this.resolver.resolve(tx, canonical));
  }

  async requireTree(dir: string): Promise<TreeRecord> {
    const canonical = await canonicalizePath(dir);
    return this.db.read((tx) => this.governing(tx, canonical));
  }

  /**
   * Register `dir` itself as a tree root.
   */
  async establish(dir: string): Promise<TreeRecord> {
    const canonical = await canonicalizePath(dir);
    return this.db.write((tx) => this.trees.create(tx, canonical));
  }

  /**
   * Remove the tree rooted exactly at `dir`, with all its associations.
   */
  async unestablish(dir: string): Promise<TreeRecord> {
    const canonical = await canonicalizePath(dir);
    return this.db.write(async (tx) => {
      const tree = await this.trees.lookup(tx, canonical);
      if (!tree) {
        throw new NotFoundError('tree', canonical);
      }
      for (const table of Object.values(this.tables)) {
        await table.removeAll(tx, tree.id);
      }
      await this.trees.remove(tx, tree.id);
      return tree;
    });
  }

  async listTrees(): Promise<TreeRecord[]> {
    return this.db.read((tx) => this.trees.list(tx));
  }

  // ─── Associations ──────────────────────────────────────────

  /**
   * Associate `body` with the tree governing `dir` under `name`. When no
   * tree governs `dir`, `dir` is registered as a new root.
   */
  async add(
    kind: AssociationKind,
    dir: string,
    name: string,
    body: Uint8Array,
    options: AddOptions = {},
  ): Promise<AddResult> {
    const canonical = await canonicalizePath(dir);
    return this.db.write(async (tx) => {
      const governing = await this.resolver.resolve(tx, canonical);
      const tree = governing ?? (await this.trees.resolveOrCreate(tx, canonical));
      const replaced = await this.store(tx, kind, tree, name, body, options);
      return { tree, treeCreated: !governing, replaced };
    });
  }

  /**
   * Save the file at `path` for the tree governing `dir`, named by its path
   * relative to that tree's root. Without a governing tree, `dir` becomes
   * the root. Naming and storing happen in one transaction.
   */
  async saveFile(dir: string, path: string, body: Uint8Array, options: AddOptions = {}): Promise<SaveResult> {
    const canonical = await canonicalizePath(dir);
    const file = await canonicalizePath(path, canonical);
    return this.db.write(async (tx) => {
      const governing = await this.resolver.resolve(tx, canonical);
      const tree = governing ?? (await this.trees.resolveOrCreate(tx, canonical));
      const name = treeRelativeName(tree.root, file);
      const replaced = await this.store(tx, 'file', tree, name, body, options);
      return { tree, treeCreated: !governing, replaced, name };
    });
  }

  /**
   * Replace the body of an existing association, keeping its description.
   */
  async update(kind: AssociationKind, dir: string, name: string, body: Uint8Array): Promise<TreeRecord> {
    const canonical = await canonicalizePath(dir);
    const table = this.tables[kind];
    return this.db.write(async (tx) => {
      const tree = await this.governing(tx, canonical);
      if (!(await table.get(tx, tree.id, name))) {
        throw new NotFoundError(kind, tree.root, name);
      }
      const blobId = await this.blobs.store(tx, body);
      await table.upsert(tx, { treeId: tree.id, name, blobId });
      return tree;
    });
  }

  async lookup(kind: AssociationKind, dir: string, name: string): Promise<AssociationLookup> {
    const canonical = await canonicalizePath(dir);
    return this.db.read((tx) => this.lookupIn(tx, kind, canonical, name));
  }

  /**
   * The script `name` of the tree governing `dir`, with its body.
   */
  async runLookup(dir: string, name: string): Promise<AssociationLookup> {
    return this.lookup('script', dir, name);
  }

  /**
   * Look `name` up among scripts first, then files.
   */
  async cat(dir: string, name: string): Promise<AssociationLookup> {
    const canonical = await canonicalizePath(dir);
    return this.db.read(async (tx) => {
      const tree = await this.governing(tx, canonical);
      for (const kind of ASSOCIATION_KINDS) {
        const found = await this.bodyOf(tx, tree, kind, name);
        if (found) return found;
      }
      throw new NotFoundError('entry', tree.root, name);
    });
  }

  async list(dir: string, kind: AssociationKind): Promise<TreeListing> {
    const canonical = await canonicalizePath(dir);
    return this.db.read(async (tx) => {
      const tree = await this.governing(tx, canonical);
      const associations = await this.tables[kind].list(tx, tree.id);
      return { tree, associations };
    });
  }

  /**
   * Remove an association. Returns false when there was nothing to remove.
   */
  async remove(kind: AssociationKind, dir: string, name: string): Promise<boolean> {
    const canonical = await canonicalizePath(dir);
    return this.db.write(async (tx) => {
      const tree = await this.governing(tx, canonical);
      return this.tables[kind].remove(tx, tree.id, name);
    });
  }

  async describe(kind: AssociationKind, dir: string, name: string, description: string | null): Promise<void> {
    const canonical = await canonicalizePath(dir);
    await this.db.write(async (tx) => {
      const tree = await this.governing(tx, canonical);
      if (!(await this.tables[kind].describe(tx, tree.id, name, description))) {
        throw new NotFoundError(kind, tree.root, name);
      }
    });
  }

  async rename(kind: AssociationKind, dir: string, from: string, to: string): Promise<void> {
    const canonical = await canonicalizePath(dir);
    await this.db.write(async (tx) => {
      const tree = await this.governing(tx, canonical);
      if (!(await this.tables[kind].rename(tx, tree.id, from, to))) {
        throw new NotFoundError(kind, tree.root, from);
      }
    });
  }

  // ─── Clone ─────────────────────────────────────────────────

  /**
   * Copy the associations of the tree governing `srcDir` into the tree
   * governing `dstDir`, registering `dstDir` when nothing governs it.
   */
  async clone(srcDir: string, dstDir: string, policy: ConflictPolicy = this.onConflict): Promise<CloneOutcome> {
    const src = await canonicalizePath(srcDir);
    const dst = await canonicalizePath(dstDir);

    return this.db.write(async (tx) => {
      const source = await this.governing(tx, src);
      const governing = await this.resolver.resolve(tx, dst);
      const destination = governing ?? (await this.trees.resolveOrCreate(tx, dst));
      const result = await this.cloner.cloneAssociations(tx, source.id, destination.id, policy);
      return { source, destination, destinationCreated: !governing, result };
    });
  }

  // ─── Internals ─────────────────────────────────────────────

  /** Store the blob and associate it. Returns whether a row was replaced. */
  private async store(
    tx: Transaction,
    kind: AssociationKind,
    tree: TreeRecord,
    name: string,
    body: Uint8Array,
    options: AddOptions,
  ): Promise<boolean> {
    const table = this.tables[kind];
    const blobId = await this.blobs.store(tx, body);
    const input = { treeId: tree.id, name, blobId, description: options.description };

    const existing = await table.get(tx, tree.id, name);
    if (options.overwrite ?? this.overwrite) {
      await table.upsert(tx, input);
    } else if (!(await table.insert(tx, input))) {
      throw new ConflictError(`A ${kind} named '${name}' already exists for ${tree.root}`, [{ kind, name }]);
    }
    return existing !== undefined;
  }

  private async governing(tx: Transaction, dir: string): Promise<TreeRecord> {
    const tree = await this.resolver.resolve(tx, dir);
    if (!tree) {
      throw new NotFoundError('tree', dir);
    }
    return tree;
  }

  private async lookupIn(
    tx: Transaction,
    kind: AssociationKind,
    dir: string,
    name: string,
  ): Promise<AssociationLookup> {
    const tree = await this.governing(tx, dir);
    const found = await this.bodyOf(tx, tree, kind, name);
    if (!found) {
      throw new NotFoundError(kind, tree.root, name);
    }
    return found;
  }

  private async bodyOf(
    tx: Transaction,
    tree: TreeRecord,
    kind: AssociationKind,
    name: string,
  ): Promise<AssociationLookup | undefined> {
    const association = await this.tables[kind].get(tx, tree.id, name);
    if (!association) {
      return undefined;
    }
    const body = await this.blobs.read(tx, association.blobId);
    if (!body) {
      throw new StorageError(`Blob ${association.blobId} referenced by ${kind} '${name}' is missing`);
    }
    return { tree, association, body };
  }
}
