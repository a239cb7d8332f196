/**
 * Association tables: (tree, name) -> blob, one table per kind.
 *
 * Names are unique per tree within a kind. Scripts and files share the
 * same shape and live in `tree_scripts` and `tree_files`.
 */

import type { Row, Transaction } from '@libsql/client';
import { ConflictError } from '../errors.js';
import type { Association, AssociationKind, BlobId, TreeId } from '../types.js';
import { readInteger, readOptionalText, readText } from './database.js';

const TABLES: Record<AssociationKind, string> = {
  script: 'tree_scripts',
  file: 'tree_files',
};

export interface AssociationInput {
  treeId: TreeId;
  name: string;
  blobId: BlobId;
  /** `undefined` keeps the stored description, `null` clears it */
  description?: string | null;
}

export interface CopyOptions {
  /** Leave names the destination already has untouched */
  skipExisting?: boolean;
}

export class AssociationTable {
  readonly kind: AssociationKind;
  private readonly table: string;

  constructor(kind: AssociationKind) {
    this.kind = kind;
    this.table = TABLES[kind];
  }

  /**
   * Insert the association, or replace blob (and description, when given)
   * of the existing row with the same name.
   */
  async upsert(tx: Transaction, input: AssociationInput): Promise<void> {
    const updates = input.description === undefined
      ? 'blob_id = excluded.blob_id'
      : 'blob_id = excluded.blob_id, description = excluded.description';
    await tx.execute({
      sql: `INSERT INTO ${this.table} (tree_id, blob_id, name, description)
            VALUES (?, ?, ?, ?)
            ON CONFLICT(tree_id, name) DO UPDATE SET ${updates}`,
      args: [input.treeId, input.blobId, input.name, input.description ?? null],
    });
  }

  /**
   * Insert only if the name is free. Returns false when it was taken.
   */
  async insert(tx: Transaction, input: AssociationInput): Promise<boolean> {
    const result = await tx.execute({
      sql: `INSERT INTO ${this.table} (tree_id, blob_id, name, description)
            VALUES (?, ?, ?, ?)
            ON CONFLICT(tree_id, name) DO NOTHING`,
      args: [input.treeId, input.blobId, input.name, input.description ?? null],
    });
    return result.rowsAffected > 0;
  }

  async get(tx: Transaction, treeId: TreeId, name: string): Promise<Association | undefined> {
    const result = await tx.execute({
      sql: `SELECT tree_id, blob_id, name, description FROM ${this.table}
            WHERE tree_id = ? AND name = ?`,
      args: [treeId, name],
    });
    const row = result.rows[0];
    return row ? this.toAssociation(row) : undefined;
  }

  async list(tx: Transaction, treeId: TreeId): Promise<Association[]> {
    const result = await tx.execute({
      sql: `SELECT tree_id, blob_id, name, description FROM ${this.table}
            WHERE tree_id = ? ORDER BY name`,
      args: [treeId],
    });
    return result.rows.map((row) => this.toAssociation(row));
  }

  async remove(tx: Transaction, treeId: TreeId, name: string): Promise<boolean> {
    const result = await tx.execute({
      sql: `DELETE FROM ${this.table} WHERE tree_id = ? AND name = ?`,
      args: [treeId, name],
    });
    return result.rowsAffected > 0;
  }

  async removeAll(tx: Transaction, treeId: TreeId): Promise<number> {
    const result = await tx.execute({
      sql: `DELETE FROM ${this.table} WHERE tree_id = ?`,
      args: [treeId],
    });
    return result.rowsAffected;
  }

  /**
   * Rename `from` to `to`. Returns false when `from` does not exist and
   * throws ConflictError when `to` is taken.
   */
  async rename(tx: Transaction, treeId: TreeId, from: string, to: string): Promise<boolean> {
    if (from !== to && (await this.get(tx, treeId, to))) {
      throw new ConflictError(`A ${this.kind} named '${to}' already exists`, [
        { kind: this.kind, name: to },
      ]);
    }
    const result = await tx.execute({
      sql: `UPDATE ${this.table} SET name = ? WHERE tree_id = ? AND name = ?`,
      args: [to, treeId, from],
    });
    return result.rowsAffected > 0;
  }

  async describe(tx: Transaction, treeId: TreeId, name: string, description: string | null): Promise<boolean> {
    const result = await tx.execute({
      sql: `UPDATE ${this.table} SET description = ? WHERE tree_id = ? AND name = ?`,
      args: [description, treeId, name],
    });
    return result.rowsAffected > 0;
  }

  /**
   * Names present in both `src` and `dst`, ordered.
   */
  async conflictsWith(tx: Transaction, src: TreeId, dst: TreeId): Promise<string[]> {
    const result = await tx.execute({
      sql: `SELECT s.name AS name FROM ${this.table} s
            JOIN ${this.table} d ON d.tree_id = ? AND d.name = s.name
            WHERE s.tree_id = ? ORDER BY s.name`,
      args: [dst, src],
    });
    return result.rows.map((row) => readText(row, 'name'));
  }

  /**
   * Copy every row of `src` to `dst`. Returns the number of rows written.
   */
  async copyInto(tx: Transaction, src: TreeId, dst: TreeId, options: CopyOptions = {}): Promise<number> {
    const onConflict = options.skipExisting ? ' ON CONFLICT(tree_id, name) DO NOTHING' : '';
    const result = await tx.execute({
      sql: `INSERT INTO ${this.table} (tree_id, blob_id, name, description)
            SELECT ?, blob_id, name, description FROM ${this.table}
            WHERE tree_id = ?${onConflict}`,
      args: [dst, src],
    });
    return result.rowsAffected;
  }

  private toAssociation(row: Row): Association {
    return {
      kind: this.kind,
      treeId: readInteger(row, 'tree_id'),
      blobId: readInteger(row, 'blob_id'),
      name: readText(row, 'name'),
      description: readOptionalText(row, 'description'),
    };
  }
}
