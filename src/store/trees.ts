/**
 * Tree registry: canonical root path <-> tree id.
 *
 * Callers pass roots already canonicalized (see paths.ts).
 */

import type { Row, Transaction } from '@libsql/client';
import { ConflictError, StorageError } from '../errors.js';
import type { TreeId, TreeRecord } from '../types.js';
import { readInteger, readText } from './database.js';

export class TreeRegistry {
  async lookup(tx: Transaction, root: string): Promise<TreeRecord | undefined> {
    const result = await tx.execute({
      sql: 'SELECT id, root FROM trees WHERE root = ?',
      args: [root],
    });
    const row = result.rows[0];
    return row ? toTreeRecord(row) : undefined;
  }

  async resolveOrCreate(tx: Transaction, root: string): Promise<TreeRecord> {
    await tx.execute({
      sql: 'INSERT INTO trees (root) VALUES (?) ON CONFLICT(root) DO NOTHING',
      args: [root],
    });
    const tree = await this.lookup(tx, root);
    if (!tree) {
      throw new StorageError(`Tree row for ${root} missing after insert`);
    }
    return tree;
  }

  /**
   * Register a new root. Fails if the root is already registered.
   */
  async create(tx: Transaction, root: string): Promise<TreeRecord> {
    const existing = await this.lookup(tx, root);
    if (existing) {
      throw new ConflictError(`There is already a tree root at ${root}`);
    }
    return this.resolveOrCreate(tx, root);
  }

  async findByRoots(tx: Transaction, roots: readonly string[]): Promise<TreeRecord[]> {
    if (roots.length === 0) {
      return [];
    }
    const placeholders = roots.map(() => '?').join(', ');
    const result = await tx.execute({
      sql: `SELECT id, root FROM trees WHERE root IN (${placeholders})`,
      args: [...roots],
    });
    return result.rows.map(toTreeRecord);
  }

  async list(tx: Transaction): Promise<TreeRecord[]> {
    const result = await tx.execute('SELECT id, root FROM trees ORDER BY root');
    return result.rows.map(toTreeRecord);
  }

  /**
   * Delete the tree row. Association rows are removed by the caller in the
   * same transaction.
   */
  async remove(tx: Transaction, id: TreeId): Promise<boolean> {
    const result = await tx.execute({
      sql: 'DELETE FROM trees WHERE id = ?',
      args: [id],
    });
    return result.rowsAffected > 0;
  }
}

function toTreeRecord(row: Row): TreeRecord {
  return {
    id: readInteger(row, 'id'),
    root: readText(row, 'root'),
  };
}
