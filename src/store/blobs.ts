/**
 * Content-addressed blob store.
 *
 * Bodies are unique by exact content. Storing a payload that already
 * exists returns the existing id.
 */

import type { Transaction } from '@libsql/client';
import { StorageError } from '../errors.js';
import type { BlobId } from '../types.js';
import { readBytes, readInteger } from './database.js';

export class BlobStore {
  /**
   * Store `body` and return its id. Must run inside a write transaction so
   * the insert and the id lookup see the same state.
   */
  async store(tx: Transaction, body: Uint8Array): Promise<BlobId> {
    await tx.execute({
      sql: 'INSERT INTO blobs (body) VALUES (?) ON CONFLICT(body) DO NOTHING',
      args: [body],
    });
    const result = await tx.execute({
      sql: 'SELECT id FROM blobs WHERE body = ?',
      args: [body],
    });
    const row = result.rows[0];
    if (!row) {
      throw new StorageError('Blob vanished between insert and lookup');
    }
    return readInteger(row, 'id');
  }

  async read(tx: Transaction, id: BlobId): Promise<Buffer | undefined> {
    const result = await tx.execute({
      sql: 'SELECT body FROM blobs WHERE id = ?',
      args: [id],
    });
    const row = result.rows[0];
    return row ? readBytes(row, 'body') : undefined;
  }
}
