/**
 * treekeep database
 *
 * One SQLite file per user, opened through libSQL. Each logical operation
 * runs inside a single transaction: writes take the write lock up front
 * (BEGIN IMMEDIATE), reads use a deferred transaction. A connection that
 * finds the database locked waits up to `busyTimeout` milliseconds before
 * the operation fails with a retryable StorageError.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  createClient,
  LibsqlError,
  type Client,
  type Row,
  type Transaction,
  type TransactionMode,
  type Value,
} from '@libsql/client';
import { KeepError, StorageError } from '../errors.js';
import { DEFAULT_BUSY_TIMEOUT } from '../types.js';

/** Database filename inside the treekeep home directory */
export const DB_FILENAME = 'treekeep.sqlite3';

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS blobs (
    id   INTEGER PRIMARY KEY,
    body BLOB NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS trees (
    id   INTEGER PRIMARY KEY,
    root TEXT NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS tree_scripts (
    tree_id     INTEGER NOT NULL,
    blob_id     INTEGER NOT NULL,
    name        TEXT NOT NULL,
    description TEXT,
    UNIQUE(tree_id, name)
  )`,
  `CREATE TABLE IF NOT EXISTS tree_files (
    tree_id     INTEGER NOT NULL,
    blob_id     INTEGER NOT NULL,
    name        TEXT NOT NULL,
    description TEXT,
    UNIQUE(tree_id, name)
  )`,
];

const BUSY_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED'];

export interface KeepDatabaseOptions {
  /** How long a locked database is waited on, in milliseconds (0 fails at once) */
  busyTimeout?: number;
}

export class KeepDatabase {
  readonly path: string;
  readonly busyTimeout: number;
  private readonly client: Client;

  private constructor(client: Client, path: string, busyTimeout: number) {
    this.client = client;
    this.path = path;
    this.busyTimeout = busyTimeout;
  }

  /**
   * Open (creating if needed) the database file and apply the schema.
   */
  static async open(path: string, options: KeepDatabaseOptions = {}): Promise<KeepDatabase> {
    const busyTimeout = Math.max(0, Math.floor(options.busyTimeout ?? DEFAULT_BUSY_TIMEOUT));
    try {
      await mkdir(dirname(path), { recursive: true });
      const client = createClient({ url: pathToFileURL(path).href });
      const db = new KeepDatabase(client, path, busyTimeout);
      await db.applyBusyTimeout();
      await client.batch(SCHEMA, 'write');
      return db;
    } catch (err) {
      throw toStorageError(err, `Failed to open database at ${path}`);
    }
  }

  async write<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    return this.transact('write', fn);
  }

  async read<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    return this.transact('deferred', fn);
  }

  close(): void {
    this.client.close();
  }

  private async transact<T>(mode: TransactionMode, fn: (tx: Transaction) => Promise<T>): Promise<T> {
    let tx: Transaction;
    try {
      await this.applyBusyTimeout();
      tx = await this.client.transaction(mode);
    } catch (err) {
      throw toStorageError(err, 'Failed to begin transaction');
    }

    // close() rolls back whatever was not committed
    try {
      const result = await fn(tx);
      await tx.commit();
      return result;
    } catch (err) {
      throw toStorageError(err, 'Transaction failed');
    } finally {
      tx.close();
    }
  }

  // The client hands its connection to each transaction and opens a fresh
  // one afterwards, so the pragma is set again before every BEGIN.
  private async applyBusyTimeout(): Promise<void> {
    await this.client.execute(`PRAGMA busy_timeout = ${this.busyTimeout}`);
  }
}

/**
 * Wrap a driver failure in a StorageError. KeepErrors pass through.
 */
export function toStorageError(err: unknown, context: string): KeepError {
  if (err instanceof KeepError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new StorageError(`${context}: ${detail}`, {
    cause: err,
    retryable: isBusyError(err),
  });
}

function isBusyError(err: unknown): boolean {
  return err instanceof LibsqlError && BUSY_CODES.some((code) => err.code.startsWith(code));
}

// ─── Row access ──────────────────────────────────────────────

export function readInteger(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  throw unexpectedValue(column, 'an integer', value);
}

export function readText(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw unexpectedValue(column, 'text', value);
}

export function readOptionalText(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null) return null;
  return readText(row, column);
}

export function readBytes(row: Row, column: string): Buffer {
  const value = row[column];
  if (value instanceof ArrayBuffer) return Buffer.from(value);
  throw unexpectedValue(column, 'a blob', value);
}

function unexpectedValue(column: string, expected: string, value: Value): StorageError {
  const actual = value === null ? 'null' : typeof value;
  return new StorageError(`Expected ${expected} in column "${column}", got ${actual}`);
}
