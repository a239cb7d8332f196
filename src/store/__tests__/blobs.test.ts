import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BlobStore } from '../blobs.js';
import { KeepDatabase, readInteger } from '../database.js';

describe('BlobStore', () => {
  let dir: string;
  let db: KeepDatabase;
  const blobs = new BlobStore();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'treekeep-blobs-'));
    db = await KeepDatabase.open(join(dir, 'test.sqlite3'));
  });

  afterEach(async () => {
    db.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function countBlobs(): Promise<number> {
    return db.read(async (tx) => {
      const result = await tx.execute('SELECT COUNT(*) AS n FROM blobs');
      return readInteger(result.rows[0], 'n');
    });
  }

  it('returns the same id for identical content', async () => {
    const first = await db.write((tx) => blobs.store(tx, Buffer.from('echo hi\n')));
    const second = await db.write((tx) => blobs.store(tx, Buffer.from('echo hi\n')));

    expect(second).toBe(first);
    expect(await countBlobs()).toBe(1);
  });

  it('stores distinct content under distinct ids', async () => {
    const a = await db.write((tx) => blobs.store(tx, Buffer.from('make all')));
    const b = await db.write((tx) => blobs.store(tx, Buffer.from('make all ')));

    expect(b).not.toBe(a);
    expect(await countBlobs()).toBe(2);
  });

  it('reads back binary content byte for byte', async () => {
    const body = Buffer.from([0x00, 0x01, 0x7f, 0x80, 0xff]);
    const id = await db.write((tx) => blobs.store(tx, body));

    const read = await db.read((tx) => blobs.read(tx, id));
    expect(read?.equals(body)).toBe(true);
  });

  it('returns undefined for an unknown id', async () => {
    expect(await db.read((tx) => blobs.read(tx, 999))).toBeUndefined();
  });
});
