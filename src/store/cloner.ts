/**
 * Copies every script and file association from one tree to another.
 *
 * Runs inside the caller's write transaction: either every row of both
 * kinds lands in the destination, or none does.
 */

import type { Transaction } from '@libsql/client';
import { ConflictError } from '../errors.js';
import type { AssociationRef, CloneResult, ConflictPolicy, TreeId } from '../types.js';
import type { AssociationTable } from './associations.js';

export class TreeCloner {
  private readonly tables: readonly AssociationTable[];

  constructor(tables: readonly AssociationTable[]) {
    this.tables = tables;
  }

  /**
   * With policy `fail`, any name the destination already holds aborts the
   * clone with a ConflictError listing all of them. With `skip`, those
   * names keep their destination rows and are reported in `skipped`.
   */
  async cloneAssociations(
    tx: Transaction,
    src: TreeId,
    dst: TreeId,
    policy: ConflictPolicy = 'fail',
  ): Promise<CloneResult> {
    if (src === dst) {
      throw new ConflictError('Cannot clone a tree onto itself');
    }

    const collisions: AssociationRef[] = [];
    for (const table of this.tables) {
      for (const name of await table.conflictsWith(tx, src, dst)) {
        collisions.push({ kind: table.kind, name });
      }
    }

    if (collisions.length > 0 && policy === 'fail') {
      const listed = collisions.map((c) => `${c.kind} '${c.name}'`).join(', ');
      throw new ConflictError(`Destination tree already has ${listed}`, collisions);
    }

    const result: CloneResult = {
      copied: { script: 0, file: 0 },
      skipped: collisions,
    };
    for (const table of this.tables) {
      result.copied[table.kind] = await table.copyInto(tx, src, dst, {
        skipExisting: policy === 'skip',
      });
    }
    return result;
  }
}
