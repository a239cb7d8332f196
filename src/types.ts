/**
 * treekeep shared types
 */

import { z } from 'zod';

// ─── Store ───────────────────────────────────────────────────

export type BlobId = number;
export type TreeId = number;

/** Scripts are runnable entry points; files are inert payloads. */
export type AssociationKind = 'script' | 'file';

export const ASSOCIATION_KINDS: readonly AssociationKind[] = ['script', 'file'];

export interface TreeRecord {
  id: TreeId;
  /** Canonical absolute root path */
  root: string;
}

export interface Association {
  kind: AssociationKind;
  treeId: TreeId;
  blobId: BlobId;
  name: string;
  description: string | null;
}

export interface AssociationRef {
  kind: AssociationKind;
  name: string;
}

/** What clone does with a name the destination tree already has. */
export type ConflictPolicy = 'fail' | 'skip';

export interface CloneResult {
  copied: Record<AssociationKind, number>;
  skipped: AssociationRef[];
}

// ─── Configuration ───────────────────────────────────────────

export const CONFIG_VERSION = '0.1.0';

/** Default lock wait in milliseconds */
export const DEFAULT_BUSY_TIMEOUT = 5000;

export const TreekeepConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION),
  database: z
    .object({
      /** Database file, relative to the treekeep home directory */
      path: z.string().min(1).optional(),
      /** Milliseconds to wait on a locked database */
      busyTimeout: z.number().int().nonnegative().default(DEFAULT_BUSY_TIMEOUT),
    })
    .default({}),
  add: z
    .object({
      /** Replace an existing association of the same name on add */
      overwrite: z.boolean().default(true),
    })
    .default({}),
  clone: z
    .object({
      onConflict: z.enum(['fail', 'skip']).default('fail'),
    })
    .default({}),
});

export type TreekeepConfig = z.infer<typeof TreekeepConfigSchema>;
