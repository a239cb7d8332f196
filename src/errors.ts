/**
 * treekeep errors
 *
 * Every failure the core reports is a KeepError with a stable `code`, so the
 * CLI can tell an expected miss from a broken database.
 */

import type { AssociationRef } from './types.js';

export type KeepErrorCode = 'STORAGE' | 'NOT_FOUND' | 'CONFLICT' | 'INVALID_PATH';

export abstract class KeepError extends Error {
  abstract readonly code: KeepErrorCode;
}

/**
 * The database could not be opened, read or written.
 * `retryable` is set when the failure was lock contention.
 */
export class StorageError extends KeepError {
  readonly code = 'STORAGE';
  readonly retryable: boolean;

  constructor(message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.retryable = options.retryable ?? false;
  }
}

/** `entry` is a lookup that searched scripts and files alike. */
export type NotFoundSubject = 'tree' | 'script' | 'file' | 'entry';

const SUBJECT_LABELS: Record<Exclude<NotFoundSubject, 'tree'>, string> = {
  script: 'script',
  file: 'file',
  entry: 'script or file',
};

/**
 * No tree governs a directory, or a tree has no association by that name.
 */
export class NotFoundError extends KeepError {
  readonly code = 'NOT_FOUND';
  readonly subject: NotFoundSubject;
  readonly directory: string;
  readonly itemName?: string;

  constructor(subject: NotFoundSubject, directory: string, itemName?: string) {
    super(
      subject === 'tree'
        ? `No tree root was found for ${directory}`
        : `No ${SUBJECT_LABELS[subject]} named '${itemName ?? ''}' for the tree at ${directory}`,
    );
    this.name = 'NotFoundError';
    this.subject = subject;
    this.directory = directory;
    this.itemName = itemName;
  }
}

export class ConflictError extends KeepError {
  readonly code = 'CONFLICT';
  readonly conflicts: readonly AssociationRef[];

  constructor(message: string, conflicts: readonly AssociationRef[] = []) {
    super(message);
    this.name = 'ConflictError';
    this.conflicts = conflicts;
  }
}

/**
 * A file path that cannot be stored for a tree, such as one outside its root.
 */
export class PathError extends KeepError {
  readonly code = 'INVALID_PATH';
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'PathError';
    this.path = path;
  }
}

export function isKeepError(err: unknown): err is KeepError {
  return err instanceof KeepError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
