import { mkdir, mkdtemp, realpath, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathError } from '../../errors.js';
import { ancestorsOf, canonicalizePath, isWithin, treeRelativeName } from '../paths.js';

describe('ancestorsOf', () => {
  it('lists the directory and each parent up to the root', () => {
    expect(ancestorsOf('/a/b/c')).toEqual(['/a/b/c', '/a/b', '/a', '/']);
  });

  it('returns only the root for the root', () => {
    expect(ancestorsOf('/')).toEqual(['/']);
  });
});

describe('isWithin', () => {
  it('matches the root itself and its descendants', () => {
    expect(isWithin('/a/b', '/a/b')).toBe(true);
    expect(isWithin('/a/b', '/a/b/c/d')).toBe(true);
  });

  it('compares whole path components', () => {
    expect(isWithin('/a/b', '/a/bc')).toBe(false);
    expect(isWithin('/a/b', '/a')).toBe(false);
  });

  it('treats the filesystem root as governing everything', () => {
    expect(isWithin('/', '/anything/below')).toBe(true);
  });
});

describe('treeRelativeName', () => {
  it('returns the slash-separated path below the root', () => {
    expect(treeRelativeName('/repo', '/repo/config/local.env')).toBe('config/local.env');
  });

  it('rejects paths outside the root', () => {
    expect(() => treeRelativeName('/repo', '/elsewhere/file')).toThrow('is not a file inside the tree at /repo');
    expect(() => treeRelativeName('/repo', '/repo')).toThrow('is not a file inside the tree');
    expect(() => treeRelativeName('/repo', '/repo-other/file')).toThrow(PathError);
  });
});

describe('canonicalizePath', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await realpath(await mkdtemp(join(tmpdir(), 'treekeep-paths-')));
  });

  afterEach(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  it('resolves relative spellings against the base directory', async () => {
    await mkdir(join(tmp, 'sub'));
    expect(await canonicalizePath('sub/../sub/', tmp)).toBe(join(tmp, 'sub'));
  });

  it('resolves symlinks to the same location', async () => {
    await mkdir(join(tmp, 'real'));
    await symlink(join(tmp, 'real'), join(tmp, 'link'));
    expect(await canonicalizePath(join(tmp, 'link'))).toBe(join(tmp, 'real'));
  });

  it('keeps the normalized spelling of a missing path', async () => {
    expect(await canonicalizePath(join(tmp, 'missing', '..', 'gone'))).toBe(join(tmp, 'gone'));
  });

  it('resolves symlinks in the existing part of a missing path', async () => {
    await mkdir(join(tmp, 'real', 'repo'), { recursive: true });
    await symlink(join(tmp, 'real'), join(tmp, 'link'));

    expect(await canonicalizePath(join(tmp, 'link', 'repo', 'new-dir', 'deeper'))).toBe(
      join(tmp, 'real', 'repo', 'new-dir', 'deeper'),
    );
  });
});
