import { mkdir, mkdtemp, realpath, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConflictError, NotFoundError, PathError } from '../errors.js';
import { Keeper } from '../keeper.js';
import { KeepDatabase } from '../store/index.js';

describe('Keeper', () => {
  let tmp: string;
  let repo: string;
  let db: KeepDatabase;
  let keeper: Keeper;

  beforeEach(async () => {
    tmp = await realpath(await mkdtemp(join(tmpdir(), 'treekeep-keeper-')));
    repo = join(tmp, 'repo');
    await mkdir(join(repo, 'sub', 'dir'), { recursive: true });
    db = await KeepDatabase.open(join(tmp, 'home', 'treekeep.sqlite3'));
    keeper = new Keeper(db);
  });

  afterEach(async () => {
    db.close();
    await rm(tmp, { recursive: true, force: true });
  });

  describe('add and run lookup', () => {
    it('finds a script added at the root from a nested directory', async () => {
      const result = await keeper.add('script', repo, 'build-win', Buffer.from('echo hi'));
      expect(result.treeCreated).toBe(true);
      expect(result.replaced).toBe(false);
      expect(result.tree.root).toBe(repo);

      const found = await keeper.runLookup(join(repo, 'sub', 'dir'), 'build-win');
      expect(found.body.toString('utf-8')).toBe('echo hi');
      expect(found.tree.root).toBe(repo);
      expect(found.association.name).toBe('build-win');
    });

    it('adds from a subdirectory to the tree that governs it', async () => {
      await keeper.establish(repo);
      const result = await keeper.add('script', join(repo, 'sub'), 'lint', Buffer.from('npm run lint'));

      expect(result.treeCreated).toBe(false);
      expect(result.tree.root).toBe(repo);
      expect(await keeper.listTrees()).toEqual([result.tree]);
    });

    it('collapses different spellings of one root into one tree', async () => {
      await keeper.add('script', repo, 'a', Buffer.from('a'));
      await keeper.add('script', join(repo, 'sub', '..'), 'b', Buffer.from('b'));

      const trees = await keeper.listTrees();
      expect(trees.map((t) => t.root)).toEqual([repo]);
    });

    it('replaces an existing name by default', async () => {
      await keeper.add('script', repo, 'build', Buffer.from('v1'), { description: 'first' });
      const second = await keeper.add('script', repo, 'build', Buffer.from('v2'), { description: 'second' });

      expect(second.replaced).toBe(true);
      const found = await keeper.runLookup(repo, 'build');
      expect(found.body.toString()).toBe('v2');
      expect(found.association.description).toBe('second');
      expect((await keeper.list(repo, 'script')).associations).toHaveLength(1);
    });

    it('raises ConflictError when overwriting is disabled', async () => {
      const strict = new Keeper(db, { overwrite: false });
      await strict.add('script', repo, 'build', Buffer.from('v1'));

      await expect(strict.add('script', repo, 'build', Buffer.from('v2'))).rejects.toBeInstanceOf(ConflictError);
      expect((await strict.runLookup(repo, 'build')).body.toString()).toBe('v1');

      await strict.add('script', repo, 'build', Buffer.from('v3'), { overwrite: true });
      expect((await strict.runLookup(repo, 'build')).body.toString()).toBe('v3');
    });

    it('reports a missing tree and a missing name as distinct NotFoundErrors', async () => {
      const noTree = await keeper.runLookup(join(tmp, 'unrelated'), 'x').catch((err: unknown) => err);
      expect(noTree).toBeInstanceOf(NotFoundError);
      expect(noTree instanceof NotFoundError && noTree.subject).toBe('tree');

      await keeper.add('script', repo, 'build', Buffer.from('make'));
      const noScript = await keeper.runLookup(repo, 'nope').catch((err: unknown) => err);
      expect(noScript).toBeInstanceOf(NotFoundError);
      expect(noScript instanceof NotFoundError && noScript.subject).toBe('script');
      expect(noScript instanceof NotFoundError && noScript.itemName).toBe('nope');
    });

    it('does not run files', async () => {
      await keeper.add('file', repo, 'notes.md', Buffer.from('# notes'));
      await expect(keeper.runLookup(repo, 'notes.md')).rejects.toBeInstanceOf(NotFoundError);
      expect((await keeper.cat(repo, 'notes.md')).body.toString()).toBe('# notes');
    });

    it('cat names both kinds when neither has the name', async () => {
      await keeper.establish(repo);
      const missing = await keeper.cat(repo, 'nope').catch((err: unknown) => err);

      expect(missing).toBeInstanceOf(NotFoundError);
      expect(missing instanceof NotFoundError && missing.subject).toBe('entry');
      expect(missing instanceof NotFoundError && missing.message).toBe(
        `No script or file named 'nope' for the tree at ${repo}`,
      );
    });

    it('finds the tree through a symlink to a directory that does not exist yet', async () => {
      await keeper.add('script', repo, 'build', Buffer.from('make'));
      await symlink(tmp, join(tmp, 'link'));

      const found = await keeper.runLookup(join(tmp, 'link', 'repo', 'not-yet', 'created'), 'build');
      expect(found.tree.root).toBe(repo);
    });
  });

  describe('list', () => {
    it('returns associations of one kind ordered by name', async () => {
      await keeper.add('script', repo, 'b', Buffer.from('echo b'));
      await keeper.add('script', repo, 'a', Buffer.from('echo a'), { description: 'first' });
      await keeper.add('file', repo, 'c', Buffer.from('c'));

      const { tree, associations } = await keeper.list(repo, 'script');
      expect(tree.root).toBe(repo);
      expect(associations.map((a) => [a.name, a.description])).toEqual([
        ['a', 'first'],
        ['b', null],
      ]);
    });

    it('raises NotFoundError outside any tree', async () => {
      await expect(keeper.list(join(tmp, 'elsewhere'), 'script')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('trees', () => {
    it('refuses to establish the same root twice', async () => {
      await keeper.establish(repo);
      await expect(keeper.establish(repo)).rejects.toBeInstanceOf(ConflictError);
    });

    it('unestablish removes the tree and its associations', async () => {
      await keeper.add('script', repo, 'build', Buffer.from('make'));
      await keeper.add('file', repo, 'notes.md', Buffer.from('notes'));

      const removed = await keeper.unestablish(repo);
      expect(removed.root).toBe(repo);
      expect(await keeper.listTrees()).toEqual([]);

      await keeper.establish(repo);
      expect((await keeper.list(repo, 'script')).associations).toEqual([]);
      expect((await keeper.list(repo, 'file')).associations).toEqual([]);
    });

    it('unestablish only accepts the exact root', async () => {
      await keeper.establish(repo);
      await expect(keeper.unestablish(join(repo, 'sub'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('maintenance', () => {
    beforeEach(async () => {
      await keeper.add('script', repo, 'build', Buffer.from('make'), { description: 'Build all' });
    });

    it('update replaces the body and keeps the description', async () => {
      await keeper.update('script', repo, 'build', Buffer.from('make -j8'));

      const found = await keeper.runLookup(repo, 'build');
      expect(found.body.toString()).toBe('make -j8');
      expect(found.association.description).toBe('Build all');
    });

    it('update of an unknown name is NotFound', async () => {
      await expect(keeper.update('script', repo, 'nope', Buffer.from('x'))).rejects.toBeInstanceOf(NotFoundError);
    });

    it('describe and rename', async () => {
      await keeper.describe('script', repo, 'build', 'Release build');
      await keeper.rename('script', repo, 'build', 'release');

      const found = await keeper.runLookup(repo, 'release');
      expect(found.association.description).toBe('Release build');
      await expect(keeper.runLookup(repo, 'build')).rejects.toBeInstanceOf(NotFoundError);
      await expect(keeper.rename('script', repo, 'build', 'x')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('remove reports whether anything was removed', async () => {
      expect(await keeper.remove('script', repo, 'build')).toBe(true);
      expect(await keeper.remove('script', repo, 'build')).toBe(false);
    });
  });

  describe('saveFile', () => {
    it('names the file relative to the governing root', async () => {
      await keeper.establish(repo);

      const result = await keeper.saveFile(join(repo, 'sub'), 'dir/local.env', Buffer.from('A=1'));

      expect(result.name).toBe('sub/dir/local.env');
      expect(result.tree.root).toBe(repo);
      expect(result.treeCreated).toBe(false);
      expect((await keeper.lookup('file', repo, 'sub/dir/local.env')).body.toString()).toBe('A=1');
    });

    it('makes the directory the root when no tree governs it', async () => {
      const result = await keeper.saveFile(join(repo, 'sub'), join(repo, 'sub', 'dir', 'x.txt'), Buffer.from('x'));

      expect(result.treeCreated).toBe(true);
      expect(result.tree.root).toBe(join(repo, 'sub'));
      expect(result.name).toBe('dir/x.txt');
    });

    it('rejects a file outside the tree and stores nothing', async () => {
      await keeper.establish(repo);

      await expect(keeper.saveFile(repo, join(tmp, 'elsewhere.txt'), Buffer.from('x'))).rejects.toBeInstanceOf(
        PathError,
      );
      expect((await keeper.list(repo, 'file')).associations).toEqual([]);
    });
  });

  describe('clone', () => {
    it('copies into a new tree registered at the destination', async () => {
      const branch = join(tmp, 'branch');
      await mkdir(branch);
      await keeper.add('script', repo, 'build', Buffer.from('make'));
      await keeper.add('file', repo, '.env', Buffer.from('A=1'));

      const outcome = await keeper.clone(join(repo, 'sub'), branch);

      expect(outcome.source.root).toBe(repo);
      expect(outcome.destination.root).toBe(branch);
      expect(outcome.destinationCreated).toBe(true);
      expect(outcome.result.copied).toEqual({ script: 1, file: 1 });
      expect((await keeper.runLookup(branch, 'build')).body.toString()).toBe('make');
    });

    it('uses the configured conflict policy', async () => {
      const branch = join(tmp, 'branch');
      await mkdir(branch);
      await keeper.add('script', repo, 'build', Buffer.from('make'));
      await keeper.add('script', branch, 'build', Buffer.from('ninja'));

      await expect(keeper.clone(repo, branch)).rejects.toBeInstanceOf(ConflictError);

      const skipping = new Keeper(db, { onConflict: 'skip' });
      const outcome = await skipping.clone(repo, branch);
      expect(outcome.result.skipped).toEqual([{ kind: 'script', name: 'build' }]);
      expect((await keeper.runLookup(branch, 'build')).body.toString()).toBe('ninja');
    });

    it('needs a tree at the source', async () => {
      await expect(keeper.clone(join(tmp, 'nowhere'), repo)).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
