/**
 * Script execution
 *
 * A stored script is written to a private temp directory as an executable
 * file and spawned with the caller's arguments. The tree root is exposed
 * to the script as $TREEKEEP_TREE_ROOT.
 */

import { spawn } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export const TREE_ROOT_ENV = 'TREEKEEP_TREE_ROOT';

const MODE_EXEC = 0o755;
const SCRIPT_FILENAME = 'script';

export interface StagedScript {
  path: string;
  dispose(): Promise<void>;
}

/**
 * Write `body` to a fresh temp directory with mode 0755.
 */
export async function stageScript(body: Uint8Array): Promise<StagedScript> {
  const dir = await mkdtemp(join(tmpdir(), 'treekeep-run-'));
  const path = join(dir, SCRIPT_FILENAME);
  try {
    await writeFile(path, body, { mode: MODE_EXEC });
  } catch (err) {
    await rm(dir, { recursive: true, force: true });
    throw err;
  }
  return {
    path,
    dispose: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Run a script body with inherited stdio. Resolves with its exit code
 * (1 when it was killed by a signal).
 */
export async function runScript(body: Uint8Array, args: readonly string[], treeRoot: string): Promise<number> {
  const staged = await stageScript(body);
  try {
    return await new Promise<number>((resolveExit, reject) => {
      const child = spawn(staged.path, [...args], {
        stdio: 'inherit',
        env: { ...process.env, [TREE_ROOT_ENV]: treeRoot },
      });
      child.once('error', reject);
      child.once('exit', (code) => resolveExit(code ?? 1));
    });
  } finally {
    await staged.dispose();
  }
}
