import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FilesystemError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { sweepStaleWorkspaces, withWorkspace } from '../src/workspace.js';
import { makeTempDir } from './helpers.js';

describe('withWorkspace', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('creates a private directory and removes it after success', async () => {
    const workRoot = path.join(root, 'work');
    let seen = '';

    const result = await withWorkspace(
      workRoot,
      async (workspace) => {
        seen = workspace.dir;
        await fs.writeFile(workspace.file('source.media'), 'bytes');
        return 'done';
      },
      silentLogger(),
    );

    expect(result).toBe('done');
    expect(path.dirname(seen)).toBe(workRoot);
    expect(path.basename(seen)).toMatch(/^task-/);
    expect(await fs.pathExists(seen)).toBe(false);
  });

  it('removes the directory when the work fails', async () => {
    let seen = '';

    await expect(
      withWorkspace(
        root,
        async (workspace) => {
          seen = workspace.dir;
          await fs.writeFile(workspace.file('partial.mp3'), 'half');
          throw new Error('boom');
        },
        silentLogger(),
      ),
    ).rejects.toThrow('boom');
    expect(await fs.pathExists(seen)).toBe(false);
  });

  it('gives every call its own directory', async () => {
    const dirs = await Promise.all(
      [1, 2, 3].map(() => withWorkspace(root, async (workspace) => workspace.dir, silentLogger())),
    );

    expect(new Set(dirs).size).toBe(3);
  });

  it('reports a root it cannot create as a filesystem error', async () => {
    const blocker = path.join(root, 'blocker');
    await fs.writeFile(blocker, '');

    await expect(
      withWorkspace(path.join(blocker, 'work'), async () => 'never', silentLogger()),
    ).rejects.toBeInstanceOf(FilesystemError);
  });
});

describe('sweepStaleWorkspaces', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('removes only old task directories', async () => {
    const now = Date.now();
    const old = path.join(root, 'task-old');
    await fs.ensureDir(old);
    await fs.ensureDir(path.join(root, 'task-new'));
    await fs.ensureDir(path.join(root, 'keep'));
    const twoHoursAgo = new Date(now - 2 * 60 * 60 * 1000);
    await fs.utimes(old, twoHoursAgo, twoHoursAgo);

    const removed = await sweepStaleWorkspaces(root, 60 * 60 * 1000, silentLogger(), now);

    expect(removed).toBe(1);
    expect((await fs.readdir(root)).sort()).toEqual(['keep', 'task-new']);
  });

  it('ignores a missing root', async () => {
    expect(await sweepStaleWorkspaces(path.join(root, 'absent'), 1_000, silentLogger())).toBe(0);
  });
});
