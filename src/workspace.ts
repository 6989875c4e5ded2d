import path from 'node:path';
import fs from 'fs-extra';
import { FilesystemError, describeError } from './errors.js';
import type { Logger } from './logger.js';

const WORKSPACE_PREFIX = 'task-';

export interface Workspace {
  readonly dir: string;
  file(name: string): string;
}

/**
 * Creates a private directory under `root`, runs `work` with it and removes
 * the directory afterwards on every exit path (success, failure or abort).
 * Nothing outside `work` may keep a reference to files inside it.
 */
export const withWorkspace = async <T>(
  root: string,
  work: (workspace: Workspace) => Promise<T>,
  logger: Logger,
): Promise<T> => {
  let dir: string;
  try {
    await fs.ensureDir(root);
    dir = await fs.mkdtemp(path.join(root, WORKSPACE_PREFIX));
  } catch (error) {
    throw new FilesystemError(`Could not create workspace under ${root}: ${describeError(error)}`, error);
  }

  const workspace: Workspace = {
    dir,
    file: (name) => path.join(dir, name),
  };

  try {
    return await work(workspace);
  } finally {
    try {
      await fs.remove(dir);
    } catch (error) {
      logger.error({ dir }, 'workspace cleanup failed: %s', describeError(error));
    }
  }
};

/**
 * Removes workspaces left behind by a previous process (for example after a
 * crash) that are older than `maxAgeMs`. Returns the number removed.
 */
export const sweepStaleWorkspaces = async (
  root: string,
  maxAgeMs: number,
  logger: Logger,
  now: number = Date.now(),
): Promise<number> => {
  if (!(await fs.pathExists(root))) {
    return 0;
  }
  const entries = await fs.readdir(root);
  let removed = 0;
  for (const name of entries.filter((entry) => entry.startsWith(WORKSPACE_PREFIX))) {
    const target = path.join(root, name);
    try {
      const stats = await fs.stat(target);
      if (now - stats.mtimeMs > maxAgeMs) {
        await fs.remove(target);
        removed += 1;
      }
    } catch (error) {
      logger.warn({ target }, 'stale workspace sweep failed: %s', describeError(error));
    }
  }
  return removed;
};
