import * as fs from 'fs/promises';
import * as path from 'path';
import { UsageError, hasErrorCode } from '@mender/shared';

export * from './patch';
export * from './scanner';
export * from './git';

/**
 * Finds the git repository that contains `cwd`: the nearest parent holding a
 * `.git` entry (a directory, or a file for worktrees and submodules).
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const root = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await hasGitEntry(currentDir)) {
      return currentDir;
    }
    if (currentDir === root) {
      break;
    }
    currentDir = path.dirname(currentDir);
  }

  throw new UsageError(
    `Could not detect repository root from ${cwd}. Run mender inside a git repository; fixes are made on an isolated branch.`,
  );
}

async function hasGitEntry(dir: string): Promise<boolean> {
  try {
    await fs.access(path.join(dir, '.git'));
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) return false;
    throw error;
  }
}
