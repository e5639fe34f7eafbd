import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { join } from '@mender/shared';
import type { IgnoreFilter } from './ignore';

export interface WalkOptions {
  /** Keep only files this returns true for */
  include?: (relPath: string) => boolean;
  maxFiles?: number;
}

export interface WalkResult {
  /** Repository-relative POSIX paths, sorted */
  files: string[];
  warnings: string[];
}

/**
 * Lists the files under `repoRoot` that survive the ignore filter, pruning ignored
 * directories before descending into them. Symlinks are not followed.
 */
export async function walkRepository(
  repoRoot: string,
  filter: IgnoreFilter,
  options: WalkOptions = {},
): Promise<WalkResult> {
  const files: string[] = [];
  const warnings: string[] = [];
  let stoppedEarly = false;

  const walk = async (dir: string, relativeDir: string): Promise<void> => {
    if (stoppedEarly) return;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      warnings.push(`Could not read directory ${relativeDir || '.'}: ${String(error)}`);
      return;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (stoppedEarly) return;
      const relPath = relativeDir ? join(relativeDir, entry.name) : entry.name;

      if (entry.isDirectory()) {
        if (filter.ignoresDir(relPath)) continue;
        await walk(path.join(dir, entry.name), relPath);
      } else if (entry.isFile()) {
        if (filter.ignores(relPath)) continue;
        if (options.include && !options.include(relPath)) continue;

        if (options.maxFiles !== undefined && files.length >= options.maxFiles) {
          warnings.push(`Stopped scanning early, hit max files limit of ${options.maxFiles}.`);
          stoppedEarly = true;
          return;
        }
        files.push(relPath);
      }
    }
  };

  await walk(repoRoot, '');
  files.sort((a, b) => a.localeCompare(b));

  return { files, warnings };
}
