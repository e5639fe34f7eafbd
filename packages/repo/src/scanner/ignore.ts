import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import ignore, { type Ignore } from 'ignore';
import { z } from 'zod';
import { ConfigError, hasErrorCode, normalizePath, type IgnoreConfig } from '@mender/shared';

export const IGNORE_DEFAULTS_PATH = fileURLToPath(
  new URL('../../rules/ignore-defaults.json', import.meta.url),
);

const IgnoreDefaultsSchema = z.object({
  dirs: z.array(z.string()),
  extensions: z.array(z.string()),
});

/** Repository files whose gitignore-style patterns are honoured. */
export const IGNORE_FILES = ['.gitignore', '.menderignore'];

export interface IgnoreRules {
  /** Directory names excluded wherever they appear in a path */
  dirs: string[];
  /** File extensions, with leading dot */
  extensions: string[];
  /** Substrings of a lower-cased basename that mark a backup copy */
  backupMarkers: string[];
  /** gitignore-style patterns */
  patterns: string[];
}

/**
 * Decides which repository-relative paths are out of scope for scanning and remediation.
 */
export class IgnoreFilter {
  private readonly dirs: Set<string>;
  private readonly extensions: Set<string>;
  private readonly backupMarkers: string[];
  private readonly matcher: Ignore;

  constructor(rules: IgnoreRules) {
    this.dirs = new Set(rules.dirs);
    this.extensions = new Set(rules.extensions);
    this.backupMarkers = rules.backupMarkers.map((m) => m.toLowerCase());
    this.matcher = ignore().add(rules.patterns);
  }

  /**
   * Builds the filter for a repository from the bundled defaults (unless disabled),
   * the configured extras, and the patterns in `.gitignore` and `.menderignore`.
   */
  static async load(repoRoot: string, config: IgnoreConfig): Promise<IgnoreFilter> {
    const defaults = config.useDefaults ? await loadIgnoreDefaults() : { dirs: [], extensions: [] };
    const patterns = [...config.patterns];

    for (const name of IGNORE_FILES) {
      const filePath = path.join(repoRoot, name);
      try {
        patterns.push(await fs.readFile(filePath, 'utf8'));
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw new ConfigError(`Could not read ${filePath}`, { cause: error });
        }
      }
    }

    return new IgnoreFilter({
      dirs: [...defaults.dirs, ...config.dirs],
      extensions: [...defaults.extensions, ...config.extensions],
      backupMarkers: config.backupMarkers,
      patterns,
    });
  }

  /**
   * Whether a repository-relative file path is excluded.
   */
  ignores(relPath: string): boolean {
    const normalized = normalizePath(relPath);
    const parts = normalized.split('/').filter((p) => p.length > 0 && p !== '.');
    const basename = parts[parts.length - 1] ?? '';

    if (parts.slice(0, -1).some((part) => this.dirs.has(part))) return true;
    if (this.extensions.has(path.extname(basename))) return true;

    const lower = basename.toLowerCase();
    if (this.backupMarkers.some((marker) => lower.includes(marker))) return true;

    return this.matchesPattern(parts.join('/'));
  }

  /**
   * Whether a directory should be pruned from a walk.
   */
  ignoresDir(relDir: string): boolean {
    const parts = normalizePath(relDir)
      .split('/')
      .filter((p) => p.length > 0 && p !== '.');
    if (parts.some((part) => this.dirs.has(part))) return true;
    return parts.length > 0 && this.matchesPattern(parts.join('/') + '/');
  }

  private matchesPattern(relPath: string): boolean {
    // `ignore` rejects paths that leave the repository; those are never pattern-matched.
    if (relPath.length === 0 || relPath.startsWith('../') || path.isAbsolute(relPath)) {
      return false;
    }
    return this.matcher.ignores(relPath);
  }
}

export async function loadIgnoreDefaults(
  filePath: string = IGNORE_DEFAULTS_PATH,
): Promise<z.infer<typeof IgnoreDefaultsSchema>> {
  try {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    return IgnoreDefaultsSchema.parse(raw);
  } catch (error) {
    throw new ConfigError(`Could not load ignore defaults from ${filePath}`, { cause: error });
  }
}
