import path from 'node:path';
import { RuleTable, findingToIssue, scanFile, walkRepository, type IgnoreFilter } from '@mender/repo';
import { toError, type DetectorsConfig } from '@mender/shared';
import type { Detector, DetectorFinding, DetectorResult, RepositoryScanResult } from './types';

export interface PatternDetectorOptions {
  table: RuleTable;
  filter: IgnoreFilter;
}

/**
 * Regex rules selected by file extension, evaluated line by line.
 */
export class PatternDetector implements Detector {
  readonly id = 'pattern';
  private readonly table: RuleTable;
  private readonly filter: IgnoreFilter;

  constructor(options: PatternDetectorOptions) {
    this.table = options.table;
    this.filter = options.filter;
  }

  static async create(config: DetectorsConfig['pattern'], filter: IgnoreFilter): Promise<PatternDetector> {
    const table = await RuleTable.load(config.rulesPath);
    return new PatternDetector({ table, filter });
  }

  async scanFile(filePath: string): Promise<DetectorResult> {
    try {
      const findings = await scanFile(filePath, this.table);
      return { ok: true, issues: findings.map(findingToIssue) };
    } catch (error) {
      return { ok: false, error: { kind: 'failed', message: `Could not scan ${filePath}: ${toError(error).message}` } };
    }
  }

  async scanRepository(repoRoot: string): Promise<RepositoryScanResult> {
    const walk = await walkRepository(repoRoot, this.filter, {
      include: (relPath) => this.table.hasRulesFor(relPath),
    });
    const files: DetectorFinding[] = [];
    const warnings = [...walk.warnings];

    for (const relPath of walk.files) {
      const result = await this.scanFile(path.join(repoRoot, relPath));
      if (!result.ok) {
        warnings.push(result.error.message);
        continue;
      }
      if (result.issues.length > 0) {
        files.push({ path: relPath, issues: result.issues });
      }
    }

    return { ok: true, files, warnings };
  }
}
