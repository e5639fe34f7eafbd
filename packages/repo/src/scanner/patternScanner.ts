import fs from 'node:fs/promises';
import path from 'node:path';
import type { Issue, IssuePriority } from '@mender/shared';
import type { RuleTable } from './rules';

export interface PatternFinding {
  ruleId: string;
  /** 1-indexed */
  line: number;
  /** The matching line, trimmed */
  code: string;
  suggestion: string;
  priority: IssuePriority;
  fixExample?: string;
}

const COMMENT_PREFIXES = ['#', '//'];

/**
 * Runs the rules selected by `extension` over `content`, one line at a time.
 * Lines that start with `#` or `//` after indentation are skipped.
 */
export function scanText(content: string, extension: string, table: RuleTable): PatternFinding[] {
  const rules = table.rulesForExtension(extension);
  if (rules.length === 0) return [];

  const findings: PatternFinding[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, idx) => {
    const trimmed = line.trim();
    if (COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) return;

    for (const rule of rules) {
      if (rule.pattern.test(line)) {
        findings.push({
          ruleId: rule.id,
          line: idx + 1,
          code: trimmed,
          suggestion: rule.suggestion,
          priority: rule.priority,
          fixExample: rule.fixExample,
        });
      }
    }
  });

  return findings;
}

/**
 * Scans a file on disk. Returns an empty list when no rule covers its extension,
 * without reading it.
 */
export async function scanFile(filePath: string, table: RuleTable): Promise<PatternFinding[]> {
  if (!table.hasRulesFor(filePath)) return [];
  const content = await fs.readFile(filePath, 'utf8');
  return scanText(content, path.extname(filePath), table);
}

export function findingToIssue(finding: PatternFinding): Issue {
  return {
    ruleId: finding.ruleId,
    line: finding.line,
    message: `${finding.suggestion} (Priority: ${finding.priority})`,
    codeSnippet: finding.code,
    source: 'pattern',
    priority: finding.priority,
    fixExample: finding.fixExample,
  };
}
