import { toRepoRelative, type Issue, type IssueMap } from '@mender/shared';
import type { IgnoreFilter } from '@mender/repo';
import type { DetectorFinding } from '../detect';

/** Findings of one detector over the repository. */
export interface DetectorBatch {
  source: string;
  files: DetectorFinding[];
}

export interface IssueAggregatorOptions {
  repoRoot: string;
  filter: IgnoreFilter;
  /** Remove exact duplicates (same rule, line, message and snippet) across detectors */
  dedupe?: boolean;
}

/**
 * Merges detector findings into one issue map keyed by repository-relative POSIX path.
 * Files appear in the order they were first reported; within a file, issues keep
 * detector order, then finding order.
 */
export class IssueAggregator {
  private readonly repoRoot: string;
  private readonly filter: IgnoreFilter;
  private readonly dedupe: boolean;

  constructor(options: IssueAggregatorOptions) {
    this.repoRoot = options.repoRoot;
    this.filter = options.filter;
    this.dedupe = options.dedupe ?? false;
  }

  aggregate(batches: DetectorBatch[]): IssueMap {
    const merged: IssueMap = new Map();

    for (const batch of batches) {
      for (const finding of batch.files) {
        const relPath = toRepoRelative(this.repoRoot, finding.path);
        if (relPath === '' || relPath.startsWith('../') || this.filter.ignores(relPath)) continue;
        merged.set(relPath, [...(merged.get(relPath) ?? []), ...finding.issues]);
      }
    }

    for (const [relPath, issues] of merged) {
      const kept = this.dedupe ? dedupeIssues(issues) : issues;
      if (kept.length === 0) {
        merged.delete(relPath);
      } else {
        merged.set(relPath, kept);
      }
    }
    return merged;
  }
}

/** Drops exact duplicates (same rule, line, message and snippet), keeping the first. */
export function dedupeIssues(issues: Issue[]): Issue[] {
  const seen = new Set<string>();
  return issues.filter((issue) => {
    const key = JSON.stringify([issue.ruleId, issue.line, issue.message, issue.codeSnippet]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** Total number of issues in a map. */
export function countIssues(map: IssueMap): number {
  let total = 0;
  for (const issues of map.values()) total += issues.length;
  return total;
}
