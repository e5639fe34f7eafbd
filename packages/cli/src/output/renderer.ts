import pc from 'picocolors';
import Table from 'cli-table3';
import type { BatchSummary, CollectResult } from '@mender/core';
import { toWireIssue, type BranchDisposition, type FileOutcome, type WireIssue } from '@mender/shared';

export interface ScanReport {
  files: { path: string; issues: WireIssue[] }[];
  issueCount: number;
  detectors: string[];
  warnings: string[];
}

export interface FixReport {
  runId: string;
  branch?: string;
  previousBranch?: string;
  fixed: number;
  reverted: number;
  skipped: number;
  unprocessed: number;
  durationMs: number;
  disposition?: BranchDisposition;
  outcomes: FileOutcome[];
}

export function toScanReport(result: CollectResult): ScanReport {
  const files = [...result.issues.entries()].map(([path, issues]) => ({
    path,
    issues: issues.map(toWireIssue),
  }));
  return {
    files,
    issueCount: files.reduce((sum, f) => sum + f.issues.length, 0),
    detectors: result.detectors.map((d) => d.id),
    warnings: result.warnings,
  };
}

export function toFixReport(summary: BatchSummary, disposition?: BranchDisposition): FixReport {
  return {
    runId: summary.runId,
    branch: summary.branch,
    previousBranch: summary.previousBranch,
    fixed: summary.fixed,
    reverted: summary.reverted,
    skipped: summary.skipped,
    unprocessed: summary.unprocessed,
    durationMs: summary.durationMs,
    disposition,
    outcomes: summary.outcomes,
  };
}

/**
 * One line per file outcome.
 */
export function formatOutcome(outcome: FileOutcome): string {
  const attempts = outcome.attempts.length;
  switch (outcome.status) {
    case 'accepted':
      return `${pc.green('fixed')}    ${outcome.filePath} (${outcome.initialIssueCount} -> ${outcome.finalIssueCount} issues, attempt ${attempts}, ${outcome.provenance ?? 'patch'})`;
    case 'reverted': {
      const last = outcome.attempts[attempts - 1]?.failure;
      const reason = last ? `; last failure: ${last.kind}: ${last.message}` : '';
      return `${pc.yellow('reverted')} ${outcome.filePath} (${outcome.initialIssueCount} issues, ${attempts} attempts${reason})`;
    }
    case 'skipped':
      return `${pc.gray('skipped')}  ${outcome.filePath} (${outcome.error ?? 'no reason recorded'})`;
  }
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  /** Progress text; kept off stdout in JSON mode. */
  log(message: string): void {
    if (this.isJson) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  renderScan(report: ScanReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    this.renderWarnings(report.warnings);
    if (report.files.length === 0) {
      console.log(pc.green('No issues found.'));
      return;
    }

    const table = new Table({ head: ['File', 'Issues', 'Rules'] });
    for (const file of report.files) {
      const rules = [...new Set(file.issues.map((i) => i.rule))].join(', ');
      table.push([file.path, String(file.issues.length), rules]);
    }
    console.log(table.toString());
    console.log(
      pc.bold(`\n${report.issueCount} issues in ${report.files.length} files`) +
        ` (detectors: ${report.detectors.join(', ') || 'none'})`,
    );
  }

  renderFix(report: FixReport): void {
    if (this.isJson) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    for (const outcome of report.outcomes) {
      console.log(formatOutcome(outcome));
    }

    const processed = report.fixed + report.reverted + report.skipped;
    const headline = `Fixed ${report.fixed} of ${processed} files`;
    console.log(`\n${report.fixed > 0 ? pc.green(headline) : pc.yellow(headline)}`);
    console.log(`  Reverted: ${report.reverted}`);
    console.log(`  Skipped: ${report.skipped}`);
    if (report.unprocessed > 0) {
      console.log(`  Not processed (file limit): ${report.unprocessed}`);
    }
    console.log(`  Duration: ${(report.durationMs / 1000).toFixed(1)}s`);

    if (report.branch) {
      console.log(pc.bold('\nBranch:'));
      if (report.disposition === 'discard') {
        console.log(`  Discarded '${report.branch}', back on '${report.previousBranch}'.`);
      } else {
        console.log(`  Changes are on '${report.branch}'.`);
        console.log(`  - Review them with: ${pc.cyan(`git diff ${report.previousBranch}...${report.branch}`)}`);
        console.log(`  - Drop them with: ${pc.cyan(`git checkout ${report.previousBranch} && git branch -D ${report.branch}`)}`);
      }
    }
  }

  private renderWarnings(warnings: string[]): void {
    for (const warning of warnings) {
      console.log(pc.yellow(`warning: ${warning}`));
    }
  }
}
