import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BatchSummary, CollectResult, Detector } from '@mender/core';
import type { FileOutcome } from '@mender/shared';
import { OutputRenderer, formatOutcome, toFixReport, toScanReport } from './renderer';

const detector = (id: string): Detector => ({
  id,
  scanFile: async () => ({ ok: true, issues: [] }),
  scanRepository: async () => ({ ok: true, files: [], warnings: [] }),
});

const collected: CollectResult = {
  issues: new Map([
    [
      'src/job.py',
      [
        { ruleId: 'R-PRINT', line: 2, message: 'Use logging.', codeSnippet: 'print(x)', source: 'pattern', priority: 'LOW' },
        { ruleId: 'R-PRINT', line: 3, message: 'Use logging.', codeSnippet: 'print(y)', source: 'pattern', priority: 'LOW' },
      ],
    ],
  ]),
  detectors: [detector('pattern')],
  warnings: ['Stopped scanning early, hit max files limit of 1.'],
};

const accepted: FileOutcome = {
  filePath: 'src/job.py',
  status: 'accepted',
  initialIssueCount: 3,
  finalIssueCount: 1,
  attempts: [{ attempt: 1, issueCount: 1, provenance: 'patch' }],
  transitions: ['Init', 'Proposed', 'Applied', 'Verified', 'Accepted'],
  provenance: 'patch',
};

const reverted: FileOutcome = {
  filePath: 'src/db.py',
  status: 'reverted',
  initialIssueCount: 2,
  finalIssueCount: 2,
  attempts: [
    { attempt: 1, failure: { kind: 'EmptyResponse', message: 'oracle returned empty content' } },
    { attempt: 2, issueCount: 2, failure: { kind: 'NoImprovement', message: 'issue count stayed at 2' } },
  ],
  transitions: [],
};

const skipped: FileOutcome = {
  filePath: 'src/blob.py',
  status: 'skipped',
  initialIssueCount: 1,
  finalIssueCount: 1,
  attempts: [],
  transitions: [],
  error: 'file is not valid UTF-8',
};

const summary: BatchSummary = {
  runId: 'run-1',
  branch: 'autofix-run-1700000000',
  previousBranch: 'main',
  fixed: 1,
  reverted: 1,
  skipped: 1,
  unprocessed: 2,
  outcomes: [accepted, reverted, skipped],
  durationMs: 4200,
};

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const output = () => logSpy.mock.calls.map((c) => String(c[0])).join('\n');

  it('converts collected issues to the wire format', () => {
    expect(toScanReport(collected)).toEqual({
      files: [
        {
          path: 'src/job.py',
          issues: [
            { rule: 'R-PRINT', line: 2, message: 'Use logging.', line_text: 'print(x)' },
            { rule: 'R-PRINT', line: 3, message: 'Use logging.', line_text: 'print(y)' },
          ],
        },
      ],
      issueCount: 2,
      detectors: ['pattern'],
      warnings: ['Stopped scanning early, hit max files limit of 1.'],
    });
  });

  it('renders a scan as JSON', () => {
    new OutputRenderer(true).renderScan(toScanReport(collected));

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0])).issueCount).toBe(2);
  });

  it('renders a scan table with totals', () => {
    new OutputRenderer(false).renderScan(toScanReport(collected));

    expect(output()).toContain('warning: Stopped scanning early, hit max files limit of 1.');
    expect(output()).toContain('src/job.py');
    expect(output()).toContain('2 issues in 1 files');
    expect(output()).toContain('(detectors: pattern)');
  });

  it('renders an empty scan', () => {
    new OutputRenderer(false).renderScan({ files: [], issueCount: 0, detectors: ['pattern'], warnings: [] });

    expect(output()).toContain('No issues found.');
  });

  it('formats one line per outcome', () => {
    expect(formatOutcome(accepted)).toContain('src/job.py (3 -> 1 issues, attempt 1, patch)');
    expect(formatOutcome(reverted)).toContain(
      'src/db.py (2 issues, 2 attempts; last failure: NoImprovement: issue count stayed at 2)',
    );
    expect(formatOutcome(skipped)).toContain('src/blob.py (file is not valid UTF-8)');
  });

  it('renders the batch summary with branch hints', () => {
    new OutputRenderer(false).renderFix(toFixReport(summary, 'keep'));

    const text = output();
    expect(text).toContain('Fixed 1 of 3 files');
    expect(text).toContain('  Reverted: 1');
    expect(text).toContain('  Skipped: 1');
    expect(text).toContain('  Not processed (file limit): 2');
    expect(text).toContain('  Duration: 4.2s');
    expect(text).toContain("  Changes are on 'autofix-run-1700000000'.");
    expect(text).toContain('git diff main...autofix-run-1700000000');
  });

  it('reports a discarded branch', () => {
    new OutputRenderer(false).renderFix(toFixReport(summary, 'discard'));

    expect(output()).toContain("  Discarded 'autofix-run-1700000000', back on 'main'.");
  });

  it('renders the batch summary as JSON', () => {
    new OutputRenderer(true).renderFix(toFixReport(summary, 'keep'));

    const parsed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toMatchObject({ runId: 'run-1', fixed: 1, reverted: 1, skipped: 1, disposition: 'keep' });
    expect(parsed.outcomes).toHaveLength(3);
  });

  it('keeps progress text off stdout in JSON mode', () => {
    new OutputRenderer(true).log('working');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledWith('working');
  });
});
