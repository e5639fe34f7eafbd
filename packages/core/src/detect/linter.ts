import path from 'node:path';
import { z } from 'zod';
import { fromWireIssue, type DetectorsConfig, type Issue } from '@mender/shared';
import { execaProcessRunner, type ProcessResult, type ProcessRunner } from './process';
import type { Detector, DetectorFailure, DetectorFinding, DetectorResult, RepositoryScanResult } from './types';

const WireIssueSchema = z.object({
  rule: z.string(),
  line: z.number().int(),
  message: z.string(),
  line_text: z.string().default(''),
});

export const LinterReportSchema = z.object({
  files: z.array(
    z.object({
      file: z.string(),
      issues: z.array(WireIssueSchema),
    }),
  ),
});

export type LinterReport = z.infer<typeof LinterReportSchema>;

export type LinterDetectorConfig = DetectorsConfig['linter'];

/**
 * External linter invoked as `<command> check [path] --format json`.
 */
export class LinterDetector implements Detector {
  readonly id = 'linter';
  private readonly config: LinterDetectorConfig;
  private readonly run: ProcessRunner;

  constructor(config: LinterDetectorConfig, runner: ProcessRunner = execaProcessRunner) {
    this.config = config;
    this.run = runner;
  }

  async scanFile(filePath: string): Promise<DetectorResult> {
    const report = await this.invoke(['check', filePath, '--format', 'json'], path.dirname(filePath));
    if (!report.ok) return report;
    const issues: Issue[] = report.report.files.flatMap((file) =>
      file.issues.map((wire) => fromWireIssue(wire, this.id)),
    );
    return { ok: true, issues };
  }

  async scanRepository(repoRoot: string): Promise<RepositoryScanResult> {
    const report = await this.invoke(['check', '--format', 'json'], repoRoot);
    if (!report.ok) return report;
    const files: DetectorFinding[] = report.report.files.map((file) => ({
      path: file.file,
      issues: file.issues.map((wire) => fromWireIssue(wire, this.id)),
    }));
    return { ok: true, files, warnings: [] };
  }

  private async invoke(
    args: string[],
    cwd: string,
  ): Promise<{ ok: true; report: LinterReport } | { ok: false; error: DetectorFailure }> {
    const { command, timeoutMs } = this.config;
    const result = await this.run(command, [...args, ...this.config.args], { cwd, timeoutMs });
    const failure = this.classifyFailure(result);
    if (failure) return { ok: false, error: failure };

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch {
      return {
        ok: false,
        error: { kind: 'parse-failure', message: `${command} did not print JSON: ${excerpt(result.stdout)}` },
      };
    }

    const parsed = LinterReportSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return { ok: false, error: { kind: 'parse-failure', message: `Unexpected ${command} report: ${issues}` } };
    }
    return { ok: true, report: parsed.data };
  }

  private classifyFailure(result: ProcessResult): DetectorFailure | undefined {
    const { command, timeoutMs } = this.config;
    if (result.spawnFailed) {
      return { kind: 'unavailable', message: `${command} could not be started; is it installed and on PATH?` };
    }
    if (result.timedOut) {
      return { kind: 'failed', message: `${command} timed out after ${timeoutMs}ms` };
    }
    // A non-zero exit with a report on stdout means "issues found".
    if (result.stdout.trim() === '') {
      if (result.exitCode === 0) {
        return { kind: 'parse-failure', message: `${command} printed no report` };
      }
      const code = result.exitCode === undefined ? 'a signal' : `code ${result.exitCode}`;
      return { kind: 'failed', message: `${command} exited with ${code}: ${excerpt(result.stderr)}` };
    }
    return undefined;
  }
}

function excerpt(text: string, max = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}
