import * as fs from 'fs/promises';
import * as path from 'path';
import {
  BranchCreationError,
  UsageError,
  eventBase,
  toError,
  type BranchDisposition,
  type FileOutcome,
  type GitConfig,
  type Issue,
  type IssueMap,
  type Logger,
} from '@mender/shared';
import { AsyncSemaphore } from './semaphore';

/**
 * The git operations a batch needs. `GitService` from `@mender/repo` implements it.
 */
export interface VersionControl {
  ensureCleanWorkingTree(options?: { allowDirty?: boolean }): Promise<void>;
  currentBranch(): Promise<string>;
  createIsolatedBranch(branchName: string): Promise<void>;
  checkout(branchName: string): Promise<void>;
  deleteBranch(branchName: string): Promise<void>;
}

export interface FileRemediator {
  remediate(filePath: string, issues: Issue[]): Promise<FileOutcome>;
}

export interface BatchSummary {
  runId: string;
  branch: string;
  previousBranch: string;
  fixed: number;
  reverted: number;
  skipped: number;
  /** Files beyond the `maxFiles` cap */
  unprocessed: number;
  outcomes: FileOutcome[];
  durationMs: number;
}

export interface BatchRunnerOptions {
  runId: string;
  repoRoot: string;
  vcs: VersionControl;
  remediator: FileRemediator;
  logger: Logger;
  git: Pick<GitConfig, 'branchPrefix' | 'allowDirtyWorkingTree'>;
  maxFiles: number;
  concurrency: number;
  /** Milliseconds since the epoch; names the isolated branch */
  now?: () => number;
}

/**
 * Runs a whole remediation batch on an isolated branch.
 */
export class BatchRunner {
  private lastRun?: BatchSummary;
  /** Bytes each accepted file held when the batch reached it, keyed by repository-relative path */
  private snapshots = new Map<string, Buffer>();

  constructor(private readonly options: BatchRunnerOptions) {}

  async run(issueMap: IssueMap): Promise<BatchSummary> {
    const { runId, logger, maxFiles } = this.options;
    const now = this.options.now ?? Date.now;
    const startedAt = now();

    const files = [...issueMap.entries()];
    const planned = files.slice(0, maxFiles);
    const issueCount = files.reduce((sum, [, issues]) => sum + issues.length, 0);

    await logger.log({
      ...eventBase(runId),
      type: 'BatchStarted',
      payload: { fileCount: files.length, issueCount, plannedFiles: planned.length },
    });

    const branch = `${this.options.git.branchPrefix}${Math.floor(startedAt / 1000)}`;
    const previousBranch = await this.createBranch(branch);
    await logger.trace(
      { ...eventBase(runId), type: 'BranchCreated', payload: { branch, previousBranch } },
      `Created branch '${branch}'. Check out '${previousBranch}' to undo every change.`,
    );

    this.snapshots = new Map();
    const semaphore = new AsyncSemaphore(this.options.concurrency);
    const outcomes = await Promise.all(
      planned.map(([filePath, issues]) => semaphore.run(() => this.remediateFile(filePath, issues))),
    );

    const count = (status: FileOutcome['status']) => outcomes.filter((o) => o.status === status).length;
    const summary: BatchSummary = {
      runId,
      branch,
      previousBranch,
      fixed: count('accepted'),
      reverted: count('reverted'),
      skipped: count('skipped'),
      unprocessed: files.length - planned.length,
      outcomes,
      durationMs: now() - startedAt,
    };

    await logger.log({
      ...eventBase(runId),
      type: 'BatchFinished',
      payload: {
        fixed: summary.fixed,
        reverted: summary.reverted,
        skipped: summary.skipped,
        unprocessed: summary.unprocessed,
        durationMs: summary.durationMs,
      },
    });

    this.lastRun = summary;
    return summary;
  }

  /**
   * Applies the post-batch choice: `keep` leaves the isolated branch checked out;
   * `discard` writes back the bytes the changed files held before the batch,
   * returns to the previous branch and deletes the isolated one. Uncommitted
   * edits the run started from survive a discard.
   */
  async finalizeBranch(choice: BranchDisposition): Promise<void> {
    const run = this.lastRun;
    if (!run) {
      throw new UsageError('No batch has run yet; nothing to finalize.');
    }
    if (choice === 'keep') {
      await this.options.logger.info(`Keeping branch '${run.branch}'. Merge it to keep the fixes.`);
      return;
    }

    const { vcs, repoRoot } = this.options;
    for (const [filePath, bytes] of this.snapshots) {
      await fs.writeFile(path.join(repoRoot, filePath), bytes);
    }
    await vcs.checkout(run.previousBranch);
    await vcs.deleteBranch(run.branch);
    await this.options.logger.info(`Discarded branch '${run.branch}' and returned to '${run.previousBranch}'.`);
  }

  /** Returns the branch that was checked out before. Nothing is written on failure. */
  private async createBranch(branch: string): Promise<string> {
    const { vcs, git } = this.options;
    try {
      await vcs.ensureCleanWorkingTree({ allowDirty: git.allowDirtyWorkingTree });
      const previous = await vcs.currentBranch();
      await vcs.createIsolatedBranch(branch);
      return previous;
    } catch (error) {
      if (error instanceof BranchCreationError) throw error;
      throw new BranchCreationError(branch, { cause: error });
    }
  }

  private async remediateFile(filePath: string, issues: Issue[]): Promise<FileOutcome> {
    let snapshot: Buffer;
    try {
      snapshot = await fs.readFile(path.join(this.options.repoRoot, filePath));
    } catch (error) {
      return this.skip(filePath, issues, `could not read file: ${toError(error).message}`);
    }

    try {
      const outcome = await this.options.remediator.remediate(filePath, issues);
      if (outcome.status === 'accepted') this.snapshots.set(filePath, snapshot);
      return outcome;
    } catch (error) {
      const err = toError(error);
      await this.options.logger.error(err, `Unexpected failure while remediating ${filePath}`);
      return this.skip(filePath, issues, err.message);
    }
  }

  private async skip(filePath: string, issues: Issue[], reason: string): Promise<FileOutcome> {
    await this.options.logger.log({
      ...eventBase(this.options.runId),
      type: 'FileSkipped',
      payload: { filePath, reason },
    });
    return {
      filePath,
      status: 'skipped',
      initialIssueCount: issues.length,
      finalIssueCount: issues.length,
      attempts: [],
      transitions: [],
      error: reason,
    };
  }
}
