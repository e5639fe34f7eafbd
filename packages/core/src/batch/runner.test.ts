import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { execa } from 'execa';
import { GitService } from '@mender/repo';
import { BranchCreationError, GitError, MemoryLogger, type FileOutcome, type Issue, type IssueMap } from '@mender/shared';
import { BatchRunner, type FileRemediator, type VersionControl } from './runner';

const issue = (line: number): Issue => ({
  ruleId: 'R',
  line,
  message: 'm',
  codeSnippet: 'x',
  source: 'pattern',
  priority: 'MEDIUM',
});

class FakeVcs implements VersionControl {
  readonly calls: string[] = [];
  failOn?: string;

  private async record(call: string): Promise<void> {
    this.calls.push(call);
    if (this.failOn && call.startsWith(this.failOn)) {
      throw new GitError(`Git command failed: ${call}`);
    }
  }

  ensureCleanWorkingTree(options: { allowDirty?: boolean } = {}) {
    return this.record(`clean-check allowDirty=${String(options.allowDirty)}`);
  }
  async currentBranch() {
    await this.record('current-branch');
    return 'main';
  }
  createIsolatedBranch(name: string) {
    return this.record(`create ${name}`);
  }
  checkout(name: string) {
    return this.record(`checkout ${name}`);
  }
  deleteBranch(name: string) {
    return this.record(`delete ${name}`);
  }
}

const outcome = (filePath: string, status: FileOutcome['status']): FileOutcome => ({
  filePath,
  status,
  initialIssueCount: 2,
  finalIssueCount: status === 'accepted' ? 1 : 2,
  attempts: [],
  transitions: [],
});

describe('BatchRunner', () => {
  let vcs: FakeVcs;
  let logger: MemoryLogger;
  let issueMap: IssueMap;
  let repoRoot: string;

  const runnerWith = (remediator: FileRemediator, overrides: { maxFiles?: number; concurrency?: number } = {}) =>
    new BatchRunner({
      runId: 'run-1',
      repoRoot,
      vcs,
      remediator,
      logger,
      git: { branchPrefix: 'autofix-run-', allowDirtyWorkingTree: false },
      maxFiles: overrides.maxFiles ?? 100,
      concurrency: overrides.concurrency ?? 1,
      now: () => 1_700_000_000_500,
    });

  beforeEach(async () => {
    vcs = new FakeVcs();
    logger = new MemoryLogger();
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-batch-'));
    for (const name of ['a.py', 'b.py', 'c.py']) {
      await fs.writeFile(path.join(repoRoot, name), `${name} before\n`);
    }
    issueMap = new Map([
      ['a.py', [issue(1), issue(2)]],
      ['b.py', [issue(1), issue(2)]],
      ['c.py', [issue(1), issue(2)]],
    ]);
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it('creates the branch before touching files and summarises outcomes', async () => {
    const statuses: Record<string, FileOutcome['status']> = { 'a.py': 'accepted', 'b.py': 'reverted', 'c.py': 'accepted' };
    const remediate = vi.fn(async (filePath: string) => {
      expect(vcs.calls).toContain('create autofix-run-1700000000');
      return outcome(filePath, statuses[filePath]);
    });

    const summary = await runnerWith({ remediate }).run(issueMap);

    expect(vcs.calls).toEqual(['clean-check allowDirty=false', 'current-branch', 'create autofix-run-1700000000']);
    expect(summary).toMatchObject({
      runId: 'run-1',
      branch: 'autofix-run-1700000000',
      previousBranch: 'main',
      fixed: 2,
      reverted: 1,
      skipped: 0,
      unprocessed: 0,
      durationMs: 0,
    });
    expect(summary.outcomes.map((o) => o.filePath)).toEqual(['a.py', 'b.py', 'c.py']);
    expect(logger.eventsOfType('BatchStarted')[0].payload).toEqual({ fileCount: 3, issueCount: 6, plannedFiles: 3 });
    expect(logger.eventsOfType('BatchFinished')[0].payload).toEqual({
      fixed: 2,
      reverted: 1,
      skipped: 0,
      unprocessed: 0,
      durationMs: 0,
    });
  });

  it('aborts before any file when the branch cannot be created', async () => {
    vcs.failOn = 'create';
    const remediate = vi.fn();

    const error = await runnerWith({ remediate }).run(issueMap).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BranchCreationError);
    expect(error).toMatchObject({ branch: 'autofix-run-1700000000' });
    expect(remediate).not.toHaveBeenCalled();
  });

  it('treats a dirty working tree as a branch creation failure', async () => {
    vcs.failOn = 'clean-check';
    const remediate = vi.fn();

    await expect(runnerWith({ remediate }).run(issueMap)).rejects.toThrow(BranchCreationError);
    expect(vcs.calls).toEqual(['clean-check allowDirty=false']);
    expect(remediate).not.toHaveBeenCalled();
  });

  it('caps the number of files and counts the rest as unprocessed', async () => {
    const remediate = vi.fn(async (filePath: string) => outcome(filePath, 'reverted'));

    const summary = await runnerWith({ remediate }, { maxFiles: 2 }).run(issueMap);

    expect(remediate).toHaveBeenCalledTimes(2);
    expect(summary.unprocessed).toBe(1);
    expect(summary.outcomes.map((o) => o.filePath)).toEqual(['a.py', 'b.py']);
  });

  it('counts an unexpected failure as skipped and carries on', async () => {
    const remediate = vi.fn(async (filePath: string) => {
      if (filePath === 'b.py') throw new Error('disk full');
      return outcome(filePath, 'accepted');
    });

    const summary = await runnerWith({ remediate }).run(issueMap);

    expect(summary).toMatchObject({ fixed: 2, skipped: 1 });
    expect(summary.outcomes[1]).toMatchObject({ filePath: 'b.py', status: 'skipped', error: 'disk full' });
    expect(logger.eventsOfType('FileSkipped').map((e) => e.payload)).toEqual([
      { filePath: 'b.py', reason: 'disk full' },
    ]);
    expect(logger.messages).toContainEqual({
      level: 'error',
      message: 'Unexpected failure while remediating b.py: disk full',
    });
  });

  it('skips a file that cannot be read without calling the remediator', async () => {
    await fs.rm(path.join(repoRoot, 'b.py'));
    const remediate = vi.fn(async (filePath: string) => outcome(filePath, 'accepted'));

    const summary = await runnerWith({ remediate }).run(issueMap);

    expect(remediate.mock.calls.map(([filePath]) => filePath)).toEqual(['a.py', 'c.py']);
    expect(summary.outcomes[1]).toMatchObject({ filePath: 'b.py', status: 'skipped' });
    expect(summary.outcomes[1].error).toMatch(/^could not read file: ENOENT/);
  });

  it('keeps at most `concurrency` files in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const remediate = vi.fn(async (filePath: string) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return outcome(filePath, 'accepted');
    });

    await runnerWith({ remediate }, { concurrency: 2 }).run(issueMap);

    expect(peak).toBe(2);
  });

  describe('finalizeBranch', () => {
    it('leaves the branch in place for keep', async () => {
      const runner = runnerWith({ remediate: async (filePath) => outcome(filePath, 'accepted') });
      await runner.run(issueMap);
      vcs.calls.length = 0;

      await runner.finalizeBranch('keep');

      expect(vcs.calls).toEqual([]);
    });

    it('writes back the pre-batch bytes of accepted files, returns to the previous branch and deletes the batch branch for discard', async () => {
      const runner = runnerWith({
        remediate: async (filePath) => {
          await fs.writeFile(path.join(repoRoot, filePath), 'candidate\n');
          return outcome(filePath, filePath === 'b.py' ? 'reverted' : 'accepted');
        },
      });
      await runner.run(issueMap);
      vcs.calls.length = 0;

      await runner.finalizeBranch('discard');

      expect(vcs.calls).toEqual(['checkout main', 'delete autofix-run-1700000000']);
      expect(await fs.readFile(path.join(repoRoot, 'a.py'), 'utf8')).toBe('a.py before\n');
      expect(await fs.readFile(path.join(repoRoot, 'b.py'), 'utf8')).toBe('candidate\n');
      expect(await fs.readFile(path.join(repoRoot, 'c.py'), 'utf8')).toBe('c.py before\n');
    });

    it('requires a completed run', async () => {
      await expect(runnerWith({ remediate: vi.fn() }).finalizeBranch('discard')).rejects.toThrow(
        'No batch has run yet',
      );
    });
  });
});

describe('BatchRunner on a git repository', () => {
  let repoRoot: string;
  const git = (...args: string[]) => execa('git', args, { cwd: repoRoot });

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-batch-git-'));
    await git('init', '-q');
    await fs.writeFile(path.join(repoRoot, 'a.py'), 'committed\n');
    await git('add', 'a.py');
    await git('-c', 'user.name=Test', '-c', 'user.email=test@example.com', '-c', 'commit.gpgsign=false', 'commit', '-q', '-m', 'init');
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it('keeps uncommitted edits the run started from when the batch is discarded', async () => {
    const filePath = path.join(repoRoot, 'a.py');
    await fs.writeFile(filePath, 'user uncommitted edit\n');
    const vcs = new GitService({ repoRoot });
    const previousBranch = await vcs.currentBranch();
    const runner = new BatchRunner({
      runId: 'run-1',
      repoRoot,
      vcs,
      logger: new MemoryLogger(),
      git: { branchPrefix: 'autofix-run-', allowDirtyWorkingTree: true },
      maxFiles: 10,
      concurrency: 1,
      now: () => 1_700_000_000_000,
      remediator: {
        remediate: async (file) => {
          await fs.writeFile(path.join(repoRoot, file), 'candidate\n');
          return outcome(file, 'accepted');
        },
      },
    });

    await runner.run(new Map([['a.py', [issue(1)]]]));
    expect(await vcs.currentBranch()).toBe('autofix-run-1700000000');

    await runner.finalizeBranch('discard');

    expect(await fs.readFile(filePath, 'utf8')).toBe('user uncommitted edit\n');
    expect(await vcs.currentBranch()).toBe(previousBranch);
    expect((await git('branch', '--list', 'autofix-run-*')).stdout).toBe('');
  });
});
