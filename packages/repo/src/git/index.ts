import { execa } from 'execa';
import { BranchCreationError, GitError } from '@mender/shared';

export interface GitCommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs `git <args>` in `cwd`. Resolves for non-zero exits as well. */
export type GitRunner = (args: string[], cwd: string) => Promise<GitCommandResult>;

export const execaGitRunner: GitRunner = async (args, cwd) => {
  const result = await execa('git', args, { cwd, reject: false });
  return {
    // Undefined when git could not be spawned at all.
    exitCode: result.exitCode ?? -1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

export interface GitServiceOptions {
  repoRoot: string;
  runner?: GitRunner;
}

export class GitService {
  private readonly repoRoot: string;
  private readonly runner: GitRunner;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.runner = options.runner ?? execaGitRunner;
  }

  private async exec(args: string[]): Promise<string> {
    const result = await this.runner(args, this.repoRoot);
    if (result.exitCode !== 0) {
      throw new GitError(`Git command failed: git ${args.join(' ')}\n${result.stderr.trim()}`, {
        details: { args, exitCode: result.exitCode },
      });
    }
    return result.stdout.trim();
  }

  async getStatusPorcelain(): Promise<string> {
    return this.exec(['status', '--porcelain']);
  }

  async ensureCleanWorkingTree(options: { allowDirty?: boolean } = {}): Promise<void> {
    const status = await this.getStatusPorcelain();
    if (status && !options.allowDirty) {
      throw new GitError(
        `Working tree is dirty. Please commit or stash your changes.\n\n${status}\n\nSet 'git.allowDirtyWorkingTree: true' to bypass this check.`,
      );
    }
  }

  async currentBranch(): Promise<string> {
    return this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  /**
   * Creates `branchName` from HEAD and checks it out. An existing branch of the
   * same name is an error, never reused.
   */
  async createIsolatedBranch(branchName: string): Promise<void> {
    try {
      await this.exec(['checkout', '-b', branchName]);
    } catch (error) {
      throw new BranchCreationError(branchName, { cause: error });
    }
  }

  async checkout(branchName: string): Promise<void> {
    await this.exec(['checkout', branchName]);
  }

  async deleteBranch(branchName: string): Promise<void> {
    await this.exec(['branch', '-D', branchName]);
  }
}
