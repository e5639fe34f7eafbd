import type { Command } from 'commander';
import { RemediationSession, type BatchSummary, type FixResult, type SessionOptions } from '@mender/core';
import type { AfterBatch, BranchDisposition, Logger } from '@mender/shared';
import { OutputRenderer, toFixReport, toScanReport } from '../output/renderer';
import { confirm } from '../utils/confirm';
import { loadCommandContext, type GlobalOptions } from '../utils/context';
import { abortOnInterrupt, type InterruptSource } from '../utils/interrupt';
import { parseAfterBatch, parsePositiveInt } from '../utils/options';

export interface FixCommandOptions {
  oracle?: string;
  maxFiles?: number;
  maxAttempts?: number;
  concurrency?: number;
  afterBatch?: AfterBatch;
}

export interface FixSession {
  readonly runId: string;
  fix(options: { oracle?: string }): Promise<FixResult>;
  finalizeBranch(choice: BranchDisposition): Promise<void>;
}

export interface FixCommandDeps {
  loadContext?: typeof loadCommandContext;
  createSession?: (options: SessionOptions) => Promise<FixSession>;
  interrupts?: InterruptSource;
}

/**
 * Resolves `ask` through a prompt; keeping the branch is the default answer.
 */
export async function chooseDisposition(
  choice: AfterBatch,
  summary: BatchSummary,
  options: { yes?: boolean; logger?: Logger } = {},
): Promise<BranchDisposition> {
  if (choice !== 'ask') {
    return choice;
  }
  const keep = await confirm(
    `Keep the fixes on branch '${summary.branch}'?`,
    `${summary.fixed} fixed, ${summary.reverted} reverted, ${summary.skipped} skipped. Answering no returns to '${summary.previousBranch}' and deletes the branch.`,
    false,
    options,
  );
  return keep ? 'keep' : 'discard';
}

export function registerFixCommand(program: Command, deps: FixCommandDeps = {}) {
  const loadContext = deps.loadContext ?? loadCommandContext;
  const createSession = deps.createSession ?? RemediationSession.create;

  program
    .command('fix')
    .description('Remediate flagged files on an isolated branch')
    .option('--oracle <providerId>', 'Provider to ask for fixes (default: defaults.oracle)')
    .option('--max-files <n>', 'Process at most this many files', parsePositiveInt)
    .option('--max-attempts <n>', 'Attempts per file before reverting it', parsePositiveInt)
    .option('--concurrency <n>', 'Files remediated at the same time', parsePositiveInt)
    .option('--after-batch <choice>', 'Branch afterwards: keep, discard, ask', parseAfterBatch)
    .action(async (options: FixCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const { config, repoRoot, logger } = await loadContext(globalOpts, {
        remediation: {
          maxFiles: options.maxFiles,
          maxAttempts: options.maxAttempts,
          concurrency: options.concurrency,
        },
        git: { afterBatch: options.afterBatch },
      });

      // The first Ctrl-C cancels oracle requests; the batch then reverts what it has not finished.
      const interrupt = abortOnInterrupt(() => {
        renderer.log('Interrupted. Cancelling oracle requests; press Ctrl-C again to exit immediately.');
      }, deps.interrupts);
      let fixed: FixResult;
      let session: FixSession;
      try {
        session = await createSession({ config, repoRoot, logger, abortSignal: interrupt.signal });
        fixed = await session.fix({ oracle: options.oracle });
      } finally {
        interrupt.dispose();
      }

      const { collected, summary } = fixed;
      if (!summary) {
        renderer.renderScan(toScanReport(collected));
        return;
      }

      const disposition = await chooseDisposition(config.git.afterBatch, summary, {
        yes: globalOpts.yes,
        logger,
      });
      await session.finalizeBranch(disposition);

      renderer.renderFix(toFixReport(summary, disposition));
    });
}
