import path from 'node:path';
import type { ProviderAdapter } from '@mender/adapters';
import { GitService, IgnoreFilter } from '@mender/repo';
import {
  DetectorError,
  UsageError,
  type BranchDisposition,
  type Config,
  type IssueMap,
  type Logger,
} from '@mender/shared';
import { IssueAggregator, collectIssues, type CollectResult } from './aggregate';
import { BatchRunner, type BatchSummary, type VersionControl } from './batch';
import { LinterDetector, PatternDetector, type Detector, type ProcessRunner } from './detect';
import { FailureHistoryTracker, RemediationContext } from './history';
import { PromptBuilder } from './prompt/builder';
import { createDefaultRegistry, type ProviderRegistry } from './registry';
import { ProviderOracle, RemediationController } from './remediation';
import { VerificationEngine } from './verify';

export interface SessionOptions {
  config: Config;
  repoRoot: string;
  logger: Logger;
  runId?: string;
  /** Defaults to a registry with the bundled adapter types */
  registry?: ProviderRegistry;
  /** Defaults to git in `repoRoot` */
  vcs?: VersionControl;
  /** Runs the external linter; defaults to execa */
  processRunner?: ProcessRunner;
  abortSignal?: AbortSignal;
  now?: () => number;
}

export interface FixOptions {
  /** Provider id; defaults to `defaults.oracle` */
  oracle?: string;
}

export interface FixResult {
  collected: CollectResult;
  /** Absent when there was nothing to fix */
  summary?: BatchSummary;
}

/**
 * Builds the detectors enabled in configuration. The pattern rule table path is
 * resolved against the repository root.
 */
export async function createDetectors(
  config: Config,
  repoRoot: string,
  filter: IgnoreFilter,
  processRunner?: ProcessRunner,
): Promise<Detector[]> {
  const detectors: Detector[] = [];
  const { linter, pattern } = config.detectors;
  if (linter.enabled) {
    detectors.push(new LinterDetector(linter, processRunner));
  }
  if (pattern.enabled) {
    const rulesPath = pattern.rulesPath ? path.resolve(repoRoot, pattern.rulesPath) : undefined;
    detectors.push(await PatternDetector.create({ ...pattern, rulesPath }, filter));
  }
  return detectors;
}

/**
 * One invocation against one repository: scanning, and the fix batch with its
 * post-batch branch choice.
 */
export class RemediationSession {
  readonly runId: string;
  private runner?: BatchRunner;

  private constructor(
    private readonly options: SessionOptions,
    private readonly filter: IgnoreFilter,
    private readonly detectors: Detector[],
  ) {
    this.runId = options.runId || Date.now().toString();
  }

  static async create(options: SessionOptions): Promise<RemediationSession> {
    const filter = await IgnoreFilter.load(options.repoRoot, options.config.ignore);
    const detectors = await createDetectors(options.config, options.repoRoot, filter, options.processRunner);
    return new RemediationSession(options, filter, detectors);
  }

  async scan(): Promise<CollectResult> {
    const { config, repoRoot, logger } = this.options;
    const aggregator = new IssueAggregator({ repoRoot, filter: this.filter, dedupe: config.aggregation.dedupe });
    return collectIssues(repoRoot, this.detectors, { aggregator, logger, runId: this.runId });
  }

  async fix(options: FixOptions = {}): Promise<FixResult> {
    const { config, repoRoot, logger } = this.options;
    const registry = this.options.registry ?? createDefaultRegistry(config);
    const { providerId, adapter } = registry.resolveOracle(options.oracle);

    const collected = await this.scan();
    if (collected.detectors.length === 0) {
      throw new DetectorError('No detector produced a report, so no candidate could be verified.');
    }
    if (collected.issues.size === 0) {
      await logger.info('No issues found; nothing to fix.');
      return { collected };
    }

    const summary = await this.runBatch(collected.issues, collected.detectors, providerId, adapter);
    return { collected, summary };
  }

  async finalizeBranch(choice: BranchDisposition): Promise<void> {
    if (!this.runner) {
      throw new UsageError('No batch has run yet; nothing to finalize.');
    }
    await this.runner.finalizeBranch(choice);
  }

  private async runBatch(
    issues: IssueMap,
    detectors: Detector[],
    providerId: string,
    adapter: ProviderAdapter,
  ): Promise<BatchSummary> {
    const { config, repoRoot, logger } = this.options;
    const { remediation } = config;
    const providerConfig = config.providers[providerId];

    const controller = new RemediationController({
      repoRoot,
      runId: this.runId,
      oracle: new ProviderOracle(adapter, {
        logger,
        timeoutMs: providerConfig?.timeoutMs ?? remediation.oracleTimeoutMs,
      }),
      verifier: new VerificationEngine(detectors, { dedupe: config.aggregation.dedupe }),
      promptBuilder: new PromptBuilder({
        maxTokens: providerConfig?.maxTokens,
        temperature: providerConfig?.temperature,
      }),
      tracker: new FailureHistoryTracker(remediation.messagePrefixLength),
      context: new RemediationContext(),
      logger,
      maxAttempts: remediation.maxAttempts,
      sizeBounds: remediation.sizeBounds,
      abortSignal: this.options.abortSignal,
    });

    this.runner = new BatchRunner({
      runId: this.runId,
      repoRoot,
      vcs: this.options.vcs ?? new GitService({ repoRoot }),
      remediator: controller,
      logger,
      git: config.git,
      maxFiles: remediation.maxFiles,
      concurrency: remediation.concurrency,
      now: this.options.now,
    });
    return this.runner.run(issues);
  }
}
