import * as fs from 'fs/promises';
import * as path from 'path';
import {
  eventBase,
  toError,
  type AttemptFailure,
  type AttemptRecord,
  type Candidate,
  type FileOutcome,
  type Issue,
  type Logger,
  type RemediationPhase,
  type SizeBounds,
} from '@mender/shared';
import type { FailureHistoryTracker, RemediationContext } from '../history';
import type { PromptBuilder } from '../prompt/builder';
import type { Verifier } from '../verify';
import { resolveCandidate } from './candidate';
import type { Oracle } from './oracle';

export interface RemediationControllerOptions {
  repoRoot: string;
  runId: string;
  oracle: Oracle;
  verifier: Verifier;
  promptBuilder: PromptBuilder;
  tracker: FailureHistoryTracker;
  context: RemediationContext;
  logger: Logger;
  maxAttempts: number;
  sizeBounds: SizeBounds;
  abortSignal?: AbortSignal;
}

type AttemptResult =
  | { accepted: true; candidate: Candidate; issueCount: number }
  | {
      accepted: false;
      failure: AttemptFailure;
      issueCount?: number;
      provenance?: Candidate['provenance'];
      /** Issues the verified candidate still had */
      remaining?: Issue[];
    };

/**
 * Drives one file through propose, apply, verify and accept-or-retry until it is
 * accepted or out of attempts. The file on disk changes only on acceptance, and
 * holds its original bytes again after a revert.
 */
export class RemediationController {
  constructor(private readonly options: RemediationControllerOptions) {}

  /**
   * @param filePath repository-relative POSIX path
   * @param issues the file's aggregated issues; their count is the baseline to beat
   */
  async remediate(filePath: string, issues: Issue[]): Promise<FileOutcome> {
    const { context, runId } = this.options;
    const logger = this.options.logger.child({ file: filePath });
    const absolutePath = path.join(this.options.repoRoot, filePath);
    const baseline = issues.length;

    const original = await readText(absolutePath);
    if (!original.ok) {
      await logger.trace(
        { ...eventBase(runId), type: 'FileSkipped', payload: { filePath, reason: original.reason } },
        `Skipped: ${original.reason}`,
      );
      return {
        filePath,
        status: 'skipped',
        initialIssueCount: baseline,
        finalIssueCount: baseline,
        attempts: [],
        transitions: [],
        error: original.reason,
      };
    }

    const state = context.open(filePath, original.content);
    const transitions: RemediationPhase[] = ['Init'];
    const attempts: AttemptRecord[] = [];

    try {
      await logger.log({
        ...eventBase(runId),
        type: 'FileRemediationStarted',
        payload: { filePath, issueCount: baseline },
      });

      let currentIssues = issues;
      let failureNote = 'initial pass';
      let guidance = '';

      for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
        if (this.options.abortSignal?.aborted) {
          failureNote = 'interrupted';
          break;
        }
        state.attemptCount = attempt;

        await logger.log({
          ...eventBase(runId),
          type: 'AttemptStarted',
          payload: { filePath, attempt, hasGuidance: guidance !== '' },
        });

        const result = await this.attempt(
          { filePath, original: original.content, issues: currentIssues, attempt, failureNote, guidance, baseline },
          transitions,
        );

        if (result.accepted) {
          await fs.writeFile(absolutePath, result.candidate.content, 'utf8');
          transitions.push('Accepted');
          attempts.push({ attempt, issueCount: result.issueCount, provenance: result.candidate.provenance });
          await logger.trace(
            {
              ...eventBase(runId),
              type: 'FileAccepted',
              payload: {
                filePath,
                attempt,
                before: baseline,
                after: result.issueCount,
                provenance: result.candidate.provenance,
              },
            },
            `Accepted on attempt ${attempt}: ${baseline} -> ${result.issueCount} issues`,
          );
          return {
            filePath,
            status: 'accepted',
            initialIssueCount: baseline,
            finalIssueCount: result.issueCount,
            attempts,
            transitions,
            provenance: result.candidate.provenance,
          };
        }

        attempts.push({
          attempt,
          issueCount: result.issueCount,
          provenance: result.provenance,
          failure: result.failure,
        });
        failureNote = result.failure.message;
        if (result.remaining) {
          guidance = this.options.tracker.record(state, result.remaining);
          if (result.remaining.length > 0) currentIssues = result.remaining;
        }
        await logger.trace(
          {
            ...eventBase(runId),
            type: 'AttemptFailed',
            payload: { filePath, attempt, kind: result.failure.kind, message: result.failure.message },
          },
          `Attempt ${attempt} failed (${result.failure.kind}): ${result.failure.message}`,
        );
        if (attempt < this.options.maxAttempts) transitions.push('Retrying');
      }

      await fs.writeFile(absolutePath, original.content, 'utf8');
      transitions.push('Reverted');
      await logger.trace(
        {
          ...eventBase(runId),
          type: 'FileReverted',
          payload: { filePath, attempts: attempts.length, lastFailure: failureNote },
        },
        `Reverted after ${attempts.length} attempts: ${failureNote}`,
      );
      return {
        filePath,
        status: 'reverted',
        initialIssueCount: baseline,
        finalIssueCount: baseline,
        attempts,
        transitions,
      };
    } finally {
      context.close(filePath);
    }
  }

  private async attempt(
    input: {
      filePath: string;
      original: string;
      issues: Issue[];
      attempt: number;
      failureNote: string;
      guidance: string;
      baseline: number;
    },
    transitions: RemediationPhase[],
  ): Promise<AttemptResult> {
    const { oracle, verifier, promptBuilder, runId, abortSignal } = this.options;

    const request = promptBuilder.build({
      filePath: input.filePath,
      issues: input.issues,
      content: input.original,
      attempt: input.attempt,
      failureNote: input.failureNote,
      guidance: input.guidance,
    });

    const response = await oracle.propose(request, { runId, abortSignal });
    if (!response.ok) {
      return { accepted: false, failure: { kind: 'OracleError', message: response.error.message } };
    }
    transitions.push('Proposed');

    const resolved = resolveCandidate(response.text, input.original, this.options.sizeBounds);
    if (!resolved.ok) {
      return { accepted: false, failure: resolved.failure };
    }
    transitions.push('Applied');

    const verified = await verifier.verify(input.filePath, resolved.candidate.content);
    if (verified.status === 'inconclusive') {
      return {
        accepted: false,
        provenance: resolved.candidate.provenance,
        failure: { kind: 'VerificationInconclusive', message: `verification inconclusive: ${verified.reason}` },
      };
    }
    transitions.push('Verified');

    const { issueCount } = verified.result;
    if (issueCount < input.baseline) {
      return { accepted: true, candidate: resolved.candidate, issueCount };
    }

    return {
      accepted: false,
      issueCount,
      provenance: resolved.candidate.provenance,
      failure: {
        kind: 'NoImprovement',
        message: issueCount === input.baseline ? `issue count stayed at ${issueCount}` : `issue count rose to ${issueCount}`,
      },
      remaining: verified.result.issues,
    };
  }
}

async function readText(filePath: string): Promise<{ ok: true; content: string } | { ok: false; reason: string }> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    return { ok: false, reason: `could not read file: ${toError(error).message}` };
  }
  const content = bytes.toString('utf8');
  // A revert must restore the exact bytes, so content has to survive a round trip.
  if (!Buffer.from(content, 'utf8').equals(bytes)) {
    return { ok: false, reason: 'file is not valid UTF-8 text' };
  }
  return { ok: true, content };
}
