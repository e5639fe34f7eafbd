import { createHash } from 'crypto';
import { ConcurrentRemediationError, type Issue } from '@mender/shared';

export const DEFAULT_MESSAGE_PREFIX_LENGTH = 128;

export interface RuleHistory {
  lastSignature: string;
  consecutiveCount: number;
  lastMessage: string;
}

/**
 * Everything the loop remembers about one file while it is being remediated.
 */
export interface FileRemediationState {
  readonly filePath: string;
  /** Content on disk when remediation started; written back on revert */
  readonly originalContent: string;
  attemptCount: number;
  rules: Map<string, RuleHistory>;
}

/**
 * Stable identity of an issue across attempts: sha256 over rule, line and the
 * first `prefixLength` characters of the message.
 */
export function issueSignature(issue: Issue, prefixLength = DEFAULT_MESSAGE_PREFIX_LENGTH): string {
  return createHash('sha256')
    .update(`${issue.ruleId}|${issue.line}|${issue.message.slice(0, prefixLength)}`)
    .digest('hex');
}

export function escalatedGuidance(issue: Issue): string {
  const near = issue.codeSnippet.trim() || 'the highlighted section';
  return `Rule ${issue.ruleId} keeps failing; keep the existing logic near '${near}' and adjust only the guarded block to satisfy the rule without reworking the entire function.`;
}

export function basicGuidance(issue: Issue): string {
  const near = issue.codeSnippet.trim() || 'the affected lines';
  return `You failed on rule ${issue.ruleId} because ${issue.message}; avoid the prior edit by focusing changes around '${near}'.`;
}

/**
 * Turns repeated verification failures into guidance for the next prompt.
 */
export class FailureHistoryTracker {
  constructor(private readonly prefixLength = DEFAULT_MESSAGE_PREFIX_LENGTH) {}

  /**
   * Updates the per-rule history with the issues a failed candidate still had and
   * returns the guidance block for the next attempt (empty when there are no issues).
   */
  record(state: FileRemediationState, issues: Issue[]): string {
    const representatives = new Map<string, Issue>();
    for (const issue of issues) {
      if (!representatives.has(issue.ruleId)) representatives.set(issue.ruleId, issue);
    }

    const parts: string[] = [];
    for (const [ruleId, issue] of representatives) {
      const signature = issueSignature(issue, this.prefixLength);
      const previous = state.rules.get(ruleId);
      const consecutiveCount = previous?.lastSignature === signature ? previous.consecutiveCount + 1 : 1;

      state.rules.set(ruleId, { lastSignature: signature, consecutiveCount, lastMessage: issue.message });
      parts.push(consecutiveCount >= 2 ? escalatedGuidance(issue) : basicGuidance(issue));
    }
    return parts.join(' ');
  }
}

/**
 * Per-batch registry of files under remediation. At most one state per path.
 */
export class RemediationContext {
  private readonly states = new Map<string, FileRemediationState>();

  open(filePath: string, originalContent: string): FileRemediationState {
    if (this.states.has(filePath)) {
      throw new ConcurrentRemediationError(filePath);
    }
    const state: FileRemediationState = { filePath, originalContent, attemptCount: 0, rules: new Map() };
    this.states.set(filePath, state);
    return state;
  }

  get(filePath: string): FileRemediationState | undefined {
    return this.states.get(filePath);
  }

  /** Drops the state after acceptance or final revert. */
  close(filePath: string): void {
    this.states.delete(filePath);
  }

  get activeFiles(): string[] {
    return [...this.states.keys()];
  }
}
