/**
 * Urgency attached to a finding by the detector that produced it.
 */
export type IssuePriority = 'HIGH' | 'MEDIUM' | 'LOW';

/** Identifier of the detector that reported an issue. */
export type DetectorSource = 'pattern' | 'linter' | (string & {});

/**
 * Issue record as exchanged with external detectors (JSON wire shape).
 */
export interface WireIssue {
  rule: string;
  line: number;
  message: string;
  line_text: string;
}

/**
 * A single finding against a file, normalized across detector sources.
 */
export interface Issue {
  /** Rule identifier, e.g. `OPT-IO-001` */
  ruleId: string;
  /** 1-indexed line number */
  line: number;
  /** Human-readable explanation */
  message: string;
  /** Source text of the offending line */
  codeSnippet: string;
  /** Detector that produced the finding */
  source: DetectorSource;
  priority: IssuePriority;
  /** Before/after illustration of the fix, when the detector has one */
  fixExample?: string;
}

export const DEFAULT_ISSUE_PRIORITY: IssuePriority = 'MEDIUM';

/**
 * Builds an Issue from a wire record, filling defaults for the fields the wire shape lacks.
 */
export function fromWireIssue(
  wire: WireIssue,
  source: DetectorSource,
  priority: IssuePriority = DEFAULT_ISSUE_PRIORITY,
): Issue {
  return {
    ruleId: wire.rule,
    line: wire.line,
    message: wire.message,
    codeSnippet: wire.line_text,
    source,
    priority,
  };
}

export function toWireIssue(issue: Issue): WireIssue {
  return {
    rule: issue.ruleId,
    line: issue.line,
    message: issue.message,
    line_text: issue.codeSnippet,
  };
}

/**
 * Aggregated issues keyed by repository-relative POSIX path, in discovery order.
 */
export type IssueMap = Map<string, Issue[]>;
