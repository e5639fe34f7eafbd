import type { Issue } from './issue';

/**
 * Why a remediation attempt did not end in acceptance.
 */
export type AttemptFailureKind =
  /** The oracle returned nothing usable */
  | 'EmptyResponse'
  /** A SEARCH block was not found verbatim, was ambiguous, or the patch was malformed */
  | 'PatchMismatch'
  /** Candidate length outside the safety bound */
  | 'SizeSafetyRejection'
  /** Detector output could not be obtained or parsed */
  | 'VerificationInconclusive'
  /** Transport, timeout or backend failure */
  | 'OracleError'
  /** Verified, but the issue count did not go down */
  | 'NoImprovement';

export interface AttemptFailure {
  kind: AttemptFailureKind;
  message: string;
}

/** Where a candidate came from. */
export type CandidateProvenance = 'patch' | 'full-file';

/**
 * A proposed replacement for a file's content.
 */
export interface Candidate {
  content: string;
  provenance: CandidateProvenance;
}

/**
 * Issue set recomputed for a candidate, summed across all detector sources.
 */
export interface VerificationResult {
  issueCount: number;
  issues: Issue[];
}

/**
 * States of the per-file remediation state machine.
 */
export type RemediationPhase =
  | 'Init'
  | 'Proposed'
  | 'Applied'
  | 'Verified'
  | 'Accepted'
  | 'Retrying'
  | 'Reverted';

export interface AttemptRecord {
  attempt: number;
  /** Issue count of the verified candidate, when verification ran */
  issueCount?: number;
  provenance?: CandidateProvenance;
  failure?: AttemptFailure;
}

export type FileOutcomeStatus = 'accepted' | 'reverted' | 'skipped';

export interface FileOutcome {
  filePath: string;
  status: FileOutcomeStatus;
  initialIssueCount: number;
  /** Issue count of the file as it stands on disk after the outcome */
  finalIssueCount: number;
  attempts: AttemptRecord[];
  transitions: RemediationPhase[];
  provenance?: CandidateProvenance;
  /** Reason for a skip */
  error?: string;
}

/**
 * What happens to the isolated branch once the batch is done.
 */
export type BranchDisposition = 'keep' | 'discard';
