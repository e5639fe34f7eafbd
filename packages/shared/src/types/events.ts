import type { AttemptFailureKind, CandidateProvenance } from './remediation';

/**
 * Base interface for all remediation events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the batch run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a batch run starts.
 */
export interface BatchStarted extends BaseEvent {
  type: 'BatchStarted';
  payload: {
    /** Files with at least one issue */
    fileCount: number;
    /** Total issues across all files */
    issueCount: number;
    /** Files that will be processed after applying the file cap */
    plannedFiles: number;
  };
}

/** Emitted once the isolated branch is checked out */
export interface BranchCreated extends BaseEvent {
  type: 'BranchCreated';
  payload: {
    branch: string;
    previousBranch?: string;
  };
}

/** Emitted when a detector cannot be used for this run */
export interface DetectorUnavailable extends BaseEvent {
  type: 'DetectorUnavailable';
  payload: {
    detector: string;
    reason: string;
  };
}

export interface FileRemediationStarted extends BaseEvent {
  type: 'FileRemediationStarted';
  payload: {
    filePath: string;
    issueCount: number;
  };
}

export interface AttemptStarted extends BaseEvent {
  type: 'AttemptStarted';
  payload: {
    filePath: string;
    attempt: number;
    /** True when the prompt carries rule guidance from earlier failures */
    hasGuidance: boolean;
  };
}

export interface AttemptFailed extends BaseEvent {
  type: 'AttemptFailed';
  payload: {
    filePath: string;
    attempt: number;
    kind: AttemptFailureKind;
    message: string;
  };
}

export interface FileAccepted extends BaseEvent {
  type: 'FileAccepted';
  payload: {
    filePath: string;
    attempt: number;
    before: number;
    after: number;
    provenance: CandidateProvenance;
  };
}

export interface FileReverted extends BaseEvent {
  type: 'FileReverted';
  payload: {
    filePath: string;
    attempts: number;
    lastFailure?: string;
  };
}

export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    filePath: string;
    reason: string;
  };
}

export interface BatchFinished extends BaseEvent {
  type: 'BatchFinished';
  payload: {
    fixed: number;
    reverted: number;
    skipped: number;
    unprocessed: number;
    durationMs: number;
  };
}

/** Emitted before each oracle request */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/** Emitted after an oracle request settles, including retries */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    retries: number;
    error?: string;
  };
}

/**
 * Union of all remediation event types.
 */
export type RemediationEvent =
  | BatchStarted
  | BranchCreated
  | DetectorUnavailable
  | FileRemediationStarted
  | AttemptStarted
  | AttemptFailed
  | FileAccepted
  | FileReverted
  | FileSkipped
  | BatchFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;

export type RemediationEventType = RemediationEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for an event emitted now. Spread into an event literal:
 * `logger.log({ ...eventBase(runId), type: 'FileSkipped', payload })`.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
