import type { Issue } from '@mender/shared';

export type DetectorFailureKind =
  /** The detector's tool is not installed or could not be started */
  | 'unavailable'
  /** The tool ran but its output could not be read */
  | 'parse-failure'
  /** The tool timed out, crashed or exited without a report */
  | 'failed';

export interface DetectorFailure {
  kind: DetectorFailureKind;
  message: string;
}

export type DetectorResult = { ok: true; issues: Issue[] } | { ok: false; error: DetectorFailure };

/** Issues a detector reported for one file during a repository scan. */
export interface DetectorFinding {
  /** As reported by the detector; normalised by the aggregator */
  path: string;
  issues: Issue[];
}

export type RepositoryScanResult =
  | { ok: true; files: DetectorFinding[]; warnings: string[] }
  | { ok: false; error: DetectorFailure };

/**
 * A source of issues. `scanFile` is used to verify candidates, `scanRepository`
 * to build the initial issue map.
 */
export interface Detector {
  readonly id: string;
  scanFile(filePath: string): Promise<DetectorResult>;
  scanRepository(repoRoot: string): Promise<RepositoryScanResult>;
}
