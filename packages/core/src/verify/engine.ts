import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { toError, type Issue, type VerificationResult } from '@mender/shared';
import { dedupeIssues } from '../aggregate/aggregator';
import type { Detector } from '../detect';

export type VerificationOutcome =
  | { status: 'ok'; result: VerificationResult }
  | { status: 'inconclusive'; reason: string };

export interface Verifier {
  verify(filePath: string, candidate: string): Promise<VerificationOutcome>;
}

export interface VerificationEngineOptions {
  /** Parent directory for the scratch directories; defaults to the OS temp dir */
  tmpRoot?: string;
  /** Count exact duplicates across detectors once, as the aggregator does for the baseline */
  dedupe?: boolean;
}

/**
 * Recounts a candidate's issues with the run's detectors, without touching the
 * file in the repository.
 */
export class VerificationEngine implements Verifier {
  constructor(
    private readonly detectors: Detector[],
    private readonly options: VerificationEngineOptions = {},
  ) {}

  async verify(filePath: string, candidate: string): Promise<VerificationOutcome> {
    if (this.detectors.length === 0) {
      return { status: 'inconclusive', reason: 'no detectors are available for this run' };
    }

    let dir: string;
    try {
      dir = await fs.mkdtemp(path.join(this.options.tmpRoot ?? os.tmpdir(), 'mender-verify-'));
    } catch (error) {
      return { status: 'inconclusive', reason: `could not create a scratch directory: ${toError(error).message}` };
    }

    try {
      // Same extension as the target so detectors select the same rules.
      const scratchFile = path.join(dir, `candidate${path.extname(filePath)}`);
      await fs.writeFile(scratchFile, candidate, 'utf8');

      const issues: Issue[] = [];
      for (const detector of this.detectors) {
        const result = await detector.scanFile(scratchFile);
        if (!result.ok) {
          return {
            status: 'inconclusive',
            reason: `${detector.id} ${result.error.kind}: ${result.error.message}`,
          };
        }
        issues.push(...result.issues);
      }
      const counted = this.options.dedupe ? dedupeIssues(issues) : issues;
      return { status: 'ok', result: { issueCount: counted.length, issues: counted } };
    } catch (error) {
      return { status: 'inconclusive', reason: toError(error).message };
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
