import { eventBase, type IssueMap, type Logger } from '@mender/shared';
import type { Detector } from '../detect';
import type { DetectorBatch, IssueAggregator } from './aggregator';

export interface CollectOptions {
  aggregator: IssueAggregator;
  logger: Logger;
  runId: string;
}

export interface CollectResult {
  issues: IssueMap;
  /** Detectors that produced a report; the only ones consulted during verification */
  detectors: Detector[];
  warnings: string[];
}

/**
 * Runs every detector's repository scan and aggregates the findings. A detector
 * that cannot produce a report is logged and left out of the run.
 */
export async function collectIssues(
  repoRoot: string,
  detectors: Detector[],
  options: CollectOptions,
): Promise<CollectResult> {
  const { aggregator, logger, runId } = options;
  const batches: DetectorBatch[] = [];
  const available: Detector[] = [];
  const warnings: string[] = [];

  for (const detector of detectors) {
    const result = await detector.scanRepository(repoRoot);
    if (!result.ok) {
      await logger.trace(
        {
          ...eventBase(runId),
          type: 'DetectorUnavailable',
          payload: { detector: detector.id, reason: `${result.error.kind}: ${result.error.message}` },
        },
        `Detector ${detector.id} skipped for this run: ${result.error.message}`,
      );
      continue;
    }
    available.push(detector);
    warnings.push(...result.warnings);
    batches.push({ source: detector.id, files: result.files });
  }

  for (const warning of warnings) {
    await logger.warn(warning);
  }

  return { issues: aggregator.aggregate(batches), detectors: available, warnings };
}
