import {
  applySearchReplace,
  extractFirstCodeBlock,
  isWithinSizeBounds,
  parseSearchReplace,
  type SizeRatioBounds,
} from '@mender/repo';
import type { AttemptFailure, Candidate } from '@mender/shared';

export type CandidateResolution = { ok: true; candidate: Candidate } | { ok: false; failure: AttemptFailure };

/**
 * Turns an oracle response into a candidate for the whole file.
 *
 * SEARCH/REPLACE blocks win; a response without any falls back to the first fenced
 * code block as a full replacement. Either way the candidate must lie within the
 * size bounds relative to the original.
 */
export function resolveCandidate(response: string, original: string, bounds: SizeRatioBounds): CandidateResolution {
  if (response.trim() === '') {
    return fail('EmptyResponse', 'oracle returned empty content');
  }

  const parsed = parseSearchReplace(response);
  if (parsed.status === 'malformed') {
    const { line, message } = parsed.error;
    return fail('PatchMismatch', `malformed SEARCH/REPLACE response at line ${line}: ${message}`);
  }

  let candidate: Candidate;
  if (parsed.blocks.length > 0) {
    const applied = applySearchReplace(original, parsed.blocks);
    if (!applied.applied) {
      return fail('PatchMismatch', applied.message);
    }
    candidate = { content: applied.content, provenance: 'patch' };
  } else {
    const block = extractFirstCodeBlock(response);
    if (block === undefined || block.trim() === '') {
      return fail('EmptyResponse', 'response contained no SEARCH/REPLACE block and no fenced code block');
    }
    candidate = { content: matchFinalNewline(block, original), provenance: 'full-file' };
  }

  if (candidate.content === original) {
    return fail('EmptyResponse', `${candidate.provenance === 'patch' ? 'patch' : 'replacement'} left the file unchanged`);
  }

  if (!isWithinSizeBounds(candidate.content, original, bounds)) {
    const percent = original.length === 0 ? 'non-empty' : `${Math.round((candidate.content.length / original.length) * 100)}%`;
    return fail(
      'SizeSafetyRejection',
      `candidate is ${percent} of the original size, outside ${bounds.min * 100}%-${bounds.max * 100}%`,
    );
  }

  return { ok: true, candidate };
}

/** Fenced blocks lose their final newline; restore it when the original had one. */
function matchFinalNewline(content: string, original: string): string {
  return original.endsWith('\n') && !content.endsWith('\n') ? `${content}\n` : content;
}

function fail(kind: AttemptFailure['kind'], message: string): CandidateResolution {
  return { ok: false, failure: { kind, message } };
}
