import type { SearchReplaceBlock } from './parser';

export type PatchMismatchReason = 'not-found' | 'empty-search';

export type SearchReplaceApplyResult =
  | { applied: true; content: string }
  | {
      applied: false;
      /** 0-based index of the first block that could not be applied */
      blockIndex: number;
      reason: PatchMismatchReason;
      message: string;
    };

/**
 * Applies blocks in order, each replacing the first verbatim occurrence of its
 * `search` text in the content produced by the blocks before it.
 *
 * All-or-nothing: when any block fails, no partially patched content is returned.
 */
export function applySearchReplace(
  content: string,
  blocks: readonly SearchReplaceBlock[],
): SearchReplaceApplyResult {
  let current = content;

  for (let i = 0; i < blocks.length; i++) {
    const { search, replace, startLine } = blocks[i];

    if (search.length === 0) {
      return {
        applied: false,
        blockIndex: i,
        reason: 'empty-search',
        message: `Block ${i + 1} (line ${startLine}) has an empty SEARCH section`,
      };
    }

    const at = current.indexOf(search);
    if (at === -1) {
      return {
        applied: false,
        blockIndex: i,
        reason: 'not-found',
        message: `Block ${i + 1} (line ${startLine}): SEARCH text not found verbatim in the file`,
      };
    }

    current = current.slice(0, at) + replace + current.slice(at + search.length);
  }

  return { applied: true, content: current };
}
