/**
 * One SEARCH/REPLACE edit as proposed by the oracle.
 *
 * ```
 * <<<< SEARCH
 * [exact lines from the original file]
 * ====
 * [replacement lines]
 * >>>>
 * ```
 */
export interface SearchReplaceBlock {
  search: string;
  replace: string;
  /** 1-indexed line of the `<<<< SEARCH` delimiter in the response */
  startLine: number;
}

export type PatchParseErrorKind =
  | 'UNEXPECTED_DIVIDER'
  | 'UNEXPECTED_CLOSE'
  | 'NESTED_OPEN'
  | 'MISSING_DIVIDER'
  | 'UNTERMINATED_BLOCK';

export interface PatchParseError {
  kind: PatchParseErrorKind;
  /** 1-indexed line of the response where parsing failed */
  line: number;
  message: string;
  suggestion?: string;
}

export type PatchParseResult =
  | { status: 'ok'; blocks: SearchReplaceBlock[] }
  | { status: 'malformed'; error: PatchParseError };

export const SEARCH_MARKER = '<<<< SEARCH';
export const DIVIDER_MARKER = '====';
export const CLOSE_MARKER = '>>>>';

type Delimiter = 'open' | 'divider' | 'close';

function delimiterOf(line: string): Delimiter | undefined {
  const bare = line.endsWith('\r') ? line.slice(0, -1) : line;
  if (bare === SEARCH_MARKER) return 'open';
  if (bare === DIVIDER_MARKER) return 'divider';
  if (bare === CLOSE_MARKER) return 'close';
  return undefined;
}

/**
 * Parses every SEARCH/REPLACE block in `text`.
 *
 * Delimiters must occupy a whole line. Text outside blocks (prose, code fences) is
 * ignored. Any delimiter out of sequence makes the whole response malformed; the
 * parser never skips a block it cannot read.
 */
export function parseSearchReplace(text: string): PatchParseResult {
  const lines = text.split('\n');
  const blocks: SearchReplaceBlock[] = [];

  let state: 'outside' | 'in-search' | 'in-replace' = 'outside';
  let startLine = 0;
  let search: string[] = [];
  let replace: string[] = [];

  const malformed = (
    kind: PatchParseErrorKind,
    line: number,
    message: string,
    suggestion?: string,
  ): PatchParseResult => ({ status: 'malformed', error: { kind, line, message, suggestion } });

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx];
    const lineNumber = idx + 1;
    const delimiter = delimiterOf(line);

    switch (state) {
      case 'outside':
        if (delimiter === 'open') {
          state = 'in-search';
          startLine = lineNumber;
          search = [];
          replace = [];
        } else if (delimiter === 'divider') {
          return malformed(
            'UNEXPECTED_DIVIDER',
            lineNumber,
            `"${DIVIDER_MARKER}" outside of a block`,
            `Start each block with "${SEARCH_MARKER}".`,
          );
        } else if (delimiter === 'close') {
          return malformed(
            'UNEXPECTED_CLOSE',
            lineNumber,
            `"${CLOSE_MARKER}" outside of a block`,
            `Start each block with "${SEARCH_MARKER}".`,
          );
        }
        break;

      case 'in-search':
        if (delimiter === 'divider') {
          state = 'in-replace';
        } else if (delimiter === 'open') {
          return malformed(
            'NESTED_OPEN',
            lineNumber,
            `"${SEARCH_MARKER}" inside the block opened at line ${startLine}`,
            `Close each block with "${CLOSE_MARKER}" before opening another.`,
          );
        } else if (delimiter === 'close') {
          return malformed(
            'MISSING_DIVIDER',
            lineNumber,
            `Block opened at line ${startLine} closed without "${DIVIDER_MARKER}"`,
            `Separate the search and replacement sections with "${DIVIDER_MARKER}".`,
          );
        } else {
          search.push(line);
        }
        break;

      case 'in-replace':
        if (delimiter === 'close') {
          blocks.push({ search: search.join('\n'), replace: replace.join('\n'), startLine });
          state = 'outside';
        } else if (delimiter === 'open') {
          return malformed(
            'NESTED_OPEN',
            lineNumber,
            `"${SEARCH_MARKER}" inside the block opened at line ${startLine}`,
            `Close each block with "${CLOSE_MARKER}" before opening another.`,
          );
        } else if (delimiter === 'divider') {
          return malformed(
            'UNEXPECTED_DIVIDER',
            lineNumber,
            `Second "${DIVIDER_MARKER}" in the block opened at line ${startLine}`,
          );
        } else {
          replace.push(line);
        }
        break;
    }
  }

  if (state !== 'outside') {
    return malformed(
      'UNTERMINATED_BLOCK',
      lines.length,
      `Block opened at line ${startLine} is never closed`,
      `End each block with "${CLOSE_MARKER}".`,
    );
  }

  return { status: 'ok', blocks };
}
