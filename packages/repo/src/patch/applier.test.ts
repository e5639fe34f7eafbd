import { describe, expect, it } from 'vitest';
import { applySearchReplace } from './applier';

const block = (search: string, replace: string, startLine = 1) => ({ search, replace, startLine });

describe('applySearchReplace', () => {
  it('replaces the first verbatim occurrence and leaves the rest untouched', () => {
    const content = 'x = 1\ny = 2\nx = 1\n';

    const result = applySearchReplace(content, [block('x = 1', 'x = 3')]);

    expect(result).toEqual({ applied: true, content: 'x = 3\ny = 2\nx = 1\n' });
  });

  it('applies blocks in order against the running content', () => {
    const result = applySearchReplace('a\nb\n', [block('a', 'c'), block('c\nb', 'd')]);

    expect(result).toEqual({ applied: true, content: 'd\n' });
  });

  it('fails without partial output when a search is absent', () => {
    const content = 'alpha\nbeta\n';

    const result = applySearchReplace(content, [block('alpha', 'gamma'), block('missing', 'x', 7)]);

    expect(result).toEqual({
      applied: false,
      blockIndex: 1,
      reason: 'not-found',
      message: 'Block 2 (line 7): SEARCH text not found verbatim in the file',
    });
    expect(content).toBe('alpha\nbeta\n');
  });

  it('does not match on whitespace-insensitive text', () => {
    const result = applySearchReplace('    return x;\n', [block('return x;  ', 'return y;')]);

    expect(result.applied).toBe(false);
  });

  it('treats an empty search as a mismatch', () => {
    const result = applySearchReplace('abc', [block('', 'x')]);

    expect(result).toMatchObject({ applied: false, blockIndex: 0, reason: 'empty-search' });
  });

  it('returns the content unchanged for zero blocks', () => {
    expect(applySearchReplace('abc', [])).toEqual({ applied: true, content: 'abc' });
  });

  it('inserts replacement text literally', () => {
    const result = applySearchReplace('v = 1', [block('1', '$& $1')]);

    expect(result).toEqual({ applied: true, content: 'v = $& $1' });
  });
});
