import { describe, expect, it } from 'vitest';
import { resolveCandidate } from './candidate';

const bounds = { min: 0.5, max: 1.5 };
const original = 'def run():\n    print("a")\n    print("b")\n    return 1\n';

const patch = (search: string, replace: string) => `<<<< SEARCH\n${search}\n====\n${replace}\n>>>>`;

describe('resolveCandidate', () => {
  it('applies SEARCH/REPLACE blocks', () => {
    const result = resolveCandidate(
      `Here is the fix:\n\`\`\`\n${patch('    print("a")', '    log.info("a")')}\n\`\`\``,
      original,
      bounds,
    );

    expect(result).toEqual({
      ok: true,
      candidate: {
        content: 'def run():\n    log.info("a")\n    print("b")\n    return 1\n',
        provenance: 'patch',
      },
    });
  });

  it('rejects empty and whitespace-only responses', () => {
    expect(resolveCandidate('  \n\t', original, bounds)).toEqual({
      ok: false,
      failure: { kind: 'EmptyResponse', message: 'oracle returned empty content' },
    });
  });

  it('reports a SEARCH text that is not in the file as a mismatch', () => {
    expect(resolveCandidate(patch('print("a")\nprint("b")', 'x'), original, bounds)).toEqual({
      ok: false,
      failure: { kind: 'PatchMismatch', message: 'Block 1 (line 1): SEARCH text not found verbatim in the file' },
    });
  });

  it('reports a malformed patch as a mismatch', () => {
    const result = resolveCandidate('<<<< SEARCH\n    print("a")\n>>>>', original, bounds);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.kind).toBe('PatchMismatch');
    expect(!result.ok && result.failure.message).toMatch(/^malformed SEARCH\/REPLACE response at line 3: /);
  });

  it('treats a patch that changes nothing as empty', () => {
    expect(resolveCandidate(patch('    return 1', '    return 1'), original, bounds)).toEqual({
      ok: false,
      failure: { kind: 'EmptyResponse', message: 'patch left the file unchanged' },
    });
  });

  it('falls back to the first fenced block as a full-file candidate', () => {
    const replacement = 'def run():\n    log("a")\n    log("b")\n    return 1';

    const result = resolveCandidate(`\`\`\`python\n${replacement}\n\`\`\`\n\`\`\`\nother\n\`\`\``, original, bounds);

    expect(result).toEqual({ ok: true, candidate: { content: `${replacement}\n`, provenance: 'full-file' } });
  });

  it('rejects prose without blocks or fences', () => {
    expect(resolveCandidate('I could not find a safe fix.', original, bounds)).toEqual({
      ok: false,
      failure: {
        kind: 'EmptyResponse',
        message: 'response contained no SEARCH/REPLACE block and no fenced code block',
      },
    });
  });

  it('rejects candidates outside the size bounds', () => {
    // 11 of 54 characters.
    const result = resolveCandidate('```\ndef run():\n```', original, bounds);

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'SizeSafetyRejection', message: 'candidate is 20% of the original size, outside 50%-150%' },
    });
  });

  it('accepts candidates exactly on a bound', () => {
    const base = 'a'.repeat(10);
    const half = '```\naaaa\n```';

    expect(resolveCandidate(half, base, bounds).ok).toBe(false);
    expect(resolveCandidate('```\naaaaa\n```', base, bounds)).toEqual({
      ok: true,
      candidate: { content: 'aaaaa', provenance: 'full-file' },
    });
  });
});
