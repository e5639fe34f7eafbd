/**
 * Body of the first fenced code block in `text`, or undefined when there is none.
 * The opening fence may carry a language tag; an unclosed fence runs to the end.
 */
export function extractFirstCodeBlock(text: string): string | undefined {
  const body: string[] = [];
  let inBlock = false;

  for (const line of text.split('\n')) {
    if (line.trim().startsWith('```')) {
      if (inBlock) break;
      inBlock = true;
      continue;
    }
    if (inBlock) {
      body.push(line);
    }
  }

  return body.length > 0 ? body.join('\n') : undefined;
}

export interface SizeRatioBounds {
  min: number;
  max: number;
}

/**
 * Whether `candidate.length` lies within `[min, max]` times `original.length`, inclusive.
 * An empty original only admits an empty candidate.
 */
export function isWithinSizeBounds(
  candidate: string,
  original: string,
  bounds: SizeRatioBounds,
): boolean {
  if (original.length === 0) {
    return candidate.length === 0;
  }
  const ratio = candidate.length / original.length;
  return ratio >= bounds.min && ratio <= bounds.max;
}
