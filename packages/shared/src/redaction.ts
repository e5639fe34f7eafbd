const PLACEHOLDER = '[REDACTED]';

/** Literal secrets shorter than this are left alone; they would match ordinary words. */
const MIN_LITERAL_LENGTH = 8;

interface RedactionRule {
  pattern: RegExp;
  /** Receives the match and its first capture group */
  mask: (match: string, prefix: unknown) => string;
}

const mask = () => PLACEHOLDER;

// Longer key prefixes come first so they win over `sk-`.
const BUILTIN_RULES: RedactionRule[] = [
  { pattern: /sk-or-v1-[a-zA-Z0-9]{20,}/g, mask },
  { pattern: /sk-ant-[a-zA-Z0-9-]{20,}/g, mask },
  { pattern: /sk-[a-zA-Z0-9]{20,}/g, mask },
  { pattern: /\bBearer\s+[A-Za-z0-9._~+/-]+=*/g, mask: () => `Bearer ${PLACEHOLDER}` },
  {
    pattern: /\b([A-Z0-9_]*(?:TOKEN|SECRET|API_KEY))\s*=\s*['"]?[A-Za-z0-9_-]+['"]?/g,
    mask: (_match, name) => `${String(name)}=${PLACEHOLDER}`,
  },
  {
    pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
    mask,
  },
];

export interface Redaction<T> {
  value: T;
  count: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Masks provider keys and similar secrets in values bound for a log sink.
 * Besides the built-in key shapes it masks the literal secrets it is given,
 * e.g. the `api_key` values of the configured providers.
 */
export class Redactor {
  private readonly rules: RedactionRule[];

  constructor(secrets: Iterable<string> = []) {
    const literals = [...new Set(secrets)]
      .filter((s) => s.length >= MIN_LITERAL_LENGTH)
      .sort((a, b) => b.length - a.length)
      .map((s) => ({ pattern: new RegExp(escapeRegExp(s), 'g'), mask }));
    this.rules = [...literals, ...BUILTIN_RULES];
  }

  redactString(input: string): Redaction<string> {
    let value = input;
    let count = 0;
    for (const rule of this.rules) {
      value = value.replace(rule.pattern, (match: string, prefix: unknown) => {
        count++;
        return rule.mask(match, prefix);
      });
    }
    return { value, count };
  }

  redact(input: unknown): Redaction<unknown> {
    if (typeof input === 'string') {
      return this.redactString(input);
    }

    if (Array.isArray(input)) {
      let count = 0;
      const value = input.map((item) => {
        const result = this.redact(item);
        count += result.count;
        return result.value;
      });
      return { value, count };
    }

    if (typeof input === 'object' && input !== null) {
      let count = 0;
      const value: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(input)) {
        const result = this.redact(item);
        count += result.count;
        value[key] = result.value;
      }
      return { value, count };
    }

    return { value: input, count: 0 };
  }
}

const defaultRedactor = new Redactor();

/**
 * Redacts secrets from a structured value before it is written to a log sink.
 */
export function redactForLogs(input: unknown, redactor: Redactor = defaultRedactor): unknown {
  return redactor.redact(input).value;
}
