import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DetectorError, type IssuePriority } from '@mender/shared';

/** Rule table shipped with the package. */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../rules/default-rules.json', import.meta.url));

const RuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  /** RegExp flags; `g` and `y` are not allowed since rules test one line at a time */
  flags: z
    .string()
    .regex(/^[imsu]*$/)
    .default(''),
  suggestion: z.string().min(1),
  priority: z.enum(['HIGH', 'MEDIUM', 'LOW']).default('MEDIUM'),
  fixExample: z.string().optional(),
});

const RuleGroupSchema = z.object({
  name: z.string(),
  extensions: z.array(z.string().regex(/^\./, 'extensions start with a dot')).min(1),
  rules: z.array(RuleSchema),
});

export const RuleTableSchema = z.object({
  version: z.literal(1),
  groups: z.array(RuleGroupSchema),
});

export type RuleTableDocument = z.infer<typeof RuleTableSchema>;

export interface PatternRule {
  id: string;
  pattern: RegExp;
  suggestion: string;
  priority: IssuePriority;
  /** Before/after illustration handed to the oracle with the issue */
  fixExample?: string;
}

/**
 * Compiled rules indexed by lower-cased file extension.
 */
export class RuleTable {
  private readonly byExtension = new Map<string, PatternRule[]>();

  constructor(document: RuleTableDocument) {
    for (const group of document.groups) {
      const compiled = group.rules.map((rule) => compileRule(rule, group.name));
      for (const ext of group.extensions) {
        const key = ext.toLowerCase();
        this.byExtension.set(key, [...(this.byExtension.get(key) ?? []), ...compiled]);
      }
    }
  }

  /**
   * Parses and validates a rule table document.
   */
  static parse(raw: unknown, source = 'rule table'): RuleTable {
    const parsed = RuleTableSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new DetectorError(`Invalid ${source}: ${issues}`, { cause: parsed.error });
    }
    return new RuleTable(parsed.data);
  }

  static async load(filePath: string = DEFAULT_RULES_PATH): Promise<RuleTable> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new DetectorError(`Could not read rule table at ${filePath}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new DetectorError(`Rule table at ${filePath} is not valid JSON`, { cause: error });
    }
    return RuleTable.parse(raw, `rule table ${filePath}`);
  }

  rulesFor(filePath: string): PatternRule[] {
    return this.rulesForExtension(path.extname(filePath));
  }

  /** Rules for an extension given with its leading dot, e.g. `.py`. */
  rulesForExtension(extension: string): PatternRule[] {
    return this.byExtension.get(extension.toLowerCase()) ?? [];
  }

  hasRulesFor(filePath: string): boolean {
    return this.rulesFor(filePath).length > 0;
  }

  get size(): number {
    const ids = new Set<string>();
    for (const rules of this.byExtension.values()) {
      for (const rule of rules) ids.add(rule.id);
    }
    return ids.size;
  }
}

function compileRule(rule: z.infer<typeof RuleSchema>, group: string): PatternRule {
  let pattern: RegExp;
  try {
    pattern = new RegExp(rule.pattern, rule.flags);
  } catch (error) {
    throw new DetectorError(`Rule ${rule.id} in group "${group}" has an invalid pattern`, {
      cause: error,
      details: { pattern: rule.pattern },
    });
  }
  return {
    id: rule.id,
    pattern,
    suggestion: rule.suggestion,
    priority: rule.priority,
    fixExample: rule.fixExample,
  };
}
