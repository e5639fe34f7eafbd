import { z } from 'zod';

export const ProviderConfigSchema = z
  .object({
    type: z.string(),
    model: z.string(),
    api_key_env: z.string().optional(),
    api_key: z.string().optional(),
    /** OpenAI-compatible endpoint, e.g. OpenRouter or a local server */
    base_url: z.string().url().optional(),
    timeoutMs: z.number().int().positive().optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
  })
  .passthrough();

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const SizeBoundsSchema = z
  .object({
    min: z.number().positive().default(0.5),
    max: z.number().positive().default(1.5),
  })
  .refine((b) => b.min <= b.max, {
    message: '`sizeBounds.min` must not exceed `sizeBounds.max`.',
    path: ['min'],
  });

export type SizeBounds = z.infer<typeof SizeBoundsSchema>;

export const RemediationConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  maxFiles: z.number().int().min(1).default(100),
  concurrency: z.number().int().min(1).default(1),
  oracleTimeoutMs: z.number().int().positive().default(120_000),
  sizeBounds: SizeBoundsSchema.default({ min: 0.5, max: 1.5 }),
  messagePrefixLength: z.number().int().positive().default(128),
});

export type RemediationConfig = z.infer<typeof RemediationConfigSchema>;

export const DetectorsConfigSchema = z.object({
  pattern: z
    .object({
      enabled: z.boolean().default(true),
      /** JSON rule table replacing the bundled one */
      rulesPath: z.string().optional(),
    })
    .default({ enabled: true }),
  linter: z
    .object({
      enabled: z.boolean().default(true),
      command: z.string().default('tscanner'),
      /** Extra arguments appended after `check <path> --format json` */
      args: z.array(z.string()).default([]),
      timeoutMs: z.number().int().positive().default(60_000),
    })
    .default({ enabled: true, command: 'tscanner', args: [], timeoutMs: 60_000 }),
});

export type DetectorsConfig = z.infer<typeof DetectorsConfigSchema>;

/**
 * Entries here are added to the bundled ignore defaults unless `useDefaults` is false.
 */
export const IgnoreConfigSchema = z.object({
  useDefaults: z.boolean().default(true),
  dirs: z.array(z.string()).default([]),
  extensions: z.array(z.string()).default([]),
  backupMarkers: z.array(z.string()).default(['_backup', 'backup_']),
  /** gitignore-style patterns */
  patterns: z.array(z.string()).default([]),
});

export type IgnoreConfig = z.infer<typeof IgnoreConfigSchema>;

export const AfterBatchSchema = z.enum(['keep', 'discard', 'ask']);
export type AfterBatch = z.infer<typeof AfterBatchSchema>;

export const GitConfigSchema = z.object({
  branchPrefix: z.string().min(1).default('autofix-run-'),
  afterBatch: AfterBatchSchema.default('keep'),
  allowDirtyWorkingTree: z.boolean().default(false),
});

export type GitConfig = z.infer<typeof GitConfigSchema>;

export const ConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    providers: z.record(z.string(), ProviderConfigSchema).default({}),
    defaults: z
      .object({
        oracle: z.string().optional(),
      })
      .default({}),
    remediation: RemediationConfigSchema.default({}),
    detectors: DetectorsConfigSchema.default({}),
    ignore: IgnoreConfigSchema.default({}),
    aggregation: z
      .object({
        dedupe: z.boolean().default(false),
      })
      .default({ dedupe: false }),
    git: GitConfigSchema.default({}),
    logging: z
      .object({
        jsonlPath: z.string().optional(),
        verbose: z.boolean().default(false),
      })
      .default({ verbose: false }),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
