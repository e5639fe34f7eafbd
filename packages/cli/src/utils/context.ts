import path from 'node:path';
import { loadProjectConfig } from '@mender/core';
import { ConsoleLogger, JsonlLogger, Redactor, type Config, type ConfigInput, type Logger } from '@mender/shared';

/** Options shared by every command. */
export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  yes?: boolean;
};

export interface CommandContext {
  config: Config;
  repoRoot: string;
  logger: Logger;
}

/**
 * JSONL event file when `logging.jsonlPath` is set (relative to the repository
 * root), console otherwise. The configured provider keys are masked in the file.
 */
export function createLogger(config: Config, repoRoot: string): Logger {
  if (config.logging.jsonlPath) {
    const secrets = Object.values(config.providers).flatMap((p) => (p.api_key ? [p.api_key] : []));
    return new JsonlLogger(path.resolve(repoRoot, config.logging.jsonlPath), { redactor: new Redactor(secrets) });
  }
  return new ConsoleLogger({ verbose: config.logging.verbose });
}

export async function loadCommandContext(globalOpts: GlobalOptions, flags: ConfigInput = {}): Promise<CommandContext> {
  const { config, repoRoot } = await loadProjectConfig({
    configPath: globalOpts.config,
    flags: {
      ...flags,
      logging: globalOpts.verbose ? { verbose: true } : undefined,
    },
  });
  return { config, repoRoot, logger: createLogger(config, repoRoot) };
}
