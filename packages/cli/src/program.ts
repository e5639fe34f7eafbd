import { Command } from 'commander';
import pkg from '../package.json';
import { AppError, ConfigError, UsageError } from '@mender/shared';
import { registerFixCommand } from './commands/fix';
import { registerScanCommand } from './commands/scan';
import type { GlobalOptions } from './utils/context';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mender')
    .description('Fix statically flagged source files through a patch-apply-verify loop')
    .version(pkg.version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--yes', 'Automatically answer "yes" to all prompts');

  registerScanCommand(program);
  registerFixCommand(program);

  return program;
}

/** 2 for errors the user can correct, 1 for everything else. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

/**
 * Prints an uncaught error the way the selected output mode expects and returns
 * the process exit code.
 */
export function reportError(error: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    const payload =
      error instanceof AppError
        ? { code: error.code, message: error.message, details: error.details }
        : { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
    console.log(JSON.stringify({ error: payload }));
  } else {
    console.error(`Error: ${(error instanceof Error && error.message) || String(error)}`);
    if (error instanceof AppError && error.details) {
      console.error(
        `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
      );
    }
    if (opts.verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }
  return exitCodeFor(error);
}
