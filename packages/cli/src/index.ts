#!/usr/bin/env node
import { createProgram, reportError } from './program';
import type { GlobalOptions } from './utils/context';

async function main() {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    process.exit(reportError(e, program.opts<GlobalOptions>()));
  }
}

void main();
