import type { Command } from 'commander';
import { RemediationSession, type CollectResult, type SessionOptions } from '@mender/core';
import { OutputRenderer, toScanReport } from '../output/renderer';
import { loadCommandContext, type GlobalOptions } from '../utils/context';

export interface ScanSession {
  scan(): Promise<CollectResult>;
}

export interface ScanCommandDeps {
  loadContext?: typeof loadCommandContext;
  createSession?: (options: SessionOptions) => Promise<ScanSession>;
}

export function registerScanCommand(program: Command, deps: ScanCommandDeps = {}) {
  const loadContext = deps.loadContext ?? loadCommandContext;
  const createSession = deps.createSession ?? RemediationSession.create;

  program
    .command('scan')
    .description('Run the detectors and list flagged files without changing anything')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const { config, repoRoot, logger } = await loadContext(globalOpts);
      const session = await createSession({ config, repoRoot, logger });
      const result = await session.scan();

      renderer.renderScan(toScanReport(result));
    });
}
