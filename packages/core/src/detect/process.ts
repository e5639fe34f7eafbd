import { execa } from 'execa';

export interface ProcessResult {
  /** Undefined when the process never started or was killed */
  exitCode?: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** The executable could not be spawned, e.g. it is not on PATH */
  spawnFailed: boolean;
}

export interface ProcessOptions {
  cwd: string;
  timeoutMs: number;
}

/** Runs an external tool to completion. Never rejects for a failed process. */
export type ProcessRunner = (command: string, args: string[], options: ProcessOptions) => Promise<ProcessResult>;

export const execaProcessRunner: ProcessRunner = async (command, args, options) => {
  const result = await execa(command, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs,
    reject: false,
  });
  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    spawnFailed: result.failed && result.exitCode === undefined && !result.timedOut && !result.isTerminated,
  };
};
