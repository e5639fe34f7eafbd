import type { RemediationEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Logging surface shared by every package.
 *
 * Structured events go through `log`/`trace`; human-facing progress goes through
 * the level methods. `child` returns a logger whose messages carry the given
 * bindings, e.g. `logger.child({ file: 'src/app.ts' }).info('attempt 2')`.
 */
export interface Logger {
  /** Persist a structured remediation event. */
  log(event: RemediationEvent): MaybePromise<void>;

  /** Persist an event together with a human-readable summary of it. */
  trace(event: RemediationEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
