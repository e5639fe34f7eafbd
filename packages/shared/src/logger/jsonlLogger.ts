import * as fs from 'fs/promises';
import type { RemediationEvent } from '../types/events';
import { Redactor, redactForLogs } from '../redaction';
import { formatBindings, type Logger } from './types';

/**
 * Appends structured events to a JSONL file, one redacted event per line.
 * Level messages still go to the console.
 */
export interface JsonlLoggerOptions {
  bindings?: Record<string, unknown>;
  /** Defaults to the built-in key patterns only */
  redactor?: Redactor;
}

export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly redactor: Redactor;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.bindings = options.bindings ?? {};
    this.redactor = options.redactor ?? new Redactor();
  }

  async log(event: RemediationEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event, this.redactor)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: RemediationEvent, message: string): Promise<void> {
    console.log(formatBindings(this.bindings, message));
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, {
      bindings: { ...this.bindings, ...bindings },
      redactor: this.redactor,
    });
  }
}
