import type { RemediationEvent } from '../types/events';
import { formatBindings, type Logger } from './types';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LoggedMessage {
  level: LogLevel;
  message: string;
}

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  readonly events: RemediationEvent[];
  readonly messages: LoggedMessage[];
  private readonly bindings: Record<string, unknown>;

  constructor(
    bindings: Record<string, unknown> = {},
    events: RemediationEvent[] = [],
    messages: LoggedMessage[] = [],
  ) {
    this.bindings = bindings;
    this.events = events;
    this.messages = messages;
  }

  log(event: RemediationEvent): void {
    this.events.push(event);
  }

  trace(event: RemediationEvent, message: string): void {
    this.events.push(event);
    this.push('trace', message);
  }

  debug(message: string): void {
    this.push('debug', message);
  }

  info(message: string): void {
    this.push('info', message);
  }

  warn(message: string): void {
    this.push('warn', message);
  }

  error(error: Error, message?: string): void {
    this.push('error', message ? `${message}: ${error.message}` : error.message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new MemoryLogger({ ...this.bindings, ...bindings }, this.events, this.messages);
  }

  /** Events of one type, in emission order. */
  eventsOfType<T extends RemediationEvent['type']>(type: T): Extract<RemediationEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<RemediationEvent, { type: T }> => e.type === type);
  }

  private push(level: LogLevel, message: string): void {
    this.messages.push({ level, message: formatBindings(this.bindings, message) });
  }
}
