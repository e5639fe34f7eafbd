export { ConsoleLogger } from './consoleLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export type { JsonlLoggerOptions } from './jsonlLogger';
export { MemoryLogger } from './memoryLogger';
export type { LogLevel, LoggedMessage } from './memoryLogger';
export { formatBindings } from './types';
export type { Logger, MaybePromise } from './types';
