export const name = '@mender/shared';

export * from './errors';
export * from './redaction';
export * from './logger';
export * from './fs/path';
export * from './config/schema';

export * from './types/events';
export * from './types/issue';
export * from './types/llm';
export * from './types/remediation';
