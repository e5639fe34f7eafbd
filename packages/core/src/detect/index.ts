export * from './types';
export * from './process';
export * from './pattern';
export * from './linter';
