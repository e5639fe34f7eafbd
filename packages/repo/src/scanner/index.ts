export * from './rules';
export * from './patternScanner';
export * from './ignore';
export * from './walk';
