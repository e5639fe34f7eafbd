export * from './parser';
export * from './applier';
export * from './fullFile';
