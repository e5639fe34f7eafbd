export * from './semaphore';
export * from './runner';
