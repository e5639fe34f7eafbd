export const name = '@mender/core';

export * from './config/loader';
export * from './registry';
export * from './detect';
export * from './aggregate';
export * from './prompt/builder';
export * from './history';
export * from './verify';
export * from './remediation';
export * from './batch';
export * from './session';
