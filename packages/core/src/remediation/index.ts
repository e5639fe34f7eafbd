export * from './oracle';
export * from './candidate';
export * from './controller';
