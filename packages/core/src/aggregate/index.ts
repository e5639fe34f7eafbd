export * from './aggregator';
export * from './collect';
