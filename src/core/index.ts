export * from './interface-parser.js';
export * from './metrics-engine.js';
export * from './ranking.js';
export * from './aggregator.js';
export * from './error-analyzer.js';
