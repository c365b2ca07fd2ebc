export * from './interface.js';
export * from './report.js';
