export * from './source-reader.js';
