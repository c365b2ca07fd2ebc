export * from './errors.js';
export * from './format.js';
export { logger, createChildLogger, getCurrentLogFile, LogLevelSchema, type UtilLogLevel } from './logger.js';
export { metrics, type AnalysisRunSample, type MetricStats } from './metrics.js';
