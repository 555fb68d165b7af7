export * from './types/index.js';
export * from './conformance/index.js';

export {
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LogContext,
  type Logger,
  configureLogging,
  resetLogging,
  createLogger,
} from './core/logger.js';

export { ConfigLoadError, loadSuiteOptions, parseSuiteOptions } from './core/config-loader.js';
export { ResponseValidator, formatFindings } from './core/response-validator.js';
export {
  validateResourceDescriptor,
  validateTimeRange,
  validateActualCostRequest,
  validateRecommendationsRequest,
} from './core/contract-rules.js';
