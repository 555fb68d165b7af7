export {
  type ConformanceSuiteOptions,
  type EntryPointOptions,
  type RunOptions,
  ConformanceSuite,
  DEFAULT_CATEGORY_MODULES,
  categoriesForLevel,
  runBasicConformance,
  runStandardConformance,
  runAdvancedConformance,
} from './suite.js';

export {
  type CategoryContext,
  type CategoryModule,
  type ValidRequests,
  type CallResult,
  type TestIdentity,
  buildValidRequests,
  callMethod,
  cancelled,
  classifyFailure,
  runCancelled,
  capabilitySkipReason,
  identify,
  result,
  skipped,
  unexpectedError,
} from './context.js';

export { runSpecValidation } from './spec-validation.js';
export { runRpcCorrectness } from './rpc-correctness.js';
export { type LatencyStats, runPerformance, summarize, evaluateLatency } from './performance.js';
export { type FanOutState, DETERMINISTIC_METHODS, RACE_DETECTION_WARNING, runConcurrency } from './concurrency.js';

export {
  type AggregateInput,
  LEVEL_LABELS,
  aggregateCategory,
  aggregateResults,
  determineAchievedLevel,
  formatSummaryText,
} from './aggregator.js';

export {
  type CategoryState,
  type StructuredReport,
  type ReportCategory,
  type ReportTest,
  type ReportCounts,
  toStructuredReport,
  formatJsonReport,
  formatTextReport,
  formatJUnitReport,
} from './reporter.js';
