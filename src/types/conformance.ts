/**
 * Conformance data model: levels, categories, per-test outcomes and the
 * aggregated certification result.
 */

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

export const ConformanceLevel = {
  BASIC: 'basic',
  STANDARD: 'standard',
  ADVANCED: 'advanced',
} as const;

export type ConformanceLevelValue = (typeof ConformanceLevel)[keyof typeof ConformanceLevel];

/** Lowest to highest. Each level implies every level before it. */
export const LEVEL_ORDER: readonly ConformanceLevelValue[] = ['basic', 'standard', 'advanced'];

/** The achieved level; `none` means below Basic. */
export type AchievedLevel = ConformanceLevelValue | 'none';

export function levelRank(level: ConformanceLevelValue): number {
  return LEVEL_ORDER.indexOf(level);
}

export function isConformanceLevel(value: unknown): value is ConformanceLevelValue {
  return value === 'basic' || value === 'standard' || value === 'advanced';
}

// ---------------------------------------------------------------------------
// Categories
// ---------------------------------------------------------------------------

export const TestCategory = {
  SPEC_VALIDATION: 'spec_validation',
  RPC_CORRECTNESS: 'rpc_correctness',
  PERFORMANCE: 'performance',
  CONCURRENCY: 'concurrency',
} as const;

export type TestCategoryValue = (typeof TestCategory)[keyof typeof TestCategory];

/** Fixed execution order. */
export const CATEGORY_ORDER: readonly TestCategoryValue[] = [
  'spec_validation',
  'rpc_correctness',
  'performance',
  'concurrency',
];

/** The lowest level at which each category is required. */
export const CATEGORY_MIN_LEVEL: Readonly<Record<TestCategoryValue, ConformanceLevelValue>> = {
  spec_validation: 'basic',
  rpc_correctness: 'basic',
  performance: 'standard',
  concurrency: 'standard',
};

export function isTestCategory(value: unknown): value is TestCategoryValue {
  return (
    value === 'spec_validation' ||
    value === 'rpc_correctness' ||
    value === 'performance' ||
    value === 'concurrency'
  );
}

// ---------------------------------------------------------------------------
// Test outcomes
// ---------------------------------------------------------------------------

export const TestStatus = {
  PASSED: 'passed',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  TIMED_OUT: 'timed_out',
  CANCELLED: 'cancelled',
} as const;

export type TestStatusValue = (typeof TestStatus)[keyof typeof TestStatus];

/** Statuses that prevent a level from being claimed. */
export const BLOCKING_STATUSES: ReadonlySet<TestStatusValue> = new Set<TestStatusValue>([
  'failed',
  'timed_out',
  'cancelled',
]);

/** A single structural violation in a response. */
export interface Finding {
  /** Dotted path to the field, e.g. `results[0].cost`. */
  field: string;
  /** The expected domain, e.g. `present` or `one of USD, EUR`. */
  expected: string;
  actual?: unknown;
}

export interface TestResult {
  /** `<RPC method>.<check>`, e.g. `GetBudgets.valid_request`. */
  name: string;
  category: TestCategoryValue;
  /** RPC method name the test exercised. */
  method: string;
  /** The level this test contributes to. */
  level: ConformanceLevelValue;
  status: TestStatusValue;
  durationMs: number;
  error?: string;
  details?: string;
  metrics?: Record<string, number>;
  findings?: Finding[];
  warnings?: string[];
}

// ---------------------------------------------------------------------------
// Aggregates
// ---------------------------------------------------------------------------

export interface StatusCounts {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  timedOut: number;
  cancelled: number;
}

export interface CategoryResult {
  category: TestCategoryValue;
  /** False when no test of this category was recorded. */
  attempted: boolean;
  counts: StatusCounts;
  /** Attempted and no blocking outcome. */
  satisfied: boolean;
  warnings: readonly string[];
  results: readonly TestResult[];
}

export interface ConformanceResult {
  version: string;
  pluginName: string;
  requestedLevel: ConformanceLevelValue;
  achievedLevel: AchievedLevel;
  categories: readonly CategoryResult[];
  summary: StatusCounts;
  summaryText: string;
  warnings: readonly string[];
  startedAt: string;
  durationMs: number;
}

/** Version of the structured report format. */
export const REPORT_VERSION = '1.0.0';

// ---------------------------------------------------------------------------
// Performance baselines
// ---------------------------------------------------------------------------

export interface PerformanceBaseline {
  /** Mean latency ceiling for Standard, in milliseconds. */
  standardLatencyMs: number;
  /** Mean latency ceiling for Advanced, in milliseconds. */
  advancedLatencyMs: number;
  /** Mean heap growth ceiling per call, in bytes. Unchecked when absent. */
  maxAllocBytes?: number;
}
