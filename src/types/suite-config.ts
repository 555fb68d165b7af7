/**
 * Suite configuration: tunables, defaults, and the frozen per-run SuiteConfig.
 *
 * `SuiteOptions` is what callers (or a TOML file) supply; every field is
 * optional. `createSuiteConfig()` validates the options, fills in defaults
 * for the requested level, and returns an immutable `SuiteConfig`.
 */

import type { ContractMethodName, CostSourceService, ResourceDescriptor } from './contract.js';
import { CONTRACT_METHODS } from './contract.js';
import type { ConformanceLevelValue, PerformanceBaseline } from './conformance.js';
import { isConformanceLevel } from './conformance.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_TEST_TIMEOUT_MS = 60_000;
export const ADVANCED_TEST_TIMEOUT_MS = 120_000;
export const DEFAULT_CONCURRENCY_FAN_OUT = 10;
export const ADVANCED_CONCURRENCY_FAN_OUT = 50;

/**
 * Fraction above the baseline ceiling a mean latency may reach before the
 * test fails. Latency is environment-sensitive, so this is a tunable rather
 * than a universal constant.
 */
export const DEFAULT_PERFORMANCE_TOLERANCE = 0.1;
export const DEFAULT_WARMUP_ITERATIONS = 3;
export const DEFAULT_TIMED_ITERATIONS = 10;
export const DEFAULT_PERFORMANCE_BUDGET_MS = 60_000;

/** Coefficient of variation (percent) above which latency is flagged as unstable. */
export const MAX_VARIANCE_PERCENT = 10;

/** Longest delay a Node timer honours; anything longer fires after 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** True for a delay a timer can wait out: a positive integer up to MAX_TIMEOUT_MS. */
export function isTimerDelay(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_TIMEOUT_MS;
}

/** 4 MiB, the usual RPC message ceiling. */
export const DEFAULT_MAX_MESSAGE_BYTES = 4 * 1024 * 1024;

/** Latency ceilings per method. */
export const DEFAULT_BASELINES: Readonly<Record<ContractMethodName, PerformanceBaseline>> = {
  name: { standardLatencyMs: 100, advancedLatencyMs: 50 },
  supports: { standardLatencyMs: 50, advancedLatencyMs: 25 },
  getActualCost: { standardLatencyMs: 2_000, advancedLatencyMs: 1_000 },
  getProjectedCost: { standardLatencyMs: 200, advancedLatencyMs: 100 },
  getPricingSpec: { standardLatencyMs: 200, advancedLatencyMs: 100 },
  estimateCost: { standardLatencyMs: 500, advancedLatencyMs: 250 },
  getRecommendations: { standardLatencyMs: 5_000, advancedLatencyMs: 2_000 },
  getBudgets: { standardLatencyMs: 5_000, advancedLatencyMs: 2_000 },
};

export const DEFAULT_FIXTURES: Readonly<ProbeFixtures> = {
  resource: {
    provider: 'aws',
    resource_type: 'ec2',
    sku: 't3.micro',
    region: 'us-east-1',
  },
  unsupportedResource: {
    provider: 'conformance-unsupported',
    resource_type: 'nonexistent',
  },
  actualCostResourceId: 'i-conformance-0001',
  actualCostWindowHours: 24,
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Canned inputs the category modules send. */
export interface ProbeFixtures {
  /** A resource the implementation is expected to support. */
  resource: ResourceDescriptor;
  /** A resource the implementation is expected to reject. */
  unsupportedResource: ResourceDescriptor;
  actualCostResourceId: string;
  actualCostWindowHours: number;
}

export interface PerformanceSettings {
  warmupIterations: number;
  iterations: number;
  tolerance: number;
  /** Wall-clock budget for the whole Performance category. */
  budgetMs: number;
  baselines: Readonly<Record<ContractMethodName, PerformanceBaseline>>;
}

export interface SuiteOptions {
  level?: ConformanceLevelValue;
  testTimeoutMs?: number;
  concurrencyFanOut?: number;
  /**
   * Set when the process runs under a race-detecting mode. Without it the
   * Concurrency category warns that its safety evidence is unverified.
   */
  raceDetection?: boolean;
  performance?: Partial<Omit<PerformanceSettings, 'baselines'>>;
  baselines?: Partial<Record<ContractMethodName, Partial<PerformanceBaseline>>>;
  fixtures?: Partial<ProbeFixtures>;
  maxMessageBytes?: number;
}

export interface SuiteConfig {
  readonly implementation: CostSourceService;
  readonly level: ConformanceLevelValue;
  readonly testTimeoutMs: number;
  readonly concurrencyFanOut: number;
  readonly raceDetection: boolean;
  readonly performance: Readonly<PerformanceSettings>;
  readonly fixtures: Readonly<ProbeFixtures>;
  readonly maxMessageBytes: number;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export class SuiteConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SuiteConfigError';
  }
}

function requirePositiveInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new SuiteConfigError(`${field} must be a positive integer, got ${value}`);
  }
  return value;
}

function requireTimerDelay(value: number, field: string): number {
  requirePositiveInteger(value, field);
  if (!isTimerDelay(value)) {
    throw new SuiteConfigError(`${field} must be at most ${MAX_TIMEOUT_MS}ms, got ${value}`);
  }
  return value;
}

function requireNonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new SuiteConfigError(`${field} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function requirePositiveNumber(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new SuiteConfigError(`${field} must be a positive number, got ${value}`);
  }
  return value;
}

function resolveBaselines(
  overrides: SuiteOptions['baselines'],
): Record<ContractMethodName, PerformanceBaseline> {
  const resolved = { ...DEFAULT_BASELINES };
  if (!overrides) return resolved;

  for (const method of CONTRACT_METHODS) {
    const override = overrides[method];
    if (!override) continue;

    const merged: PerformanceBaseline = { ...DEFAULT_BASELINES[method], ...override };
    requirePositiveNumber(merged.standardLatencyMs, `baselines.${method}.standardLatencyMs`);
    requirePositiveNumber(merged.advancedLatencyMs, `baselines.${method}.advancedLatencyMs`);
    if (merged.maxAllocBytes !== undefined) {
      requirePositiveNumber(merged.maxAllocBytes, `baselines.${method}.maxAllocBytes`);
    }
    resolved[method] = Object.freeze(merged);
  }
  return resolved;
}

/**
 * Validate options and build the immutable configuration for one run.
 *
 * Timeout and fan-out defaults depend on the level: Advanced runs use
 * 120 s per test and 50 concurrent calls.
 *
 * @throws SuiteConfigError when a tunable is out of range.
 */
export function createSuiteConfig(
  implementation: CostSourceService,
  options: SuiteOptions = {},
): SuiteConfig {
  const level = options.level ?? 'basic';
  if (!isConformanceLevel(level)) {
    throw new SuiteConfigError(`level must be one of basic, standard, advanced, got "${String(level)}"`);
  }
  const advanced = level === 'advanced';

  const testTimeoutMs = requireTimerDelay(
    options.testTimeoutMs ?? (advanced ? ADVANCED_TEST_TIMEOUT_MS : DEFAULT_TEST_TIMEOUT_MS),
    'testTimeoutMs',
  );
  const concurrencyFanOut = requirePositiveInteger(
    options.concurrencyFanOut ??
      (advanced ? ADVANCED_CONCURRENCY_FAN_OUT : DEFAULT_CONCURRENCY_FAN_OUT),
    'concurrencyFanOut',
  );

  const perf = options.performance ?? {};
  const tolerance = perf.tolerance ?? DEFAULT_PERFORMANCE_TOLERANCE;
  if (!Number.isFinite(tolerance) || tolerance < 0 || tolerance >= 1) {
    throw new SuiteConfigError(`performance.tolerance must be in [0, 1), got ${tolerance}`);
  }

  const performance: PerformanceSettings = {
    warmupIterations: requireNonNegativeInteger(
      perf.warmupIterations ?? DEFAULT_WARMUP_ITERATIONS,
      'performance.warmupIterations',
    ),
    iterations: requirePositiveInteger(
      perf.iterations ?? DEFAULT_TIMED_ITERATIONS,
      'performance.iterations',
    ),
    tolerance,
    budgetMs: requireTimerDelay(
      perf.budgetMs ?? DEFAULT_PERFORMANCE_BUDGET_MS,
      'performance.budgetMs',
    ),
    baselines: Object.freeze(resolveBaselines(options.baselines)),
  };

  const fixtures: ProbeFixtures = { ...DEFAULT_FIXTURES, ...options.fixtures };
  if (fixtures.actualCostResourceId.length === 0) {
    throw new SuiteConfigError('fixtures.actualCostResourceId must not be empty');
  }
  requirePositiveInteger(fixtures.actualCostWindowHours, 'fixtures.actualCostWindowHours');
  if (Number.isNaN(new Date(Date.now() - fixtures.actualCostWindowHours * 3_600_000).getTime())) {
    throw new SuiteConfigError(
      'fixtures.actualCostWindowHours must start within the representable date range, ' +
        `got ${fixtures.actualCostWindowHours}`,
    );
  }

  return Object.freeze({
    implementation,
    level,
    testTimeoutMs,
    concurrencyFanOut,
    raceDetection: options.raceDetection ?? false,
    performance: Object.freeze(performance),
    fixtures: Object.freeze(fixtures),
    maxMessageBytes: requirePositiveInteger(
      options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES,
      'maxMessageBytes',
    ),
  });
}
