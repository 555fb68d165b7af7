/**
 * Conformance suite: binds an implementation to a fresh transport harness,
 * runs the category modules in their fixed order and aggregates the
 * outcome into a certification.
 *
 * Contract problems always come back as data in the ConformanceResult.
 * Only infrastructure failures throw: HarnessError when the harness
 * cannot be set up, SuiteConfigError for invalid tunables.
 *
 * Usage:
 *   const suite = ConformanceSuite.create(plugin, { level: 'standard' });
 *   const result = await suite.run();
 *   console.log(formatTextReport(result));
 */

import { randomUUID } from 'node:crypto';
import type { CapabilityFlags, CostSourceService } from '../types/contract.js';
import type {
  CategoryResult,
  ConformanceLevelValue,
  ConformanceResult,
  TestCategoryValue,
  TestResult,
} from '../types/conformance.js';
import { BLOCKING_STATUSES, CATEGORY_ORDER, levelRank } from '../types/conformance.js';
import type { SuiteConfig, SuiteOptions } from '../types/suite-config.js';
import { createSuiteConfig } from '../types/suite-config.js';
import { isRpcError } from '../types/status.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { ResponseValidator } from '../core/response-validator.js';
import type { CostSourceClient } from '../testing/cost-source-client.js';
import type { TransportHarnessOptions } from '../testing/transport-harness.js';
import { TransportHarness, assertCostSourceService } from '../testing/transport-harness.js';
import type { CategoryContext, CategoryModule } from './context.js';
import { buildValidRequests } from './context.js';
import { runSpecValidation } from './spec-validation.js';
import { runRpcCorrectness } from './rpc-correctness.js';
import { runPerformance } from './performance.js';
import { runConcurrency } from './concurrency.js';
import { aggregateCategory, aggregateResults } from './aggregator.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConformanceSuiteOptions extends SuiteOptions {
  /** Channel settings for the harness each run binds. Limits and timeouts come from the suite config. */
  harness?: Pick<TransportHarnessOptions, 'address' | 'createChannel'>;
  logger?: Logger;
}

export interface RunOptions {
  /**
   * Aborting cancels the calls in flight and stops new checks from being
   * dispatched. Affected checks are reported cancelled.
   */
  signal?: AbortSignal;
}

/** Category modules in their default registration. */
export const DEFAULT_CATEGORY_MODULES: Readonly<Record<TestCategoryValue, CategoryModule>> = {
  spec_validation: runSpecValidation,
  rpc_correctness: runRpcCorrectness,
  performance: runPerformance,
  concurrency: runConcurrency,
};

/** Categories a run at `level` executes, in order. */
export function categoriesForLevel(level: ConformanceLevelValue): TestCategoryValue[] {
  return levelRank(level) >= levelRank('standard')
    ? [...CATEGORY_ORDER]
    : CATEGORY_ORDER.filter((c) => c === 'spec_validation' || c === 'rpc_correctness');
}

const UNKNOWN_PLUGIN_NAME = 'unknown';

interface RunOutput {
  pluginName: string;
  results: TestResult[];
  warnings: string[];
}

// ---------------------------------------------------------------------------
// ConformanceSuite
// ---------------------------------------------------------------------------

export class ConformanceSuite {
  private readonly modules: Record<TestCategoryValue, CategoryModule> = { ...DEFAULT_CATEGORY_MODULES };
  private readonly validator = new ResponseValidator();
  private readonly logger: Logger;

  private constructor(
    private readonly options: ConformanceSuiteOptions,
    readonly config: SuiteConfig,
  ) {
    this.logger = options.logger ?? createLogger('suite');
  }

  /**
   * Validate the implementation and options up front.
   *
   * @throws HarnessError INVALID_IMPLEMENTATION when a required method is missing.
   * @throws SuiteConfigError when a tunable is out of range.
   */
  static create(implementation: CostSourceService, options: ConformanceSuiteOptions = {}): ConformanceSuite {
    assertCostSourceService(implementation);
    return new ConformanceSuite(options, createSuiteConfig(implementation, options));
  }

  /** Replace the module that runs `category`. */
  registerCategory(category: TestCategoryValue, module: CategoryModule): this {
    this.modules[category] = module;
    return this;
  }

  /**
   * Run every category the level requires and aggregate the result.
   * Later categories still run when earlier ones fail.
   */
  async run(level: ConformanceLevelValue = this.config.level, options: RunOptions = {}): Promise<ConformanceResult> {
    const config =
      level === this.config.level
        ? this.config
        : createSuiteConfig(this.config.implementation, { ...this.options, level });
    const startedAt = new Date().toISOString();
    const started = performance.now();

    const output = await this.execute(config, categoriesForLevel(level), options.signal);
    const result = aggregateResults({
      pluginName: output.pluginName,
      requestedLevel: level,
      results: output.results,
      startedAt,
      durationMs: performance.now() - started,
      runWarnings: output.warnings,
    });

    this.logger.info(result.summaryText, {
      plugin: result.pluginName,
      achieved: result.achievedLevel,
      duration_ms: result.durationMs,
    });
    return result;
  }

  /** Run a single category in isolation, at the configured level. */
  async runCategory(category: TestCategoryValue, options: RunOptions = {}): Promise<CategoryResult> {
    const output = await this.execute(this.config, [category], options.signal);
    return aggregateCategory(category, output.results);
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private async execute(
    config: SuiteConfig,
    categories: readonly TestCategoryValue[],
    signal: AbortSignal | undefined,
  ): Promise<RunOutput> {
    const logger = this.logger.withContext({ run: randomUUID() });
    const harness = new TransportHarness({
      ...this.options.harness,
      limits: { maxMessageBytes: config.maxMessageBytes },
      defaultTimeoutMs: config.testTimeoutMs,
      logger: logger.child('harness'),
    });

    const onAbort = (): void => logger.warn('run cancelled by caller; remaining checks are reported cancelled');

    const client = await harness.start(config.implementation);
    try {
      if (signal?.aborted) onAbort();
      else signal?.addEventListener('abort', onAbort, { once: true });

      const warnings: string[] = [];
      const probe: ProbeScope = { client, config, logger, signal, warnings };
      const pluginName = await probeName(probe);
      const ctx: CategoryContext = {
        client,
        config,
        level: config.level,
        capabilities: await probeCapabilities(probe),
        requests: buildValidRequests(config.fixtures),
        validator: this.validator,
        logger,
        signal,
      };

      const results: TestResult[] = [];
      for (const category of categories) {
        results.push(...(await this.runModule(category, ctx)));
      }
      return { pluginName, results, warnings };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await harness.stop();
    }
  }

  private async runModule(category: TestCategoryValue, base: CategoryContext): Promise<TestResult[]> {
    const logger = base.logger.withContext({ category }).child(category);
    const started = performance.now();
    logger.debug('category started');

    const results = await this.modules[category]({ ...base, logger });

    for (const r of results) {
      const meta = { method: r.method, test: r.name, status: r.status, duration_ms: r.durationMs };
      if (BLOCKING_STATUSES.has(r.status)) {
        logger.warn(r.error ?? 'test did not pass', meta);
      } else {
        logger.debug('test finished', meta);
      }
    }
    logger.info('category finished', {
      tests: results.length,
      blocking: results.filter((r) => BLOCKING_STATUSES.has(r.status)).length,
      duration_ms: performance.now() - started,
    });
    return results;
  }
}

// ---------------------------------------------------------------------------
// Probes
// ---------------------------------------------------------------------------

interface ProbeScope {
  client: CostSourceClient;
  config: SuiteConfig;
  logger: Logger;
  signal: AbortSignal | undefined;
  /** Run warnings reported alongside the results. */
  warnings: string[];
}

async function probeName({ client, config, logger, signal }: ProbeScope): Promise<string> {
  try {
    const response: unknown = await client.name({ timeoutMs: config.testTimeoutMs, signal });
    const name = field(response, 'name');
    return typeof name === 'string' && name.length > 0 ? name : UNKNOWN_PLUGIN_NAME;
  } catch (err) {
    if (!isRpcError(err)) throw err;
    logger.warn('Name probe failed; reporting plugin as unknown', { status: err.code });
    return UNKNOWN_PLUGIN_NAME;
  }
}

/** Capability flags Supports advertises for the fixture resource; none when it fails. */
async function probeCapabilities({ client, config, logger, signal, warnings }: ProbeScope): Promise<CapabilityFlags> {
  try {
    const response: unknown = await client.supports(
      { resource: config.fixtures.resource },
      { timeoutMs: config.testTimeoutMs, signal },
    );
    if (field(response, 'supported') !== true) {
      logger.warn('probe resource reported unsupported', { reason: field(response, 'reason') });
    }
    return capabilityFlags(field(response, 'capabilities'));
  } catch (err) {
    if (!isRpcError(err)) throw err;
    // A cancelled run reports its checks cancelled; the probe adds nothing.
    if (signal?.aborted) return {};
    logger.warn('capability probe failed; optional checks will be skipped', { status: err.code });
    warnings.push(`capability probe failed (${err.describe()}); optional methods are treated as not advertised`);
    return {};
  }
}

// Probe responses are read as the plugin sent them, unvalidated.
function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function capabilityFlags(value: unknown): CapabilityFlags {
  const flags: CapabilityFlags = {};
  if (typeof value !== 'object' || value === null) return flags;
  for (const [key, enabled] of Object.entries(value)) {
    if (typeof enabled === 'boolean') flags[key] = enabled;
  }
  return flags;
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export type EntryPointOptions = Omit<ConformanceSuiteOptions, 'level'>;

export function runBasicConformance(
  implementation: CostSourceService,
  options: EntryPointOptions = {},
): Promise<ConformanceResult> {
  return ConformanceSuite.create(implementation, { ...options, level: 'basic' }).run();
}

export function runStandardConformance(
  implementation: CostSourceService,
  options: EntryPointOptions = {},
): Promise<ConformanceResult> {
  return ConformanceSuite.create(implementation, { ...options, level: 'standard' }).run();
}

export function runAdvancedConformance(
  implementation: CostSourceService,
  options: EntryPointOptions = {},
): Promise<ConformanceResult> {
  return ConformanceSuite.create(implementation, { ...options, level: 'advanced' }).run();
}
