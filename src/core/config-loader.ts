/**
 * TOML-based configuration loader for conformance runs.
 *
 * Reads a suite file (conventionally `conformance.toml`), parses it with
 * smol-toml and maps its snake_case keys onto `SuiteOptions`. Only shapes
 * and types are checked here; ranges are checked by `createSuiteConfig()`.
 *
 *   level = "standard"
 *   test_timeout_ms = 30000
 *   concurrency_fan_out = 20
 *   race_detection = false
 *
 *   [performance]
 *   warmup_iterations = 3
 *   iterations = 10
 *   tolerance = 0.1
 *   budget_ms = 60000
 *
 *   [performance.baselines.GetProjectedCost]
 *   standard_latency_ms = 150
 *
 *   [transport]
 *   max_message_bytes = 4194304
 *
 *   [fixtures]
 *   actual_cost_resource_id = "i-0abc"
 *   [fixtures.resource]
 *   provider = "aws"
 *   resource_type = "ec2"
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import type { ContractMethodName, ResourceDescriptor } from '../types/contract.js';
import { CONTRACT_METHODS, RPC_METHOD_NAMES } from '../types/contract.js';
import type { PerformanceBaseline } from '../types/conformance.js';
import { isConformanceLevel } from '../types/conformance.js';
import type { ProbeFixtures, SuiteOptions } from '../types/suite-config.js';

export class ConfigLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// loadSuiteOptions()
// ---------------------------------------------------------------------------

/**
 * Load suite options from a TOML file.
 *
 * A missing or empty file yields `{}`, so every default applies.
 *
 * @throws ConfigLoadError on unreadable files, TOML syntax errors and
 *   keys of the wrong shape.
 */
export function loadSuiteOptions(path: string): SuiteOptions {
  if (!existsSync(path)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`could not read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (content.trim().length === 0) {
    return {};
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    throw new ConfigLoadError(`invalid TOML in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseSuiteOptions(raw);
}

// ---------------------------------------------------------------------------
// parseSuiteOptions()
// ---------------------------------------------------------------------------

const TOP_LEVEL_KEYS = [
  'level',
  'test_timeout_ms',
  'concurrency_fan_out',
  'race_detection',
  'performance',
  'transport',
  'fixtures',
];
const PERFORMANCE_KEYS = ['warmup_iterations', 'iterations', 'tolerance', 'budget_ms', 'baselines'];
const BASELINE_KEYS = ['standard_latency_ms', 'advanced_latency_ms', 'max_alloc_bytes'];
const TRANSPORT_KEYS = ['max_message_bytes'];
const FIXTURE_KEYS = ['resource', 'unsupported_resource', 'actual_cost_resource_id', 'actual_cost_window_hours'];
const RESOURCE_KEYS = ['provider', 'resource_type', 'sku', 'region', 'tags'];

const METHOD_BY_RPC_NAME: ReadonlyMap<string, ContractMethodName> = new Map(
  CONTRACT_METHODS.map((method) => [RPC_METHOD_NAMES[method], method]),
);

/** Map a parsed TOML document onto `SuiteOptions`. Unknown keys are rejected. */
export function parseSuiteOptions(raw: Record<string, unknown>): SuiteOptions {
  rejectUnknownKeys(raw, TOP_LEVEL_KEYS, '');
  const options: SuiteOptions = {};

  // --- top level ---
  const level = raw['level'];
  if (level !== undefined) {
    if (!isConformanceLevel(level)) {
      throw new ConfigLoadError(`level must be one of basic, standard, advanced, got ${JSON.stringify(level)}`);
    }
    options.level = level;
  }
  const testTimeoutMs = optionalNumber(raw, 'test_timeout_ms', '');
  if (testTimeoutMs !== undefined) options.testTimeoutMs = testTimeoutMs;
  const fanOut = optionalNumber(raw, 'concurrency_fan_out', '');
  if (fanOut !== undefined) options.concurrencyFanOut = fanOut;
  const raceDetection = raw['race_detection'];
  if (raceDetection !== undefined) {
    if (typeof raceDetection !== 'boolean') {
      throw new ConfigLoadError('race_detection must be a boolean');
    }
    options.raceDetection = raceDetection;
  }

  // --- performance ---
  const performance = optionalTable(raw, 'performance', '');
  if (performance) {
    rejectUnknownKeys(performance, PERFORMANCE_KEYS, 'performance.');
    const settings: NonNullable<SuiteOptions['performance']> = {};
    const warmup = optionalNumber(performance, 'warmup_iterations', 'performance.');
    if (warmup !== undefined) settings.warmupIterations = warmup;
    const iterations = optionalNumber(performance, 'iterations', 'performance.');
    if (iterations !== undefined) settings.iterations = iterations;
    const tolerance = optionalNumber(performance, 'tolerance', 'performance.');
    if (tolerance !== undefined) settings.tolerance = tolerance;
    const budgetMs = optionalNumber(performance, 'budget_ms', 'performance.');
    if (budgetMs !== undefined) settings.budgetMs = budgetMs;
    options.performance = settings;

    const baselines = optionalTable(performance, 'baselines', 'performance.');
    if (baselines) options.baselines = parseBaselines(baselines);
  }

  // --- transport ---
  const transport = optionalTable(raw, 'transport', '');
  if (transport) {
    rejectUnknownKeys(transport, TRANSPORT_KEYS, 'transport.');
    const maxMessageBytes = optionalNumber(transport, 'max_message_bytes', 'transport.');
    if (maxMessageBytes !== undefined) options.maxMessageBytes = maxMessageBytes;
  }

  // --- fixtures ---
  const fixtures = optionalTable(raw, 'fixtures', '');
  if (fixtures) options.fixtures = parseFixtures(fixtures);

  return options;
}

function parseBaselines(table: Record<string, unknown>): NonNullable<SuiteOptions['baselines']> {
  const baselines: NonNullable<SuiteOptions['baselines']> = {};

  for (const [rpcName, value] of Object.entries(table)) {
    const method = METHOD_BY_RPC_NAME.get(rpcName);
    if (!method) {
      throw new ConfigLoadError(
        `performance.baselines.${rpcName} is not a contract method ` +
          `(expected one of ${[...METHOD_BY_RPC_NAME.keys()].join(', ')})`,
      );
    }
    const prefix = `performance.baselines.${rpcName}.`;
    if (!isTable(value)) {
      throw new ConfigLoadError(`performance.baselines.${rpcName} must be a table`);
    }
    rejectUnknownKeys(value, BASELINE_KEYS, prefix);

    const baseline: Partial<PerformanceBaseline> = {};
    const standard = optionalNumber(value, 'standard_latency_ms', prefix);
    if (standard !== undefined) baseline.standardLatencyMs = standard;
    const advanced = optionalNumber(value, 'advanced_latency_ms', prefix);
    if (advanced !== undefined) baseline.advancedLatencyMs = advanced;
    const maxAlloc = optionalNumber(value, 'max_alloc_bytes', prefix);
    if (maxAlloc !== undefined) baseline.maxAllocBytes = maxAlloc;
    baselines[method] = baseline;
  }

  return baselines;
}

function parseFixtures(table: Record<string, unknown>): Partial<ProbeFixtures> {
  rejectUnknownKeys(table, FIXTURE_KEYS, 'fixtures.');
  const fixtures: Partial<ProbeFixtures> = {};

  const resource = optionalTable(table, 'resource', 'fixtures.');
  if (resource) fixtures.resource = parseResource(resource, 'fixtures.resource.');
  const unsupported = optionalTable(table, 'unsupported_resource', 'fixtures.');
  if (unsupported) fixtures.unsupportedResource = parseResource(unsupported, 'fixtures.unsupported_resource.');

  const resourceId = optionalString(table, 'actual_cost_resource_id', 'fixtures.');
  if (resourceId !== undefined) fixtures.actualCostResourceId = resourceId;
  const windowHours = optionalNumber(table, 'actual_cost_window_hours', 'fixtures.');
  if (windowHours !== undefined) fixtures.actualCostWindowHours = windowHours;

  return fixtures;
}

function parseResource(table: Record<string, unknown>, prefix: string): ResourceDescriptor {
  rejectUnknownKeys(table, RESOURCE_KEYS, prefix);
  const provider = optionalString(table, 'provider', prefix);
  const resourceType = optionalString(table, 'resource_type', prefix);
  if (provider === undefined || resourceType === undefined) {
    throw new ConfigLoadError(`${prefix}provider and ${prefix}resource_type are required`);
  }

  const resource: ResourceDescriptor = { provider, resource_type: resourceType };
  const sku = optionalString(table, 'sku', prefix);
  if (sku !== undefined) resource.sku = sku;
  const region = optionalString(table, 'region', prefix);
  if (region !== undefined) resource.region = region;

  const tags = optionalTable(table, 'tags', prefix);
  if (tags) {
    const parsed: Record<string, string> = {};
    for (const [key, value] of Object.entries(tags)) {
      if (typeof value !== 'string') {
        throw new ConfigLoadError(`${prefix}tags.${key} must be a string`);
      }
      parsed[key] = value;
    }
    resource.tags = parsed;
  }
  return resource;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function rejectUnknownKeys(table: Record<string, unknown>, allowed: readonly string[], prefix: string): void {
  for (const key of Object.keys(table)) {
    if (!allowed.includes(key)) {
      throw new ConfigLoadError(`unknown key ${prefix}${key}`);
    }
  }
}

function optionalTable(
  table: Record<string, unknown>,
  key: string,
  prefix: string,
): Record<string, unknown> | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (!isTable(value)) {
    throw new ConfigLoadError(`${prefix}${key} must be a table`);
  }
  return value;
}

function optionalNumber(table: Record<string, unknown>, key: string, prefix: string): number | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ConfigLoadError(`${prefix}${key} must be a number`);
  }
  return value;
}

function optionalString(table: Record<string, unknown>, key: string, prefix: string): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigLoadError(`${prefix}${key} must be a string`);
  }
  return value;
}
