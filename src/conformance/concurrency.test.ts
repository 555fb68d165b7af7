import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FanOutRun, RACE_DETECTION_WARNING, canonicalJson, runConcurrency } from './concurrency.js';
import { ConfigurableTestDouble } from '../testing/test-double.js';
import { startCategoryContext, type CategorySession, type CategoryContextOptions } from '../testing/category-context.js';
import { createActualCostResponse } from '../testing/factories.js';
import type { CostSourceService, GetActualCostResponse } from '../types/contract.js';
import type { TestResult } from '../types/conformance.js';
import { configureLogging, createLogger, resetLogging, type LogEntry } from '../core/logger.js';

function byName(results: TestResult[], name: string): TestResult | undefined {
  return results.find((r) => r.name === name);
}

/** Forwards every required method to the double, with overrides. */
function wrap(double: ConfigurableTestDouble, overrides: Partial<CostSourceService>): CostSourceService {
  return {
    name: (request, context) => double.name(request, context),
    supports: (request, context) => double.supports(request, context),
    getActualCost: (request, context) => double.getActualCost(request, context),
    getProjectedCost: (request, context) => double.getProjectedCost(request, context),
    getPricingSpec: (request, context) => double.getPricingSpec(request, context),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('canonicalJson', () => {
  it('sorts object keys at every depth and keeps array order', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [{ f: 1, e: 2 }] } })).toBe('{"a":{"c":[{"e":2,"f":1}],"d":2},"b":1}');
  });

  it('treats objects that differ only in key order as equal', () => {
    expect(canonicalJson({ currency: 'USD', cost: 1 })).toBe(canonicalJson({ cost: 1, currency: 'USD' }));
  });
});

describe('FanOutRun', () => {
  beforeEach(() => {
    configureLogging({ level: 'error', sink: () => {} });
  });

  afterEach(() => {
    resetLogging();
  });

  it('walks idle, dispatching, collecting to a terminal state', () => {
    const run = new FanOutRun('name', createLogger('test'));
    expect(run.state).toBe('idle');

    run.transition('dispatching');
    run.transition('collecting');
    run.transition('verified');

    expect(run.state).toBe('verified');
  });

  it('rejects transitions out of order', () => {
    const run = new FanOutRun('supports', createLogger('test'));

    expect(() => run.transition('collecting')).toThrow('invalid fan-out transition idle -> collecting for Supports');
  });

  it('rejects leaving a terminal state', () => {
    const run = new FanOutRun('name', createLogger('test'));
    run.transition('dispatching');
    run.transition('collecting');
    run.transition('failed');

    expect(() => run.transition('dispatching')).toThrow('invalid fan-out transition failed -> dispatching for Name');
  });
});

// ---------------------------------------------------------------------------
// runConcurrency
// ---------------------------------------------------------------------------

describe('runConcurrency', () => {
  let double: ConfigurableTestDouble;
  let session: CategorySession | undefined;
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    configureLogging({ level: 'warn', sink: (entry) => logs.push(entry) });
    double = new ConfigurableTestDouble({ name: 'concurrent-double' });
  });

  afterEach(async () => {
    await session?.stop();
    session = undefined;
    resetLogging();
  });

  async function run(
    implementation: CostSourceService = double,
    options: CategoryContextOptions = {},
  ): Promise<TestResult[]> {
    session = await startCategoryContext(implementation, {
      level: 'standard',
      capabilities: double.capabilities(),
      ...options,
    });
    return runConcurrency(session.ctx);
  }

  it('reports ten identical Name responses as consistent', async () => {
    const results = await run(double, { concurrencyFanOut: 10 });

    expect(byName(results, 'Name.fan_out')).toMatchObject({
      status: 'passed',
      level: 'standard',
      details: '10 concurrent calls succeeded',
      metrics: { calls: 10, succeeded: 10 },
    });
    expect(byName(results, 'Name.consistency')).toMatchObject({
      status: 'passed',
      details: 'all 10 responses identical',
    });
    expect(double.callCount('name')).toBe(10);
  });

  it('produces a fan_out and a consistency result per method in contract order', async () => {
    const results = await run();

    expect(results.map((r) => r.name)).toEqual([
      'Name.fan_out',
      'Name.consistency',
      'Supports.fan_out',
      'Supports.consistency',
      'GetActualCost.fan_out',
      'GetActualCost.consistency',
      'GetProjectedCost.fan_out',
      'GetProjectedCost.consistency',
      'GetPricingSpec.fan_out',
      'GetPricingSpec.consistency',
      'EstimateCost.fan_out',
      'EstimateCost.consistency',
      'GetRecommendations.fan_out',
      'GetRecommendations.consistency',
      'GetBudgets.fan_out',
      'GetBudgets.consistency',
    ]);
  });

  it('checks variant methods for validity rather than equality', async () => {
    const results = await run();

    expect(byName(results, 'GetActualCost.consistency')).toMatchObject({
      status: 'passed',
      details: 'all 10 responses structurally valid',
    });
  });

  // -------------------------------------------------------------------------
  // Race detection warning
  // -------------------------------------------------------------------------

  it('warns on every fan_out result and logs once when race detection is off', async () => {
    const results = await run();

    expect(byName(results, 'Name.fan_out')?.warnings).toEqual([RACE_DETECTION_WARNING]);
    expect(byName(results, 'GetPricingSpec.fan_out')?.warnings).toEqual([RACE_DETECTION_WARNING]);
    expect(logs.filter((e) => e.msg === RACE_DETECTION_WARNING)).toHaveLength(1);
  });

  it('omits the warning when race detection is active', async () => {
    const results = await run(double, { raceDetection: true });

    expect(byName(results, 'Name.fan_out')?.warnings).toBeUndefined();
    expect(logs.filter((e) => e.msg === RACE_DETECTION_WARNING)).toHaveLength(0);
  });

  // -------------------------------------------------------------------------
  // Inconsistency
  // -------------------------------------------------------------------------

  it('fails a deterministic method whose responses differ', async () => {
    let calls = 0;
    const plugin = wrap(double, {
      name: async () => ({ name: `replica-${calls++ % 2}` }),
    });

    const results = await run(plugin, { concurrencyFanOut: 10 });

    expect(byName(results, 'Name.fan_out')?.status).toBe('passed');
    expect(byName(results, 'Name.consistency')).toMatchObject({
      status: 'failed',
      error: '2 distinct responses across 10 concurrent calls',
    });
  });

  it('fails a variant method when some responses are malformed', async () => {
    let calls = 0;
    const plugin = wrap(double, {
      getActualCost: async (): Promise<GetActualCostResponse> => {
        const response = createActualCostResponse();
        if (calls++ % 2 === 1) Reflect.deleteProperty(response, 'currency');
        return response;
      },
    });

    const results = await run(plugin, { concurrencyFanOut: 10 });

    expect(byName(results, 'GetActualCost.consistency')).toMatchObject({
      status: 'failed',
      error: '5 of 10 responses violate the contract: currency (expected present)',
      findings: [{ field: 'currency', expected: 'present' }],
    });
  });

  // -------------------------------------------------------------------------
  // Failed fan-outs
  // -------------------------------------------------------------------------

  it('fails fan_out and skips consistency for that method only', async () => {
    double.failWith('getProjectedCost', 'INTERNAL', 'connection pool exhausted');

    const results = await run(double, { concurrencyFanOut: 4 });

    expect(byName(results, 'GetProjectedCost.fan_out')).toMatchObject({
      status: 'failed',
      error: '4 of 4 concurrent calls did not succeed: INTERNAL: connection pool exhausted',
      metrics: { calls: 4, succeeded: 0 },
    });
    expect(byName(results, 'GetProjectedCost.consistency')).toMatchObject({
      status: 'skipped',
      details: 'fan_out did not complete; responses were not compared',
    });
    expect(byName(results, 'GetPricingSpec.consistency')?.status).toBe('passed');
  });

  it('reports calls that miss their deadline as timed out', async () => {
    double.delay('supports', 200);

    const results = await run(double, { concurrencyFanOut: 3, testTimeoutMs: 20 });

    expect(byName(results, 'Supports.fan_out')).toMatchObject({
      status: 'timed_out',
      error: '3 of 3 concurrent calls did not succeed: DEADLINE_EXCEEDED: Supports did not respond within 20ms',
    });
    expect(byName(results, 'Supports.consistency')?.status).toBe('skipped');
  });

  it('reports a fan-out the caller abandons as cancelled and dispatches nothing after it', async () => {
    const controller = new AbortController();
    double.delay('getProjectedCost', 200);
    const implementation = wrap(double, {
      getProjectedCost: (request, context) => {
        controller.abort();
        return double.getProjectedCost(request, context);
      },
    });

    const results = await run(implementation, { concurrencyFanOut: 3, signal: controller.signal });

    expect(byName(results, 'GetActualCost.consistency')?.status).toBe('passed');
    expect(byName(results, 'GetProjectedCost.fan_out')).toMatchObject({
      status: 'cancelled',
      error: '3 of 3 concurrent calls did not succeed: CANCELLED: call cancelled by caller',
    });
    expect(byName(results, 'GetProjectedCost.consistency')?.status).toBe('cancelled');
    expect(byName(results, 'GetPricingSpec.fan_out')).toMatchObject({
      status: 'cancelled',
      error: 'run cancelled before the check started',
    });
    expect(byName(results, 'GetBudgets.consistency')?.status).toBe('cancelled');
    expect(double.callCount('getPricingSpec')).toBe(0);
  });

  it('skips both checks for an advertised optional method that is not implemented', async () => {
    const results = await run(double, { capabilities: { budgets: true } });

    expect(byName(results, 'GetBudgets.fan_out')).toMatchObject({
      status: 'skipped',
      details: 'GetBudgets is not implemented',
    });
    expect(byName(results, 'GetBudgets.consistency')).toMatchObject({
      status: 'skipped',
      details: 'GetBudgets is not implemented',
    });
  });

  it('skips both checks for an optional method whose capability is not advertised', async () => {
    const results = await run();

    expect(byName(results, 'EstimateCost.fan_out')?.details).toBe('capability "estimate_cost" not advertised by Supports');
    expect(byName(results, 'EstimateCost.consistency')?.details).toBe(
      'capability "estimate_cost" not advertised by Supports',
    );
  });
});
