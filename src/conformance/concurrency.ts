/**
 * Concurrency category: fan out identical calls without awaiting, collect
 * every one, then check the responses agree.
 *
 * Each method moves through idle -> dispatching -> collecting and ends
 * verified or failed. A method that ends failed skips its consistency
 * check; the other methods are unaffected.
 */

import type { ContractMethodName, ContractResponse } from '../types/contract.js';
import { CONTRACT_METHODS, RPC_METHOD_NAMES } from '../types/contract.js';
import type { TestResult } from '../types/conformance.js';
import type { Logger } from '../core/logger.js';
import { formatFindings } from '../core/response-validator.js';
import type { CallResult, CategoryContext, CategoryModule, TestIdentity } from './context.js';
import {
  callMethod,
  cancelled,
  capabilitySkipReason,
  classifyFailure,
  identify,
  result,
  roundMs,
  runCancelled,
  skipped,
} from './context.js';

/** Methods whose identical requests must yield identical responses. */
export const DETERMINISTIC_METHODS: ReadonlySet<ContractMethodName> = new Set<ContractMethodName>([
  'name',
  'supports',
  'getPricingSpec',
  'getProjectedCost',
  'estimateCost',
]);

export const RACE_DETECTION_WARNING =
  'race detection was not active; shared-state hazards in the implementation are unverified';

// ---------------------------------------------------------------------------
// Fan-out state machine
// ---------------------------------------------------------------------------

export type FanOutState = 'idle' | 'dispatching' | 'collecting' | 'verified' | 'failed';

const TRANSITIONS: Readonly<Record<FanOutState, readonly FanOutState[]>> = {
  idle: ['dispatching'],
  dispatching: ['collecting'],
  collecting: ['verified', 'failed'],
  verified: [],
  failed: [],
};

export class FanOutRun {
  private current: FanOutState = 'idle';

  constructor(
    readonly method: ContractMethodName,
    private readonly logger: Logger,
  ) {}

  get state(): FanOutState {
    return this.current;
  }

  transition(next: FanOutState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`invalid fan-out transition ${this.current} -> ${next} for ${RPC_METHOD_NAMES[this.method]}`);
    }
    this.logger.debug('fan-out state', { method: RPC_METHOD_NAMES[this.method], from: this.current, to: next });
    this.current = next;
  }
}

// ---------------------------------------------------------------------------
// Canonical form
// ---------------------------------------------------------------------------

/** JSON with object keys sorted at every depth, so equal values compare equal. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val !== 'object' || val === null || Array.isArray(val)) return val;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(val).sort()) {
      sorted[key] = Reflect.get(val, key);
    }
    return sorted;
  });
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function fanOutResult<T>(
  identity: TestIdentity,
  method: ContractMethodName,
  calls: CallResult<T>[],
  wallMs: number,
  warnings: string[],
): TestResult {
  const failures = calls.flatMap((call) => (call.ok ? [] : [call.error]));
  const metrics = {
    calls: calls.length,
    succeeded: calls.length - failures.length,
    wall_ms: roundMs(wallMs),
    mean_ms: roundMs(calls.reduce((sum, call) => sum + call.durationMs, 0) / calls.length),
  };
  const extras = warnings.length > 0 ? { warnings } : {};

  if (failures.length === 0) {
    return result(identity, {
      status: 'passed',
      durationMs: wallMs,
      details: `${calls.length} concurrent calls succeeded`,
      metrics,
      ...extras,
    });
  }

  const classified = failures.map((error) => classifyFailure(method, error));
  const skip = classified.find((c) => c.status === 'skipped');
  if (skip) return skipped(identity, skip.message);

  // A real failure outranks a timeout, which outranks a cancellation.
  const worst =
    classified.find((c) => c.status === 'failed') ??
    classified.find((c) => c.status === 'timed_out') ??
    classified[0];

  return result(identity, {
    status: worst.status,
    durationMs: wallMs,
    error: `${failures.length} of ${calls.length} concurrent calls did not succeed: ${worst.message}`,
    metrics,
    ...extras,
  });
}

function consistencyResult<M extends ContractMethodName>(
  ctx: CategoryContext,
  identity: TestIdentity,
  method: M,
  responses: ContractResponse<M>[],
): TestResult {
  if (DETERMINISTIC_METHODS.has(method)) {
    const distinct = new Set(responses.map(canonicalJson));
    return distinct.size === 1
      ? result(identity, { status: 'passed', durationMs: 0, details: `all ${responses.length} responses identical` })
      : result(identity, {
          status: 'failed',
          durationMs: 0,
          error: `${distinct.size} distinct responses across ${responses.length} concurrent calls`,
        });
  }

  const invalid = responses.map((response) => ctx.validator.validate(method, response)).filter((f) => f.length > 0);
  if (invalid.length === 0) {
    return result(identity, {
      status: 'passed',
      durationMs: 0,
      details: `all ${responses.length} responses structurally valid`,
    });
  }
  return result(identity, {
    status: 'failed',
    durationMs: 0,
    error: `${invalid.length} of ${responses.length} responses violate the contract: ${formatFindings(invalid[0])}`,
    findings: invalid[0],
  });
}

async function fanOut<M extends ContractMethodName>(
  ctx: CategoryContext,
  method: M,
  warnings: string[],
): Promise<TestResult[]> {
  const fanOutId = identify('concurrency', method, 'fan_out', 'standard');
  const consistencyId = identify('concurrency', method, 'consistency', 'standard');

  if (runCancelled(ctx)) return [cancelled(fanOutId), cancelled(consistencyId)];

  const skipReason = capabilitySkipReason(ctx, method);
  if (skipReason) return [skipped(fanOutId, skipReason), skipped(consistencyId, skipReason)];

  const run = new FanOutRun(method, ctx.logger);
  const request = ctx.requests[method];
  const started = performance.now();

  run.transition('dispatching');
  const pending = Array.from({ length: ctx.config.concurrencyFanOut }, () => callMethod(ctx, method, request));

  run.transition('collecting');
  const calls = await Promise.all(pending);
  const wallMs = performance.now() - started;

  const fanOutOutcome = fanOutResult(fanOutId, method, calls, wallMs, warnings);
  if (fanOutOutcome.status !== 'passed') {
    run.transition('failed');
    if (fanOutOutcome.status === 'cancelled') return [fanOutOutcome, cancelled(consistencyId)];
    const reason =
      fanOutOutcome.status === 'skipped'
        ? (fanOutOutcome.details ?? 'fan_out skipped')
        : 'fan_out did not complete; responses were not compared';
    return [fanOutOutcome, skipped(consistencyId, reason)];
  }

  const responses = calls.flatMap((call) => (call.ok ? [call.value] : []));
  const consistency = consistencyResult(ctx, consistencyId, method, responses);
  run.transition(consistency.status === 'passed' ? 'verified' : 'failed');
  return [fanOutOutcome, consistency];
}

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

export const runConcurrency: CategoryModule = async (ctx) => {
  const warnings = ctx.config.raceDetection ? [] : [RACE_DETECTION_WARNING];
  if (!ctx.config.raceDetection) {
    ctx.logger.warn(RACE_DETECTION_WARNING);
  }

  const results: TestResult[] = [];
  for (const method of CONTRACT_METHODS) {
    results.push(...(await fanOut(ctx, method, warnings)));
  }
  return results;
};
