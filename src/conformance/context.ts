/**
 * Shared plumbing for the category modules: the per-run context, the
 * canned valid requests, and the uniform classification of call outcomes.
 */

import type {
  CapabilityFlags,
  ContractMethodName,
  ContractRequest,
  ContractResponse,
} from '../types/contract.js';
import { CAPABILITY_FLAGS, RPC_METHOD_NAMES, isOptionalMethod } from '../types/contract.js';
import type {
  ConformanceLevelValue,
  TestCategoryValue,
  TestResult,
  TestStatusValue,
} from '../types/conformance.js';
import type { ProbeFixtures, SuiteConfig } from '../types/suite-config.js';
import type { RpcError } from '../types/status.js';
import { StatusCode, isRpcError } from '../types/status.js';
import type { Logger } from '../core/logger.js';
import type { ResponseValidator } from '../core/response-validator.js';
import type { CostSourceClient } from '../testing/cost-source-client.js';

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/** One valid request per method, built once per run from the fixtures. */
export type ValidRequests = { readonly [M in ContractMethodName]: ContractRequest<M> };

export interface CategoryContext {
  client: CostSourceClient;
  config: SuiteConfig;
  /** The level requested for this run. */
  level: ConformanceLevelValue;
  /** Flags the implementation's Supports advertised for the probe resource. */
  capabilities: CapabilityFlags;
  requests: ValidRequests;
  validator: ResponseValidator;
  logger: Logger;
  /** Aborted when the caller gives up on the run. */
  signal?: AbortSignal;
}

/** A category module. Contract problems are results, never throws. */
export type CategoryModule = (ctx: CategoryContext) => Promise<TestResult[]>;

export function buildValidRequests(fixtures: ProbeFixtures, now: number = Date.now()): ValidRequests {
  const windowMs = fixtures.actualCostWindowHours * 3_600_000;
  const resource = fixtures.resource;

  return {
    name: {},
    supports: { resource },
    getActualCost: {
      resource_id: fixtures.actualCostResourceId,
      start: new Date(now - windowMs).toISOString(),
      end: new Date(now).toISOString(),
    },
    getProjectedCost: { resource },
    getPricingSpec: { resource },
    estimateCost: { resource },
    getRecommendations: { target_resources: [resource], page_size: 10 },
    getBudgets: { include_status: true },
  };
}

// ---------------------------------------------------------------------------
// Calling
// ---------------------------------------------------------------------------

export type CallResult<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: RpcError; durationMs: number };

/**
 * Call a method with the run's per-test timeout and signal. Resolves with
 * the RPC status either way; anything other than an RpcError is a harness
 * fault and is rethrown.
 */
export async function callMethod<M extends ContractMethodName>(
  ctx: CategoryContext,
  method: M,
  request: ContractRequest<M>,
  timeoutMs: number = ctx.config.testTimeoutMs,
): Promise<CallResult<ContractResponse<M>>> {
  const started = performance.now();
  try {
    const value = await ctx.client.call(method, request, { timeoutMs, signal: ctx.signal });
    return { ok: true, value, durationMs: performance.now() - started };
  } catch (err) {
    if (!isRpcError(err)) throw err;
    return { ok: false, error: err, durationMs: performance.now() - started };
  }
}

export interface Classification {
  status: TestStatusValue;
  message: string;
}

/**
 * Classify a call that did not end the way a check expected.
 *
 * UNIMPLEMENTED on an optional method is a skip and deadlines keep their
 * own status. CANCELLED is the caller's cancellation only when this side
 * produced it; an implementation answering CANCELLED unprompted fails.
 */
export function classifyFailure(method: ContractMethodName, error: RpcError): Classification {
  if (error.code === StatusCode.UNIMPLEMENTED && isOptionalMethod(method)) {
    return { status: 'skipped', message: `${RPC_METHOD_NAMES[method]} is not implemented` };
  }
  if (error.code === StatusCode.DEADLINE_EXCEEDED) {
    return { status: 'timed_out', message: error.describe() };
  }
  if (error.code === StatusCode.CANCELLED) {
    return error.local
      ? { status: 'cancelled', message: error.describe() }
      : { status: 'failed', message: `implementation answered CANCELLED without being cancelled: ${error.message}` };
  }
  if (error.panic) {
    return { status: 'failed', message: `implementation panicked: ${stripPanicPrefix(error.message)}` };
  }
  return { status: 'failed', message: error.describe() };
}

function stripPanicPrefix(message: string): string {
  return message.startsWith('panic: ') ? message.slice('panic: '.length) : message;
}

/** True once the caller has cancelled the run; no further checks are dispatched. */
export function runCancelled(ctx: CategoryContext): boolean {
  return ctx.signal?.aborted === true;
}

/**
 * Why an optional method's checks are skipped, or null when they run.
 * Methods whose capability flag Supports did not advertise are never called.
 */
export function capabilitySkipReason(ctx: CategoryContext, method: ContractMethodName): string | null {
  if (!isOptionalMethod(method)) return null;
  const flag = CAPABILITY_FLAGS[method];
  return ctx.capabilities[flag] === true ? null : `capability "${flag}" not advertised by Supports`;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface TestIdentity {
  name: string;
  category: TestCategoryValue;
  method: string;
  level: ConformanceLevelValue;
}

export function identify(
  category: TestCategoryValue,
  method: ContractMethodName,
  check: string,
  level: ConformanceLevelValue,
): TestIdentity {
  const rpc = RPC_METHOD_NAMES[method];
  return { name: `${rpc}.${check}`, category, method: rpc, level };
}

type Outcome = Omit<TestResult, keyof TestIdentity>;

export function result(identity: TestIdentity, outcome: Outcome): TestResult {
  return { ...identity, ...outcome, durationMs: roundMs(outcome.durationMs) };
}

export function skipped(identity: TestIdentity, reason: string): TestResult {
  return { ...identity, status: 'skipped', durationMs: 0, details: reason };
}

/** A check the run was cancelled before it could start. */
export function cancelled(identity: TestIdentity): TestResult {
  return { ...identity, status: 'cancelled', durationMs: 0, error: 'run cancelled before the check started' };
}

/** The result of a check whose call ended in an error it did not expect. */
export function unexpectedError(
  identity: TestIdentity,
  method: ContractMethodName,
  error: RpcError,
  durationMs: number,
): TestResult {
  const { status, message } = classifyFailure(method, error);
  if (status === 'skipped') return skipped(identity, message);
  return result(identity, { status, durationMs, error: message });
}

/** Milliseconds to three decimals, for stable reports. */
export function roundMs(value: number): number {
  return Math.round(value * 1000) / 1000;
}
