/**
 * RPCCorrectness category: each method accepts a valid request and rejects
 * invalid ones with the right status code.
 *
 * Checks per method, in contract order:
 *   valid_request          every method
 *   missing_descriptor     Supports, GetActualCost (empty resource_id),
 *                          GetProjectedCost, GetPricingSpec, EstimateCost
 *   inverted_time_range    GetActualCost
 *   zero_width_time_range  GetActualCost
 *   unsupported_resource   GetProjectedCost, GetPricingSpec, EstimateCost
 *   invalid_page_size      GetRecommendations
 *
 * When valid_request is skipped (capability not advertised, or the method
 * answered UNIMPLEMENTED), the method's other checks are skipped with it.
 */

import type { ContractMethodName, ContractRequest, SupportsResponse } from '../types/contract.js';
import { CONTRACT_METHODS, RPC_METHOD_NAMES } from '../types/contract.js';
import type { TestResult } from '../types/conformance.js';
import type { StatusCodeValue } from '../types/status.js';
import { REJECTION_CODES, StatusCode } from '../types/status.js';
import { formatFindings } from '../core/response-validator.js';
import type { CategoryContext, CategoryModule, TestIdentity } from './context.js';
import {
  callMethod,
  cancelled,
  capabilitySkipReason,
  identify,
  result,
  runCancelled,
  skipped,
  unexpectedError,
} from './context.js';

// ---------------------------------------------------------------------------
// Negative checks
// ---------------------------------------------------------------------------

interface NegativeCheck<M extends ContractMethodName> {
  check: string;
  request: ContractRequest<M>;
  accept: ReadonlySet<StatusCodeValue>;
  /** Accepts a successful response in place of a rejection. */
  acceptResponse?: (response: unknown) => boolean;
  /** Only run when the unsupported-resource probe showed the resource is refused. */
  needsUnsupportedResource?: boolean;
}

const INVALID_ARGUMENT_ONLY: ReadonlySet<StatusCodeValue> = new Set<StatusCodeValue>([StatusCode.INVALID_ARGUMENT]);

function isRefusal(response: unknown): boolean {
  if (typeof response !== 'object' || response === null) return false;
  const supported: unknown = Reflect.get(response, 'supported');
  const reason: unknown = Reflect.get(response, 'reason');
  return supported === false && typeof reason === 'string' && reason.length > 0;
}

type NegativeChecks = { [M in ContractMethodName]: NegativeCheck<M>[] };

function negativeChecks(ctx: CategoryContext): NegativeChecks {
  const valid = ctx.requests;
  const unsupported = ctx.config.fixtures.unsupportedResource;

  return {
    name: [],
    supports: [
      {
        check: 'missing_descriptor',
        request: { resource: null },
        accept: INVALID_ARGUMENT_ONLY,
        acceptResponse: isRefusal,
      },
    ],
    getActualCost: [
      {
        check: 'missing_descriptor',
        request: { ...valid.getActualCost, resource_id: '' },
        accept: INVALID_ARGUMENT_ONLY,
      },
      {
        check: 'inverted_time_range',
        request: { ...valid.getActualCost, start: valid.getActualCost.end, end: valid.getActualCost.start },
        accept: INVALID_ARGUMENT_ONLY,
      },
      {
        check: 'zero_width_time_range',
        request: { ...valid.getActualCost, end: valid.getActualCost.start },
        accept: INVALID_ARGUMENT_ONLY,
      },
    ],
    getProjectedCost: [
      { check: 'missing_descriptor', request: { resource: null }, accept: INVALID_ARGUMENT_ONLY },
      {
        check: 'unsupported_resource',
        request: { resource: unsupported },
        accept: REJECTION_CODES,
        needsUnsupportedResource: true,
      },
    ],
    getPricingSpec: [
      { check: 'missing_descriptor', request: { resource: null }, accept: INVALID_ARGUMENT_ONLY },
      {
        check: 'unsupported_resource',
        request: { resource: unsupported },
        accept: REJECTION_CODES,
        needsUnsupportedResource: true,
      },
    ],
    estimateCost: [
      { check: 'missing_descriptor', request: { resource: null }, accept: INVALID_ARGUMENT_ONLY },
      {
        check: 'unsupported_resource',
        request: { resource: unsupported },
        accept: REJECTION_CODES,
        needsUnsupportedResource: true,
      },
    ],
    getRecommendations: [
      {
        check: 'invalid_page_size',
        request: { ...valid.getRecommendations, page_size: -1 },
        accept: INVALID_ARGUMENT_ONLY,
      },
    ],
    getBudgets: [],
  };
}

function describeCodes(codes: ReadonlySet<StatusCodeValue>): string {
  return [...codes].join(' or ');
}

async function runNegativeCheck<M extends ContractMethodName>(
  ctx: CategoryContext,
  method: M,
  spec: NegativeCheck<M>,
  identity: TestIdentity,
): Promise<TestResult> {
  const call = await callMethod(ctx, method, spec.request);

  if (call.ok) {
    if (spec.acceptResponse?.(call.value)) {
      return result(identity, { status: 'passed', durationMs: call.durationMs, details: 'refused without an error' });
    }
    return result(identity, {
      status: 'failed',
      durationMs: call.durationMs,
      error: `expected ${describeCodes(spec.accept)}, got OK`,
    });
  }

  if (spec.accept.has(call.error.code)) {
    return result(identity, {
      status: 'passed',
      durationMs: call.durationMs,
      details: `rejected with ${call.error.code}`,
    });
  }

  const unexpected = unexpectedError(identity, method, call.error, call.durationMs);
  if (unexpected.status !== 'failed' || call.error.panic) return unexpected;
  return {
    ...unexpected,
    error: `expected ${describeCodes(spec.accept)}, got ${call.error.describe()}`,
  };
}

// ---------------------------------------------------------------------------
// Unsupported resource probe
// ---------------------------------------------------------------------------

/**
 * Ask Supports about the unsupported fixture, once per run. Resolves null
 * when the implementation refuses it (so rejection checks apply), otherwise
 * the reason those checks are skipped.
 */
function unsupportedResourceProbe(ctx: CategoryContext): () => Promise<string | null> {
  let verdict: Promise<string | null> | undefined;

  const probe = async (): Promise<string | null> => {
    const call = await callMethod(ctx, 'supports', { resource: ctx.config.fixtures.unsupportedResource });
    if (!call.ok) {
      return REJECTION_CODES.has(call.error.code) ? null : `Supports probe failed: ${call.error.describe()}`;
    }
    const response: SupportsResponse = call.value;
    return response.supported === false ? null : 'Supports claims the unsupported probe resource is supported';
  };

  return () => (verdict ??= probe());
}

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

async function checkMethod<M extends ContractMethodName>(
  ctx: CategoryContext,
  method: M,
  negatives: NegativeCheck<M>[],
  unsupportedSkip: () => Promise<string | null>,
): Promise<TestResult[]> {
  const validId = identify('rpc_correctness', method, 'valid_request', 'basic');
  const skipAll = (reason: string): TestResult[] => [
    skipped(validId, reason),
    ...negatives.map((n) => skipped(identify('rpc_correctness', method, n.check, 'basic'), reason)),
  ];

  if (runCancelled(ctx)) {
    return [validId, ...negatives.map((n) => identify('rpc_correctness', method, n.check, 'basic'))].map(cancelled);
  }

  const capabilitySkip = capabilitySkipReason(ctx, method);
  if (capabilitySkip) return skipAll(capabilitySkip);

  const results: TestResult[] = [];
  const request: ContractRequest<M> = ctx.requests[method];
  const call = await callMethod(ctx, method, request);
  if (!call.ok) {
    const outcome = unexpectedError(validId, method, call.error, call.durationMs);
    if (outcome.status === 'skipped') {
      return skipAll(outcome.details ?? `${RPC_METHOD_NAMES[method]} is not implemented`);
    }
    results.push(outcome);
  } else {
    const findings = ctx.validator.validate(method, call.value);
    results.push(
      findings.length > 0
        ? result(validId, {
            status: 'failed',
            durationMs: call.durationMs,
            error: `response violates the contract: ${formatFindings(findings)}`,
            findings,
          })
        : result(validId, { status: 'passed', durationMs: call.durationMs }),
    );
  }

  for (const negative of negatives) {
    const identity = identify('rpc_correctness', method, negative.check, 'basic');
    if (runCancelled(ctx)) {
      results.push(cancelled(identity));
      continue;
    }
    if (negative.needsUnsupportedResource) {
      const reason = await unsupportedSkip();
      if (runCancelled(ctx)) {
        results.push(cancelled(identity));
        continue;
      }
      if (reason !== null) {
        results.push(skipped(identity, reason));
        continue;
      }
    }
    results.push(await runNegativeCheck(ctx, method, negative, identity));
  }

  return results;
}

export const runRpcCorrectness: CategoryModule = async (ctx) => {
  const checks = negativeChecks(ctx);
  const unsupportedSkip = unsupportedResourceProbe(ctx);

  const results: TestResult[] = [];
  for (const method of CONTRACT_METHODS) {
    results.push(...(await checkMethod(ctx, method, checks[method], unsupportedSkip)));
  }
  return results;
};
