/**
 * SpecValidation category: every method answers a valid request with a
 * structurally valid response. All violations of one response are reported
 * together in a single result.
 */

import { CONTRACT_METHODS } from '../types/contract.js';
import type { TestResult } from '../types/conformance.js';
import { formatFindings } from '../core/response-validator.js';
import type { CategoryModule } from './context.js';
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

export const runSpecValidation: CategoryModule = async (ctx) => {
  const results: TestResult[] = [];

  for (const method of CONTRACT_METHODS) {
    const identity = identify('spec_validation', method, 'response_structure', 'basic');
    if (runCancelled(ctx)) {
      results.push(cancelled(identity));
      continue;
    }

    const skipReason = capabilitySkipReason(ctx, method);
    if (skipReason) {
      results.push(skipped(identity, skipReason));
      continue;
    }

    const call = await callMethod(ctx, method, ctx.requests[method]);
    if (!call.ok) {
      results.push(unexpectedError(identity, method, call.error, call.durationMs));
      continue;
    }

    const findings = ctx.validator.validate(method, call.value);
    if (findings.length > 0) {
      results.push(
        result(identity, {
          status: 'failed',
          durationMs: call.durationMs,
          error: `response violates the contract: ${formatFindings(findings)}`,
          findings,
        }),
      );
    } else {
      results.push(result(identity, { status: 'passed', durationMs: call.durationMs }));
    }
  }

  return results;
};
