/**
 * Performance category: mean latency (and optionally heap growth) per
 * method against the baseline ceilings.
 *
 * Each method gets `warmupIterations` discarded calls, then up to
 * `iterations` timed calls. Sampling stops as soon as the running total
 * already guarantees a failing mean at the Standard ceiling. The whole
 * category runs under `budgetMs`; a method that cannot be measured before
 * the budget runs out is reported timed_out.
 */

import type { ContractMethodName } from '../types/contract.js';
import { CONTRACT_METHODS } from '../types/contract.js';
import type { ConformanceLevelValue, PerformanceBaseline, TestResult } from '../types/conformance.js';
import type { RpcError } from '../types/status.js';
import { MAX_VARIANCE_PERCENT } from '../types/suite-config.js';
import type { CategoryContext, CategoryModule, TestIdentity } from './context.js';
import {
  callMethod,
  cancelled,
  capabilitySkipReason,
  identify,
  result,
  roundMs,
  runCancelled,
  skipped,
  unexpectedError,
} from './context.js';

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

export interface Samples {
  latencies: number[];
  allocations: number[];
  stoppedEarly: boolean;
}

type Measurement =
  | { kind: 'measured'; samples: Samples }
  | { kind: 'error'; error: RpcError; durationMs: number }
  | { kind: 'budget'; samples: Samples };

async function measure(
  ctx: CategoryContext,
  method: ContractMethodName,
  failAboveMs: number,
  budgetEndsAt: number,
): Promise<Measurement> {
  const { warmupIterations, iterations } = ctx.config.performance;
  const request = ctx.requests[method];
  const samples: Samples = { latencies: [], allocations: [], stoppedEarly: false };
  const timeoutFor = (): number =>
    Math.max(1, Math.min(ctx.config.testTimeoutMs, Math.ceil(budgetEndsAt - Date.now())));

  for (let i = 0; i < warmupIterations; i++) {
    if (Date.now() >= budgetEndsAt) return { kind: 'budget', samples };
    const call = await callMethod(ctx, method, request, timeoutFor());
    if (!call.ok) return { kind: 'error', error: call.error, durationMs: call.durationMs };
  }

  let total = 0;
  for (let i = 0; i < iterations; i++) {
    if (Date.now() >= budgetEndsAt) return { kind: 'budget', samples };

    const heapBefore = process.memoryUsage().heapUsed;
    const call = await callMethod(ctx, method, request, timeoutFor());
    const heapAfter = process.memoryUsage().heapUsed;
    if (!call.ok) return { kind: 'error', error: call.error, durationMs: call.durationMs };

    samples.latencies.push(call.durationMs);
    samples.allocations.push(Math.max(0, heapAfter - heapBefore));
    total += call.durationMs;

    // Even if every remaining call took no time, the mean would still fail.
    if (total > failAboveMs * iterations && i < iterations - 1) {
      samples.stoppedEarly = true;
      break;
    }
  }

  return { kind: 'measured', samples };
}

export interface LatencyStats {
  count: number;
  min: number;
  mean: number;
  max: number;
  cvPercent: number;
  allocMean: number;
}

export function summarize(samples: Samples): LatencyStats {
  const count = samples.latencies.length;
  const mean = samples.latencies.reduce((sum, v) => sum + v, 0) / count;
  const variance = samples.latencies.reduce((sum, v) => sum + (v - mean) ** 2, 0) / count;
  return {
    count,
    min: Math.min(...samples.latencies),
    mean,
    max: Math.max(...samples.latencies),
    cvPercent: mean > 0 ? (Math.sqrt(variance) / mean) * 100 : 0,
    allocMean: samples.allocations.reduce((sum, v) => sum + v, 0) / count,
  };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

function ceilingFor(baseline: PerformanceBaseline, level: ConformanceLevelValue): number {
  return level === 'advanced' ? baseline.advancedLatencyMs : baseline.standardLatencyMs;
}

/** Compare the measured stats against one level's ceiling. */
export function evaluateLatency(
  identity: TestIdentity,
  stats: LatencyStats,
  baseline: PerformanceBaseline,
  tolerance: number,
  plannedIterations: number,
  stoppedEarly: boolean,
): TestResult {
  const ceiling = ceilingFor(baseline, identity.level);
  const limit = roundMs(ceiling * (1 + tolerance));
  const warnAbove = ceiling * (1 - tolerance);
  const tolerancePercent = Math.round(tolerance * 100);

  const errors: string[] = [];
  const warnings: string[] = [];

  if (stats.mean > limit) {
    errors.push(
      `mean latency ${stats.mean.toFixed(2)}ms exceeds ceiling ${ceiling}ms ` +
        `(+${tolerancePercent}% tolerance = ${limit}ms)`,
    );
  } else if (stats.mean > warnAbove) {
    warnings.push(`mean latency ${stats.mean.toFixed(2)}ms is within ${tolerancePercent}% of the ${ceiling}ms ceiling`);
  }

  if (baseline.maxAllocBytes !== undefined) {
    const allocLimit = Math.round(baseline.maxAllocBytes * (1 + tolerance));
    if (stats.allocMean > allocLimit) {
      errors.push(
        `mean heap growth ${Math.round(stats.allocMean)} bytes exceeds ceiling ${baseline.maxAllocBytes} bytes ` +
          `(+${tolerancePercent}% tolerance = ${allocLimit} bytes)`,
      );
    } else if (stats.allocMean > baseline.maxAllocBytes * (1 - tolerance)) {
      warnings.push(
        `mean heap growth ${Math.round(stats.allocMean)} bytes is within ${tolerancePercent}% of the ` +
          `${baseline.maxAllocBytes} byte ceiling`,
      );
    }
  }

  if (stats.count > 1 && stats.cvPercent > MAX_VARIANCE_PERCENT) {
    warnings.push(
      `latency coefficient of variation ${stats.cvPercent.toFixed(1)}% exceeds ${MAX_VARIANCE_PERCENT}%`,
    );
  }

  let details = `mean ${stats.mean.toFixed(2)}ms over ${stats.count} calls (min ${stats.min.toFixed(2)}ms, max ${stats.max.toFixed(2)}ms)`;
  if (stoppedEarly) details += `, stopped early after ${stats.count} of ${plannedIterations} calls`;

  return result(identity, {
    status: errors.length > 0 ? 'failed' : 'passed',
    durationMs: stats.mean * stats.count,
    details,
    ...(errors.length > 0 ? { error: errors.join('; ') } : {}),
    ...(warnings.length > 0 ? { warnings } : {}),
    metrics: {
      iterations: stats.count,
      min_ms: roundMs(stats.min),
      mean_ms: roundMs(stats.mean),
      max_ms: roundMs(stats.max),
      ceiling_ms: ceiling,
      margin_ms: roundMs(ceiling - stats.mean),
      alloc_bytes_mean: Math.round(stats.allocMean),
      cv_percent: Math.round(stats.cvPercent * 10) / 10,
    },
  });
}

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

export const runPerformance: CategoryModule = async (ctx) => {
  const settings = ctx.config.performance;
  const levels: ConformanceLevelValue[] = ctx.level === 'advanced' ? ['standard', 'advanced'] : ['standard'];
  const budgetEndsAt = Date.now() + settings.budgetMs;
  const results: TestResult[] = [];

  for (const method of CONTRACT_METHODS) {
    const identities = levels.map((level) =>
      identify('performance', method, level === 'advanced' ? 'latency_advanced' : 'latency', level),
    );

    if (runCancelled(ctx)) {
      results.push(...identities.map(cancelled));
      continue;
    }

    const skipReason = capabilitySkipReason(ctx, method);
    if (skipReason) {
      results.push(...identities.map((id) => skipped(id, skipReason)));
      continue;
    }

    const baseline = settings.baselines[method];
    const failAboveMs = baseline.standardLatencyMs * (1 + settings.tolerance);
    const measurement = await measure(ctx, method, failAboveMs, budgetEndsAt);

    switch (measurement.kind) {
      case 'error':
        results.push(
          ...identities.map((id) => unexpectedError(id, method, measurement.error, measurement.durationMs)),
        );
        break;
      case 'budget': {
        const taken = measurement.samples.latencies.length;
        ctx.logger.warn('performance budget exhausted', { method: identities[0].method, samples: taken });
        results.push(
          ...identities.map((id) =>
            result(id, {
              status: 'timed_out',
              durationMs: measurement.samples.latencies.reduce((sum, v) => sum + v, 0),
              error: `performance budget of ${settings.budgetMs}ms exhausted after ${taken} of ${settings.iterations} samples`,
            }),
          ),
        );
        break;
      }
      case 'measured': {
        const stats = summarize(measurement.samples);
        results.push(
          ...identities.map((id) =>
            evaluateLatency(id, stats, baseline, settings.tolerance, settings.iterations, measurement.samples.stoppedEarly),
          ),
        );
        break;
      }
    }
  }

  return results;
};
