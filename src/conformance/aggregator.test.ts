import { describe, it, expect } from 'vitest';
import {
  aggregateCategory,
  aggregateResults,
  determineAchievedLevel,
  formatSummaryText,
} from './aggregator.js';
import type {
  CategoryResult,
  ConformanceLevelValue,
  TestCategoryValue,
  TestResult,
  TestStatusValue,
} from '../types/conformance.js';
import { BLOCKING_STATUSES, CATEGORY_ORDER } from '../types/conformance.js';

function outcome(
  category: TestCategoryValue,
  name: string,
  status: TestStatusValue,
  level: ConformanceLevelValue = category === 'spec_validation' || category === 'rpc_correctness' ? 'basic' : 'standard',
): TestResult {
  return { name, category, method: name.split('.')[0], level, status, durationMs: 1 };
}

function categories(results: TestResult[]): CategoryResult[] {
  return CATEGORY_ORDER.map((c) => aggregateCategory(c, results));
}

const PASSING_RUN: TestResult[] = [
  outcome('spec_validation', 'Name.response_structure', 'passed'),
  outcome('rpc_correctness', 'Name.valid_request', 'passed'),
  outcome('performance', 'Name.latency', 'passed'),
  outcome('performance', 'Name.latency_advanced', 'passed', 'advanced'),
  outcome('concurrency', 'Name.fan_out', 'passed'),
  outcome('concurrency', 'Name.consistency', 'passed'),
];

function replace(results: TestResult[], name: string, status: TestStatusValue): TestResult[] {
  return results.map((r) => (r.name === name ? { ...r, status } : r));
}

// ---------------------------------------------------------------------------
// aggregateCategory
// ---------------------------------------------------------------------------

describe('aggregateCategory', () => {
  it('counts each status and only looks at its own category', () => {
    const result = aggregateCategory('rpc_correctness', [
      outcome('rpc_correctness', 'Name.valid_request', 'passed'),
      outcome('rpc_correctness', 'Supports.missing_descriptor', 'failed'),
      outcome('rpc_correctness', 'GetBudgets.valid_request', 'skipped'),
      outcome('rpc_correctness', 'GetActualCost.valid_request', 'timed_out'),
      outcome('rpc_correctness', 'GetProjectedCost.valid_request', 'cancelled'),
      outcome('spec_validation', 'Name.response_structure', 'failed'),
    ]);

    expect(result.counts).toEqual({ total: 5, passed: 1, failed: 1, skipped: 1, timedOut: 1, cancelled: 1 });
    expect(result.attempted).toBe(true);
    expect(result.satisfied).toBe(false);
  });

  it('is satisfied when only passes and skips were recorded', () => {
    const result = aggregateCategory('spec_validation', [
      outcome('spec_validation', 'Name.response_structure', 'passed'),
      outcome('spec_validation', 'GetBudgets.response_structure', 'skipped'),
    ]);

    expect(result.satisfied).toBe(true);
  });

  it('marks a category with no results as unattempted and unsatisfied', () => {
    const result = aggregateCategory('concurrency', []);

    expect(result).toEqual({
      category: 'concurrency',
      attempted: false,
      counts: { total: 0, passed: 0, failed: 0, skipped: 0, timedOut: 0, cancelled: 0 },
      satisfied: false,
      warnings: [],
      results: [],
    });
  });

  it('orders results by contract method, then name', () => {
    const result = aggregateCategory('rpc_correctness', [
      outcome('rpc_correctness', 'GetBudgets.valid_request', 'passed'),
      outcome('rpc_correctness', 'Supports.valid_request', 'passed'),
      outcome('rpc_correctness', 'Supports.missing_descriptor', 'passed'),
      outcome('rpc_correctness', 'Name.valid_request', 'passed'),
    ]);

    expect(result.results.map((r) => r.name)).toEqual([
      'Name.valid_request',
      'Supports.missing_descriptor',
      'Supports.valid_request',
      'GetBudgets.valid_request',
    ]);
  });

  it('prefixes test warnings with the test name', () => {
    const result = aggregateCategory('concurrency', [
      { ...outcome('concurrency', 'Name.fan_out', 'passed'), warnings: ['race detection was not active'] },
    ]);

    expect(result.warnings).toEqual(['Name.fan_out: race detection was not active']);
  });

  it('deep-freezes its output without freezing the input', () => {
    const input = [outcome('spec_validation', 'Name.response_structure', 'passed')];
    const result = aggregateCategory('spec_validation', input);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.results[0])).toBe(true);
    expect(Object.isFrozen(input[0])).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// determineAchievedLevel
// ---------------------------------------------------------------------------

describe('determineAchievedLevel', () => {
  it('achieves the requested level when every required category is satisfied', () => {
    expect(determineAchievedLevel(categories(PASSING_RUN), 'advanced')).toBe('advanced');
  });

  it('never reports more than was requested', () => {
    expect(determineAchievedLevel(categories(PASSING_RUN), 'basic')).toBe('basic');
    expect(determineAchievedLevel(categories(PASSING_RUN), 'standard')).toBe('standard');
  });

  it('reports none when a basic category fails, whatever else passes', () => {
    const results = replace(PASSING_RUN, 'Name.response_structure', 'failed');

    expect(determineAchievedLevel(categories(results), 'advanced')).toBe('none');
  });

  it('caps at basic when a standard category fails', () => {
    const results = replace(PASSING_RUN, 'Name.fan_out', 'failed');

    expect(determineAchievedLevel(categories(results), 'advanced')).toBe('basic');
  });

  it('caps at standard when only an advanced-level test fails', () => {
    const results = replace(PASSING_RUN, 'Name.latency_advanced', 'failed');

    expect(determineAchievedLevel(categories(results), 'advanced')).toBe('standard');
  });

  it('treats timeouts and cancellations as blocking', () => {
    expect(determineAchievedLevel(categories(replace(PASSING_RUN, 'Name.valid_request', 'timed_out')), 'basic')).toBe(
      'none',
    );
    expect(determineAchievedLevel(categories(replace(PASSING_RUN, 'Name.latency', 'cancelled')), 'standard')).toBe(
      'basic',
    );
  });

  it('does not let skips block a level', () => {
    const results = replace(replace(PASSING_RUN, 'Name.valid_request', 'skipped'), 'Name.consistency', 'skipped');

    expect(determineAchievedLevel(categories(results), 'standard')).toBe('standard');
  });

  it('requires every category of a level to have been attempted', () => {
    const withoutPerformance = PASSING_RUN.filter((r) => r.category !== 'performance');

    expect(determineAchievedLevel(categories(withoutPerformance), 'standard')).toBe('basic');
    expect(determineAchievedLevel([], 'basic')).toBe('none');
  });

  it('is monotonic over every combination of outcomes', () => {
    const statuses: TestStatusValue[] = ['passed', 'failed', 'skipped', 'timed_out', 'cancelled'];

    for (const spec of statuses) {
      for (const latency of statuses) {
        for (const advanced of statuses) {
          let results = replace(PASSING_RUN, 'Name.response_structure', spec);
          results = replace(results, 'Name.latency', latency);
          results = replace(results, 'Name.latency_advanced', advanced);
          const achieved = determineAchievedLevel(categories(results), 'advanced');

          if (achieved !== 'none') {
            expect(BLOCKING_STATUSES.has(spec)).toBe(false);
          }
          if (achieved === 'advanced') {
            expect(BLOCKING_STATUSES.has(latency)).toBe(false);
            expect(BLOCKING_STATUSES.has(advanced)).toBe(false);
          }
          if (achieved === 'standard') {
            expect(BLOCKING_STATUSES.has(latency)).toBe(false);
            expect(BLOCKING_STATUSES.has(advanced)).toBe(true);
          }
        }
      }
    }
  });
});

// ---------------------------------------------------------------------------
// aggregateResults
// ---------------------------------------------------------------------------

describe('aggregateResults', () => {
  const input = {
    pluginName: 'aggregate-plugin',
    requestedLevel: 'basic' as const,
    startedAt: '2026-03-01T12:00:00.000Z',
    durationMs: 12.34567,
  };

  it('builds the summary, text and every category', () => {
    const result = aggregateResults({
      ...input,
      results: [
        outcome('spec_validation', 'Name.response_structure', 'passed'),
        outcome('rpc_correctness', 'GetBudgets.valid_request', 'skipped'),
      ],
    });

    expect(result.version).toBe('1.0.0');
    expect(result.achievedLevel).toBe('basic');
    expect(result.categories.map((c) => [c.category, c.attempted])).toEqual([
      ['spec_validation', true],
      ['rpc_correctness', true],
      ['performance', false],
      ['concurrency', false],
    ]);
    expect(result.summary).toEqual({ total: 2, passed: 1, failed: 0, skipped: 1, timedOut: 0, cancelled: 0 });
    expect(result.summaryText).toBe(
      'Achieved Basic conformance (requested Basic): 1 passed, 0 failed, 1 skipped, 0 timed out, 0 cancelled',
    );
    expect(result.durationMs).toBe(12.346);
  });

  it('aggregates identically regardless of input order', () => {
    const shuffled = [...PASSING_RUN].reverse();

    expect(aggregateResults({ ...input, results: shuffled })).toEqual(
      aggregateResults({ ...input, results: PASSING_RUN }),
    );
  });

  it('collects warnings from every category', () => {
    const result = aggregateResults({
      ...input,
      results: [
        { ...outcome('performance', 'Name.latency', 'passed'), warnings: ['near the ceiling'] },
        { ...outcome('concurrency', 'Name.fan_out', 'passed'), warnings: ['unverified'] },
      ],
    });

    expect(result.warnings).toEqual(['Name.latency: near the ceiling', 'Name.fan_out: unverified']);
  });

  it('lists run warnings ahead of test warnings', () => {
    const result = aggregateResults({
      ...input,
      results: [{ ...outcome('performance', 'Name.latency', 'passed'), warnings: ['near the ceiling'] }],
      runWarnings: ['capability probe failed'],
    });

    expect(result.warnings).toEqual(['capability probe failed', 'Name.latency: near the ceiling']);
  });
});

describe('formatSummaryText', () => {
  it('says no level was achieved below basic', () => {
    expect(
      formatSummaryText('none', 'standard', { total: 3, passed: 1, failed: 1, skipped: 0, timedOut: 1, cancelled: 0 }),
    ).toBe('No conformance level achieved (requested Standard): 1 passed, 1 failed, 0 skipped, 1 timed out, 0 cancelled');
  });
});
