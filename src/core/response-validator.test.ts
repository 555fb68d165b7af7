import { describe, it, expect } from 'vitest';
import { ResponseValidator, formatInstancePath, formatFindings } from './response-validator.js';
import {
  createActualCostResponse,
  createBudgetsResponse,
  createEstimateCostResponse,
  createNameResponse,
  createPricingSpecResponse,
  createProjectedCostResponse,
  createRecommendationsResponse,
  createSupportsResponse,
} from '../testing/factories.js';
import { BILLING_MODES } from '../types/response-schemas.js';

const validator = new ResponseValidator();

describe('formatInstancePath', () => {
  it('turns JSON pointers into dotted paths with indexes', () => {
    expect(formatInstancePath('')).toBe('');
    expect(formatInstancePath('/currency')).toBe('currency');
    expect(formatInstancePath('/results/0/cost')).toBe('results[0].cost');
    expect(formatInstancePath('/spec/a~1b')).toBe('spec.a/b');
  });
});

describe('ResponseValidator', () => {
  it('accepts every factory default', () => {
    expect(validator.validate('name', createNameResponse())).toEqual([]);
    expect(validator.validate('supports', createSupportsResponse())).toEqual([]);
    expect(validator.validate('getActualCost', createActualCostResponse())).toEqual([]);
    expect(validator.validate('getProjectedCost', createProjectedCostResponse())).toEqual([]);
    expect(validator.validate('getPricingSpec', createPricingSpecResponse())).toEqual([]);
    expect(validator.validate('estimateCost', createEstimateCostResponse())).toEqual([]);
    expect(validator.validate('getRecommendations', createRecommendationsResponse())).toEqual([]);
    expect(validator.validate('getBudgets', createBudgetsResponse())).toEqual([]);
  });

  it('loads the billing mode enumeration from disk', () => {
    expect(BILLING_MODES).toContain('on_demand');
    expect(BILLING_MODES).toContain('per_gb_month');
    expect(BILLING_MODES).toHaveLength(51);
  });

  it('names a missing top-level field', () => {
    const response = createActualCostResponse();
    Reflect.deleteProperty(response, 'currency');

    expect(validator.validate('getActualCost', response)).toEqual([{ field: 'currency', expected: 'present' }]);
  });

  it('names nested and indexed fields', () => {
    const response = createActualCostResponse({
      results: [{ timestamp: '2026-01-01T00:00:00Z', cost: -2, source: 'x' }],
    });

    expect(validator.validate('getActualCost', response)).toEqual([
      { field: 'results[0].cost', expected: '>= 0', actual: -2 },
    ]);
  });

  it('reports an out-of-domain billing mode with the allowed values', () => {
    const findings = validator.validate(
      'getPricingSpec',
      createPricingSpecResponse({ spec: { billing_mode: 'hourly' } }),
    );

    expect(findings).toHaveLength(1);
    expect(findings[0].field).toBe('spec.billing_mode');
    expect(findings[0].actual).toBe('hourly');
    expect(findings[0].expected).toBe(
      'one of per_hour, per_minute, per_second, per_day, per_week, per_month, per_year, ' +
        'per_gb_month, per_gb_hour, per_gb_day, ... (51 values)',
    );
  });

  it('collects every finding for one response', () => {
    const response = createPricingSpecResponse({ spec: { currency: 'usd', rate_per_unit: -1 } });
    Reflect.deleteProperty(response.spec, 'provider');

    const fields = validator.validate('getPricingSpec', response).map((f) => f.field);
    expect(fields.sort()).toEqual(['spec.currency', 'spec.provider', 'spec.rate_per_unit']);
  });

  it('requires a reason when Supports answers false', () => {
    expect(validator.validate('supports', { supported: false })).toEqual([{ field: 'reason', expected: 'present' }]);
    expect(validator.validate('supports', { supported: false, reason: 'no' })).toEqual([]);
  });

  it('reports a non-object response at the root', () => {
    expect(validator.validate('name', 'plugin')).toEqual([
      { field: '(response)', expected: 'type object', actual: 'plugin' },
    ]);
  });

  it('flags budget summaries whose buckets exceed the total', () => {
    const response = createBudgetsResponse({ summary: { budgets_warning: 2 } });

    expect(validator.validate('getBudgets', response)).toEqual([
      { field: 'summary', expected: 'bucket counts summing to at most total_budgets (1)', actual: 3 },
    ]);
  });

  it('requires a positive budget limit', () => {
    const response = createBudgetsResponse();
    response.budgets[0].amount.limit = 0;

    expect(validator.validate('getBudgets', response)).toEqual([
      { field: 'budgets[0].amount.limit', expected: '> 0', actual: 0 },
    ]);
  });
});

describe('formatFindings', () => {
  it('joins findings with their expected and actual values', () => {
    expect(
      formatFindings([
        { field: 'currency', expected: 'present' },
        { field: 'results[0].cost', expected: '>= 0', actual: -2 },
      ]),
    ).toBe('currency (expected present); results[0].cost (expected >= 0, got -2)');
  });
});
