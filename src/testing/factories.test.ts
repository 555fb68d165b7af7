import { describe, it, expect } from 'vitest';
import {
  deepMerge,
  createActualCostRequest,
  createActualCostResponse,
  createBudgetsResponse,
  createPricingSpecResponse,
  createResourceDescriptor,
} from './factories.js';
import { ResponseValidator } from '../core/response-validator.js';

// ---------------------------------------------------------------------------
// deepMerge
// ---------------------------------------------------------------------------

describe('deepMerge', () => {
  it('returns a shallow copy when source is empty', () => {
    const target = { a: 1, b: { c: 2 } };
    const result = deepMerge(target, {});
    expect(result).toEqual(target);
    expect(result).not.toBe(target);
  });

  it('merges nested objects recursively', () => {
    const target = { a: { b: 1, c: 2 }, d: 3 };
    const result = deepMerge(target, { a: { b: 99 } });
    expect(result).toEqual({ a: { b: 99, c: 2 }, d: 3 });
  });

  it('replaces arrays outright instead of merging', () => {
    const target: { tags: string[] } = { tags: ['a', 'b'] };
    const result = deepMerge(target, { tags: ['c'] });
    expect(result.tags).toEqual(['c']);
  });

  it('does not mutate the original target', () => {
    const target = { a: { b: 1 } };
    deepMerge(target, { a: { b: 99 } });
    expect(target.a.b).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

describe('request factories', () => {
  it('describes an on-demand aws instance by default', () => {
    expect(createResourceDescriptor()).toEqual({
      provider: 'aws',
      resource_type: 'ec2',
      sku: 't3.micro',
      region: 'us-east-1',
    });
  });

  it('applies shallow overrides to an actual cost request', () => {
    const request = createActualCostRequest({ resource_id: 'i-override' });

    expect(request).toEqual({
      resource_id: 'i-override',
      start: '2026-01-01T00:00:00.000Z',
      end: '2026-01-02T00:00:00.000Z',
    });
  });
});

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

describe('response factories', () => {
  const validator = new ResponseValidator();

  it('produces responses that satisfy the contract', () => {
    expect(validator.validate('getActualCost', createActualCostResponse())).toEqual([]);
    expect(validator.validate('getPricingSpec', createPricingSpecResponse())).toEqual([]);
    expect(validator.validate('getBudgets', createBudgetsResponse())).toEqual([]);
  });

  it('applies deep overrides inside the pricing spec', () => {
    const response = createPricingSpecResponse({ spec: { billing_mode: 'reserved' } });

    expect(response.spec.billing_mode).toBe('reserved');
    expect(response.spec.rate_per_unit).toBe(0.0104);
  });

  it('produces independently mutable objects', () => {
    const a = createActualCostResponse();
    const b = createActualCostResponse();
    Reflect.deleteProperty(a, 'currency');

    expect(b.currency).toBe('USD');
  });
});
