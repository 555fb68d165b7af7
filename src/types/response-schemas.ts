/**
 * Runtime JSON Schemas for contract responses, compiled by ajv in the
 * response validator. Kept as plain objects so they can be handed straight
 * to `ajv.compile()`.
 *
 * Unknown fields are allowed: a plugin may return more than the contract
 * requires.
 */

import { readFileSync } from 'node:fs';

import type { ContractMethodName } from './contract.js';

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

function loadBillingModes(): string[] {
  const parsed: unknown = JSON.parse(
    readFileSync(new URL('./billing-modes.json', import.meta.url), 'utf-8'),
  );
  if (!Array.isArray(parsed) || !parsed.every((mode) => typeof mode === 'string')) {
    throw new Error('billing-modes.json must be an array of strings');
  }
  return parsed;
}

/** Every billing mode a pricing spec may declare. */
export const BILLING_MODES: readonly string[] = loadBillingModes();

export const RECOMMENDATION_CATEGORIES = [
  'cost',
  'performance',
  'security',
  'reliability',
  'anomaly',
] as const;

export const BUDGET_PERIODS = ['daily', 'weekly', 'monthly', 'quarterly', 'annually'] as const;

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

const currencySchema = { type: 'string', pattern: '^[A-Z]{3}$' };
const nonEmptyString = { type: 'string', minLength: 1 };
const nonNegative = { type: 'number', minimum: 0 };

// ---------------------------------------------------------------------------
// Per-method schemas
// ---------------------------------------------------------------------------

const nameSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 100 },
  },
};

const supportsSchema = {
  type: 'object',
  required: ['supported'],
  properties: {
    supported: { type: 'boolean' },
    reason: { type: 'string' },
    capabilities: { type: 'object', additionalProperties: { type: 'boolean' } },
  },
  if: { properties: { supported: { const: false } } },
  then: { required: ['reason'], properties: { reason: nonEmptyString } },
};

const actualCostSchema = {
  type: 'object',
  required: ['results', 'currency'],
  properties: {
    currency: currencySchema,
    results: {
      type: 'array',
      items: {
        type: 'object',
        required: ['timestamp', 'cost', 'source'],
        properties: {
          timestamp: nonEmptyString,
          cost: nonNegative,
          usage_amount: nonNegative,
          usage_unit: { type: 'string' },
          source: nonEmptyString,
        },
      },
    },
  },
};

const projectedCostSchema = {
  type: 'object',
  required: ['unit_price', 'currency', 'cost_per_month'],
  properties: {
    unit_price: nonNegative,
    currency: currencySchema,
    cost_per_month: nonNegative,
    billing_detail: { type: 'string' },
  },
};

const pricingSpecSchema = {
  type: 'object',
  required: ['spec'],
  properties: {
    spec: {
      type: 'object',
      required: ['provider', 'resource_type', 'billing_mode', 'rate_per_unit', 'currency'],
      properties: {
        provider: nonEmptyString,
        resource_type: nonEmptyString,
        sku: { type: 'string' },
        region: { type: 'string' },
        billing_mode: { type: 'string', enum: BILLING_MODES },
        rate_per_unit: nonNegative,
        currency: currencySchema,
        description: { type: 'string' },
      },
    },
  },
};

const estimateCostSchema = {
  type: 'object',
  required: ['currency', 'cost_monthly'],
  properties: {
    currency: currencySchema,
    cost_monthly: nonNegative,
  },
};

const recommendationsSchema = {
  type: 'object',
  required: ['recommendations'],
  properties: {
    recommendations: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'category'],
        properties: {
          id: nonEmptyString,
          category: { type: 'string', enum: RECOMMENDATION_CATEGORIES },
          description: { type: 'string' },
          estimated_savings: nonNegative,
          currency: currencySchema,
        },
      },
    },
    next_page_token: { type: 'string' },
  },
};

const budgetCount = { type: 'integer', minimum: 0 };

const budgetsSchema = {
  type: 'object',
  required: ['budgets'],
  properties: {
    budgets: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'source', 'amount', 'period'],
        properties: {
          id: nonEmptyString,
          name: nonEmptyString,
          source: nonEmptyString,
          amount: {
            type: 'object',
            required: ['limit', 'currency'],
            properties: {
              limit: { type: 'number', exclusiveMinimum: 0 },
              currency: currencySchema,
            },
          },
          period: { type: 'string', enum: BUDGET_PERIODS },
          status: {
            type: 'object',
            required: ['current_spend', 'percentage_used'],
            properties: {
              current_spend: nonNegative,
              percentage_used: nonNegative,
            },
          },
        },
      },
    },
    summary: {
      type: 'object',
      required: [
        'total_budgets',
        'budgets_ok',
        'budgets_warning',
        'budgets_critical',
        'budgets_exceeded',
      ],
      properties: {
        total_budgets: budgetCount,
        budgets_ok: budgetCount,
        budgets_warning: budgetCount,
        budgets_critical: budgetCount,
        budgets_exceeded: budgetCount,
      },
    },
  },
};

/** Response schema per contract method. */
export const RESPONSE_SCHEMAS: Readonly<Record<ContractMethodName, Record<string, unknown>>> = {
  name: nameSchema,
  supports: supportsSchema,
  getActualCost: actualCostSchema,
  getProjectedCost: projectedCostSchema,
  getPricingSpec: pricingSpecSchema,
  estimateCost: estimateCostSchema,
  getRecommendations: recommendationsSchema,
  getBudgets: budgetsSchema,
};
