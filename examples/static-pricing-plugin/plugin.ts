/**
 * Static pricing plugin: a minimal cost source backed by a fixed rate card.
 *
 * Certifies at Standard. Run it through the suite with:
 *   const result = await runStandardConformance(createStaticPricingPlugin());
 */

import type { CostSourceService, ResourceDescriptor } from '../../src/types/contract.js';
import { RpcError, StatusCode } from '../../src/types/status.js';
import {
  validateActualCostRequest,
  validateResourceDescriptor,
  validateTimeRange,
} from '../../src/core/contract-rules.js';

const HOURS_PER_MONTH = 730;

/** Hourly USD rates keyed by `provider/resource_type/sku`. */
export const RATE_CARD: Readonly<Record<string, number>> = {
  'aws/ec2/t3.micro': 0.0104,
  'aws/ec2/t3.small': 0.0208,
  'aws/ec2/m5.large': 0.096,
  'aws/rds/db.t3.micro': 0.017,
};

function rateKey(resource: ResourceDescriptor): string {
  return `${resource.provider}/${resource.resource_type}/${resource.sku ?? ''}`;
}

function priced(resource: ResourceDescriptor | null): { resource: ResourceDescriptor; rate: number } {
  const valid = validateResourceDescriptor(resource);
  const rate = RATE_CARD[rateKey(valid)];
  if (rate === undefined) {
    throw new RpcError({ code: StatusCode.NOT_FOUND, message: `no rate for ${rateKey(valid)}` });
  }
  return { resource: valid, rate };
}

function monthly(rate: number): number {
  return Math.round(rate * HOURS_PER_MONTH * 100) / 100;
}

export interface StaticPricingOptions {
  /** Rate card entry every resource id is billed at by GetActualCost. */
  actualCostRateKey?: string;
}

export function createStaticPricingPlugin(options: StaticPricingOptions = {}): CostSourceService {
  const actualCostRateKey = options.actualCostRateKey ?? 'aws/ec2/t3.micro';
  const actualCostRate = RATE_CARD[actualCostRateKey];
  if (actualCostRate === undefined) {
    throw new Error(`actualCostRateKey "${actualCostRateKey}" is not in the rate card`);
  }

  return {
    async name() {
      return { name: 'static-pricing' };
    },

    async supports({ resource }) {
      const valid = validateResourceDescriptor(resource);
      if (valid.provider !== 'aws') {
        return { supported: false, reason: `provider "${valid.provider}" is not priced` };
      }
      return { supported: true, capabilities: { estimate_cost: true } };
    },

    async getActualCost(request) {
      validateActualCostRequest(request);
      const { startMs, endMs } = validateTimeRange(request.start, request.end);
      const hours = (endMs - startMs) / 3_600_000;

      return {
        currency: 'USD',
        results: [
          {
            timestamp: request.start,
            cost: Math.round(actualCostRate * hours * 100) / 100,
            usage_amount: hours,
            usage_unit: 'hours',
            source: 'static-pricing',
          },
        ],
      };
    },

    async getProjectedCost({ resource }) {
      const { rate } = priced(resource);
      return { unit_price: rate, currency: 'USD', cost_per_month: monthly(rate), billing_detail: 'on_demand' };
    },

    async getPricingSpec({ resource }) {
      const { resource: valid, rate } = priced(resource);
      return {
        spec: {
          provider: valid.provider,
          resource_type: valid.resource_type,
          ...(valid.sku !== undefined ? { sku: valid.sku } : {}),
          ...(valid.region !== undefined ? { region: valid.region } : {}),
          billing_mode: 'on_demand',
          rate_per_unit: rate,
          currency: 'USD',
        },
      };
    },

    async estimateCost({ resource }) {
      const { rate } = priced(resource);
      return { currency: 'USD', cost_monthly: monthly(rate) };
    },
  };
}
