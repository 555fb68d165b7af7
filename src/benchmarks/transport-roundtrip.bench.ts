/**
 * Transport round-trip benchmark.
 *
 * Measures calls/second through the in-memory channel: frame encoding,
 * server dispatch inside the fault boundary, and client correlation.
 * Also measures the codec alone so transport overhead can be separated
 * from plugin time.
 *
 * Target: >1000 calls/s for GetProjectedCost against the test double.
 */

import { bench, describe } from 'vitest';
import { TransportHarness } from '../testing/transport-harness.js';
import { ConfigurableTestDouble } from '../testing/test-double.js';
import { createActualCostRequest, createResourceDescriptor } from '../testing/factories.js';
import { decodeFrame, encodeFrame } from '../core/codec.js';
import type { RequestFrame } from '../core/codec.js';
import { configureLogging } from '../core/logger.js';

configureLogging({ level: 'error', sink: () => {} });

// Module-level setup, runs once before benchmarks
const harness = new TransportHarness();
const client = await harness.start(new ConfigurableTestDouble({ actualCostDataPoints: 24 }));
const resource = createResourceDescriptor();

const frame: RequestFrame = {
  kind: 'request',
  id: 1,
  method: 'getActualCost',
  timeout_ms: 5_000,
  payload: createActualCostRequest(),
};
const encoded = encodeFrame(frame);

describe('transport round trip', () => {
  bench(
    'Name',
    async () => {
      await client.name();
    },
    { iterations: 1_000, time: 3_000 },
  );

  bench(
    'GetProjectedCost',
    async () => {
      await client.getProjectedCost({ resource });
    },
    { iterations: 1_000, time: 3_000 },
  );

  bench(
    'GetActualCost with 24 results',
    async () => {
      await client.getActualCost(createActualCostRequest());
    },
    { iterations: 500, time: 3_000 },
  );

  bench(
    '10 concurrent GetPricingSpec calls',
    async () => {
      await Promise.all(Array.from({ length: 10 }, () => client.getPricingSpec({ resource })));
    },
    { iterations: 200, time: 3_000 },
  );
});

describe('frame codec', () => {
  bench('encodeFrame', () => {
    encodeFrame(frame);
  });

  bench('decodeFrame', () => {
    decodeFrame(encoded);
  });
});
