export {
  type DeepPartial,
  deepMerge,
  createResourceDescriptor,
  createActualCostRequest,
  createNameResponse,
  createSupportsResponse,
  createActualCostResponse,
  createProjectedCostResponse,
  createPricingSpecResponse,
  createEstimateCostResponse,
  createRecommendationsResponse,
  createBudgetsResponse,
} from './factories.js';

export {
  type ErrorStatus,
  type DoubleBehavior,
  type ScriptOptions,
  type TestDoubleConfig,
  ConfigurableTestDouble,
  TestDoubleError,
  DEFAULT_PROVIDERS,
  SLOW_DOUBLE_DELAYS_MS,
  createSlowTestDouble,
} from './test-double.js';

export {
  type TransportHarnessOptions,
  type HarnessErrorCodeValue,
  TransportHarness,
  HarnessError,
  HarnessErrorCode,
  isHarnessError,
  assertCostSourceService,
  withTransportHarness,
} from './transport-harness.js';

export { type CallOptions, type ClientOptions, CostSourceClient } from './cost-source-client.js';
export { CostSourceServer } from './cost-source-server.js';
export { type MemoryChannel, type InjectedErrorType, createMemoryChannel } from './memory-channel.js';
export { type CategoryContextOptions, type CategorySession, startCategoryContext } from './category-context.js';

export {
  type DescribeConformanceOptions,
  type PluginFactory,
  describeCostSourceConformance,
} from './describe-conformance.js';
