export {
  type ResourceDescriptor,
  type CapabilityFlags,
  type NameRequest,
  type NameResponse,
  type SupportsRequest,
  type SupportsResponse,
  type GetActualCostRequest,
  type ActualCostResult,
  type GetActualCostResponse,
  type GetProjectedCostRequest,
  type GetProjectedCostResponse,
  type GetPricingSpecRequest,
  type PricingSpec,
  type GetPricingSpecResponse,
  type EstimateCostRequest,
  type EstimateCostResponse,
  type GetRecommendationsRequest,
  type RecommendationCategory,
  type Recommendation,
  type GetRecommendationsResponse,
  type GetBudgetsRequest,
  type BudgetPeriod,
  type Budget,
  type BudgetSummary,
  type GetBudgetsResponse,
  type ContractMethods,
  type ContractMethodName,
  type ContractRequest,
  type ContractResponse,
  type OptionalMethodName,
  type RequiredMethodName,
  type CallContext,
  type MethodHandler,
  type HandlerTable,
  type CostSourceService,
  CONTRACT_METHODS,
  REQUIRED_METHODS,
  CAPABILITY_FLAGS,
  RPC_METHOD_NAMES,
  isContractMethod,
  isOptionalMethod,
} from './contract.js';

export {
  type StatusCodeValue,
  type RpcErrorOptions,
  StatusCode,
  REJECTION_CODES,
  RpcError,
  isStatusCode,
  isRpcError,
} from './status.js';

export {
  type ConformanceLevelValue,
  type AchievedLevel,
  type TestCategoryValue,
  type TestStatusValue,
  type Finding,
  type TestResult,
  type StatusCounts,
  type CategoryResult,
  type ConformanceResult,
  type PerformanceBaseline,
  ConformanceLevel,
  LEVEL_ORDER,
  TestCategory,
  CATEGORY_ORDER,
  CATEGORY_MIN_LEVEL,
  TestStatus,
  BLOCKING_STATUSES,
  REPORT_VERSION,
  levelRank,
  isConformanceLevel,
  isTestCategory,
} from './conformance.js';

export {
  type ProbeFixtures,
  type PerformanceSettings,
  type SuiteOptions,
  type SuiteConfig,
  DEFAULT_TEST_TIMEOUT_MS,
  ADVANCED_TEST_TIMEOUT_MS,
  DEFAULT_CONCURRENCY_FAN_OUT,
  ADVANCED_CONCURRENCY_FAN_OUT,
  DEFAULT_PERFORMANCE_TOLERANCE,
  DEFAULT_WARMUP_ITERATIONS,
  DEFAULT_TIMED_ITERATIONS,
  DEFAULT_PERFORMANCE_BUDGET_MS,
  MAX_VARIANCE_PERCENT,
  MAX_TIMEOUT_MS,
  isTimerDelay,
  DEFAULT_MAX_MESSAGE_BYTES,
  DEFAULT_BASELINES,
  DEFAULT_FIXTURES,
  SuiteConfigError,
  createSuiteConfig,
} from './suite-config.js';

export { BILLING_MODES, RECOMMENDATION_CATEGORIES, BUDGET_PERIODS, RESPONSE_SCHEMAS } from './response-schemas.js';
