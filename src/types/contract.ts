/**
 * Cost source service contract.
 *
 * Message shapes use the wire's snake_case field names. The harness treats
 * these as opaque payloads: it never validates requests on the transport,
 * and response structure is checked by the SpecValidation category.
 */

// ---------------------------------------------------------------------------
// Shared messages
// ---------------------------------------------------------------------------

/** Identifies a cloud resource for pricing. */
export interface ResourceDescriptor {
  provider: string;
  resource_type: string;
  sku?: string;
  region?: string;
  tags?: Record<string, string>;
}

/** Capability flag name to advertised state. */
export type CapabilityFlags = Record<string, boolean>;

// ---------------------------------------------------------------------------
// Required methods
// ---------------------------------------------------------------------------

export type NameRequest = Record<string, never>;

export interface NameResponse {
  name: string;
}

export interface SupportsRequest {
  resource: ResourceDescriptor | null;
}

export interface SupportsResponse {
  supported: boolean;
  reason?: string;
  capabilities?: CapabilityFlags;
}

export interface GetActualCostRequest {
  resource_id: string;
  /** RFC 3339 timestamp. */
  start: string;
  /** RFC 3339 timestamp; must be strictly after `start`. */
  end: string;
  tags?: Record<string, string>;
}

export interface ActualCostResult {
  timestamp: string;
  cost: number;
  usage_amount?: number;
  usage_unit?: string;
  source: string;
}

export interface GetActualCostResponse {
  results: ActualCostResult[];
  currency: string;
}

export interface GetProjectedCostRequest {
  resource: ResourceDescriptor | null;
}

export interface GetProjectedCostResponse {
  unit_price: number;
  currency: string;
  cost_per_month: number;
  billing_detail?: string;
}

export interface GetPricingSpecRequest {
  resource: ResourceDescriptor | null;
}

export interface PricingSpec {
  provider: string;
  resource_type: string;
  sku?: string;
  region?: string;
  billing_mode: string;
  rate_per_unit: number;
  currency: string;
  description?: string;
}

export interface GetPricingSpecResponse {
  spec: PricingSpec;
}

// ---------------------------------------------------------------------------
// Optional methods
// ---------------------------------------------------------------------------

export interface EstimateCostRequest {
  resource: ResourceDescriptor | null;
  attributes?: Record<string, string | number | boolean>;
}

export interface EstimateCostResponse {
  currency: string;
  cost_monthly: number;
}

export interface GetRecommendationsRequest {
  target_resources?: ResourceDescriptor[];
  page_size?: number;
  page_token?: string;
}

export type RecommendationCategory = 'cost' | 'performance' | 'security' | 'reliability' | 'anomaly';

export interface Recommendation {
  id: string;
  category: RecommendationCategory;
  description?: string;
  estimated_savings?: number;
  currency?: string;
}

export interface GetRecommendationsResponse {
  recommendations: Recommendation[];
  next_page_token?: string;
}

export interface GetBudgetsRequest {
  include_status?: boolean;
}

export type BudgetPeriod = 'daily' | 'weekly' | 'monthly' | 'quarterly' | 'annually';

export interface Budget {
  id: string;
  name: string;
  source: string;
  amount: { limit: number; currency: string };
  period: BudgetPeriod;
  status?: { current_spend: number; percentage_used: number };
}

export interface BudgetSummary {
  total_budgets: number;
  budgets_ok: number;
  budgets_warning: number;
  budgets_critical: number;
  budgets_exceeded: number;
}

export interface GetBudgetsResponse {
  budgets: Budget[];
  summary?: BudgetSummary;
}

// ---------------------------------------------------------------------------
// Method table
// ---------------------------------------------------------------------------

/** Request/response pair per contract method, keyed by handler name. */
export interface ContractMethods {
  name: { request: NameRequest; response: NameResponse };
  supports: { request: SupportsRequest; response: SupportsResponse };
  getActualCost: { request: GetActualCostRequest; response: GetActualCostResponse };
  getProjectedCost: { request: GetProjectedCostRequest; response: GetProjectedCostResponse };
  getPricingSpec: { request: GetPricingSpecRequest; response: GetPricingSpecResponse };
  estimateCost: { request: EstimateCostRequest; response: EstimateCostResponse };
  getRecommendations: { request: GetRecommendationsRequest; response: GetRecommendationsResponse };
  getBudgets: { request: GetBudgetsRequest; response: GetBudgetsResponse };
}

export type ContractMethodName = keyof ContractMethods;
export type ContractRequest<M extends ContractMethodName> = ContractMethods[M]['request'];
export type ContractResponse<M extends ContractMethodName> = ContractMethods[M]['response'];

/** All methods in contract order. */
export const CONTRACT_METHODS: readonly ContractMethodName[] = [
  'name',
  'supports',
  'getActualCost',
  'getProjectedCost',
  'getPricingSpec',
  'estimateCost',
  'getRecommendations',
  'getBudgets',
];

export type OptionalMethodName = 'estimateCost' | 'getRecommendations' | 'getBudgets';
export type RequiredMethodName = Exclude<ContractMethodName, OptionalMethodName>;

export const REQUIRED_METHODS: readonly RequiredMethodName[] = [
  'name',
  'supports',
  'getActualCost',
  'getProjectedCost',
  'getPricingSpec',
];

/** Capability flag that must be advertised by Supports for each optional method. */
export const CAPABILITY_FLAGS: Readonly<Record<OptionalMethodName, string>> = {
  estimateCost: 'estimate_cost',
  getRecommendations: 'recommendations',
  getBudgets: 'budgets',
};

/** Names as they appear on the wire and in reports. */
export const RPC_METHOD_NAMES: Readonly<Record<ContractMethodName, string>> = {
  name: 'Name',
  supports: 'Supports',
  getActualCost: 'GetActualCost',
  getProjectedCost: 'GetProjectedCost',
  getPricingSpec: 'GetPricingSpec',
  estimateCost: 'EstimateCost',
  getRecommendations: 'GetRecommendations',
  getBudgets: 'GetBudgets',
};

const METHOD_NAME_SET: ReadonlySet<string> = new Set(CONTRACT_METHODS);

export function isContractMethod(value: unknown): value is ContractMethodName {
  return typeof value === 'string' && METHOD_NAME_SET.has(value);
}

export function isOptionalMethod(method: ContractMethodName): method is OptionalMethodName {
  return method === 'estimateCost' || method === 'getRecommendations' || method === 'getBudgets';
}

// ---------------------------------------------------------------------------
// Service interface
// ---------------------------------------------------------------------------

/** Per-call context handed to every handler. */
export interface CallContext {
  method: ContractMethodName;
  /** Aborted when the caller cancels or the deadline passes. */
  signal: AbortSignal;
  /** Absolute deadline in epoch milliseconds, or null when unbounded. */
  deadline: number | null;
}

export type MethodHandler<M extends ContractMethodName> = (
  request: ContractRequest<M>,
  context: CallContext,
) => Promise<ContractResponse<M>>;

/** Handler table with every method optional, used for dispatch. */
export type HandlerTable = { [M in ContractMethodName]?: MethodHandler<M> };

/**
 * A cost source plugin. The five required methods must be present; the
 * optional ones may be omitted or answer UNIMPLEMENTED.
 */
export type CostSourceService = { [M in RequiredMethodName]: MethodHandler<M> } & {
  [M in OptionalMethodName]?: MethodHandler<M>;
};
