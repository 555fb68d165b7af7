/**
 * Response structure validation.
 *
 * Checks contract responses against their JSON Schemas with ajv (all errors,
 * not just the first) and converts each ajv error into a Finding naming the
 * field and its expected domain. A few rules that span fields, such as budget
 * summary totals, are checked after the schema.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { ContractMethodName } from '../types/contract.js';
import { CONTRACT_METHODS } from '../types/contract.js';
import type { Finding } from '../types/conformance.js';
import { RESPONSE_SCHEMAS } from '../types/response-schemas.js';

// ---------------------------------------------------------------------------
// Path formatting
// ---------------------------------------------------------------------------

/** `/results/0/cost` → `results[0].cost` */
export function formatInstancePath(pointer: string): string {
  let path = '';
  for (const segment of pointer.split('/').slice(1)) {
    const decoded = segment.replace(/~1/g, '/').replace(/~0/g, '~');
    if (/^\d+$/.test(decoded)) {
      path += `[${decoded}]`;
    } else {
      path += path.length === 0 ? decoded : `.${decoded}`;
    }
  }
  return path;
}

function joinPath(parent: string, child: string): string {
  return parent.length === 0 ? child : `${parent}.${child}`;
}

/** Enum domains longer than this are abbreviated in findings. */
const MAX_LISTED_VALUES = 10;

function describeDomain(values: readonly unknown[]): string {
  const listed = values.slice(0, MAX_LISTED_VALUES).map(String).join(', ');
  return values.length > MAX_LISTED_VALUES
    ? `one of ${listed}, ... (${values.length} values)`
    : `one of ${listed}`;
}

function paramValue(error: ErrorObject, key: string): unknown {
  const params: Record<string, unknown> = error.params;
  return params[key];
}

function valueAt(root: unknown, pointer: string): unknown {
  let current = root;
  for (const segment of pointer.split('/').slice(1)) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, segment.replace(/~1/g, '/').replace(/~0/g, '~'));
  }
  return current;
}

// ---------------------------------------------------------------------------
// ajv error → Finding
// ---------------------------------------------------------------------------

function toFinding(error: ErrorObject, response: unknown): Finding | null {
  const path = formatInstancePath(error.instancePath);
  const field = path.length === 0 ? '(response)' : path;
  const actual = valueAt(response, error.instancePath);

  switch (error.keyword) {
    case 'if':
      // The failing `then` branch reports its own errors.
      return null;
    case 'required':
      return { field: joinPath(path, String(paramValue(error, 'missingProperty'))), expected: 'present' };
    case 'enum':
      return { field, expected: describeDomain(toArray(paramValue(error, 'allowedValues'))), actual };
    case 'const':
      return { field, expected: `equal to ${JSON.stringify(paramValue(error, 'allowedValue'))}`, actual };
    case 'type':
      return { field, expected: `type ${String(paramValue(error, 'type'))}`, actual };
    case 'minimum':
      return { field, expected: `>= ${String(paramValue(error, 'limit'))}`, actual };
    case 'exclusiveMinimum':
      return { field, expected: `> ${String(paramValue(error, 'limit'))}`, actual };
    case 'maximum':
      return { field, expected: `<= ${String(paramValue(error, 'limit'))}`, actual };
    case 'minLength':
      return { field, expected: `at least ${String(paramValue(error, 'limit'))} characters`, actual };
    case 'maxLength':
      return { field, expected: `at most ${String(paramValue(error, 'limit'))} characters`, actual };
    case 'pattern':
      return { field, expected: `matching ${String(paramValue(error, 'pattern'))}`, actual };
    default:
      return { field, expected: error.message ?? error.keyword, actual };
  }
}

function toArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

// ---------------------------------------------------------------------------
// Cross-field rules
// ---------------------------------------------------------------------------

const SUMMARY_BUCKETS = ['budgets_ok', 'budgets_warning', 'budgets_critical', 'budgets_exceeded'];

function checkBudgetSummary(response: unknown): Finding[] {
  const summary = valueAt(response, '/summary');
  if (typeof summary !== 'object' || summary === null) return [];

  const total = Reflect.get(summary, 'total_budgets');
  if (typeof total !== 'number') return [];

  let bucketed = 0;
  for (const bucket of SUMMARY_BUCKETS) {
    const count = Reflect.get(summary, bucket);
    if (typeof count === 'number') bucketed += count;
  }

  return bucketed > total
    ? [{ field: 'summary', expected: `bucket counts summing to at most total_budgets (${total})`, actual: bucketed }]
    : [];
}

// ---------------------------------------------------------------------------
// ResponseValidator
// ---------------------------------------------------------------------------

export class ResponseValidator {
  private readonly validators: Map<ContractMethodName, ValidateFunction> = new Map();

  constructor() {
    const ajv = new Ajv({ allErrors: true, strict: false });
    for (const method of CONTRACT_METHODS) {
      this.validators.set(method, ajv.compile(RESPONSE_SCHEMAS[method]));
    }
  }

  /**
   * Validate a response and return every finding. An empty array means the
   * response is structurally valid.
   */
  validate(method: ContractMethodName, response: unknown): Finding[] {
    const validateFn = this.validators.get(method);
    if (!validateFn) {
      throw new Error(`No compiled schema for method: "${method}"`);
    }

    const findings: Finding[] = [];
    if (!validateFn(response)) {
      for (const error of validateFn.errors ?? []) {
        const finding = toFinding(error, response);
        if (finding) findings.push(finding);
      }
    }

    if (method === 'getBudgets') {
      findings.push(...checkBudgetSummary(response));
    }
    return findings;
  }
}

/** One line per finding, joined: `field (expected X, got Y)`. */
export function formatFindings(findings: readonly Finding[]): string {
  return findings
    .map((finding) =>
      finding.actual !== undefined
        ? `${finding.field} (expected ${finding.expected}, got ${JSON.stringify(finding.actual)})`
        : `${finding.field} (expected ${finding.expected})`,
    )
    .join('; ');
}
