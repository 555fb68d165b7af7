/**
 * Reduces raw test results into category results and the final
 * certification. Everything here is pure: the same set of results, in any
 * order, always aggregates to the same (deep-frozen) output.
 */

import { CONTRACT_METHODS, RPC_METHOD_NAMES } from '../types/contract.js';
import type {
  AchievedLevel,
  CategoryResult,
  ConformanceLevelValue,
  ConformanceResult,
  StatusCounts,
  TestCategoryValue,
  TestResult,
} from '../types/conformance.js';
import {
  BLOCKING_STATUSES,
  CATEGORY_MIN_LEVEL,
  CATEGORY_ORDER,
  LEVEL_ORDER,
  REPORT_VERSION,
  levelRank,
} from '../types/conformance.js';

export const LEVEL_LABELS: Readonly<Record<AchievedLevel, string>> = {
  none: 'None',
  basic: 'Basic',
  standard: 'Standard',
  advanced: 'Advanced',
};

// ---------------------------------------------------------------------------
// Ordering
// ---------------------------------------------------------------------------

const METHOD_INDEX: ReadonlyMap<string, number> = new Map(
  CONTRACT_METHODS.map((method, index) => [RPC_METHOD_NAMES[method], index]),
);

function methodIndex(rpc: string): number {
  return METHOD_INDEX.get(rpc) ?? CONTRACT_METHODS.length;
}

function compareResults(a: TestResult, b: TestResult): number {
  return (
    CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category) ||
    methodIndex(a.method) - methodIndex(b.method) ||
    a.name.localeCompare(b.name) ||
    levelRank(a.level) - levelRank(b.level) ||
    a.status.localeCompare(b.status)
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

// ---------------------------------------------------------------------------
// Counting
// ---------------------------------------------------------------------------

export function emptyCounts(): StatusCounts {
  return { total: 0, passed: 0, failed: 0, skipped: 0, timedOut: 0, cancelled: 0 };
}

function countStatuses(results: readonly TestResult[]): StatusCounts {
  const counts = emptyCounts();
  for (const r of results) {
    counts.total++;
    switch (r.status) {
      case 'passed':
        counts.passed++;
        break;
      case 'failed':
        counts.failed++;
        break;
      case 'skipped':
        counts.skipped++;
        break;
      case 'timed_out':
        counts.timedOut++;
        break;
      case 'cancelled':
        counts.cancelled++;
        break;
    }
  }
  return counts;
}

function sumCounts(all: readonly StatusCounts[]): StatusCounts {
  return all.reduce(
    (acc, c) => ({
      total: acc.total + c.total,
      passed: acc.passed + c.passed,
      failed: acc.failed + c.failed,
      skipped: acc.skipped + c.skipped,
      timedOut: acc.timedOut + c.timedOut,
      cancelled: acc.cancelled + c.cancelled,
    }),
    emptyCounts(),
  );
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Aggregate one category. Results from other categories are ignored; a
 * category with no results is unattempted and never satisfied.
 */
export function aggregateCategory(category: TestCategoryValue, results: readonly TestResult[]): CategoryResult {
  const own = results
    .filter((r) => r.category === category)
    .map((r) => structuredClone(r))
    .sort(compareResults);

  const warnings = own.flatMap((r) => (r.warnings ?? []).map((w) => `${r.name}: ${w}`));

  return deepFreeze({
    category,
    attempted: own.length > 0,
    counts: countStatuses(own),
    satisfied: own.length > 0 && !own.some((r) => BLOCKING_STATUSES.has(r.status)),
    warnings,
    results: own,
  });
}

function blocksLevel(category: CategoryResult, level: ConformanceLevelValue): boolean {
  if (!category.attempted) return true;
  return category.results.some((r) => BLOCKING_STATUSES.has(r.status) && levelRank(r.level) <= levelRank(level));
}

/**
 * The highest level, up to `requested`, whose required categories (and
 * those of every lower level) were all attempted without a failed, timed
 * out or cancelled test at or below that level.
 */
export function determineAchievedLevel(
  categories: readonly CategoryResult[],
  requested: ConformanceLevelValue,
): AchievedLevel {
  let achieved: AchievedLevel = 'none';

  for (const level of LEVEL_ORDER) {
    if (levelRank(level) > levelRank(requested)) break;

    const required = CATEGORY_ORDER.filter((c) => levelRank(CATEGORY_MIN_LEVEL[c]) <= levelRank(level));
    const blocked = required.some((c) => {
      const category = categories.find((r) => r.category === c);
      return category === undefined || blocksLevel(category, level);
    });
    if (blocked) break;
    achieved = level;
  }

  return achieved;
}

export function formatSummaryText(
  achieved: AchievedLevel,
  requested: ConformanceLevelValue,
  counts: StatusCounts,
): string {
  const tally =
    `${counts.passed} passed, ${counts.failed} failed, ${counts.skipped} skipped, ` +
    `${counts.timedOut} timed out, ${counts.cancelled} cancelled`;
  const headline =
    achieved === 'none'
      ? `No conformance level achieved (requested ${LEVEL_LABELS[requested]})`
      : `Achieved ${LEVEL_LABELS[achieved]} conformance (requested ${LEVEL_LABELS[requested]})`;
  return `${headline}: ${tally}`;
}

export interface AggregateInput {
  pluginName: string;
  requestedLevel: ConformanceLevelValue;
  results: readonly TestResult[];
  /** ISO timestamp of the run start. */
  startedAt: string;
  durationMs: number;
  /** Warnings about the run itself, listed before the per-test ones. */
  runWarnings?: readonly string[];
}

export function aggregateResults(input: AggregateInput): ConformanceResult {
  const categories = CATEGORY_ORDER.map((category) => aggregateCategory(category, input.results));
  const summary = sumCounts(categories.map((c) => c.counts));
  const achievedLevel = determineAchievedLevel(categories, input.requestedLevel);

  return deepFreeze({
    version: REPORT_VERSION,
    pluginName: input.pluginName,
    requestedLevel: input.requestedLevel,
    achievedLevel,
    categories,
    summary,
    summaryText: formatSummaryText(achievedLevel, input.requestedLevel, summary),
    warnings: [...(input.runWarnings ?? []), ...categories.flatMap((c) => c.warnings)],
    startedAt: input.startedAt,
    durationMs: Math.round(input.durationMs * 1000) / 1000,
  });
}
