/**
 * Report rendering for a ConformanceResult.
 *
 * The structured report is the stable, snake_case document CI tooling
 * parses. Text and JUnit renderings are derived from it.
 */

import type {
  CategoryResult,
  ConformanceResult,
  Finding,
  StatusCounts,
  TestCategoryValue,
  TestResult,
  TestStatusValue,
} from '../types/conformance.js';
import { CATEGORY_ORDER } from '../types/conformance.js';
import { LEVEL_LABELS } from './aggregator.js';

// ---------------------------------------------------------------------------
// Structured report
// ---------------------------------------------------------------------------

export type CategoryState = 'satisfied' | 'unsatisfied' | 'unattempted';

export interface ReportCounts {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  timed_out: number;
  cancelled: number;
}

export interface ReportTest {
  name: string;
  method: string;
  level: string;
  status: TestStatusValue;
  duration_ms: number;
  error?: string;
  details?: string;
  metrics?: Record<string, number>;
  findings?: Finding[];
  warnings?: string[];
}

export interface ReportCategory {
  category: TestCategoryValue;
  state: CategoryState;
  counts: ReportCounts;
  warnings: string[];
  tests: ReportTest[];
}

export interface StructuredReport {
  version: string;
  plugin_name: string;
  requested_level: string;
  achieved_level: string;
  summary: ReportCounts;
  summary_text: string;
  started_at: string;
  duration_ms: number;
  warnings: string[];
  categories: ReportCategory[];
}

const CATEGORY_LABELS: Readonly<Record<TestCategoryValue, string>> = {
  spec_validation: 'Spec Validation',
  rpc_correctness: 'RPC Correctness',
  performance: 'Performance',
  concurrency: 'Concurrency',
};

function toReportCounts(counts: StatusCounts | undefined): ReportCounts {
  return {
    total: counts?.total ?? 0,
    passed: counts?.passed ?? 0,
    failed: counts?.failed ?? 0,
    skipped: counts?.skipped ?? 0,
    timed_out: counts?.timedOut ?? 0,
    cancelled: counts?.cancelled ?? 0,
  };
}

function toReportTest(result: TestResult): ReportTest {
  return {
    name: result.name,
    method: result.method,
    level: result.level,
    status: result.status,
    duration_ms: result.durationMs,
    ...(result.error !== undefined ? { error: result.error } : {}),
    ...(result.details !== undefined ? { details: result.details } : {}),
    ...(result.metrics !== undefined ? { metrics: { ...result.metrics } } : {}),
    ...(result.findings !== undefined ? { findings: result.findings.map((f) => ({ ...f })) } : {}),
    ...(result.warnings !== undefined ? { warnings: [...result.warnings] } : {}),
  };
}

function categoryState(category: CategoryResult | undefined): CategoryState {
  if (!category || category.results.length === 0) return 'unattempted';
  return category.satisfied ? 'satisfied' : 'unsatisfied';
}

/**
 * Convert a result into the stable report document. Every category appears,
 * in execution order; one with no recorded tests is `unattempted`.
 */
export function toStructuredReport(result: ConformanceResult): StructuredReport {
  const categories = CATEGORY_ORDER.map((name): ReportCategory => {
    const category = result.categories.find((c) => c.category === name);
    return {
      category: name,
      state: categoryState(category),
      counts: toReportCounts(category?.counts),
      warnings: [...(category?.warnings ?? [])],
      tests: (category?.results ?? []).map(toReportTest),
    };
  });

  return {
    version: result.version,
    plugin_name: result.pluginName,
    requested_level: result.requestedLevel,
    achieved_level: result.achievedLevel,
    summary: toReportCounts(result.summary),
    summary_text: result.summaryText,
    started_at: result.startedAt,
    duration_ms: result.durationMs,
    warnings: [...result.warnings],
    categories,
  };
}

/** The structured report as indented JSON. */
export function formatJsonReport(result: ConformanceResult): string {
  return JSON.stringify(toStructuredReport(result), null, 2);
}

// ---------------------------------------------------------------------------
// Text report
// ---------------------------------------------------------------------------

const STATUS_ICONS: Readonly<Record<TestStatusValue, string>> = {
  passed: '✓',
  failed: '✗',
  skipped: '○',
  timed_out: '⧗',
  cancelled: '⊘',
};

const HEAVY_RULE = '═══════════════════════════════════════════════════════════';
const LIGHT_RULE = '───────────────────────────────────────────────────────────';

/** Format a result as a human-readable text summary. */
export function formatTextReport(result: ConformanceResult): string {
  const report = toStructuredReport(result);
  const lines: string[] = [];

  lines.push(HEAVY_RULE);
  lines.push(`  Conformance Report: ${report.plugin_name}`);
  lines.push(HEAVY_RULE);
  lines.push('');
  lines.push(`  Requested: ${LEVEL_LABELS[result.requestedLevel]}`);
  lines.push(`  Achieved:  ${LEVEL_LABELS[result.achievedLevel]}`);
  lines.push(`  Started:   ${report.started_at}`);
  lines.push(`  Duration:  ${report.duration_ms}ms`);
  lines.push(`  Results:   ${report.summary.passed}/${report.summary.total} passed`);
  lines.push('');

  for (const category of report.categories) {
    lines.push(LIGHT_RULE);
    lines.push(`  ${CATEGORY_LABELS[category.category]} [${category.state}]`);
    lines.push(LIGHT_RULE);
    for (const test of category.tests) {
      lines.push(formatTestLine(test));
    }
    lines.push('');
  }

  lines.push(`  ${report.summary_text}`);
  lines.push('');

  return lines.join('\n');
}

function formatTestLine(test: ReportTest): string {
  const lines: string[] = [];
  lines.push(`  ${STATUS_ICONS[test.status]} ${test.name} [${test.duration_ms}ms]`);

  if (test.status === 'skipped') {
    if (test.details) lines.push(`    Skipped: ${test.details}`);
  } else if (test.error) {
    lines.push(`    Error: ${test.error}`);
  }
  for (const warning of test.warnings ?? []) {
    lines.push(`    Warning: ${warning}`);
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// JUnit XML report (CI-compatible)
// ---------------------------------------------------------------------------

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

/**
 * Format a result as JUnit XML, one testsuite per category. Failures map
 * to `<failure>`, timeouts and cancellations to `<error>`.
 */
export function formatJUnitReport(result: ConformanceResult): string {
  const report = toStructuredReport(result);
  const s = report.summary;
  const lines: string[] = [];

  lines.push('<?xml version="1.0" encoding="UTF-8"?>');
  lines.push(
    `<testsuites name="${escapeXml(report.plugin_name)}" tests="${s.total}" failures="${s.failed}" ` +
      `errors="${s.timed_out + s.cancelled}" skipped="${s.skipped}" time="${seconds(report.duration_ms)}">`,
  );

  for (const category of report.categories) {
    const c = category.counts;
    const time = category.tests.reduce((sum, t) => sum + t.duration_ms, 0);
    lines.push(
      `  <testsuite name="${category.category}" tests="${c.total}" failures="${c.failed}" ` +
        `errors="${c.timed_out + c.cancelled}" skipped="${c.skipped}" time="${seconds(time)}">`,
    );

    for (const test of category.tests) {
      const open = `    <testcase classname="${category.category}.${escapeXml(test.method)}" name="${escapeXml(test.name)}" time="${seconds(test.duration_ms)}"`;
      const message = escapeXml(test.error ?? test.details ?? test.status);
      switch (test.status) {
        case 'passed':
          lines.push(`${open} />`);
          break;
        case 'skipped':
          lines.push(`${open}>`);
          lines.push(`      <skipped message="${message}" />`);
          lines.push('    </testcase>');
          break;
        case 'failed':
          lines.push(`${open}>`);
          lines.push(`      <failure message="${message}">${message}</failure>`);
          lines.push('    </testcase>');
          break;
        case 'timed_out':
        case 'cancelled':
          lines.push(`${open}>`);
          lines.push(`      <error type="${test.status}" message="${message}">${message}</error>`);
          lines.push('    </testcase>');
          break;
      }
    }

    lines.push('  </testsuite>');
  }

  lines.push('</testsuites>');
  return lines.join('\n');
}

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
