/**
 * Shared engine inputs for tests.
 */

import { classify } from '../../../engine/classification.ts';
import type { RunInput } from '../../../engine/orchestrator.ts';
import { planExecution } from '../../../engine/planner.ts';
import { evaluateRegression } from '../../../engine/regression.ts';
import type {
  BaselineSeries,
  DecisionReport,
  MetricDefinition,
  MetricSample,
  PatternRule,
  Policy,
} from '../../../engine/types.ts';

export const DOCS_SOURCE_RULES: readonly PatternRule[] = [
  { category: 'docs', patterns: ['**/*.md', 'docs/**'] },
  { category: 'source', patterns: ['src/**'] },
];

export const SKIP_TESTS_ON_DOCS: Policy = {
  jobGroups: [
    { name: 'tests', skipRules: [{ id: 'skip_tests_on_docs_only', whenOnly: ['docs'] }] },
    { name: 'build', skipRules: [] },
  ],
  minOptimizationScore: 0,
  skipOnEmptyChange: false,
};

export const BENCHMARK: MetricDefinition = {
  name: 'benchmark_time_ms',
  direction: 'lower-is-better',
  thresholdPercent: 10,
  window: 10,
  significanceFloorPercent: 1,
};

export function metricSample(name: string, value: number, day = 10): MetricSample {
  return { name, value, timestamp: `2024-03-${String(day).padStart(2, '0')}T12:00:00.000Z` };
}

export function baselineSeries(name: string, ...values: number[]): BaselineSeries {
  return values.map((value, index) => metricSample(name, value, index + 1));
}

export function createRunInput(overrides: Partial<RunInput> = {}): RunInput {
  return {
    changeSet: ['README.md'],
    ruleSet: DOCS_SOURCE_RULES,
    policy: SKIP_TESTS_ON_DOCS,
    metrics: [BENCHMARK],
    metricSamples: [],
    baselines: new Map(),
    ...overrides,
  };
}

/**
 * Report for `README.md` under `SKIP_TESTS_ON_DOCS` (tests skipped, build
 * run, score 50) with `benchmark_time_ms` regressed by +20%.
 */
export function createDecisionReport(overrides: Partial<DecisionReport> = {}): DecisionReport {
  const classification = classify(['README.md'], DOCS_SOURCE_RULES);
  const verdict = evaluateRegression(
    metricSample('benchmark_time_ms', 120, 20),
    baselineSeries('benchmark_time_ms', 90, 110),
    10,
    { direction: 'lower-is-better' },
  );

  return {
    runId: 'run-1',
    generatedAt: '2024-03-10T12:00:00.000Z',
    classification,
    plan: planExecution(classification, SKIP_TESTS_ON_DOCS),
    verdicts: [verdict],
    passed: false,
    baselineAppended: true,
    ...overrides,
  };
}
