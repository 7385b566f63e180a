/**
 * Decision Engine — Serialization & Summary Tests
 */

import { describe, expect, it } from 'vitest';

import {
  createDecisionReport,
  DOCS_SOURCE_RULES,
  SKIP_TESTS_ON_DOCS,
} from '../__test-utils__/fixtures/engine/engine-fixtures.ts';
import { classify } from './classification.ts';
import { planExecution } from './planner.ts';
import {
  formatDelta,
  formatNumber,
  generateMarkdownSummary,
  serializePlan,
  serializeReport,
  serializeVerdicts,
} from './summary.ts';

describe('Decision Engine — Serialization & Summaries', () => {
  describe('serializePlan', () => {
    it('maps job groups to actions', () => {
      expect(serializePlan(createDecisionReport().plan)).toEqual({
        jobs: { tests: 'skip', build: 'run' },
        optimizationScore: 50,
      });
    });
  });

  describe('serializeVerdicts', () => {
    it('maps metrics to classification and delta', () => {
      expect(serializeVerdicts(createDecisionReport().verdicts)).toEqual({
        benchmark_time_ms: { classification: 'regressed', deltaPercent: 20 },
      });
    });
  });

  describe('serializeReport', () => {
    it('produces JSON with compact and detailed sections', () => {
      const parsed: unknown = JSON.parse(serializeReport(createDecisionReport()));

      expect(parsed).toMatchObject({
        runId: 'run-1',
        passed: false,
        baselineAppended: true,
        plan: { jobs: { tests: 'skip', build: 'run' }, optimizationScore: 50 },
        verdicts: { benchmark_time_ms: { classification: 'regressed', deltaPercent: 20 } },
        details: { classification: { files: ['README.md'] } },
      });
    });

    it('is identical for identical reports', () => {
      expect(serializeReport(createDecisionReport())).toBe(serializeReport(createDecisionReport()));
    });
  });

  describe('generateMarkdownSummary', () => {
    it('renders the gate, plan, classification and regression tables', () => {
      const lines = generateMarkdownSummary(createDecisionReport()).split('\n');

      expect(lines[0]).toBe('# CI Decision Summary');
      expect(lines).toContain('**Gate**: ❌ REGRESSION DETECTED');
      expect(lines).toContain('**Optimization Score**: 50%');
      expect(lines).toContain('**Skipped Job Groups**: 1 of 2');
      expect(lines).toContain('| tests | ⏭️ skip | All changed files are limited to: docs |');
      expect(lines).toContain('| build | ▶️ run | No skip rule defined for this job group |');
      expect(lines).toContain('**Changed Files**: 1');
      expect(lines).toContain('| docs | 1 |');
      expect(lines).toContain('| benchmark_time_ms | ❌ regressed | +20% | 100 | 120 |');
      expect(lines).toContain('_Baseline updated with 1 sample(s)_');
      expect(lines.at(-1)).toBe('*Run run-1 generated at 2024-03-10T12:00:00.000Z*');
    });

    it('renders placeholders for empty sections', () => {
      const classification = classify([], DOCS_SOURCE_RULES);
      const summary = generateMarkdownSummary(
        createDecisionReport({
          classification,
          plan: planExecution(classification, SKIP_TESTS_ON_DOCS),
          verdicts: [],
          passed: true,
          baselineAppended: false,
        }),
      );
      const lines = summary.split('\n');

      expect(lines).toContain('**Gate**: ✅ PASSED');
      expect(lines).toContain('_No changed files_');
      expect(lines).toContain('_No metric samples evaluated_');
      expect(summary).not.toContain('Baseline updated');
    });

    it('notes a safety override', () => {
      const classification = classify(['README.md'], DOCS_SOURCE_RULES);
      const plan = planExecution(classification, {
        ...SKIP_TESTS_ON_DOCS,
        minOptimizationScore: 75,
      });

      const lines = generateMarkdownSummary(createDecisionReport({ plan })).split('\n');

      expect(lines).toContain(
        '**Safety Override**: skipping disallowed below the policy minimum score',
      );
    });
  });

  describe('formatting helpers', () => {
    it('formats numbers with at most two decimals', () => {
      expect(formatNumber(100)).toBe('100');
      expect(formatNumber(2 / 3)).toBe('0.67');
    });

    it('formats deltas with a sign', () => {
      expect(formatDelta(20)).toBe('+20%');
      expect(formatDelta(-4.5)).toBe('-4.5%');
      expect(formatDelta(0)).toBe('0%');
      expect(formatDelta(null)).toBe('n/a');
    });
  });
});
