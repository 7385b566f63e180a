/**
 * Decision Engine — Execution Planning Tests
 *
 * These tests assert:
 * - skips only happen when every changed file is whitelisted
 * - unclassified files and empty changes run conservatively
 * - policy inconsistencies surface as ConfigurationError
 * - adding files never turns a run into a skip
 */

import { describe, expect, it } from 'vitest';
import { captureError } from '../__test-utils__/utils/errors.ts';
import { ConfigurationError } from '../errors/errors.ts';
import { classify } from './classification.ts';
import {
  jobGroupKey,
  planExecution,
  roundScore,
  shouldRun,
  validatePolicy,
} from './planner.ts';
import type { PatternRule, Policy } from './types.ts';

const RULES: readonly PatternRule[] = [
  { category: 'docs', patterns: ['*.md', 'docs/**'] },
  { category: 'source', patterns: ['src/**'] },
  { category: 'ci', patterns: ['.github/**'] },
];

const TESTS_ON_DOCS: Policy = {
  jobGroups: [{ name: 'tests', skipRules: [{ id: 'skip_tests_on_docs_only', whenOnly: ['docs'] }] }],
  minOptimizationScore: 0,
  skipOnEmptyChange: false,
};

const THREE_GROUPS: Policy = {
  jobGroups: [
    { name: 'tests', skipRules: [{ id: 'skip_tests_on_docs_only', whenOnly: ['docs'] }] },
    {
      name: 'security',
      skipRules: [{ id: 'skip_security_on_docs_only', whenOnly: ['docs'] }],
    },
    { name: 'build', skipRules: [] },
  ],
  minOptimizationScore: 0,
  skipOnEmptyChange: false,
};

describe('Decision Engine — Execution Planning', () => {
  describe('planExecution', () => {
    it('skips tests for a docs-only change', () => {
      const plan = planExecution(
        classify(['README.md'], [{ category: 'docs', patterns: ['*.md'] }]),
        TESTS_ON_DOCS,
      );

      expect(plan.jobs).toEqual([
        {
          jobGroup: 'tests',
          action: 'skip',
          reason: 'All changed files are limited to: docs',
          rule: 'skip_tests_on_docs_only',
        },
      ]);
      expect(plan.optimizationScore).toBe(100);
      expect(plan.skipped).toBe(1);
      expect(plan.total).toBe(1);
    });

    it('runs tests when source and docs change together', () => {
      const plan = planExecution(classify(['src/app.py', 'README.md'], RULES), TESTS_ON_DOCS);

      expect(plan.jobs[0]).toEqual({
        jobGroup: 'tests',
        action: 'run',
        reason: 'Changed files fall outside every skip whitelist for this job group',
      });
      expect(plan.optimizationScore).toBe(0);
    });

    it('runs every job group when unclassified files are present', () => {
      const plan = planExecution(classify(['README.md', 'Makefile'], RULES), THREE_GROUPS);

      expect(plan.jobs.map((j) => j.action)).toEqual(['run', 'run', 'run']);
      expect(plan.jobs[0]?.reason).toBe(
        'Unclassified files present (1); running conservatively',
      );
    });

    it('runs job groups without skip rules', () => {
      const plan = planExecution(classify(['README.md'], RULES), THREE_GROUPS);

      expect(plan.jobs[2]).toEqual({
        jobGroup: 'build',
        action: 'run',
        reason: 'No skip rule defined for this job group',
      });
      expect(plan.skipped).toBe(2);
      expect(plan.optimizationScore).toBe(66.7);
    });

    it('requires every category of a multi-category file to be whitelisted', () => {
      const rules: PatternRule[] = [
        { category: 'docs', patterns: ['**/*.md'] },
        { category: 'source', patterns: ['src/**'] },
      ];

      const plan = planExecution(classify(['src/NOTES.md'], rules), TESTS_ON_DOCS);

      expect(plan.jobs[0]?.action).toBe('run');
    });

    it('skips when any one of several skip rules is satisfied', () => {
      const policy: Policy = {
        ...TESTS_ON_DOCS,
        jobGroups: [
          {
            name: 'tests',
            skipRules: [
              { id: 'docs-only', whenOnly: ['docs'] },
              { id: 'ci-only', whenOnly: ['ci'] },
            ],
          },
        ],
      };

      const plan = planExecution(classify(['.github/workflows/ci.yml'], RULES), policy);

      expect(plan.jobs[0]).toMatchObject({ action: 'skip', rule: 'ci-only' });
    });

    describe('empty change', () => {
      it('runs everything unless the policy allows skipping on zero changes', () => {
        const plan = planExecution(classify([], RULES), THREE_GROUPS);

        expect(plan.jobs.map((j) => j.action)).toEqual(['run', 'run', 'run']);
        expect(plan.jobs[0]?.reason).toBe(
          'Empty change; policy does not allow skipping on zero changes',
        );
        expect(plan.optimizationScore).toBe(0);
      });

      it('skips everything when the policy allows it', () => {
        const plan = planExecution(classify([], RULES), {
          ...THREE_GROUPS,
          skipOnEmptyChange: true,
        });

        expect(plan.jobs.map((j) => j.action)).toEqual(['skip', 'skip', 'skip']);
        expect(plan.optimizationScore).toBe(100);
      });
    });

    describe('minimum optimization score', () => {
      it('forces every job group to run when savings fall below the minimum', () => {
        const plan = planExecution(classify(['README.md'], RULES), {
          ...THREE_GROUPS,
          minOptimizationScore: 80,
        });

        expect(plan.safetyOverride).toBe(true);
        expect(plan.skipped).toBe(0);
        expect(plan.optimizationScore).toBe(0);
        expect(plan.jobs.map((j) => j.action)).toEqual(['run', 'run', 'run']);
        expect(plan.jobs[0]?.reason).toBe(
          'Optimization score 66.7 is below the policy minimum 80; skipping disallowed',
        );
        expect(plan.jobs[2]?.reason).toBe('No skip rule defined for this job group');
      });

      it('keeps skips when savings meet the minimum', () => {
        const plan = planExecution(classify(['README.md'], RULES), {
          ...THREE_GROUPS,
          minOptimizationScore: 66.7,
        });

        expect(plan.safetyOverride).toBe(false);
        expect(plan.skipped).toBe(2);
      });
    });

    it('is monotonic: adding files never turns a run into a skip', () => {
      const base = ['README.md'];
      const additions = ['docs/a.md', 'src/x.ts', '.github/ci.yml', 'Makefile'];

      let previous = planExecution(classify(base, RULES), THREE_GROUPS);
      const files = [...base];
      for (const file of additions) {
        files.push(file);
        const next = planExecution(classify(files, RULES), THREE_GROUPS);
        for (const job of previous.jobs) {
          if (job.action === 'run') {
            expect(shouldRun(next, job.jobGroup)).toBe(true);
          }
        }
        previous = next;
      }
    });

    it('is deterministic for the same inputs', () => {
      const classification = classify(['README.md', 'src/a.ts'], RULES);

      expect(planExecution(classification, THREE_GROUPS)).toEqual(
        planExecution(classification, THREE_GROUPS),
      );
    });
  });

  describe('validatePolicy', () => {
    it('rejects a skip rule referencing an undefined category', () => {
      const policy: Policy = {
        jobGroups: [
          {
            name: 'perf',
            skipRules: [{ id: 'skip_perf', whenOnly: ['nonexistent-category'] }],
          },
        ],
        minOptimizationScore: 0,
        skipOnEmptyChange: false,
      };

      const error = captureError(() => planExecution(classify(['README.md'], RULES), policy));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: 'CONFIG_UNKNOWN_CATEGORY',
        message:
          'Job group "perf": skip rule "skip_perf" references undefined category "nonexistent-category"',
      });
    });

    it('rejects whitelisting unclassified', () => {
      const policy: Policy = {
        ...TESTS_ON_DOCS,
        jobGroups: [{ name: 'tests', skipRules: [{ id: 'any', whenOnly: ['unclassified'] }] }],
      };

      expect(() => validatePolicy(policy, ['docs'])).toThrow(
        'Job group "tests": skip rule "any" may not whitelist "unclassified"',
      );
    });

    it('rejects an empty whitelist', () => {
      const policy: Policy = {
        ...TESTS_ON_DOCS,
        jobGroups: [{ name: 'tests', skipRules: [{ id: 'none', whenOnly: [] }] }],
      };

      expect(() => validatePolicy(policy, ['docs'])).toThrow(
        'Job group "tests": skip rule "none" must whitelist at least one category',
      );
    });

    it('rejects a policy without job groups', () => {
      expect(() => validatePolicy({ ...TESTS_ON_DOCS, jobGroups: [] }, ['docs'])).toThrow(
        'Policy must define at least one job group',
      );
    });

    it('rejects duplicate job groups', () => {
      const group = { name: 'tests', skipRules: [] };

      const error = captureError(() =>
        validatePolicy({ ...TESTS_ON_DOCS, jobGroups: [group, group] }, ['docs']),
      );

      expect(error).toMatchObject({
        code: 'CONFIG_DUPLICATE',
        message: 'Job group "tests" is declared twice',
      });
    });

    it('rejects job groups whose output keys collide', () => {
      const error = captureError(() =>
        validatePolicy(
          {
            ...TESTS_ON_DOCS,
            jobGroups: [
              { name: 'unit tests', skipRules: [] },
              { name: 'unit_tests', skipRules: [] },
            ],
          },
          ['docs'],
        ),
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: 'CONFIG_DUPLICATE',
        message: 'Job groups "unit tests" and "unit_tests" share the output key "unit_tests"',
        details: { subject: 'unit_tests' },
      });
    });

    it.each([-1, 101, Number.NaN])('rejects a minimum score of %s', (score) => {
      expect(() =>
        validatePolicy({ ...TESTS_ON_DOCS, minOptimizationScore: score }, ['docs']),
      ).toThrow(ConfigurationError);
    });
  });

  describe('helpers', () => {
    it('derives output keys from job-group names', () => {
      expect(jobGroupKey('e2e-suite')).toBe('e2e-suite');
      expect(jobGroupKey('lint/style checks')).toBe('lint_style_checks');
    });

    it('rounds scores to one decimal', () => {
      expect(roundScore(200 / 3)).toBe(66.7);
      expect(roundScore(100 / 3)).toBe(33.3);
    });

    it('treats unknown job groups as running', () => {
      const plan = planExecution(classify(['README.md'], RULES), TESTS_ON_DOCS);

      expect(shouldRun(plan, 'tests')).toBe(false);
      expect(shouldRun(plan, 'deploy')).toBe(true);
    });
  });
});
