import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createDecisionReport } from '../../__test-utils__/fixtures/engine/engine-fixtures.ts';
import { withEnv } from '../../__test-utils__/utils/env.ts';
import { createTempDir, removeTempDir } from '../../__test-utils__/utils/temp-utils.ts';
import { formatGithubOutputs, jobOutputName, publishToGithub } from './github.ts';

describe('GitHub Actions output', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('names job outputs after the group', () => {
    expect(jobOutputName('tests')).toBe('run_tests');
    expect(jobOutputName('e2e-suite')).toBe('run_e2e-suite');
    expect(jobOutputName('lint/style checks')).toBe('run_lint_style_checks');
  });

  it('formats one line per job group, then score and gate', () => {
    expect(formatGithubOutputs(createDecisionReport())).toEqual([
      'run_tests=false',
      'run_build=true',
      'optimization_score=50',
      'passed=false',
    ]);
  });

  it('appends outputs and the step summary to the runner files', async () => {
    const outputPath = path.join(dir, 'output.txt');
    const summaryPath = path.join(dir, 'summary.md');

    const result = await publishToGithub(createDecisionReport(), {
      GITHUB_OUTPUT: outputPath,
      GITHUB_STEP_SUMMARY: summaryPath,
    });
    await publishToGithub(createDecisionReport({ passed: true }), {
      GITHUB_OUTPUT: outputPath,
    });

    expect(result).toEqual({ outputs: true, stepSummary: true });
    expect(await readFile(outputPath, 'utf8')).toBe(
      [
        'run_tests=false',
        'run_build=true',
        'optimization_score=50',
        'passed=false',
        'run_tests=false',
        'run_build=true',
        'optimization_score=50',
        'passed=true',
        '',
      ].join('\n'),
    );
    const summary = await readFile(summaryPath, 'utf8');
    expect(summary.startsWith('# CI Decision Summary\n')).toBe(true);
    expect(summary.endsWith('*Run run-1 generated at 2024-03-10T12:00:00.000Z*\n')).toBe(true);
  });

  it('writes nothing outside GitHub Actions', async () => {
    expect(await publishToGithub(createDecisionReport(), {})).toEqual({
      outputs: false,
      stepSummary: false,
    });
    expect(await publishToGithub(createDecisionReport(), { GITHUB_OUTPUT: '' })).toEqual({
      outputs: false,
      stepSummary: false,
    });
  });

  it('reads the runner files from the process environment by default', async () => {
    const outputPath = path.join(dir, 'output.txt');

    const result = await withEnv(
      { GITHUB_OUTPUT: outputPath, GITHUB_STEP_SUMMARY: undefined },
      () => publishToGithub(createDecisionReport()),
    );

    expect(result).toEqual({ outputs: true, stepSummary: false });
    expect(await readFile(outputPath, 'utf8')).toBe(
      'run_tests=false\nrun_build=true\noptimization_score=50\npassed=false\n',
    );
  });
});
