/**
 * GitHub Actions Output
 *
 * Role:
 *   Publish a decision report to the GitHub Actions runner.
 *
 * Responsibilities:
 *   - Append `run_<group>`, `optimization_score` and `passed` to `$GITHUB_OUTPUT`
 *   - Append the Markdown summary to `$GITHUB_STEP_SUMMARY`
 *
 * Outside Actions (neither variable set) nothing is written.
 */

import { appendFile } from 'node:fs/promises';

import { jobGroupKey } from '../../engine/planner.ts';
import { generateMarkdownSummary } from '../../engine/summary.ts';
import type { DecisionReport } from '../../engine/types.ts';

export interface GithubPublishResult {
  readonly outputs: boolean;
  readonly stepSummary: boolean;
}

/**
 * Output name for a job group. Policy validation keeps these unique.
 */
export function jobOutputName(jobGroup: string): string {
  return `run_${jobGroupKey(jobGroup)}`;
}

/**
 * `key=value` lines for `$GITHUB_OUTPUT`, one per job group followed by the
 * score and gate result.
 */
export function formatGithubOutputs(report: DecisionReport): string[] {
  return [
    ...report.plan.jobs.map((job) => `${jobOutputName(job.jobGroup)}=${job.action === 'run'}`),
    `optimization_score=${report.plan.optimizationScore}`,
    `passed=${report.passed}`,
  ];
}

/**
 * Append outputs and the step summary when running under GitHub Actions.
 */
export async function publishToGithub(
  report: DecisionReport,
  env: NodeJS.ProcessEnv = process.env,
): Promise<GithubPublishResult> {
  const outputPath = env['GITHUB_OUTPUT'];
  const summaryPath = env['GITHUB_STEP_SUMMARY'];

  if (outputPath !== undefined && outputPath.length > 0) {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path set by the runner
    await appendFile(outputPath, `${formatGithubOutputs(report).join('\n')}\n`, 'utf8');
  }
  if (summaryPath !== undefined && summaryPath.length > 0) {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path set by the runner
    await appendFile(summaryPath, `${generateMarkdownSummary(report)}\n`, 'utf8');
  }

  return {
    outputs: outputPath !== undefined && outputPath.length > 0,
    stepSummary: summaryPath !== undefined && summaryPath.length > 0,
  };
}
