/**
 * Decision Engine — Serialization & Summaries
 *
 * Machine-readable JSON for downstream jobs and a Markdown step summary for
 * humans. No decision logic lives here.
 */

import type {
  DecisionReport,
  ExecutionPlan,
  JobAction,
  RegressionVerdict,
  VerdictClassification,
} from './types.ts';

/* -------------------------------------------------------------------------- */
/* JSON                                                                       */
/* -------------------------------------------------------------------------- */

export interface SerializedPlan {
  readonly jobs: Readonly<Record<string, JobAction>>;
  readonly optimizationScore: number;
}

export interface SerializedVerdict {
  readonly classification: VerdictClassification;
  readonly deltaPercent: number | null;
}

export function serializePlan(plan: ExecutionPlan): SerializedPlan {
  return {
    jobs: Object.fromEntries(
      plan.jobs.map((job): [string, JobAction] => [job.jobGroup, job.action]),
    ),
    optimizationScore: plan.optimizationScore,
  };
}

export function serializeVerdicts(
  verdicts: readonly RegressionVerdict[],
): Readonly<Record<string, SerializedVerdict>> {
  return Object.fromEntries(
    verdicts.map((v): [string, SerializedVerdict] => [
      v.metric,
      { classification: v.classification, deltaPercent: v.deltaPercent },
    ]),
  );
}

/**
 * Full decision report as pretty-printed JSON, with the compact plan and
 * verdict maps alongside the detailed structures.
 */
export function serializeReport(report: DecisionReport): string {
  return JSON.stringify(
    {
      runId: report.runId,
      generatedAt: report.generatedAt,
      passed: report.passed,
      baselineAppended: report.baselineAppended,
      plan: serializePlan(report.plan),
      verdicts: serializeVerdicts(report.verdicts),
      details: {
        classification: report.classification,
        plan: report.plan,
        verdicts: report.verdicts,
      },
    },
    null,
    2,
  );
}

/* -------------------------------------------------------------------------- */
/* Markdown                                                                   */
/* -------------------------------------------------------------------------- */

const VERDICT_EMOJI: Readonly<Record<VerdictClassification, string>> = {
  improved: '🟢',
  stable: '✅',
  regressed: '❌',
  'insufficient-data': '⚪',
};

function escapeCell(value: string): string {
  return value.replaceAll('|', '\\|').replaceAll('\n', ' ');
}

/**
 * Render a number with at most two decimals.
 */
export function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Render a percentage delta with an explicit sign, or `n/a`.
 */
export function formatDelta(delta: number | null): string {
  if (delta === null) {
    return 'n/a';
  }
  return `${delta > 0 ? '+' : ''}${formatNumber(delta)}%`;
}

function planSection(plan: ExecutionPlan): string[] {
  const lines = [
    '## Execution Plan\n',
    `**Optimization Score**: ${plan.optimizationScore}%`,
    `**Skipped Job Groups**: ${plan.skipped} of ${plan.total}`,
  ];
  if (plan.safetyOverride) {
    lines.push('**Safety Override**: skipping disallowed below the policy minimum score');
  }
  lines.push(
    '',
    '| Job Group | Action | Reason |',
    '| --- | --- | --- |',
    ...plan.jobs.map((job) => {
      const action = job.action === 'skip' ? '⏭️ skip' : '▶️ run';
      return `| ${escapeCell(job.jobGroup)} | ${action} | ${escapeCell(job.reason)} |`;
    }),
    '',
  );
  return lines;
}

function classificationSection(report: DecisionReport): string[] {
  const { classification } = report;
  const lines = [
    '## Change Classification\n',
    `**Changed Files**: ${classification.files.length}\n`,
  ];

  const matched = classification.categories.filter((c) => c.matched);
  if (matched.length === 0) {
    lines.push('_No changed files_', '');
    return lines;
  }

  lines.push(
    '| Category | Files |',
    '| --- | --- |',
    ...matched.map((c) => `| ${escapeCell(c.category)} | ${c.files.length} |`),
    '',
  );
  return lines;
}

function regressionSection(verdicts: readonly RegressionVerdict[]): string[] {
  const lines = ['## Regression Analysis\n'];
  if (verdicts.length === 0) {
    lines.push('_No metric samples evaluated_', '');
    return lines;
  }

  lines.push(
    '| Metric | Verdict | Delta | Baseline Mean | Current |',
    '| --- | --- | --- | --- | --- |',
    ...verdicts.map((v) => {
      const mean = v.baselineMean === null ? 'n/a' : formatNumber(v.baselineMean);
      return (
        `| ${escapeCell(v.metric)} | ${VERDICT_EMOJI[v.classification]} ${v.classification} ` +
        `| ${formatDelta(v.deltaPercent)} | ${mean} | ${formatNumber(v.current)} |`
      );
    }),
    '',
  );
  return lines;
}

/**
 * Render a GitHub step summary for a decision report.
 */
export function generateMarkdownSummary(report: DecisionReport): string {
  const gate = report.passed ? '✅ PASSED' : '❌ REGRESSION DETECTED';
  const lines: string[] = [
    '# CI Decision Summary\n',
    `**Gate**: ${gate}\n`,
    ...planSection(report.plan),
    ...classificationSection(report),
    ...regressionSection(report.verdicts),
  ];

  if (report.baselineAppended) {
    lines.push(`_Baseline updated with ${report.verdicts.length} sample(s)_`, '');
  }

  lines.push('---', `*Run ${report.runId} generated at ${report.generatedAt}*`);
  return lines.join('\n');
}
