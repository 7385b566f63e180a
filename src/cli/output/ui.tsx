/**
 * Ink Decision Report
 *
 * Role:
 *   Read-only rendering of a finished decision report.
 *
 * Guarantees:
 *   - No decision logic
 *   - Identical content on TTY (ink) and non-TTY (plain ANSI) output
 *   - Every status carries a symbol as well as a color
 *
 * Non-goals:
 *   - Live progress
 */

import tty from 'node:tty';

import { Box, render, Text } from 'ink';
import React from 'react';

import { formatDelta, formatNumber } from '../../engine/summary.ts';
import type {
  DecisionReport,
  ExecutionPlan,
  JobAction,
  RegressionVerdict,
  VerdictClassification,
} from '../../engine/types.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

type InkColor = 'green' | 'red' | 'yellow' | 'blue' | 'gray';

interface StatusStyle {
  readonly symbol: string;
  readonly label: string;
  readonly color: InkColor;
}

/** Minimal writable surface the plain renderer needs. */
export interface TextSink {
  write(chunk: string): boolean;
}

export interface ReportStreams {
  readonly stdout?: TextSink;
  readonly stderr?: NodeJS.WriteStream;
  readonly env?: NodeJS.ProcessEnv;
}

/* -------------------------------------------------------------------------- */
/* Utilities                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Respects the NO_COLOR convention (https://no-color.org/) and dumb terminals.
 * isTTY is not consulted: the plain renderer colors piped output too.
 */
export function supportsColor(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }
  return env['TERM'] !== 'dumb';
}

const ANSI_CODES = {
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  dim: '\u001b[2m',
  underline: '\u001b[4m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  cyan: '\u001b[36m',
  gray: '\u001b[90m',
} as const;

type AnsiPalette = Readonly<Record<keyof typeof ANSI_CODES, string>>;

const NO_ANSI: AnsiPalette = {
  reset: '',
  bold: '',
  dim: '',
  underline: '',
  red: '',
  green: '',
  yellow: '',
  blue: '',
  cyan: '',
  gray: '',
};

function isTerminal(stream: TextSink): stream is NodeJS.WriteStream {
  return stream instanceof tty.WriteStream && stream.isTTY;
}

export function createPalette(color: boolean): AnsiPalette {
  return color ? ANSI_CODES : NO_ANSI;
}

/* -------------------------------------------------------------------------- */
/* Status rendering (shared between TTY and non-TTY)                         */
/* -------------------------------------------------------------------------- */

const ACTION_STYLE: Readonly<Record<JobAction, StatusStyle>> = {
  run: { symbol: '▶', label: 'RUN', color: 'blue' },
  skip: { symbol: '⊝', label: 'SKIP', color: 'yellow' },
};

const VERDICT_STYLE: Readonly<Record<VerdictClassification, StatusStyle>> = {
  improved: { symbol: '✔', label: 'IMPROVED', color: 'green' },
  stable: { symbol: '●', label: 'STABLE', color: 'green' },
  regressed: { symbol: '✘', label: 'REGRESSED', color: 'red' },
  'insufficient-data': { symbol: '○', label: 'INSUFFICIENT DATA', color: 'gray' },
};

const UI_CONSTANTS = {
  TITLE: 'CI DECISION ENGINE',
  COLUMN_WIDTH: {
    JOB: 20,
    ACTION: 10,
    METRIC: 24,
    VERDICT: 22,
    DELTA: 10,
    BASELINE: 12,
  },
  HEADERS: {
    JOB: 'Job Group',
    ACTION: 'Action',
    REASON: 'Reason',
    METRIC: 'Metric',
    VERDICT: 'Verdict',
    DELTA: 'Delta',
    BASELINE: 'Baseline',
    CURRENT: 'Current',
  },
  NO_METRICS: 'No metric samples evaluated',
  SAFETY_OVERRIDE: 'Safety override: skipping disallowed below the policy minimum score',
} as const;

function styleText(style: StatusStyle): string {
  return `${style.symbol} ${style.label}`;
}

function baselineText(verdict: RegressionVerdict): string {
  return verdict.baselineMean === null ? 'n/a' : formatNumber(verdict.baselineMean);
}

function scoreText(plan: ExecutionPlan): string {
  return `Optimization score: ${plan.optimizationScore}% (${plan.skipped}/${plan.total} skipped)`;
}

function gateText(report: DecisionReport): string {
  return report.passed ? 'Gate: PASSED' : 'Gate: FAILED (regression detected)';
}

/* -------------------------------------------------------------------------- */
/* Components                                                                 */
/* -------------------------------------------------------------------------- */

const Header: React.FC<{ readonly runId: string }> = ({ runId }) => (
  <Box
    borderStyle="double"
    borderColor="cyan"
    paddingX={2}
    flexDirection="column"
    alignItems="center"
  >
    <Text bold>{UI_CONSTANTS.TITLE}</Text>
    <Text dimColor>Run {runId}</Text>
  </Box>
);

const PlanTable: React.FC<{ readonly plan: ExecutionPlan }> = ({ plan }) => {
  const width = UI_CONSTANTS.COLUMN_WIDTH;
  return (
    <Box flexDirection="column" marginY={1}>
      <Box>
        <Box width={width.JOB}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.JOB}
          </Text>
        </Box>
        <Box width={width.ACTION}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.ACTION}
          </Text>
        </Box>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.REASON}
        </Text>
      </Box>
      {plan.jobs.map((job) => {
        const style = ACTION_STYLE[job.action];
        return (
          <Box key={job.jobGroup}>
            <Box width={width.JOB}>
              <Text>{job.jobGroup}</Text>
            </Box>
            <Box width={width.ACTION}>
              <Text color={style.color}>{styleText(style)}</Text>
            </Box>
            <Text>{job.reason}</Text>
          </Box>
        );
      })}
      {plan.safetyOverride ? <Text color="yellow">{UI_CONSTANTS.SAFETY_OVERRIDE}</Text> : null}
    </Box>
  );
};

const VerdictTable: React.FC<{ readonly verdicts: readonly RegressionVerdict[] }> = ({
  verdicts,
}) => {
  if (verdicts.length === 0) {
    return (
      <Box marginBottom={1}>
        <Text dimColor>{UI_CONSTANTS.NO_METRICS}</Text>
      </Box>
    );
  }

  const width = UI_CONSTANTS.COLUMN_WIDTH;
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Box width={width.METRIC}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.METRIC}
          </Text>
        </Box>
        <Box width={width.VERDICT}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.VERDICT}
          </Text>
        </Box>
        <Box width={width.DELTA}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.DELTA}
          </Text>
        </Box>
        <Box width={width.BASELINE}>
          <Text bold underline>
            {UI_CONSTANTS.HEADERS.BASELINE}
          </Text>
        </Box>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.CURRENT}
        </Text>
      </Box>
      {verdicts.map((verdict) => {
        const style = VERDICT_STYLE[verdict.classification];
        return (
          <Box key={verdict.metric}>
            <Box width={width.METRIC}>
              <Text>{verdict.metric}</Text>
            </Box>
            <Box width={width.VERDICT}>
              <Text color={style.color}>{styleText(style)}</Text>
            </Box>
            <Box width={width.DELTA}>
              <Text>{formatDelta(verdict.deltaPercent)}</Text>
            </Box>
            <Box width={width.BASELINE}>
              <Text>{baselineText(verdict)}</Text>
            </Box>
            <Text>{formatNumber(verdict.current)}</Text>
          </Box>
        );
      })}
    </Box>
  );
};

const SummaryFooter: React.FC<{ readonly report: DecisionReport }> = ({ report }) => (
  <Box borderStyle="single" borderColor="gray" paddingX={1} flexDirection="column">
    <Text bold>Summary</Text>
    <Text>{scoreText(report.plan)}</Text>
    <Text color={report.passed ? 'green' : 'red'} bold>
      {gateText(report)}
    </Text>
  </Box>
);

export const Report: React.FC<{ readonly report: DecisionReport }> = ({ report }) => (
  <Box flexDirection="column" padding={1}>
    <Header runId={report.runId} />
    <PlanTable plan={report.plan} />
    <VerdictTable verdicts={report.verdicts} />
    <SummaryFooter report={report} />
  </Box>
);

/* -------------------------------------------------------------------------- */
/* Non-TTY renderer                                                           */
/* -------------------------------------------------------------------------- */

function colorize(ansi: AnsiPalette, text: string, ...codes: readonly string[]): string {
  return codes.some((code) => code.length > 0) ? `${codes.join('')}${text}${ansi.reset}` : text;
}

function ansiColor(ansi: AnsiPalette, color: InkColor): string {
  return ansi[color];
}

/**
 * Plain-text report, one table row per line. Cells are padded before they
 * are colored so escape codes never shift the columns.
 */
export function formatStaticReport(report: DecisionReport, ansi: AnsiPalette): string[] {
  const width = UI_CONSTANTS.COLUMN_WIDTH;
  const headers = UI_CONSTANTS.HEADERS;
  const heading = (text: string, pad = 0): string =>
    colorize(ansi, text.padEnd(pad), ansi.bold, ansi.underline);

  const lines = [
    colorize(ansi, UI_CONSTANTS.TITLE, ansi.bold, ansi.cyan),
    colorize(ansi, `Run ${report.runId}`, ansi.dim),
    '',
    heading(headers.JOB, width.JOB) +
      heading(headers.ACTION, width.ACTION) +
      heading(headers.REASON),
  ];

  for (const job of report.plan.jobs) {
    const style = ACTION_STYLE[job.action];
    lines.push(
      job.jobGroup.padEnd(width.JOB) +
        colorize(ansi, styleText(style).padEnd(width.ACTION), ansiColor(ansi, style.color)) +
        job.reason,
    );
  }
  if (report.plan.safetyOverride) {
    lines.push(colorize(ansi, UI_CONSTANTS.SAFETY_OVERRIDE, ansi.yellow));
  }
  lines.push('');

  if (report.verdicts.length === 0) {
    lines.push(colorize(ansi, UI_CONSTANTS.NO_METRICS, ansi.dim));
  } else {
    lines.push(
      heading(headers.METRIC, width.METRIC) +
        heading(headers.VERDICT, width.VERDICT) +
        heading(headers.DELTA, width.DELTA) +
        heading(headers.BASELINE, width.BASELINE) +
        heading(headers.CURRENT),
    );
    for (const verdict of report.verdicts) {
      const style = VERDICT_STYLE[verdict.classification];
      lines.push(
        verdict.metric.padEnd(width.METRIC) +
          colorize(ansi, styleText(style).padEnd(width.VERDICT), ansiColor(ansi, style.color)) +
          formatDelta(verdict.deltaPercent).padEnd(width.DELTA) +
          baselineText(verdict).padEnd(width.BASELINE) +
          formatNumber(verdict.current),
      );
    }
  }

  lines.push(
    '',
    colorize(ansi, 'Summary', ansi.bold),
    scoreText(report.plan),
    colorize(ansi, gateText(report), ansi.bold, report.passed ? ansi.green : ansi.red),
    '',
  );
  return lines;
}

function renderStaticReport(report: DecisionReport, stdout: TextSink, color: boolean): void {
  stdout.write(`${formatStaticReport(report, createPalette(color)).join('\n')}\n`);
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Draw the report with ink on a TTY, or as plain (optionally colored) text.
 */
export async function renderReport(
  report: DecisionReport,
  streams: ReportStreams = {},
): Promise<void> {
  const stdout = streams.stdout ?? process.stdout;
  const stderr = streams.stderr ?? process.stderr;

  if (!isTerminal(stdout)) {
    renderStaticReport(report, stdout, supportsColor(streams.env));
    return;
  }

  // One frame, then release the terminal.
  const { unmount, waitUntilExit } = render(<Report report={report} />, { stdout, stderr });
  unmount();
  await waitUntilExit();
}

export const __test__ = {
  renderStaticReport,
};
