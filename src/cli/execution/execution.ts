/**
 * CLI Decision Run
 *
 * Role:
 *   Drive one decision run from parsed arguments to published results.
 *
 * Responsibilities:
 *   - Resolve and validate output and log directories
 *   - Load the decision config, changed files, metric samples and baselines
 *   - Run the decision engine with the run logger as progress hook
 *   - Write artifacts, GitHub Actions outputs and the terminal report
 *   - Append the current samples to the baseline once every output is written
 *   - Map the outcome to an exit code
 */

import { Console } from 'node:console';
import path from 'node:path';

import { loadDecisionConfig } from '../../config/loader.ts';
import { appendToBaseline, runDecisionEngine } from '../../engine/orchestrator.ts';
import type { DecisionReport, MetricSample } from '../../engine/types.ts';
import { CliError, formatErrorMessage } from '../../errors/errors.ts';
import type { CLIArgs } from '../input/args.ts';
import { type ChangeSource, ensureSafeDirectoryPath } from '../input/validation.ts';
import { createRunLogger, type RunLogger } from '../observability/logger.ts';
import { resolveRunTraceContext } from '../observability/tracing.ts';
import { writeArtifacts } from '../output/artifacts.ts';
import { publishToGithub } from '../output/github.ts';
import { renderReport, type TextSink } from '../output/ui.tsx';
import { listChangedFiles, readFileList } from '../sources/changed-files.ts';
import { loadMetricSamples } from '../sources/metric-samples.ts';
import { type BaselineStore, FileBaselineStore, readBaselines } from '../store/baseline-store.ts';

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Tests replace git, the baseline store, the clock and the console; every
 * other step runs against the real filesystem below `cwd`.
 */
export interface MainDeps {
  readonly argv?: readonly string[];
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly console?: Pick<typeof console, 'log' | 'error'>;
  readonly stdout?: TextSink;
  readonly now?: () => Date;
  readonly listChangedFilesFn?: typeof listChangedFiles;
  readonly createStoreFn?: (directory: string) => BaselineStore;
  readonly renderReportFn?: typeof renderReport;
  readonly publishFn?: typeof publishToGithub;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly report?: DecisionReport;
}

/* -------------------------------------------------------------------------- */
/* Inputs                                                                     */
/* -------------------------------------------------------------------------- */

function describeSource(source: ChangeSource): string {
  switch (source.kind) {
    case 'list':
      return `--files (${source.files.length} path(s))`;
    case 'file':
      return `--files-from ${source.path}`;
    case 'git':
      return `git diff ${source.base} ${source.head}`;
  }
}

async function collectChangedFiles(
  source: ChangeSource,
  cwd: string,
  listFn: typeof listChangedFiles,
): Promise<readonly string[]> {
  switch (source.kind) {
    case 'list':
      return source.files;
    case 'file':
      return readFileList(path.resolve(cwd, source.path));
    case 'git':
      return listFn({ base: source.base, head: source.head, cwd });
  }
}

async function collectMetricSamples(
  metricsPath: string | undefined,
  cwd: string,
  now: () => Date,
): Promise<readonly MetricSample[]> {
  if (metricsPath === undefined) {
    return [];
  }
  return loadMetricSamples(path.resolve(cwd, metricsPath), now);
}

/* -------------------------------------------------------------------------- */
/* Run                                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Execute a decision run with parsed args and optional dependency overrides.
 *
 * Every failure is reported on the console and in the run log, and yields
 * exit code 1; a regression also yields 1.
 */
export async function executeWithArgs(
  args: CLIArgs,
  deps: Omit<MainDeps, 'argv'> = {},
): Promise<MainResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    stdout = process.stdout,
    now = (): Date => new Date(),
    listChangedFilesFn = listChangedFiles,
    createStoreFn = (directory: string): BaselineStore => new FileBaselineStore(directory),
    renderReportFn = renderReport,
    publishFn = publishToGithub,
  } = deps;

  const scopedConsole =
    deps.console ?? new Console({ stdout: process.stdout, stderr: process.stderr });
  const log = scopedConsole.log.bind(scopedConsole);
  const error = scopedConsole.error.bind(scopedConsole);
  let logger: RunLogger | undefined;

  try {
    const source = args.changeSource;
    if (source === null) {
      throw new CliError('CLI_INVALID_ARGUMENT', 'No change source given');
    }

    const outputDir = ensureSafeDirectoryPath(cwd, args.outputDir, 'Output directory');
    const logDir = ensureSafeDirectoryPath(cwd, args.logDir, 'Log directory');
    const baselineDir = path.resolve(cwd, args.baselineDir);
    const configPath = path.resolve(cwd, args.config);

    logger = await createRunLogger({
      logDir,
      structured: args.structuredLogs,
      level: args.verbose ? 'debug' : 'info',
      traceContext: resolveRunTraceContext(env['TRACEPARENT']),
      clock: now,
    });
    const runLog = logger;
    const runId = runLog.traceContext.traceId;

    log('🚦 CI Decision Engine\n');
    log(`Config: ${configPath}`);
    log(`Change source: ${describeSource(source)}`);
    log(`Output directory: ${outputDir}`);
    if (args.verbose) {
      log(`Verbose mode: ENABLED`);
      log(`Working directory: ${cwd}`);
      log(`Baseline directory: ${baselineDir}`);
      log(`Run log: ${runLog.logPath}`);
      log(`Run ID: ${runId}`);
    }
    log('');

    runLog.info(`Run ${runId} started`);
    runLog.debug(`Working directory: ${cwd}`);

    const config = await loadDecisionConfig(configPath);
    runLog.info(
      `Loaded ${config.ruleSet.length} rule(s), ${config.policy.jobGroups.length} job group(s), ` +
        `${config.metrics.length} metric definition(s) from ${configPath}`,
      'config',
    );

    const changeSet = await collectChangedFiles(source, cwd, listChangedFilesFn);
    runLog.debug(`Changed files:\n${changeSet.join('\n')}`, 'sources');

    const metricSamples = await collectMetricSamples(args.metrics, cwd, now);
    const store = createStoreFn(baselineDir);
    const baselines = await readBaselines(store, metricSamples.map((sample) => sample.name));
    runLog.debug(`Read ${baselines.size} baseline series from ${baselineDir}`, 'store');

    const evaluated = await runDecisionEngine(
      {
        changeSet,
        ruleSet: config.ruleSet,
        policy: config.policy,
        metrics: config.metrics,
        metricSamples,
        baselines,
      },
      {
        runId,
        now,
        onStep: (step, detail) => runLog.info(detail, step),
      },
    );
    // The append runs last; the report already states it so the artifacts match.
    const report: DecisionReport = {
      ...evaluated,
      baselineAppended: args.appendBaseline && metricSamples.length > 0,
    };

    const artifacts = await writeArtifacts(outputDir, report);
    runLog.info(`Wrote ${artifacts.decisionPath} and ${artifacts.summaryPath}`, 'output');

    const published = await publishFn(report, env);
    if (published.outputs || published.stepSummary) {
      runLog.info('Published GitHub Actions outputs', 'output');
    }

    await renderReportFn(report, { stdout, env });

    if (args.appendBaseline && (await appendToBaseline(store, metricSamples))) {
      runLog.info(`${metricSamples.length} sample(s) appended to baseline`, 'append');
    }

    if (!report.passed) {
      const regressed = report.verdicts
        .filter((v) => v.classification === 'regressed')
        .map((v) => v.metric);
      runLog.error(`Regression detected: ${regressed.join(', ')}`);
      error('\n❌ Regression detected');
      return { exitCode: 1, report };
    }

    runLog.info('Run passed');
    log('\n✅ Decision complete');
    return { exitCode: 0, report };
  } catch (err) {
    const message = formatErrorMessage(err);
    logger?.error(message);
    error(`\n❌ Fatal error: ${message}`);
    return { exitCode: 1 };
  } finally {
    if (logger !== undefined) {
      try {
        await logger.close();
      } catch (closeError) {
        error('\nWARN: Failed to write run log:', formatErrorMessage(closeError));
      }
    }
  }
}
