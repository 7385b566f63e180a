/**
 * Decision Engine — Orchestration
 *
 * Sequences classification, planning and regression evaluation for one CI
 * run. The first failure aborts the whole run and is re-thrown unmodified:
 * a partial plan is never returned, because acting on an incomplete skip
 * decision is unsafe.
 *
 * The only side effect is the optional baseline append, which happens after
 * every verdict has been computed so a failed run never pollutes history.
 * Callers with further output steps run `appendToBaseline` themselves once
 * those have succeeded.
 */

import { randomUUID } from 'node:crypto';

import { ConfigurationError, InputError } from '../errors/errors.ts';
import { classify, matchedCategories } from './classification.ts';
import { planExecution } from './planner.ts';
import { evaluateRegression, isBlocking } from './regression.ts';
import type {
  BaselineSeries,
  ChangeSet,
  DecisionReport,
  MetricDefinition,
  MetricSample,
  PatternRule,
  Policy,
  RegressionVerdict,
} from './types.ts';

/**
 * Write side of the baseline persistence collaborator.
 */
export interface BaselineAppender {
  /** Append every sample in order, or none of them when the write fails. */
  appendAll(samples: readonly MetricSample[]): Promise<void>;
}

export interface RunInput {
  readonly changeSet: ChangeSet;
  readonly ruleSet: readonly PatternRule[];
  readonly policy: Policy;
  readonly metrics: readonly MetricDefinition[];
  readonly metricSamples: readonly MetricSample[];
  /** Baseline series keyed by metric name; a missing entry is an empty series. */
  readonly baselines: ReadonlyMap<string, BaselineSeries>;
}

export type RunStep = 'classify' | 'plan' | 'evaluate' | 'append';

export interface RunOptions {
  readonly store?: BaselineAppender;
  /** Append every current sample to the store once verdicts are computed. */
  readonly appendBaseline?: boolean;
  readonly runId?: string;
  readonly now?: () => Date;
  /** Progress hook, called once per completed step. */
  readonly onStep?: (step: RunStep, detail: string) => void;
}

/* -------------------------------------------------------------------------- */
/* Metric evaluation                                                          */
/* -------------------------------------------------------------------------- */

function indexDefinitions(metrics: readonly MetricDefinition[]): Map<string, MetricDefinition> {
  const definitions = new Map<string, MetricDefinition>();
  for (const metric of metrics) {
    if (definitions.has(metric.name)) {
      throw new ConfigurationError(
        'CONFIG_DUPLICATE',
        `Metric "${metric.name}" is defined twice`,
        { details: { subject: metric.name } },
      );
    }
    definitions.set(metric.name, metric);
  }
  return definitions;
}

/**
 * Evaluate every current sample against its declared definition and baseline.
 *
 * @throws {ConfigurationError} when a sample's metric has no definition.
 * @throws {InputError} when a metric is sampled more than once.
 */
export function evaluateSamples(
  samples: readonly MetricSample[],
  metrics: readonly MetricDefinition[],
  baselines: ReadonlyMap<string, BaselineSeries>,
): readonly RegressionVerdict[] {
  const definitions = indexDefinitions(metrics);
  const seen = new Set<string>();

  return samples.map((sample) => {
    if (seen.has(sample.name)) {
      throw new InputError(
        'INPUT_INVALID_METRIC',
        `Metric "${sample.name}" was sampled more than once in this run`,
        { details: { metric: sample.name } },
      );
    }
    seen.add(sample.name);

    const definition = definitions.get(sample.name);
    if (definition === undefined) {
      throw new ConfigurationError(
        'CONFIG_UNKNOWN_METRIC',
        `Metric "${sample.name}" has no definition; declare its direction and threshold`,
        { details: { subject: sample.name } },
      );
    }

    const baseline = baselines.get(sample.name) ?? [];
    return evaluateRegression(sample, baseline, definition.thresholdPercent, {
      direction: definition.direction,
      window: definition.window,
      significanceFloorPercent: definition.significanceFloorPercent,
    });
  });
}

/* -------------------------------------------------------------------------- */
/* Run                                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Record the current samples as baseline history.
 *
 * @returns whether anything was appended.
 */
export async function appendToBaseline(
  store: BaselineAppender,
  samples: readonly MetricSample[],
): Promise<boolean> {
  if (samples.length === 0) {
    return false;
  }
  await store.appendAll(samples);
  return true;
}

/**
 * Run the decision engine end to end.
 *
 * @example
 * const report = await runDecisionEngine(input, { store, appendBaseline: true });
 * if (!report.passed) {
 *   // at least one metric regressed
 * }
 */
export async function runDecisionEngine(
  input: RunInput,
  options: RunOptions = {},
): Promise<DecisionReport> {
  const { store, appendBaseline = false, now = () => new Date(), onStep } = options;
  const runId = options.runId ?? randomUUID();

  if (appendBaseline && store === undefined) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      'Baseline append was requested but no baseline store is configured',
    );
  }

  const classification = classify(input.changeSet, input.ruleSet);
  const matched = matchedCategories(classification);
  const categoryList = matched.length > 0 ? matched.join(', ') : 'no categories';
  onStep?.('classify', `${classification.files.length} file(s) -> ${categoryList}`);

  const plan = planExecution(classification, input.policy);
  onStep?.(
    'plan',
    `${plan.skipped}/${plan.total} job group(s) skipped, score ${plan.optimizationScore}`,
  );

  const verdicts = evaluateSamples(input.metricSamples, input.metrics, input.baselines);
  const passed = !verdicts.some(isBlocking);
  onStep?.(
    'evaluate',
    verdicts.length === 0
      ? 'no metric samples'
      : verdicts.map((v) => `${v.metric}=${v.classification}`).join(', '),
  );

  let baselineAppended = false;
  if (appendBaseline && store !== undefined) {
    baselineAppended = await appendToBaseline(store, input.metricSamples);
    if (baselineAppended) {
      onStep?.('append', `${input.metricSamples.length} sample(s) appended to baseline`);
    }
  }

  return {
    runId,
    generatedAt: now().toISOString(),
    classification,
    plan,
    verdicts,
    passed,
    baselineAppended,
  };
}
