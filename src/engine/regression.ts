/**
 * Decision Engine — Regression Evaluation
 *
 * Compares one current metric sample against the recent window of its
 * baseline series and classifies the change as improved, stable, regressed,
 * or insufficient-data.
 *
 * Insufficient history is a verdict, not an error: a build can never fail
 * because a baseline does not exist yet.
 */

import { ConfigurationError, InputError } from '../errors/errors.ts';
import type {
  BaselineSeries,
  MetricDirection,
  MetricSample,
  RegressionVerdict,
  VerdictClassification,
} from './types.ts';

export const DEFAULT_BASELINE_WINDOW = 10;
export const DEFAULT_SIGNIFICANCE_FLOOR_PERCENT = 1;
export const DEFAULT_THRESHOLD_PERCENT = 10;
const MIN_BASELINE_SAMPLES = 2;

export interface EvaluateOptions {
  readonly direction: MetricDirection;
  /** Number of most recent baseline samples used (default 10). */
  readonly window?: number;
  /** Deltas smaller than this percentage are always stable (default 1). */
  readonly significanceFloorPercent?: number;
}

export interface BaselineStatistics {
  readonly mean: number;
  readonly stdDev: number;
  readonly count: number;
}

/* -------------------------------------------------------------------------- */
/* Statistics                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Arithmetic mean and sample standard deviation (n - 1) of the values.
 * A single value has a standard deviation of 0.
 */
export function computeStatistics(values: readonly number[]): BaselineStatistics {
  const count = values.length;
  if (count === 0) {
    return { mean: 0, stdDev: 0, count };
  }

  const mean = values.reduce((sum, v) => sum + v, 0) / count;
  if (count === 1) {
    return { mean, stdDev: 0, count };
  }

  const squared = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return { mean, stdDev: Math.sqrt(squared / (count - 1)), count };
}

/**
 * Baseline samples ordered oldest first, limited to the last `window` entries.
 * Samples sharing a timestamp keep their stored order.
 */
export function selectBaselineWindow(series: BaselineSeries, window: number): BaselineSeries {
  const ordered = series
    .map((sample, index) => ({ sample, index, time: Date.parse(sample.timestamp) }))
    .toSorted((a, b) => {
      const byTime = (Number.isNaN(a.time) ? 0 : a.time) - (Number.isNaN(b.time) ? 0 : b.time);
      return byTime === 0 ? a.index - b.index : byTime;
    })
    .map((entry) => entry.sample);

  return ordered.slice(Math.max(0, ordered.length - window));
}

/* -------------------------------------------------------------------------- */
/* Validation                                                                 */
/* -------------------------------------------------------------------------- */

function validateOptions(
  metric: string,
  thresholdPercent: number,
  window: number,
  floor: number,
): void {
  if (!Number.isFinite(thresholdPercent) || thresholdPercent < 0) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Metric "${metric}": threshold must be a non-negative percentage (got ${thresholdPercent})`,
      { details: { subject: metric } },
    );
  }
  if (!Number.isInteger(window) || window < MIN_BASELINE_SAMPLES) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Metric "${metric}": baseline window must be an integer >= ${MIN_BASELINE_SAMPLES} (got ${window})`,
      { details: { subject: metric } },
    );
  }
  if (!Number.isFinite(floor) || floor < 0) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Metric "${metric}": significance floor must be a non-negative percentage (got ${floor})`,
      { details: { subject: metric } },
    );
  }
}

function validateSamples(current: MetricSample, series: BaselineSeries): void {
  if (!Number.isFinite(current.value)) {
    throw new InputError(
      'INPUT_INVALID_METRIC',
      `Metric "${current.name}": current value must be a finite number`,
      { details: { metric: current.name } },
    );
  }

  for (const sample of series) {
    if (sample.name !== current.name) {
      throw new InputError(
        'INPUT_INVALID_METRIC',
        `Baseline for "${current.name}" contains a sample of "${sample.name}"`,
        { details: { metric: current.name } },
      );
    }
    if (!Number.isFinite(sample.value)) {
      throw new InputError(
        'INPUT_INVALID_METRIC',
        `Baseline for "${current.name}" contains a non-finite value at ${sample.timestamp}`,
        { details: { metric: current.name } },
      );
    }
  }
}

/* -------------------------------------------------------------------------- */
/* Evaluation                                                                 */
/* -------------------------------------------------------------------------- */

function roundDelta(value: number): number {
  return Math.round(value * 100) / 100;
}

function classifyDelta(
  delta: number,
  direction: MetricDirection,
  thresholdPercent: number,
  floor: number,
): VerdictClassification {
  if (Math.abs(delta) < floor) {
    return 'stable';
  }

  // Positive means the metric moved in its bad direction.
  const adverse = direction === 'lower-is-better' ? delta : -delta;
  if (adverse > thresholdPercent) {
    return 'regressed';
  }
  if (-adverse > thresholdPercent) {
    return 'improved';
  }
  return 'stable';
}

function describeVerdict(
  classification: VerdictClassification,
  delta: number,
  threshold: number,
): string {
  const signed = `${delta > 0 ? '+' : ''}${roundDelta(delta)}%`;
  switch (classification) {
    case 'regressed':
      return `Moved ${signed} against baseline, beyond the ${threshold}% threshold`;
    case 'improved':
      return `Moved ${signed} in the favourable direction, beyond the ${threshold}% threshold`;
    case 'stable':
      return `Moved ${signed}, within the ${threshold}% threshold`;
    case 'insufficient-data':
      return 'Not enough baseline history';
  }
}

/**
 * Evaluate a current sample against its baseline series.
 *
 * @example
 * const verdict = evaluateRegression(
 *   { name: 'benchmark_time_ms', value: 120, timestamp: '2024-01-03T00:00:00Z' },
 *   baseline, // mean 100
 *   10,
 *   { direction: 'lower-is-better' },
 * );
 * // verdict.classification === 'regressed', verdict.deltaPercent === 20
 *
 * @throws {ConfigurationError} for invalid threshold, window or floor.
 * @throws {InputError} for non-finite values or foreign baseline samples.
 */
export function evaluateRegression(
  current: MetricSample,
  baseline: BaselineSeries,
  thresholdPercent: number,
  options: EvaluateOptions,
): RegressionVerdict {
  const window = options.window ?? DEFAULT_BASELINE_WINDOW;
  const floor = options.significanceFloorPercent ?? DEFAULT_SIGNIFICANCE_FLOOR_PERCENT;
  validateOptions(current.name, thresholdPercent, window, floor);
  validateSamples(current, baseline);

  const samples = selectBaselineWindow(baseline, window);
  const common = {
    metric: current.name,
    current: current.value,
    samplesUsed: samples.length,
    thresholdPercent,
    direction: options.direction,
  };

  if (samples.length < MIN_BASELINE_SAMPLES) {
    return {
      ...common,
      classification: 'insufficient-data',
      deltaPercent: null,
      exceedsThreshold: false,
      baselineMean: null,
      baselineStdDev: null,
      zScore: null,
      reason: `Baseline has ${samples.length} sample(s); at least ${MIN_BASELINE_SAMPLES} are required`,
    };
  }

  const stats = computeStatistics(samples.map((s) => s.value));
  if (stats.mean === 0) {
    return {
      ...common,
      classification: 'insufficient-data',
      deltaPercent: null,
      exceedsThreshold: false,
      baselineMean: stats.mean,
      baselineStdDev: stats.stdDev,
      zScore: null,
      reason: 'Baseline mean is zero; percentage change is undefined',
    };
  }

  const delta = ((current.value - stats.mean) / stats.mean) * 100;
  const classification = classifyDelta(delta, options.direction, thresholdPercent, floor);

  return {
    ...common,
    classification,
    deltaPercent: roundDelta(delta),
    exceedsThreshold: Math.abs(delta) > thresholdPercent,
    baselineMean: stats.mean,
    baselineStdDev: stats.stdDev,
    zScore: stats.stdDev > 0 ? (current.value - stats.mean) / stats.stdDev : null,
    reason: describeVerdict(classification, delta, thresholdPercent),
  };
}

/**
 * Whether a verdict should fail a quality gate. Insufficient data never does.
 */
export function isBlocking(verdict: RegressionVerdict): boolean {
  return verdict.classification === 'regressed';
}
