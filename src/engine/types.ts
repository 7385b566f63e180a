/**
 * Decision Engine — Data Model
 *
 * Every value here is created per CI run and discarded afterwards, except
 * baseline series, which live in an append-only store outside the engine.
 */

/** Category every file falls into when no rule matches it. */
export const UNCLASSIFIED = 'unclassified' as const;

/** Repository-relative paths touched by a proposed change, in diff order. */
export type ChangeSet = readonly string[];

export interface PatternRule {
  readonly category: string;
  readonly patterns: readonly string[];
}

export interface CategoryMatch {
  readonly category: string;
  readonly matched: boolean;
  readonly files: readonly string[];
}

export interface FileAttribution {
  readonly file: string;
  readonly categories: readonly string[];
}

export interface ClassificationResult {
  readonly files: readonly string[];
  /** One entry per rule in declaration order, followed by `unclassified`. */
  readonly categories: readonly CategoryMatch[];
  readonly attributions: readonly FileAttribution[];
}

/* -------------------------------------------------------------------------- */
/* Policy & plan                                                              */
/* -------------------------------------------------------------------------- */

export interface SkipRule {
  /** Stable identifier surfaced in plan reasons (e.g. `skip_tests_on_docs_only`). */
  readonly id: string;
  /** Categories a change may be made of for the job group to be skipped. */
  readonly whenOnly: readonly string[];
}

export interface JobGroupPolicy {
  readonly name: string;
  readonly skipRules: readonly SkipRule[];
}

export interface Policy {
  readonly jobGroups: readonly JobGroupPolicy[];
  /** Skipping is disallowed when it would save less than this (0–100). */
  readonly minOptimizationScore: number;
  readonly skipOnEmptyChange: boolean;
}

export type JobAction = 'run' | 'skip';

export interface JobDecision {
  readonly jobGroup: string;
  readonly action: JobAction;
  readonly reason: string;
  /** Skip rule that made the group eligible, when one did. */
  readonly rule?: string;
}

export interface ExecutionPlan {
  readonly jobs: readonly JobDecision[];
  readonly skipped: number;
  readonly total: number;
  /** Percentage of job groups skipped, one decimal. */
  readonly optimizationScore: number;
  /** True when the minimum score forced every candidate skip back to run. */
  readonly safetyOverride: boolean;
}

/* -------------------------------------------------------------------------- */
/* Metrics & regressions                                                      */
/* -------------------------------------------------------------------------- */

export interface MetricSample {
  readonly name: string;
  readonly value: number;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
}

/** Samples of one metric, oldest first. */
export type BaselineSeries = readonly MetricSample[];

export type MetricDirection = 'lower-is-better' | 'higher-is-better';

export interface MetricDefinition {
  readonly name: string;
  readonly direction: MetricDirection;
  readonly thresholdPercent: number;
  readonly window: number;
  readonly significanceFloorPercent: number;
}

export type VerdictClassification = 'improved' | 'stable' | 'regressed' | 'insufficient-data';

export interface RegressionVerdict {
  readonly metric: string;
  readonly classification: VerdictClassification;
  readonly deltaPercent: number | null;
  readonly exceedsThreshold: boolean;
  readonly current: number;
  readonly baselineMean: number | null;
  readonly baselineStdDev: number | null;
  readonly zScore: number | null;
  readonly samplesUsed: number;
  readonly thresholdPercent: number;
  readonly direction: MetricDirection;
  readonly reason: string;
}

/* -------------------------------------------------------------------------- */
/* Report                                                                     */
/* -------------------------------------------------------------------------- */

export interface DecisionReport {
  readonly runId: string;
  readonly generatedAt: string;
  readonly classification: ClassificationResult;
  readonly plan: ExecutionPlan;
  readonly verdicts: readonly RegressionVerdict[];
  /** False only when at least one verdict is `regressed`. */
  readonly passed: boolean;
  readonly baselineAppended: boolean;
}
