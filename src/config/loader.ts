/**
 * Decision Config — Loader
 *
 * Reads a YAML or JSON decision config, validates its structure with zod and
 * its semantics with the engine's own rule and policy checks, and returns the
 * typed inputs the engine runs on.
 *
 * Guarantees:
 *   - Every structural problem is reported at once, in a single
 *     ConfigurationError whose `details.issues` lists them as `path: message`
 *   - A config that loads is one the engine accepts
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';

import { compileRules } from '../engine/classification.ts';
import { validatePolicy } from '../engine/planner.ts';
import type {
  JobGroupPolicy,
  MetricDefinition,
  PatternRule,
  Policy,
  SkipRule,
} from '../engine/types.ts';
import { ConfigurationError, isConfigurationError } from '../errors/errors.ts';
import { decisionConfigSchema, type RawDecisionConfig } from './schema.ts';

export const DEFAULT_CONFIG_PATH = '.ci-decision.yaml';

export interface DecisionConfig {
  readonly ruleSet: readonly PatternRule[];
  readonly policy: Policy;
  readonly metrics: readonly MetricDefinition[];
}

export interface ParseOptions {
  readonly format?: 'yaml' | 'json';
  /** Included in error messages and details. */
  readonly filePath?: string;
}

/* -------------------------------------------------------------------------- */
/* Mapping                                                                    */
/* -------------------------------------------------------------------------- */

function buildPolicy(raw: RawDecisionConfig['policy']): Policy {
  const groups = new Map<string, SkipRule[]>();

  for (const [name, group] of Object.entries(raw.job_groups)) {
    const rules: SkipRule[] = [];
    if (group?.skip_when_only !== undefined) {
      rules.push({ id: `job_groups.${name}.skip_when_only`, whenOnly: group.skip_when_only });
    }
    groups.set(name, rules);
  }

  for (const shorthand of raw.shorthands) {
    const rules = groups.get(shorthand.jobGroup) ?? [];
    if (shorthand.enabled) {
      rules.push({ id: shorthand.key, whenOnly: [shorthand.category] });
    }
    groups.set(shorthand.jobGroup, rules);
  }

  const jobGroups: JobGroupPolicy[] = [...groups].map(([name, skipRules]) => ({
    name,
    skipRules,
  }));

  return {
    jobGroups,
    minOptimizationScore: raw.min_optimization_score,
    skipOnEmptyChange: raw.skip_on_empty_change,
  };
}

function buildMetrics(raw: RawDecisionConfig): MetricDefinition[] {
  const defaults = raw.regression;
  return Object.entries(raw.metrics).map(([name, metric]) => ({
    name,
    direction: metric.direction,
    thresholdPercent: metric.threshold_percent ?? defaults.threshold_percent,
    window: metric.window ?? defaults.window,
    significanceFloorPercent:
      metric.significance_floor_percent ?? defaults.significance_floor_percent,
  }));
}

/**
 * Map a structurally valid config onto engine types and check it the way
 * the engine will.
 *
 * @throws {ConfigurationError} when rules or policy are inconsistent.
 */
export function buildDecisionConfig(raw: RawDecisionConfig): DecisionConfig {
  const ruleSet: PatternRule[] = Object.entries(raw.rules).map(([category, patterns]) => ({
    category,
    patterns,
  }));
  const policy = buildPolicy(raw.policy);

  compileRules(ruleSet);
  validatePolicy(policy, ruleSet.map((rule) => rule.category));

  return { ruleSet, policy, metrics: buildMetrics(raw) };
}

/* -------------------------------------------------------------------------- */
/* Parsing                                                                    */
/* -------------------------------------------------------------------------- */

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function describeSource(filePath: string | undefined): string {
  return filePath === undefined ? 'decision config' : `decision config ${filePath}`;
}

function withSource(filePath: string | undefined): { filePath?: string } {
  return filePath === undefined ? {} : { filePath };
}

function parseDocument(text: string, options: ParseOptions): unknown {
  try {
    return options.format === 'json' ? JSON.parse(text) : YAML.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Invalid ${describeSource(options.filePath)}: ${reason}`,
      { cause: error, details: withSource(options.filePath) },
    );
  }
}

/**
 * Parse and validate config text.
 *
 * @throws {ConfigurationError} for syntax errors, structural issues and
 *   inconsistent rules or policy.
 */
export function parseDecisionConfig(text: string, options: ParseOptions = {}): DecisionConfig {
  const document = parseDocument(text, options);

  const result = decisionConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Invalid ${describeSource(options.filePath)}: ${issues.join('; ')}`,
      { details: { ...withSource(options.filePath), issues } },
    );
  }

  try {
    return buildDecisionConfig(result.data);
  } catch (error) {
    if (isConfigurationError(error) && options.filePath !== undefined) {
      throw new ConfigurationError(error.code, `${options.filePath}: ${error.message}`, {
        cause: error,
        details: { ...error.details, filePath: options.filePath },
      });
    }
    throw error;
  }
}

/**
 * Read and validate a decision config file. `.json` files are parsed as
 * JSON, everything else as YAML.
 *
 * @throws {ConfigurationError} `CONFIG_READ_FAILED` when the file cannot be read.
 */
export async function loadDecisionConfig(filePath: string): Promise<DecisionConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      'CONFIG_READ_FAILED',
      `Cannot read decision config ${filePath}`,
      { cause: error, details: { filePath } },
    );
  }

  const format = path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
  return parseDecisionConfig(text, { format, filePath });
}
