/**
 * Decision Engine — Execution Planning
 *
 * Converts a classification and a policy into a run/skip decision per job
 * group plus an optimization score.
 *
 * This layer is:
 * - fail-safe on data ambiguity (unclassified files always force "run")
 * - fail-loud on configuration bugs (inconsistent policy throws, never degrades)
 * - monotonic (more changed files can only turn skips into runs)
 */

import { ConfigurationError } from '../errors/errors.ts';
import { declaredCategories } from './classification.ts';
import {
  type ClassificationResult,
  type ExecutionPlan,
  type JobDecision,
  type JobGroupPolicy,
  type Policy,
  type SkipRule,
  UNCLASSIFIED,
} from './types.ts';

/* -------------------------------------------------------------------------- */
/* Policy validation                                                          */
/* -------------------------------------------------------------------------- */

function validateSkipRule(
  group: JobGroupPolicy,
  rule: SkipRule,
  known: ReadonlySet<string>,
): void {
  if (rule.whenOnly.length === 0) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Job group "${group.name}": skip rule "${rule.id}" must whitelist at least one category`,
      { details: { subject: group.name } },
    );
  }

  for (const category of rule.whenOnly) {
    if (category === UNCLASSIFIED) {
      throw new ConfigurationError(
        'CONFIG_INVALID',
        `Job group "${group.name}": skip rule "${rule.id}" may not whitelist "${UNCLASSIFIED}"`,
        { details: { subject: group.name } },
      );
    }
    if (!known.has(category)) {
      throw new ConfigurationError(
        'CONFIG_UNKNOWN_CATEGORY',
        `Job group "${group.name}": skip rule "${rule.id}" references undefined category "${category}"`,
        { details: { subject: group.name, category } },
      );
    }
  }
}

/**
 * Identifier form of a job-group name, used for CI output keys: characters
 * outside `[A-Za-z0-9_-]` become `_`.
 */
export function jobGroupKey(name: string): string {
  return name.replaceAll(/[^\w-]/g, '_');
}

/**
 * Check a policy against the categories a rule set declares.
 *
 * @throws {ConfigurationError} naming the offending job group.
 */
export function validatePolicy(policy: Policy, categories: readonly string[]): void {
  if (policy.jobGroups.length === 0) {
    throw new ConfigurationError('CONFIG_INVALID', 'Policy must define at least one job group');
  }

  const score = policy.minOptimizationScore;
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new ConfigurationError(
      'CONFIG_INVALID',
      `Policy minimum optimization score must be between 0 and 100 (got ${score})`,
    );
  }

  const known = new Set(categories);
  const names = new Set<string>();
  const keys = new Map<string, string>();
  for (const group of policy.jobGroups) {
    if (group.name.trim().length === 0) {
      throw new ConfigurationError('CONFIG_INVALID', 'Job group names must not be empty');
    }
    if (names.has(group.name)) {
      throw new ConfigurationError(
        'CONFIG_DUPLICATE',
        `Job group "${group.name}" is declared twice`,
        { details: { subject: group.name } },
      );
    }
    names.add(group.name);

    const key = jobGroupKey(group.name);
    const sharing = keys.get(key);
    if (sharing !== undefined) {
      throw new ConfigurationError(
        'CONFIG_DUPLICATE',
        `Job groups "${sharing}" and "${group.name}" share the output key "${key}"`,
        { details: { subject: group.name } },
      );
    }
    keys.set(key, group.name);

    for (const rule of group.skipRules) {
      validateSkipRule(group, rule, known);
    }
  }
}

/* -------------------------------------------------------------------------- */
/* Eligibility                                                                */
/* -------------------------------------------------------------------------- */

interface Eligibility {
  readonly eligible: boolean;
  readonly reason: string;
  readonly rule?: string;
}

function isRuleSatisfied(rule: SkipRule, classification: ClassificationResult): boolean {
  const allowed = new Set(rule.whenOnly);
  return classification.attributions.every(({ categories }) =>
    categories.every((category) => allowed.has(category)),
  );
}

function assessJobGroup(
  group: JobGroupPolicy,
  classification: ClassificationResult,
  policy: Policy,
): Eligibility {
  if (classification.files.length === 0) {
    return policy.skipOnEmptyChange
      ? { eligible: true, reason: 'Empty change and policy allows skipping on zero changes' }
      : { eligible: false, reason: 'Empty change; policy does not allow skipping on zero changes' };
  }

  const unclassified = classification.categories.find((c) => c.category === UNCLASSIFIED);
  if (unclassified?.matched === true) {
    return {
      eligible: false,
      reason: `Unclassified files present (${unclassified.files.length}); running conservatively`,
    };
  }

  if (group.skipRules.length === 0) {
    return { eligible: false, reason: 'No skip rule defined for this job group' };
  }

  const satisfied = group.skipRules.find((rule) => isRuleSatisfied(rule, classification));
  if (satisfied === undefined) {
    return {
      eligible: false,
      reason: 'Changed files fall outside every skip whitelist for this job group',
    };
  }

  return {
    eligible: true,
    reason: `All changed files are limited to: ${satisfied.whenOnly.join(', ')}`,
    rule: satisfied.id,
  };
}

/* -------------------------------------------------------------------------- */
/* Planning                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Round to one decimal place.
 */
export function roundScore(value: number): number {
  return Math.round(value * 10) / 10;
}

function toDecision(group: JobGroupPolicy, eligibility: Eligibility, skip: boolean): JobDecision {
  return {
    jobGroup: group.name,
    action: skip ? 'skip' : 'run',
    reason: eligibility.reason,
    ...(eligibility.rule === undefined ? {} : { rule: eligibility.rule }),
  };
}

/**
 * Decide which job groups run and which are skipped.
 *
 * @example
 * const plan = planExecution(classify(['README.md'], [{ category: 'docs', patterns: ['*.md'] }]), {
 *   jobGroups: [{ name: 'tests', skipRules: [{ id: 'docs-only', whenOnly: ['docs'] }] }],
 *   minOptimizationScore: 0,
 *   skipOnEmptyChange: false,
 * });
 * // plan.jobs[0].action === 'skip', plan.optimizationScore === 100
 *
 * @throws {ConfigurationError} when the policy is inconsistent with the rule set.
 */
export function planExecution(
  classification: ClassificationResult,
  policy: Policy,
): ExecutionPlan {
  validatePolicy(policy, declaredCategories(classification));

  const assessed = policy.jobGroups.map((group) => ({
    group,
    eligibility: assessJobGroup(group, classification, policy),
  }));

  const total = assessed.length;
  const candidates = assessed.filter((a) => a.eligibility.eligible).length;
  const candidateScore = roundScore((100 * candidates) / total);

  const safetyOverride = candidates > 0 && candidateScore < policy.minOptimizationScore;
  if (safetyOverride) {
    const reason =
      `Optimization score ${candidateScore} is below the policy minimum ` +
      `${policy.minOptimizationScore}; skipping disallowed`;
    return {
      jobs: assessed.map(({ group, eligibility }): JobDecision => ({
        jobGroup: group.name,
        action: 'run',
        reason: eligibility.eligible ? reason : eligibility.reason,
      })),
      skipped: 0,
      total,
      optimizationScore: 0,
      safetyOverride: true,
    };
  }

  return {
    jobs: assessed.map(({ group, eligibility }) =>
      toDecision(group, eligibility, eligibility.eligible),
    ),
    skipped: candidates,
    total,
    optimizationScore: candidateScore,
    safetyOverride: false,
  };
}

/**
 * Whether the plan runs the given job group. Unknown groups run.
 */
export function shouldRun(plan: ExecutionPlan, jobGroup: string): boolean {
  return plan.jobs.find((job) => job.jobGroup === jobGroup)?.action !== 'skip';
}
