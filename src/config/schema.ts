/**
 * Decision Config — Schemas
 *
 * Structural validation of the decision config file and of metric sample
 * records. Keys are snake_case on disk; the loader maps them onto the
 * engine's camelCase types.
 */

import { z } from 'zod';

import {
  DEFAULT_BASELINE_WINDOW,
  DEFAULT_SIGNIFICANCE_FLOOR_PERCENT,
  DEFAULT_THRESHOLD_PERCENT,
} from '../engine/regression.ts';

/** Metric names double as baseline file names. */
export const METRIC_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/** `skip_<group>_on_<category>_only` */
export const SKIP_SHORTHAND_PATTERN = /^skip_(.+?)_on_(.+)_only$/;

const nonEmptyString = z.string().trim().min(1, 'must not be empty');

export const metricNameSchema = z
  .string()
  .regex(METRIC_NAME_PATTERN, 'may only contain letters, digits, ".", "_" and "-"');

const percentSchema = z.number().finite().nonnegative();

/* -------------------------------------------------------------------------- */
/* Metric samples                                                             */
/* -------------------------------------------------------------------------- */

export const metricSampleSchema = z.object({
  name: metricNameSchema,
  value: z.number().finite(),
  timestamp: z.string().datetime({ offset: true }),
});

/** Current samples may omit the timestamp; the run time is used instead. */
export const metricSampleInputSchema = metricSampleSchema.extend({
  timestamp: metricSampleSchema.shape.timestamp.optional(),
});

export type MetricSampleInput = z.infer<typeof metricSampleInputSchema>;

/* -------------------------------------------------------------------------- */
/* Policy                                                                     */
/* -------------------------------------------------------------------------- */

const jobGroupSchema = z
  .object({
    skip_when_only: z.array(nonEmptyString).min(1).optional(),
  })
  .strict();

const policyFieldsSchema = z
  .object({
    skip_on_empty_change: z.boolean().default(false),
    min_optimization_score: z.number().finite().min(0).max(100).default(0),
    job_groups: z.record(nonEmptyString, jobGroupSchema.nullable()).default({}),
  })
  .strict();

export interface SkipShorthand {
  readonly key: string;
  readonly jobGroup: string;
  readonly category: string;
  readonly enabled: boolean;
}

/**
 * Policy block: the known fields plus any number of
 * `skip_<group>_on_<category>_only: <bool>` shorthand flags.
 */
export const policySchema = z
  .record(z.string(), z.unknown())
  .default({})
  .transform((raw, ctx) => {
    const fields: Record<string, unknown> = {};
    const shorthands: SkipShorthand[] = [];

    for (const [key, value] of Object.entries(raw)) {
      const match = SKIP_SHORTHAND_PATTERN.exec(key);
      if (match === null) {
        fields[key] = value;
        continue;
      }
      if (typeof value !== 'boolean') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Expected boolean' });
        continue;
      }
      shorthands.push({
        key,
        jobGroup: match[1] ?? '',
        category: match[2] ?? '',
        enabled: value,
      });
    }

    const parsed = policyFieldsSchema.safeParse(fields);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
      }
      return z.NEVER;
    }

    return { ...parsed.data, shorthands };
  });

/* -------------------------------------------------------------------------- */
/* Regression                                                                 */
/* -------------------------------------------------------------------------- */

const windowSchema = z.number().int().min(2);

const regressionDefaultsSchema = z
  .object({
    threshold_percent: percentSchema.default(DEFAULT_THRESHOLD_PERCENT),
    window: windowSchema.default(DEFAULT_BASELINE_WINDOW),
    significance_floor_percent: percentSchema.default(DEFAULT_SIGNIFICANCE_FLOOR_PERCENT),
  })
  .strict();

const metricDefinitionSchema = z
  .object({
    direction: z.enum(['lower-is-better', 'higher-is-better']),
    threshold_percent: percentSchema.optional(),
    window: windowSchema.optional(),
    significance_floor_percent: percentSchema.optional(),
  })
  .strict();

/* -------------------------------------------------------------------------- */
/* Root                                                                       */
/* -------------------------------------------------------------------------- */

const patternListSchema = z.union([
  nonEmptyString.transform((pattern) => [pattern]),
  z.array(nonEmptyString).min(1),
]);

export const decisionConfigSchema = z
  .object({
    rules: z
      .record(nonEmptyString, patternListSchema)
      .refine((rules) => Object.keys(rules).length > 0, 'must declare at least one category'),
    policy: policySchema,
    regression: regressionDefaultsSchema.default({}),
    metrics: z.record(metricNameSchema, metricDefinitionSchema).default({}),
  })
  .strict();

export type RawDecisionConfig = z.infer<typeof decisionConfigSchema>;
