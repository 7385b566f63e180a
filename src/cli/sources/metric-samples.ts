/**
 * Metric Sample Source
 *
 * Loads the current run's metric samples from a JSON file:
 *
 * ```json
 * [{ "name": "benchmark_time_ms", "value": 118.4 }]
 * ```
 */

import { readFile } from 'node:fs/promises';
import type { ZodIssue } from 'zod';
import { z } from 'zod';

import { metricSampleInputSchema } from '../../config/schema.ts';
import type { MetricSample } from '../../engine/types.ts';
import { InputError } from '../../errors/errors.ts';

const samplesSchema = z.array(metricSampleInputSchema);

function formatIssue(issue: ZodIssue): string {
  return `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`;
}

/**
 * Validate parsed sample data. Samples without a timestamp are stamped with
 * `timestamp`.
 *
 * @throws {InputError} listing every invalid field.
 */
export function parseMetricSamples(
  data: unknown,
  timestamp: string,
  source = 'metric samples',
): MetricSample[] {
  const result = samplesSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new InputError('INPUT_INVALID_METRIC', `Invalid ${source}: ${issues.join('; ')}`, {
      details: { issues },
    });
  }

  return result.data.map((sample) => ({
    name: sample.name,
    value: sample.value,
    timestamp: sample.timestamp ?? timestamp,
  }));
}

/**
 * Read and validate a metric sample file.
 *
 * @throws {InputError} when the file is unreadable, not JSON or malformed.
 */
export async function loadMetricSamples(
  filePath: string,
  now: () => Date = () => new Date(),
): Promise<MetricSample[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new InputError('INPUT_READ_FAILED', `Cannot read metric samples ${filePath}`, {
      cause: error,
      details: { filePath },
    });
  }

  return parseMetricSamples(data, now().toISOString(), `metric samples in ${filePath}`);
}
