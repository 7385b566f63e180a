/**
 * Baseline Store
 *
 * Append-only metric history, one JSON-Lines file per metric:
 *
 *   <directory>/<metric>.jsonl
 *
 * The engine never holds history beyond one run; it reads the series it
 * needs and appends the current samples through this interface.
 */

import { appendFile, mkdir, readFile, rm, stat, truncate } from 'node:fs/promises';
import path from 'node:path';
import pMap from 'p-map';

import { METRIC_NAME_PATTERN, metricSampleSchema } from '../../config/schema.ts';
import type { BaselineAppender } from '../../engine/orchestrator.ts';
import type { BaselineSeries, MetricSample } from '../../engine/types.ts';
import {
  BaselineStoreError,
  formatErrorMessage,
  hasErrorProperty,
  InputError,
} from '../../errors/errors.ts';

export const DEFAULT_BASELINE_DIR = '.ci-baseline';
export const DEFAULT_READ_CONCURRENCY = 4;

export interface BaselineStore extends BaselineAppender {
  /** Samples of one metric in stored order; empty when none were recorded. */
  read(metric: string): Promise<BaselineSeries>;
}

function assertStorableName(metric: string): void {
  if (!METRIC_NAME_PATTERN.test(metric)) {
    throw new InputError(
      'INPUT_INVALID_METRIC',
      `Metric name "${metric}" cannot be stored; use letters, digits, ".", "_" and "-"`,
      { details: { metric } },
    );
  }
}

function parseLine(
  line: string,
  metric: string,
  filePath: string,
  lineNumber: number,
): MetricSample {
  const fail = (reason: string, cause?: unknown): never => {
    throw new BaselineStoreError(
      'BASELINE_READ_FAILED',
      `Malformed baseline entry at ${filePath}:${lineNumber}: ${reason}`,
      { cause, details: { filePath, metric, line: lineNumber } },
    );
  };

  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch (error) {
    return fail('not valid JSON', error);
  }

  const result = metricSampleSchema.safeParse(data);
  if (!result.success) {
    return fail(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  if (result.data.name !== metric) {
    return fail(`sample belongs to "${result.data.name}"`);
  }
  return result.data;
}

/** A file touched by a batch append and its size beforehand (`null`: it did not exist). */
interface AppendedFile {
  readonly filePath: string;
  readonly sizeBefore: number | null;
}

async function sizeOf(filePath: string): Promise<number | null> {
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- metric name is validated
  const stats = await stat(filePath).catch((error: unknown) => {
    if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  });
  if (stats === null) {
    return null;
  }
  if (!stats.isFile()) {
    throw new BaselineStoreError('BASELINE_APPEND_FAILED', `${filePath} is not a regular file`, {
      details: { filePath },
    });
  }
  return stats.size;
}

/**
 * Restore every touched file to its size before the batch.
 *
 * @returns the files that could not be restored.
 */
async function rollBack(files: readonly AppendedFile[]): Promise<string[]> {
  const failed: string[] = [];
  for (const { filePath, sizeBefore } of files) {
    try {
      if (sizeBefore === null) {
        await rm(filePath, { force: true });
      } else {
        // eslint-disable-next-line security/detect-non-literal-fs-filename -- metric name is validated
        await truncate(filePath, sizeBefore);
      }
    } catch (error) {
      failed.push(`${filePath} (${formatErrorMessage(error)})`);
    }
  }
  return failed;
}

/**
 * File-backed baseline store.
 */
export class FileBaselineStore implements BaselineStore {
  constructor(private readonly directory: string) {}

  filePath(metric: string): string {
    assertStorableName(metric);
    return path.join(this.directory, `${metric}.jsonl`);
  }

  async read(metric: string): Promise<BaselineSeries> {
    const filePath = this.filePath(metric);

    let text: string;
    try {
      // eslint-disable-next-line security/detect-non-literal-fs-filename -- metric name is validated
      text = await readFile(filePath, 'utf8');
    } catch (error) {
      if (hasErrorProperty(error, 'code') && error.code === 'ENOENT') {
        return [];
      }
      throw new BaselineStoreError('BASELINE_READ_FAILED', `Cannot read baseline ${filePath}`, {
        cause: error,
        details: { filePath, metric },
      });
    }

    const samples: MetricSample[] = [];
    text.split('\n').forEach((line, index) => {
      if (line.trim().length > 0) {
        samples.push(parseLine(line, metric, filePath, index + 1));
      }
    });
    return samples;
  }

  /**
   * Append the samples grouped per metric file. When any write fails, files
   * already written are truncated back so the batch leaves no partial history.
   */
  async appendAll(samples: readonly MetricSample[]): Promise<void> {
    const batches = new Map<string, { metric: string; text: string }>();
    for (const sample of samples) {
      const filePath = this.filePath(sample.name);
      const text = `${batches.get(filePath)?.text ?? ''}${JSON.stringify(sample)}\n`;
      batches.set(filePath, { metric: sample.name, text });
    }
    if (batches.size === 0) {
      return;
    }

    const touched: AppendedFile[] = [];
    let current = this.directory;
    let metric: string | undefined;
    try {
      await mkdir(this.directory, { recursive: true });
      for (const [filePath, batch] of batches) {
        current = filePath;
        metric = batch.metric;
        touched.push({ filePath, sizeBefore: await sizeOf(filePath) });
        // eslint-disable-next-line security/detect-non-literal-fs-filename -- metric name is validated
        await appendFile(filePath, batch.text, 'utf8');
      }
    } catch (error) {
      const unrestored = await rollBack(touched);
      const suffix =
        unrestored.length > 0 ? `; could not roll back ${unrestored.join(', ')}` : '';
      throw new BaselineStoreError(
        'BASELINE_APPEND_FAILED',
        `Cannot append to baseline ${current}${suffix}`,
        {
          cause: error,
          details: {
            filePath: current,
            ...(metric === undefined ? {} : { metric }),
            ...(unrestored.length > 0 ? { unrestored } : {}),
          },
        },
      );
    }
  }

  async append(sample: MetricSample): Promise<void> {
    await this.appendAll([sample]);
  }
}

/**
 * Read the series of several metrics with bounded concurrency.
 */
export async function readBaselines(
  store: BaselineStore,
  metrics: readonly string[],
  concurrency: number = DEFAULT_READ_CONCURRENCY,
): Promise<Map<string, BaselineSeries>> {
  const entries = await pMap(
    [...new Set(metrics)],
    async (metric): Promise<[string, BaselineSeries]> => [metric, await store.read(metric)],
    { concurrency },
  );
  return new Map(entries);
}
