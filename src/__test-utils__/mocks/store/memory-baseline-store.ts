/**
 * In-memory baseline store for tests.
 */

import type { BaselineStore } from '../../../cli/store/baseline-store.ts';
import type { BaselineSeries, MetricSample } from '../../../engine/types.ts';

export class MemoryBaselineStore implements BaselineStore {
  readonly appended: MetricSample[] = [];
  readonly reads: string[] = [];
  private readonly series = new Map<string, MetricSample[]>();

  constructor(initial: Readonly<Record<string, BaselineSeries>> = {}) {
    for (const [metric, samples] of Object.entries(initial)) {
      this.series.set(metric, [...samples]);
    }
  }

  async read(metric: string): Promise<BaselineSeries> {
    this.reads.push(metric);
    return [...(this.series.get(metric) ?? [])];
  }

  async appendAll(samples: readonly MetricSample[]): Promise<void> {
    for (const sample of samples) {
      this.appended.push(sample);
      const series = this.series.get(sample.name) ?? [];
      series.push(sample);
      this.series.set(sample.name, series);
    }
  }

  async append(sample: MetricSample): Promise<void> {
    await this.appendAll([sample]);
  }
}
