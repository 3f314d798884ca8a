/**
 * Synthetic sensor series, one row per interval step from start to end
 * inclusive. Values are uniform in [10, 100).
 */

import type { TabularBatch, TabularRow } from '../types/metric.ts';

export interface SeriesOptions {
  start: Date;
  end: Date;
  intervalSeconds: number;
  metricName: string;
  labels?: Record<string, string>;
  /** Source of uniform [0, 1) numbers. Defaults to Math.random. */
  random?: () => number;
}

export function generateSeries(options: SeriesOptions): TabularBatch {
  const { start, end, intervalSeconds, metricName, labels = {} } = options;
  if (!(intervalSeconds > 0)) {
    throw new RangeError(`intervalSeconds must be positive, got ${intervalSeconds}`);
  }
  const random = options.random ?? Math.random;
  const stepMs = intervalSeconds * 1000;

  const rows: TabularRow[] = [];
  for (let t = start.getTime(); t <= end.getTime(); t += stepMs) {
    rows.push({
      timestamp: new Date(t),
      metric_name: metricName,
      value: 10 + random() * 90,
      ...labels,
    });
  }
  return {
    columns: ['timestamp', 'metric_name', 'value', ...Object.keys(labels)],
    rows,
  };
}

/** Concatenate batches; columns are the union in first-seen order. */
export function concatBatches(batches: TabularBatch[]): TabularBatch {
  const columns: string[] = [];
  for (const b of batches) {
    for (const c of b.columns) if (!columns.includes(c)) columns.push(c);
  }
  return { columns, rows: batches.flatMap((b) => b.rows) };
}
