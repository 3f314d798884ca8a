/**
 * Converts a tabular batch to MetricPoint[].
 *
 * Column roles:
 *  - timestamp   → required; supplied pre-normalized as epoch ms
 *  - value       → required; coerced to a float, fail-fast on bad cells
 *  - metric_name → optional; falls back to a default name per row
 *  - any other   → label, omitted for rows where the cell is null
 */

import type { CellValue, MetricPoint, TabularBatch } from '../types/metric.ts';
import {
  DEFAULT_METRIC_NAME,
  METRIC_NAME_COLUMN,
  RESERVED_COLUMNS,
  TIMESTAMP_COLUMN,
  VALUE_COLUMN,
  cellOf,
} from '../types/metric.ts';
import { SchemaError } from '../core/errors.ts';

export interface ConvertOptions {
  defaultMetricName?: string;
}

const REQUIRED_COLUMNS = [TIMESTAMP_COLUMN, VALUE_COLUMN] as const;

/** Canonical text for a non-null cell. */
export function cellToString(value: Exclude<CellValue, null>): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function toFloat(value: CellValue, row: number): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const n = Number(trimmed);
    if (trimmed !== '' && !Number.isNaN(n)) return n;
  }
  const shown = value instanceof Date ? value.toISOString() : String(value);
  throw new SchemaError(
    `Column '${VALUE_COLUMN}' row ${row}: '${shown}' is not numeric`,
    VALUE_COLUMN
  );
}

export function assertRequiredColumns(batch: TabularBatch): void {
  for (const column of REQUIRED_COLUMNS) {
    if (!batch.columns.includes(column)) {
      throw new SchemaError(`Required column '${column}' not found`, column);
    }
  }
}

export function recordsToPoints(
  batch: TabularBatch,
  timestampsMs: readonly number[],
  options?: ConvertOptions
): MetricPoint[] {
  assertRequiredColumns(batch);
  if (timestampsMs.length !== batch.rows.length) {
    throw new SchemaError(
      `Expected ${batch.rows.length} timestamps, got ${timestampsMs.length}`,
      TIMESTAMP_COLUMN
    );
  }

  const defaultName = options?.defaultMetricName ?? DEFAULT_METRIC_NAME;
  const hasNameColumn = batch.columns.includes(METRIC_NAME_COLUMN);
  const labelColumns = batch.columns.filter((c) => !RESERVED_COLUMNS.has(c));

  return batch.rows.map((row, i) => {
    let name = defaultName;
    if (hasNameColumn) {
      const cell = cellOf(row, METRIC_NAME_COLUMN);
      if (cell !== null && cellToString(cell) !== '') name = cellToString(cell);
    }

    const labels: Record<string, string> = {};
    for (const column of labelColumns) {
      const cell = cellOf(row, column);
      if (cell !== null) labels[column] = cellToString(cell);
    }

    return Object.freeze({
      name,
      value: toFloat(cellOf(row, VALUE_COLUMN), i),
      timestampMs: timestampsMs[i] ?? 0,
      labels: Object.freeze(labels),
    });
  });
}
