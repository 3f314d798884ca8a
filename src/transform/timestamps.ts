/**
 * Timestamp-unit inference for a tabular timestamp column.
 *
 *  - Date column      → getTime() (whole milliseconds)
 *  - numeric column   → truncated to integers; if the column maximum is below
 *                       10^12 the whole column is epoch seconds (× 1000),
 *                       otherwise it is already epoch milliseconds
 *
 * The unit is decided once per column from its maximum, so a column mixing
 * seconds and milliseconds is converted inconsistently. Known limitation.
 */

import type { CellValue, TabularBatch } from '../types/metric.ts';
import { TIMESTAMP_COLUMN, cellOf } from '../types/metric.ts';
import { SchemaError } from '../core/errors.ts';

export const SECONDS_THRESHOLD = 1e12;

function toInteger(value: CellValue, row: number): number {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value.trim());
  } else {
    throw new SchemaError(
      `Column '${TIMESTAMP_COLUMN}' row ${row}: expected a numeric or date value, got ${describe(value)}`,
      TIMESTAMP_COLUMN
    );
  }
  if (!Number.isFinite(n)) {
    throw new SchemaError(
      `Column '${TIMESTAMP_COLUMN}' row ${row}: '${String(value)}' is not a finite number`,
      TIMESTAMP_COLUMN
    );
  }
  return Math.trunc(n);
}

function describe(value: CellValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return 'a date';
  return `${typeof value} '${String(value)}'`;
}

/** Convert raw timestamp cells to epoch-millisecond integers. */
export function normalizeTimestamps(values: readonly CellValue[]): number[] {
  if (values.length === 0) return [];

  let result: number[];
  if (values.every((v) => v instanceof Date)) {
    result = values.map((v, i) => {
      const ms = v instanceof Date ? v.getTime() : NaN;
      if (Number.isNaN(ms)) {
        throw new SchemaError(`Column '${TIMESTAMP_COLUMN}' row ${i}: invalid date`, TIMESTAMP_COLUMN);
      }
      return ms;
    });
  } else {
    const ints = values.map((v, i) => toInteger(v, i));
    const max = ints.reduce((a, b) => (b > a ? b : a), -Infinity);
    result = max < SECONDS_THRESHOLD ? ints.map((n) => n * 1000) : ints;
  }

  const negative = result.findIndex((ms) => ms < 0);
  if (negative >= 0) {
    throw new SchemaError(
      `Column '${TIMESTAMP_COLUMN}' row ${negative}: timestamp precedes the epoch`,
      TIMESTAMP_COLUMN
    );
  }
  return result;
}

/** Read and normalize the batch's timestamp column. */
export function normalizeTimestampColumn(batch: TabularBatch): number[] {
  if (!batch.columns.includes(TIMESTAMP_COLUMN)) {
    throw new SchemaError(`Required column '${TIMESTAMP_COLUMN}' not found`, TIMESTAMP_COLUMN);
  }
  return normalizeTimestamps(batch.rows.map((row) => cellOf(row, TIMESTAMP_COLUMN)));
}
