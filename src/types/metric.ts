/**
 * Tabular input and metric point structures.
 */

/** A single cell of a tabular batch. */
export type CellValue = string | number | boolean | Date | null;

export type TabularRow = Record<string, CellValue>;

/**
 * Ordered rows sharing one column set. A key missing from a row reads as null.
 */
export interface TabularBatch {
  columns: string[];
  rows: TabularRow[];
}

export interface MetricPoint {
  readonly name: string;
  readonly value: number;
  readonly timestampMs: number; // milliseconds since epoch
  readonly labels: Readonly<Record<string, string>>;
}

/** Column names with a fixed role; never emitted as labels. */
export const TIMESTAMP_COLUMN = 'timestamp';
export const VALUE_COLUMN = 'value';
export const METRIC_NAME_COLUMN = 'metric_name';

export const RESERVED_COLUMNS: ReadonlySet<string> = new Set([
  TIMESTAMP_COLUMN,
  VALUE_COLUMN,
  METRIC_NAME_COLUMN,
]);

export const DEFAULT_METRIC_NAME = 'parquet_metric';

/** Build a batch whose columns are the union of row keys, in first-seen order. */
export function tabularBatchFromRows(rows: TabularRow[]): TabularBatch {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return { columns: [...columns], rows };
}

export function cellOf(row: TabularRow, column: string): CellValue {
  return row[column] ?? null;
}
