/**
 * Text exposition-format encoder for the import endpoint.
 *
 *   name{label1="v1",label2="v2"} value timestamp_ms
 *
 * Labels are emitted sorted by key. Names and label keys are always embedded
 * verbatim; label values are too unless escaping is 'prometheus'. A name or
 * key outside the exposition-format charset, or a `"`, `{`, `}`, `\` or
 * newline in an unescaped value, corrupts the payload. findUnsafeText()
 * reports such fields for either mode.
 */

import type { MetricPoint } from '../types/metric.ts';

export type EscapingMode = 'none' | 'prometheus';

export interface EncodeOptions {
  escaping?: EscapingMode;
}

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;
const UNSAFE_VALUE = /["{}\\\n]/;

function escapeLabelValue(v: string): string {
  return v.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

export function formatSampleValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

function sortedLabelEntries(labels: Readonly<Record<string, string>>): Array<[string, string]> {
  return Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Fields of a point that would corrupt its encoded line: `__name__` for the
 * metric name, otherwise the label key. Values only count when they are
 * written unescaped.
 */
export function findUnsafeText(point: MetricPoint, escaping: EscapingMode = 'none'): string[] {
  const fields: string[] = [];
  if (!METRIC_NAME.test(point.name)) fields.push('__name__');
  for (const [k, v] of sortedLabelEntries(point.labels)) {
    if (!LABEL_NAME.test(k) || (escaping === 'none' && UNSAFE_VALUE.test(v))) fields.push(k);
  }
  return fields;
}

export function encodePoint(point: MetricPoint, options?: EncodeOptions): string {
  const escape = options?.escaping === 'prometheus';
  const entries = sortedLabelEntries(point.labels);

  let labelBlock = '';
  if (entries.length > 0) {
    const pairs = entries.map(([k, v]) => `${k}="${escape ? escapeLabelValue(v) : v}"`);
    labelBlock = `{${pairs.join(',')}}`;
  }
  return `${point.name}${labelBlock} ${formatSampleValue(point.value)} ${point.timestampMs}`;
}

/** One line per point, newline-joined, no trailing newline. */
export function encodePoints(points: readonly MetricPoint[], options?: EncodeOptions): string {
  return points.map((p) => encodePoint(p, options)).join('\n');
}
