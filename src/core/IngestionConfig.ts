/**
 * Configuration for the text-protocol import endpoint and batching.
 * Resolved once by the caller; the core never reads the environment itself.
 */

import { z } from 'zod';
import type { EscapingMode } from '../encode/lineProtocol.ts';
import { DEFAULT_METRIC_NAME } from '../types/metric.ts';
import { ConfigError } from './errors.ts';

export const IMPORT_PATH = '/api/v1/import/prometheus';
export const DEFAULT_ENDPOINT_URL = 'http://localhost:18428';

export const ingestionConfigSchema = z.object({
  endpointUrl: z.string().url(),
  batchSize: z.number().int().positive().default(1000),
  maxRetries: z.number().int().nonnegative().default(3),
  timeoutMs: z.number().int().positive().default(30_000),
  defaultMetricName: z.string().min(1).default(DEFAULT_METRIC_NAME),
  escaping: z.enum(['none', 'prometheus']).default('none'),
  headers: z.record(z.string()).optional(),
});

export interface IngestionConfig {
  endpointUrl: string;
  batchSize: number;
  maxRetries: number;
  timeoutMs: number; // milliseconds
  defaultMetricName: string;
  escaping: EscapingMode;
  headers?: Record<string, string>;
}

export type IngestionConfigInput = z.input<typeof ingestionConfigSchema>;

/** Validate and fill defaults. Throws ConfigError listing every issue. */
export function resolveIngestionConfig(input: IngestionConfigInput): IngestionConfig {
  const parsed = ingestionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid ingestion config',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    );
  }
  return parsed.data;
}

function intFromEnv(raw: string | undefined, key: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigError(`Invalid ingestion config`, [`${key}: expected an integer, got '${raw}'`]);
  }
  return n;
}

/**
 * Build a config from an explicit environment map.
 *
 *   VICTORIAMETRICS_URL  endpoint base (default http://localhost:18428)
 *   INGEST_BATCH_SIZE    points per request
 *   INGEST_MAX_RETRIES   attempt ceiling per batch
 *   INGEST_TIMEOUT_MS    per-request timeout
 */
export function ingestionConfigFromEnv(env: Record<string, string | undefined>): IngestionConfig {
  return resolveIngestionConfig({
    endpointUrl: env.VICTORIAMETRICS_URL || DEFAULT_ENDPOINT_URL,
    batchSize: intFromEnv(env.INGEST_BATCH_SIZE, 'INGEST_BATCH_SIZE'),
    maxRetries: intFromEnv(env.INGEST_MAX_RETRIES, 'INGEST_MAX_RETRIES'),
    timeoutMs: intFromEnv(env.INGEST_TIMEOUT_MS, 'INGEST_TIMEOUT_MS'),
  });
}

/** `<base>/api/v1/import/prometheus`, tolerating trailing slashes on the base. */
export function importUrl(endpointUrl: string): string {
  return `${endpointUrl.replace(/\/+$/, '')}${IMPORT_PATH}`;
}
