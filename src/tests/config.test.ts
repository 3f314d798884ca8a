import { describe, it, expect } from 'vitest';
import { resolveIngestionConfig, ingestionConfigFromEnv, importUrl } from '../core/IngestionConfig.ts';
import { ConfigError } from '../core/errors.ts';

describe('resolveIngestionConfig', () => {
  it('fills defaults', () => {
    expect(resolveIngestionConfig({ endpointUrl: 'http://vm:8428' })).toEqual({
      endpointUrl: 'http://vm:8428',
      batchSize: 1000,
      maxRetries: 3,
      timeoutMs: 30_000,
      defaultMetricName: 'parquet_metric',
      escaping: 'none',
    });
  });

  it('accepts maxRetries of 0', () => {
    expect(resolveIngestionConfig({ endpointUrl: 'http://vm:8428', maxRetries: 0 }).maxRetries).toBe(0);
  });

  it('rejects a non-positive batch size and a malformed URL', () => {
    let caught: unknown;
    try {
      resolveIngestionConfig({ endpointUrl: 'not a url', batchSize: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ issues: [expect.stringMatching(/^endpointUrl:/), expect.stringMatching(/^batchSize:/)] });
  });

  it('rejects a negative maxRetries', () => {
    expect(() => resolveIngestionConfig({ endpointUrl: 'http://vm:8428', maxRetries: -1 })).toThrow(ConfigError);
  });
});

describe('ingestionConfigFromEnv', () => {
  it('uses the local default endpoint when nothing is set', () => {
    expect(ingestionConfigFromEnv({})).toMatchObject({
      endpointUrl: 'http://localhost:18428',
      batchSize: 1000,
      maxRetries: 3,
    });
  });

  it('reads endpoint, batch size, retries and timeout', () => {
    expect(
      ingestionConfigFromEnv({
        VICTORIAMETRICS_URL: 'http://victoria:8428',
        INGEST_BATCH_SIZE: '250',
        INGEST_MAX_RETRIES: '5',
        INGEST_TIMEOUT_MS: '10000',
      })
    ).toMatchObject({
      endpointUrl: 'http://victoria:8428',
      batchSize: 250,
      maxRetries: 5,
      timeoutMs: 10_000,
    });
  });

  it('rejects a non-integer value', () => {
    expect(() => ingestionConfigFromEnv({ INGEST_BATCH_SIZE: 'lots' })).toThrow(
      `INGEST_BATCH_SIZE: expected an integer, got 'lots'`
    );
  });
});

describe('importUrl', () => {
  it('appends the import path, dropping trailing slashes', () => {
    expect(importUrl('http://vm:8428')).toBe('http://vm:8428/api/v1/import/prometheus');
    expect(importUrl('http://vm:8428//')).toBe('http://vm:8428/api/v1/import/prometheus');
  });
});
