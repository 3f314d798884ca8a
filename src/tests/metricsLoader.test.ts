import { describe, it, expect } from 'vitest';
import { MetricsLoader } from '../core/MetricsLoader.ts';
import { ConfigError } from '../core/errors.ts';
import { tabularBatchFromRows } from '../types/metric.ts';
import { ScriptedTransport, ok, recordingSleep } from './fakes.ts';

describe('MetricsLoader', () => {
  it('throws if endpoint() was not called', () => {
    expect(() => new MetricsLoader().build()).toThrow(ConfigError);
  });

  it('builds a pipeline carrying the configured values', () => {
    const pipeline = new MetricsLoader()
      .endpoint('http://victoria:8428', { timeoutMs: 10_000, headers: { 'X-Scope': 'test' } })
      .batchSize(500)
      .maxRetries(5)
      .defaultMetricName('sensor_reading')
      .escaping('prometheus')
      .build();

    expect(pipeline.config).toEqual({
      endpointUrl: 'http://victoria:8428',
      batchSize: 500,
      maxRetries: 5,
      timeoutMs: 10_000,
      defaultMetricName: 'sensor_reading',
      escaping: 'prometheus',
      headers: { 'X-Scope': 'test' },
    });
  });

  it('rejects invalid values at build time', () => {
    expect(() => new MetricsLoader().endpoint('http://vm:8428').batchSize(-1).build()).toThrow(
      ConfigError
    );
  });

  it('wires the injected transport and sleep into the pipeline', async () => {
    const transport = ScriptedTransport.sequence({ status: 503, body: '' }, ok());
    const recorder = recordingSleep();

    const pipeline = new MetricsLoader()
      .endpoint('http://vm:8428')
      .escaping('prometheus')
      .transport(transport)
      .sleep(recorder.sleep)
      .build();

    const result = await pipeline.run(
      tabularBatchFromRows([{ timestamp: 1700000000, value: 3, note: 'a "quoted" note' }])
    );

    expect(result.succeeded).toBe(true);
    expect(result.batches[0]?.attemptsMade).toBe(2);
    expect(recorder.calls).toEqual([1000]);
    expect(transport.requests[1]?.body).toBe('parquet_metric{note="a \\"quoted\\" note"} 3 1700000000000');
  });
});
