import { describe, it, expect } from 'vitest';
import { IngestionPipeline, aggregateResults } from '../core/IngestionPipeline.ts';
import { resolveIngestionConfig } from '../core/IngestionConfig.ts';
import { SchemaError } from '../core/errors.ts';
import type { TabularBatch } from '../types/metric.ts';
import { ScriptedTransport, ok, recordingSleep } from './fakes.ts';

function sensorBatch(rows: number): TabularBatch {
  return {
    columns: ['timestamp', 'metric_name', 'value', 'sensor_id'],
    rows: Array.from({ length: rows }, (_, i) => ({
      timestamp: 1700000000 + i,
      metric_name: 'temperature_celsius',
      value: 20 + (i % 10),
      sensor_id: `sensor_0${i % 3}`,
    })),
  };
}

function makePipeline(transport: ScriptedTransport, batchSize = 1000) {
  const recorder = recordingSleep();
  const pipeline = new IngestionPipeline(
    resolveIngestionConfig({ endpointUrl: 'http://localhost:8428/', batchSize }),
    { transport, sleep: recorder.sleep }
  );
  return { pipeline, sleeps: recorder.calls };
}

describe('IngestionPipeline', () => {
  it('writes 2500 rows as 1000/1000/500 and reports a failed middle batch', async () => {
    // calls: 0 → batch 1, 1..3 → batch 2 (rejected every time), 4 → batch 3
    const transport = new ScriptedTransport((_, call) =>
      call >= 1 && call <= 3 ? { status: 500, body: 'storage unavailable' } : ok()
    );
    const { pipeline } = makePipeline(transport);

    const result = await pipeline.run(sensorBatch(2500));

    expect(result.batches.map((b) => b.pointCount)).toEqual([1000, 1000, 500]);
    expect(result).toMatchObject({
      endpointUrl: 'http://localhost:8428/',
      totalPoints: 2500,
      totalBatches: 3,
      successfulBatches: 2,
      failedBatches: 1,
      totalPointsWritten: 1500,
      succeeded: false,
    });
    expect(result.batches[1]).toMatchObject({
      succeeded: false,
      attemptsMade: 3,
      lastError: 'rejection',
      lastErrorMessage: 'HTTP 500: storage unavailable',
    });
  });

  it('counts 2000 written points when the short final batch fails', async () => {
    const transport = new ScriptedTransport((_, call) =>
      call >= 2 ? new Error('socket hang up') : ok()
    );
    const { pipeline, sleeps } = makePipeline(transport);

    const result = await pipeline.run(sensorBatch(2500));

    expect(result).toMatchObject({
      successfulBatches: 2,
      failedBatches: 1,
      totalPointsWritten: 2000,
      succeeded: false,
    });
    expect(result.batches[2]).toMatchObject({ lastError: 'unexpected', attemptsMade: 3 });
    expect(sleeps).toEqual([1000, 2000]);
  });

  it('posts to the import path of the endpoint', async () => {
    const transport = ScriptedTransport.sequence(ok());
    const { pipeline } = makePipeline(transport);

    await pipeline.run(sensorBatch(1));

    expect(transport.requests[0]?.url).toBe('http://localhost:8428/api/v1/import/prometheus');
    expect(transport.requests[0]?.body).toBe(
      'temperature_celsius{sensor_id="sensor_00"} 20 1700000000000'
    );
  });

  it('reports success when every batch is accepted', async () => {
    const { pipeline, sleeps } = makePipeline(ScriptedTransport.sequence(ok(200)), 2);

    const result = await pipeline.run(sensorBatch(5));

    expect(result).toMatchObject({
      totalBatches: 3,
      successfulBatches: 3,
      failedBatches: 0,
      totalPointsWritten: 5,
      succeeded: true,
    });
    expect(sleeps).toEqual([]);
  });

  it('aborts before any network call when the value column is missing', async () => {
    const transport = ScriptedTransport.sequence(ok());
    const { pipeline } = makePipeline(transport);

    await expect(
      pipeline.run({ columns: ['timestamp', 'sensor_id'], rows: [{ timestamp: 1, sensor_id: 'a' }] })
    ).rejects.toThrow(SchemaError);
    expect(transport.requests).toHaveLength(0);
  });

  it('aborts before any network call when a value is not numeric', async () => {
    const transport = ScriptedTransport.sequence(ok());
    const { pipeline } = makePipeline(transport);
    const batch = sensorBatch(3);
    batch.rows[2] = { ...batch.rows[2], value: 'broken' };

    await expect(pipeline.run(batch)).rejects.toThrow(`Column 'value' row 2: 'broken' is not numeric`);
    expect(transport.requests).toHaveLength(0);
  });

  it('writes pre-built points with writePoints', async () => {
    const transport = ScriptedTransport.sequence(ok());
    const { pipeline } = makePipeline(transport);

    const result = await pipeline.writePoints([
      { name: 'humidity_percent', value: 55, timestampMs: 1700000000000, labels: {} },
    ]);

    expect(result.totalPointsWritten).toBe(1);
    expect(transport.requests[0]?.body).toBe('humidity_percent 55 1700000000000');
  });

  it('uses the configured default metric name', async () => {
    const transport = ScriptedTransport.sequence(ok());
    const pipeline = new IngestionPipeline(
      resolveIngestionConfig({ endpointUrl: 'http://vm:8428', defaultMetricName: 'sensor_reading' }),
      { transport }
    );

    await pipeline.run({ columns: ['timestamp', 'value'], rows: [{ timestamp: 1700000000000, value: 1 }] });

    expect(transport.requests[0]?.body).toBe('sensor_reading 1 1700000000000');
  });
});

describe('aggregateResults', () => {
  it('counts only successful batches as written', () => {
    const result = aggregateResults('http://vm:8428', 3, [
      { batchIndex: 0, succeeded: true, attemptsMade: 1, pointCount: 2, pointsWritten: 2 },
      { batchIndex: 1, succeeded: false, attemptsMade: 3, lastError: 'connection', pointCount: 1, pointsWritten: 0 },
    ]);
    expect(result).toMatchObject({
      totalPoints: 3,
      totalBatches: 2,
      successfulBatches: 1,
      failedBatches: 1,
      totalPointsWritten: 2,
      succeeded: false,
    });
  });

  it('treats an empty run as successful', () => {
    expect(aggregateResults('http://vm:8428', 0, []).succeeded).toBe(true);
  });
});
