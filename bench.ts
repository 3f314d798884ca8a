import { bench, group, run } from 'mitata';
import { normalizeTimestampColumn } from './src/transform/timestamps.ts';
import { recordsToPoints } from './src/transform/recordsToPoints.ts';
import { encodePoints } from './src/encode/lineProtocol.ts';
import { generateSeries, concatBatches } from './src/transform/synthetic.ts';
import { IngestionPipeline } from './src/core/IngestionPipeline.ts';
import { resolveIngestionConfig } from './src/core/IngestionConfig.ts';
import type { TabularBatch } from './src/types/metric.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeSensorBatch(sensors: number, hours: number): TabularBatch {
  const end = new Date('2024-01-02T00:00:00Z');
  const start = new Date(end.getTime() - hours * 3_600_000);
  return concatBatches(
    Array.from({ length: sensors }, (_, i) =>
      generateSeries({
        start,
        end,
        intervalSeconds: 60,
        metricName: 'temperature_celsius',
        labels: { sensor_id: `sensor_${i}`, location: 'room_a', type: 'temperature' },
      })
    )
  );
}

const smallBatch = makeSensorBatch(1, 1);    // 61 rows
const medBatch = makeSensorBatch(3, 24);     // 4323 rows
const largeBatch = makeSensorBatch(10, 24);  // 14410 rows

const medPoints = recordsToPoints(medBatch, normalizeTimestampColumn(medBatch));
const largePoints = recordsToPoints(largeBatch, normalizeTimestampColumn(largeBatch));

const pipeline = new IngestionPipeline(
  resolveIngestionConfig({ endpointUrl: 'http://localhost:8428' }),
  { transport: { send: async () => ({ status: 204, body: '' }) } }
);

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('timestamps', () => {
  bench('61 rows', () => normalizeTimestampColumn(smallBatch));
  bench('4323 rows', () => normalizeTimestampColumn(medBatch));
});

group('rows → points', () => {
  const ts = normalizeTimestampColumn(medBatch);
  bench('4323 rows', () => recordsToPoints(medBatch, ts));
});

group('line protocol encode', () => {
  bench('1000 points', () => encodePoints(medPoints.slice(0, 1000)));
  bench('14410 points', () => encodePoints(largePoints));
});

group('pipeline end-to-end (transport stubbed)', () => {
  bench('medium batch (4323 rows)', () => pipeline.run(medBatch));
  bench('large batch (14410 rows)', () => pipeline.run(largeBatch));
});

await run();
