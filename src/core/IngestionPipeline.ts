/**
 * Pipeline: run(batch) → PipelineRunResult
 *
 * Steps:
 *  1. Normalize the timestamp column to epoch ms
 *  2. Convert rows to MetricPoint[]
 *  3. Partition into batches of config.batchSize
 *  4. Write each batch with bounded retries
 *  5. Aggregate per-batch results
 *
 * Steps 1-2 throw SchemaError before anything is sent. Write failures never
 * throw; they surface as failedBatches in the result.
 */

import type { IngestionConfig } from './IngestionConfig.ts';
import type { MetricPoint, TabularBatch } from '../types/metric.ts';
import type { BatchState, PipelineRunResult, WriteAttemptResult } from '../types/result.ts';
import type { Transport } from './Transport.ts';
import type { Sleep } from './BatchedWriter.ts';
import type { Logger } from '../util/logger.ts';
import { importUrl } from './IngestionConfig.ts';
import { FetchTransport } from './Transport.ts';
import { BatchedWriter } from './BatchedWriter.ts';
import { normalizeTimestampColumn } from '../transform/timestamps.ts';
import { assertRequiredColumns, recordsToPoints } from '../transform/recordsToPoints.ts';
import { silentLogger } from '../util/logger.ts';

export interface PipelineDeps {
  transport?: Transport;
  sleep?: Sleep;
  logger?: Logger;
  onStateChange?: (batchIndex: number, state: BatchState) => void;
}

export function aggregateResults(
  endpointUrl: string,
  totalPoints: number,
  batches: WriteAttemptResult[]
): PipelineRunResult {
  let successfulBatches = 0;
  let totalPointsWritten = 0;
  for (const b of batches) {
    if (b.succeeded) successfulBatches++;
    totalPointsWritten += b.pointsWritten;
  }
  const failedBatches = batches.length - successfulBatches;
  return {
    endpointUrl,
    batches,
    totalPoints,
    totalBatches: batches.length,
    successfulBatches,
    failedBatches,
    totalPointsWritten,
    succeeded: failedBatches === 0,
  };
}

export class IngestionPipeline {
  private readonly writer: BatchedWriter;
  private readonly log: Logger;

  constructor(
    readonly config: IngestionConfig,
    deps: PipelineDeps = {}
  ) {
    this.log = (deps.logger ?? silentLogger()).child({ endpoint: config.endpointUrl });
    this.writer = new BatchedWriter({
      url: importUrl(config.endpointUrl),
      batchSize: config.batchSize,
      maxRetries: config.maxRetries,
      timeoutMs: config.timeoutMs,
      escaping: config.escaping,
      transport: deps.transport ?? new FetchTransport({ headers: config.headers }),
      sleep: deps.sleep,
      logger: this.log,
      onStateChange: deps.onStateChange,
    });
  }

  /** Convert a tabular batch to points and write them. */
  async run(batch: TabularBatch): Promise<PipelineRunResult> {
    this.log.info({ rows: batch.rows.length, columns: batch.columns }, 'Processing tabular batch');

    assertRequiredColumns(batch);
    const timestamps = normalizeTimestampColumn(batch);
    const points = recordsToPoints(batch, timestamps, {
      defaultMetricName: this.config.defaultMetricName,
    });
    this.log.info({ points: points.length }, `Converted ${points.length} rows to metric points`);

    return this.writePoints(points);
  }

  /** Write already-built points. */
  async writePoints(points: readonly MetricPoint[]): Promise<PipelineRunResult> {
    const { batchSize, endpointUrl } = this.config;
    this.log.info(
      { points: points.length, batches: Math.ceil(points.length / batchSize), batchSize },
      `Starting to write ${points.length} points`
    );

    const batches = await this.writer.writeAll(points);
    const result = aggregateResults(endpointUrl, points.length, batches);

    const summary = {
      successfulBatches: result.successfulBatches,
      failedBatches: result.failedBatches,
      pointsWritten: result.totalPointsWritten,
    };
    if (result.succeeded) {
      this.log.info(summary, 'Write complete');
    } else {
      this.log.error(summary, `Write complete with ${result.failedBatches} failed batches`);
    }
    return result;
  }
}
