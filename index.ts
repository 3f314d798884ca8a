// rowmetrics: tabular records → text-protocol import with bounded retries

// Core builder
export { MetricsLoader } from './src/core/MetricsLoader.ts';

// Pipeline (for advanced/testing use)
export { IngestionPipeline, aggregateResults } from './src/core/IngestionPipeline.ts';
export type { PipelineDeps } from './src/core/IngestionPipeline.ts';
export { BatchedWriter, partitionBatches, defaultSleep } from './src/core/BatchedWriter.ts';
export type { BatchedWriterOptions, Sleep } from './src/core/BatchedWriter.ts';
export { FetchTransport } from './src/core/Transport.ts';
export type { Transport, TransportRequest, TransportResponse } from './src/core/Transport.ts';
export { summarizeRun } from './src/core/summary.ts';

// Configuration
export {
  resolveIngestionConfig,
  ingestionConfigFromEnv,
  importUrl,
  ingestionConfigSchema,
} from './src/core/IngestionConfig.ts';
export type { IngestionConfig, IngestionConfigInput } from './src/core/IngestionConfig.ts';

// Errors
export {
  IngestError,
  SchemaError,
  ConfigError,
  WriteError,
  ConnectionError,
  TimeoutError,
  RejectionError,
  UnexpectedError,
} from './src/core/errors.ts';

// Types
export type { CellValue, TabularRow, TabularBatch, MetricPoint } from './src/types/metric.ts';
export { tabularBatchFromRows, DEFAULT_METRIC_NAME } from './src/types/metric.ts';
export type {
  ErrorKind,
  BatchState,
  WriteAttemptResult,
  PipelineRunResult,
} from './src/types/result.ts';

// Transform utilities (for advanced use)
export { normalizeTimestamps, normalizeTimestampColumn } from './src/transform/timestamps.ts';
export { recordsToPoints } from './src/transform/recordsToPoints.ts';
export { generateSeries, concatBatches } from './src/transform/synthetic.ts';

// Line protocol encoding (for advanced use)
export { encodePoint, encodePoints, findUnsafeText } from './src/encode/lineProtocol.ts';
export type { EscapingMode, EncodeOptions } from './src/encode/lineProtocol.ts';

// Logging
export { createLogger } from './src/util/logger.ts';
