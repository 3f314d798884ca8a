/**
 * Per-batch write outcomes and the aggregate of a pipeline run.
 */

export type ErrorKind = 'connection' | 'timeout' | 'rejection' | 'unexpected';

export type BatchState = 'pending' | 'sending' | 'retrying' | 'succeeded' | 'failed';

export interface WriteAttemptResult {
  batchIndex: number;
  succeeded: boolean;
  attemptsMade: number;
  lastError?: ErrorKind;
  lastErrorMessage?: string;
  pointCount: number;
  /** Equals pointCount on success; points of a failed batch are never counted. */
  pointsWritten: number;
}

export interface PipelineRunResult {
  endpointUrl: string;
  batches: WriteAttemptResult[];
  totalPoints: number;
  totalBatches: number;
  successfulBatches: number;
  failedBatches: number;
  totalPointsWritten: number;
  /** False when any batch ended failed. */
  succeeded: boolean;
}
