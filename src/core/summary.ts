import type { PipelineRunResult } from '../types/result.ts';

/** Human-readable pass/fail summary, one line plus one per failed batch. */
export function summarizeRun(result: PipelineRunResult): string {
  const head =
    `${result.succeeded ? 'OK' : 'FAILED'}: ` +
    `${result.successfulBatches}/${result.totalBatches} batches written, ` +
    `${result.totalPointsWritten}/${result.totalPoints} points to ${result.endpointUrl}`;

  const failures = result.batches
    .filter((b) => !b.succeeded)
    .map(
      (b) =>
        `  batch ${b.batchIndex + 1}: ${b.lastError ?? 'not attempted'} after ${b.attemptsMade} attempts` +
        (b.lastErrorMessage ? `: ${b.lastErrorMessage}` : '')
    );

  return [head, ...failures].join('\n');
}
