/**
 * Writes points in fixed-size batches with a bounded, linearly backed-off
 * retry loop per batch.
 *
 * Per-batch states:
 *
 *   pending → sending → succeeded
 *                     → retrying → sending   (attemptsMade < maxRetries)
 *                     → failed               (attempt ceiling reached)
 *
 * The backoff before attempt n+1 is 1s × n. Batches are written one after
 * another; a failed batch never stops the ones after it.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { MetricPoint } from '../types/metric.ts';
import type { BatchState, WriteAttemptResult } from '../types/result.ts';
import type { Transport } from './Transport.ts';
import type { EscapingMode } from '../encode/lineProtocol.ts';
import type { Logger } from '../util/logger.ts';
import { encodePoints, findUnsafeText } from '../encode/lineProtocol.ts';
import { RejectionError, classifyWriteError } from './errors.ts';
import type { WriteError } from './errors.ts';
import { silentLogger } from '../util/logger.ts';

export const ACCEPTED_STATUSES: ReadonlySet<number> = new Set([200, 204]);
export const BACKOFF_STEP_MS = 1000;
export const REJECTION_BODY_LIMIT = 200;

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface BatchedWriterOptions {
  url: string;
  batchSize: number;
  maxRetries: number;
  timeoutMs: number;
  escaping?: EscapingMode;
  transport: Transport;
  sleep?: Sleep;
  logger?: Logger;
  onStateChange?: (batchIndex: number, state: BatchState) => void;
}

/** Contiguous slices of at most batchSize points, in input order. */
export function partitionBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export class BatchedWriter {
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(private readonly options: BatchedWriterOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.log = (options.logger ?? silentLogger()).child({ component: 'batched-writer' });
  }

  async writeAll(points: readonly MetricPoint[]): Promise<WriteAttemptResult[]> {
    const batches = partitionBatches(points, this.options.batchSize);
    const results: WriteAttemptResult[] = [];
    for (const [index, batch] of batches.entries()) {
      this.log.info(
        { batchIndex: index, points: batch.length },
        `Writing batch ${index + 1}/${batches.length}`
      );
      results.push(await this.writeBatch(batch, index));
    }
    return results;
  }

  async writeBatch(points: readonly MetricPoint[], batchIndex: number): Promise<WriteAttemptResult> {
    const { url, maxRetries, escaping } = this.options;
    const log = this.log.child({ batchIndex });

    const unsafe = points.filter((p) => findUnsafeText(p, escaping).length > 0).length;
    if (unsafe > 0) {
      log.warn({ unsafe, escaping: escaping ?? 'none' }, 'Batch contains points that do not encode cleanly');
    }

    let state: BatchState = this.enter(batchIndex, 'pending');
    let attemptsMade = 0;
    let lastError: WriteError | undefined;
    const body = encodePoints(points, { escaping });

    state = this.enter(batchIndex, attemptsMade < maxRetries ? 'sending' : 'failed');

    while (state === 'sending' || state === 'retrying') {
      if (state === 'retrying') {
        await this.sleep(BACKOFF_STEP_MS * attemptsMade);
        state = this.enter(batchIndex, 'sending');
        continue;
      }

      attemptsMade++;
      const failure = await this.attempt(body);
      if (failure === null) {
        lastError = undefined;
        state = this.enter(batchIndex, 'succeeded');
        break;
      }
      lastError = failure;

      if (attemptsMade < maxRetries) {
        log.warn(
          { kind: failure.kind, attempt: attemptsMade, maxRetries },
          `Write failed (attempt ${attemptsMade}/${maxRetries}): ${failure.message}, retrying`
        );
        state = this.enter(batchIndex, 'retrying');
      } else {
        log.error(
          { kind: failure.kind, attempt: attemptsMade, url },
          `Write failed (final attempt): ${failure.message}`
        );
        state = this.enter(batchIndex, 'failed');
      }
    }

    const succeeded = state === 'succeeded';
    if (succeeded) log.debug({ attempts: attemptsMade }, 'Batch written');

    return {
      batchIndex,
      succeeded,
      attemptsMade,
      ...(lastError ? { lastError: lastError.kind, lastErrorMessage: lastError.message } : {}),
      pointCount: points.length,
      pointsWritten: succeeded ? points.length : 0,
    };
  }

  /** One send; null on acceptance, otherwise the classified failure. */
  private async attempt(body: string): Promise<WriteError | null> {
    const { url, timeoutMs, transport } = this.options;
    try {
      const response = await transport.send({ url, body, contentType: 'text/plain', timeoutMs });
      if (ACCEPTED_STATUSES.has(response.status)) return null;
      return new RejectionError(response.status, response.body.slice(0, REJECTION_BODY_LIMIT));
    } catch (err) {
      return classifyWriteError(err);
    }
  }

  private enter(batchIndex: number, state: BatchState): BatchState {
    this.options.onStateChange?.(batchIndex, state);
    return state;
  }
}
