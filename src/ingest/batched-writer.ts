import { CheckpointStore } from '../checkpoint/store.js';
import { MAX_WRITE_BATCH_SIZE } from '../config.js';
import { errorMessage, logger } from '../logger.js';
import { RemoteResult, RetryOptions, Sleep, sleep, withRetry } from '../remote/retry.js';

export interface WriteJob {
  jobKey: string;
  targetId: string;
  ids: string[];
  batchSize: number;
  /** One remote mutating call adding `batch` to `targetId`; all-or-nothing per call. */
  writeBatch: (targetId: string, batch: string[]) => Promise<RemoteResult<void>>;
  onProgress?: (progress: WriteProgress) => void;
}

export interface WriteProgress {
  jobKey: string;
  written: number;
  total: number;
}

export interface BatchedWriterOptions {
  retry?: RetryOptions;
  /** Pause between batches to stay under the write-rate ceiling. */
  interBatchDelayMs?: number;
  sleep?: Sleep;
}

export const DEFAULT_INTER_BATCH_DELAY_MS = 100;

/**
 * Replays ids into one target collection in fixed-size batches. The written
 * count is checkpointed after every batch, so a rerun never resubmits a batch
 * that already succeeded.
 */
export class BatchedWriter {
  private readonly retry: RetryOptions;
  private readonly interBatchDelayMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly checkpoints: CheckpointStore,
    options: BatchedWriterOptions = {}
  ) {
    this.sleep = options.sleep ?? options.retry?.sleep ?? sleep;
    this.retry = { ...options.retry, sleep: options.retry?.sleep ?? this.sleep };
    this.interBatchDelayMs = Math.max(0, options.interBatchDelayMs ?? DEFAULT_INTER_BATCH_DELAY_MS);
  }

  async write(job: WriteJob): Promise<number> {
    const checkpoint = this.checkpoints.load(job.jobKey);
    if (checkpoint?.complete) {
      logger.info(`${job.jobKey} already complete: ${checkpoint.cursor} items written`);
      return checkpoint.cursor;
    }

    const batchSize = Math.min(MAX_WRITE_BATCH_SIZE, Math.max(1, job.batchSize));
    const total = job.ids.length;
    let written = Math.min(checkpoint?.cursor ?? 0, total);

    if (written > 0) {
      logger.info(`Resuming ${job.jobKey}: ${written} of ${total} items already written`);
    }

    try {
      while (written < total) {
        const batch = job.ids.slice(written, written + batchSize);
        await withRetry(() => job.writeBatch(job.targetId, batch), {
          ...this.retry,
          label: `${job.jobKey} items ${written}-${written + batch.length}`,
        });

        written += batch.length;
        this.checkpoints.save(job.jobKey, { cursor: written, complete: false, total });
        job.onProgress?.({ jobKey: job.jobKey, written, total });

        if (written < total && this.interBatchDelayMs > 0) {
          await this.sleep(this.interBatchDelayMs);
        }
      }
    } catch (error) {
      this.checkpoints.save(job.jobKey, { cursor: written, complete: false, error: errorMessage(error), total });
      logger.error(`${job.jobKey} stopped after ${written} of ${total} items; rerun to resume`, {
        error: errorMessage(error),
      });
      throw error;
    }

    this.checkpoints.save(job.jobKey, { cursor: written, complete: true, total });
    return written;
  }
}
