import { CheckpointStore, PayloadDecoder } from '../checkpoint/store.js';
import { errorMessage, logger } from '../logger.js';
import type { Page } from '../types.js';
import { RemoteResult, RetryOptions, withRetry } from '../remote/retry.js';

export const DEFAULT_CHECKPOINT_EVERY_PAGES = 5;

export interface FetchJob<T> {
  jobKey: string;
  pageSize: number;
  /** One remote page read: up to `limit` items starting at `offset`. */
  loadPage: (offset: number, limit: number) => Promise<RemoteResult<Page<T>>>;
  /** Revalidates a buffer read back from a checkpoint file. */
  decodeItems: PayloadDecoder<T[]>;
  checkpointEveryPages?: number;
  onProgress?: (progress: FetchProgress) => void;
}

export interface FetchProgress {
  jobKey: string;
  fetched: number;
  cursor: number;
  total: number;
}

export type FetchStart = 'fresh' | 'resumed' | 'complete';

export interface FetchResult<T> {
  items: T[];
  total: number;
  start: FetchStart;
  remoteCalls: number;
}

/**
 * Pulls every page of a remote collection, checkpointing the accumulated
 * buffer so an interrupted run resumes where the last checkpoint left off.
 */
export class PaginatedFetcher {
  constructor(
    private readonly checkpoints: CheckpointStore,
    private readonly retry: RetryOptions = {}
  ) {}

  async fetch<T>(job: FetchJob<T>): Promise<FetchResult<T>> {
    const pageSize = Math.max(1, job.pageSize);
    const every = Math.max(1, job.checkpointEveryPages ?? DEFAULT_CHECKPOINT_EVERY_PAGES);
    const checkpoint = this.checkpoints.load(job.jobKey, job.decodeItems);

    if (checkpoint?.complete) {
      const items = checkpoint.payload ?? [];
      logger.info(`${job.jobKey} already fully fetched, loading ${items.length} items from checkpoint`);
      return { items, total: checkpoint.total ?? items.length, start: 'complete', remoteCalls: 0 };
    }

    let buffer: T[] = [];
    let cursor = 0;
    let total: number | undefined;
    let remoteCalls = 0;
    let start: FetchStart = 'fresh';

    if (checkpoint && checkpoint.total !== undefined) {
      buffer = checkpoint.payload ?? [];
      cursor = checkpoint.cursor;
      total = checkpoint.total;
      start = 'resumed';
      logger.info(`Resuming ${job.jobKey} at offset ${cursor}: ${buffer.length} items already fetched`);
    }

    const loadPage = (offset: number, limit: number, label: string): Promise<Page<T>> =>
      withRetry(
        () => {
          remoteCalls += 1;
          return job.loadPage(offset, limit);
        },
        { ...this.retry, label }
      );

    try {
      if (total === undefined) {
        const probe = await loadPage(0, 1, `${job.jobKey} probe`);
        total = probe.total;
        buffer = [];
        cursor = 0;
      }

      let pagesSinceCheckpoint = 0;
      while (cursor < total) {
        const page = await loadPage(cursor, pageSize, `${job.jobKey} offset ${cursor}`);
        buffer = buffer.concat(page.items);
        cursor += pageSize;
        pagesSinceCheckpoint += 1;

        job.onProgress?.({ jobKey: job.jobKey, fetched: buffer.length, cursor, total });

        if (pagesSinceCheckpoint >= every && cursor < total) {
          this.checkpoints.save(job.jobKey, { cursor, complete: false, total, payload: buffer });
          pagesSinceCheckpoint = 0;
        }
      }
    } catch (error) {
      this.checkpoints.save(job.jobKey, {
        cursor,
        complete: false,
        error: errorMessage(error),
        total,
        payload: buffer,
      });
      logger.error(`${job.jobKey} stopped at offset ${cursor}; rerun to resume`, { error: errorMessage(error) });
      throw error;
    }

    const finalTotal = total ?? buffer.length;
    this.checkpoints.save(job.jobKey, { cursor, complete: true, total: finalTotal, payload: buffer });
    return { items: buffer, total: finalTotal, start, remoteCalls };
  }
}
