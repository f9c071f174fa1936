import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { CheckpointStore, writeJobKey } from '../checkpoint/store.js';
import { failed, RemoteResult, succeeded } from '../remote/retry.js';
import { cleanupTestTempDir, createTestTempDir } from '../test-utils/temp-paths.js';
import { BatchedWriter } from './batched-writer.js';

const ids = (count: number) => Array.from({ length: count }, (_, index) => `id${index}`);

describe('BatchedWriter', () => {
  let dir: string;
  let checkpoints: CheckpointStore;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    dir = createTestTempDir('writer');
    checkpoints = new CheckpointStore(dir);
    sleep = vi.fn(async (_ms: number) => {});
  });

  afterEach(() => {
    cleanupTestTempDir(dir);
  });

  it('writes in fixed batches with a pause between them', async () => {
    const writeBatch = vi.fn(async (_target: string, _batch: string[]): Promise<RemoteResult<void>> => succeeded(undefined));
    const writer = new BatchedWriter(checkpoints, { sleep });

    const written = await writer.write({ jobKey: writeJobKey('target'), targetId: 'target', ids: ids(250), batchSize: 100, writeBatch });

    expect(written).toBe(250);
    expect(writeBatch.mock.calls.map(([target, batch]) => [target, batch.length, batch[0]])).toEqual([
      ['target', 100, 'id0'],
      ['target', 100, 'id100'],
      ['target', 50, 'id200'],
    ]);
    expect(sleep.mock.calls).toEqual([[100], [100]]);
    expect(checkpoints.load('write:target')).toMatchObject({ cursor: 250, complete: true, total: 250 });
  });

  it('resumes after a failed batch without resubmitting earlier ones', async () => {
    const all = ids(250);
    const accepted: string[] = [];
    let rejectSecondBatch = true;
    const writeBatch = vi.fn(async (_target: string, batch: string[]): Promise<RemoteResult<void>> => {
      if (batch[0] === 'id100' && rejectSecondBatch) {
        rejectSecondBatch = false;
        return failed({ kind: 'terminal', status: 403, message: 'forbidden' });
      }
      accepted.push(...batch);
      return succeeded(undefined);
    });
    const writer = new BatchedWriter(checkpoints, { sleep, interBatchDelayMs: 0 });
    const job = { jobKey: writeJobKey('target'), targetId: 'target', ids: all, batchSize: 100, writeBatch };

    await expect(writer.write(job)).rejects.toMatchObject({
      code: 'REMOTE_REJECTED',
      message: 'write:target items 100-200 rejected: forbidden',
    });
    expect(checkpoints.load('write:target')).toMatchObject({
      cursor: 100,
      complete: false,
      error: 'write:target items 100-200 rejected: forbidden',
    });

    writeBatch.mockClear();
    await expect(writer.write(job)).resolves.toBe(250);

    expect(writeBatch.mock.calls.map(([, batch]) => batch[0])).toEqual(['id100', 'id200']);
    expect(accepted).toEqual(all);
  });

  it('returns immediately for a completed job', async () => {
    checkpoints.save(writeJobKey('done'), { cursor: 120, complete: true, total: 120 });
    const writeBatch = vi.fn(async (): Promise<RemoteResult<void>> => succeeded(undefined));

    const written = await new BatchedWriter(checkpoints, { sleep }).write({
      jobKey: writeJobKey('done'),
      targetId: 'done',
      ids: ids(120),
      batchSize: 100,
      writeBatch,
    });

    expect(written).toBe(120);
    expect(writeBatch).not.toHaveBeenCalled();
  });

  it('waits out a rate limit and retries the same batch', async () => {
    const writeBatch = vi
      .fn<(target: string, batch: string[]) => Promise<RemoteResult<void>>>()
      .mockResolvedValueOnce(succeeded(undefined))
      .mockResolvedValueOnce(failed({ kind: 'rate-limited', status: 429, message: 'slow down', retryAfterSeconds: 3 }))
      .mockResolvedValue(succeeded(undefined));
    const writer = new BatchedWriter(checkpoints, { sleep, interBatchDelayMs: 0 });

    await writer.write({ jobKey: writeJobKey('t'), targetId: 't', ids: ids(150), batchSize: 100, writeBatch });

    expect(writeBatch.mock.calls.map(([, batch]) => batch[0])).toEqual(['id0', 'id100', 'id100']);
    expect(sleep.mock.calls).toEqual([[4000]]);
  });

  it('clamps the batch size to the per-call maximum', async () => {
    const writeBatch = vi.fn(async (_target: string, _batch: string[]): Promise<RemoteResult<void>> => succeeded(undefined));

    await new BatchedWriter(checkpoints, { sleep, interBatchDelayMs: 0 }).write({
      jobKey: writeJobKey('big'),
      targetId: 'big',
      ids: ids(230),
      batchSize: 500,
      writeBatch,
    });

    expect(writeBatch.mock.calls.map(([, batch]) => batch.length)).toEqual([100, 100, 30]);
  });
});
