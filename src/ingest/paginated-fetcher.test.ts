import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CheckpointStore, fetchJobKey } from '../checkpoint/store.js';
import { decodePlaylistEntries } from '../remote/normalize.js';
import { failed, RemoteResult, succeeded } from '../remote/retry.js';
import { playlistEntry } from '../test-utils/fixtures.js';
import { cleanupTestTempDir, createTestTempDir } from '../test-utils/temp-paths.js';
import type { Page, PlaylistEntry } from '../types.js';
import { PaginatedFetcher } from './paginated-fetcher.js';

function collection(size: number): PlaylistEntry[] {
  return Array.from({ length: size }, (_, index) => playlistEntry(`t${index}`));
}

function pagesOf(entries: PlaylistEntry[]) {
  return (offset: number, limit: number): Promise<RemoteResult<Page<PlaylistEntry>>> =>
    Promise.resolve(succeeded({ items: entries.slice(offset, offset + limit), total: entries.length }));
}

const noSleep = async () => {};

describe('PaginatedFetcher', () => {
  let dir: string;
  let checkpoints: CheckpointStore;
  let fetcher: PaginatedFetcher;

  beforeEach(() => {
    dir = createTestTempDir('fetcher');
    checkpoints = new CheckpointStore(dir);
    fetcher = new PaginatedFetcher(checkpoints, { sleep: noSleep });
  });

  afterEach(() => {
    cleanupTestTempDir(dir);
  });

  it('probes the total and then pages through the collection', async () => {
    const entries = collection(250);
    const loadPage = vi.fn(pagesOf(entries));

    const result = await fetcher.fetch({
      jobKey: fetchJobKey('pl1'),
      pageSize: 100,
      loadPage,
      decodeItems: decodePlaylistEntries,
    });

    expect(loadPage.mock.calls).toEqual([
      [0, 1],
      [0, 100],
      [100, 100],
      [200, 100],
    ]);
    expect(result.items).toHaveLength(250);
    expect(result.items[249].track?.id).toBe('t249');
    expect(result).toMatchObject({ total: 250, start: 'fresh', remoteCalls: 4 });
    expect(checkpoints.load('fetch:pl1')).toMatchObject({ cursor: 300, complete: true, total: 250 });
  });

  it('resumes an interrupted fetch from the last checkpoint', async () => {
    const entries = collection(250);
    const key = fetchJobKey('pl1');
    const serve = pagesOf(entries);
    let persistedBeforeThirdPage: unknown;

    const firstRun = vi.fn(async (offset: number, limit: number) => {
      if (offset === 200 && limit === 100) {
        const saved = checkpoints.load(key, decodePlaylistEntries);
        persistedBeforeThirdPage = { cursor: saved?.cursor, buffered: saved?.payload?.length, complete: saved?.complete };
        return failed({ kind: 'terminal', status: 404, message: 'playlist not found' });
      }
      return serve(offset, limit);
    });

    await expect(
      fetcher.fetch({ jobKey: key, pageSize: 100, checkpointEveryPages: 2, loadPage: firstRun, decodeItems: decodePlaylistEntries })
    ).rejects.toMatchObject({ code: 'REMOTE_REJECTED' });

    expect(persistedBeforeThirdPage).toEqual({ cursor: 200, buffered: 200, complete: false });
    expect(checkpoints.load(key)).toMatchObject({
      cursor: 200,
      complete: false,
      total: 250,
      error: 'fetch:pl1 offset 200 rejected: playlist not found',
    });

    const secondRun = vi.fn(serve);
    const resumed = await fetcher.fetch({
      jobKey: key,
      pageSize: 100,
      checkpointEveryPages: 2,
      loadPage: secondRun,
      decodeItems: decodePlaylistEntries,
    });

    expect(secondRun.mock.calls).toEqual([[200, 100]]);
    expect(resumed.start).toBe('resumed');
    expect(resumed.remoteCalls).toBe(1);
    expect(resumed.items.map((entry) => entry.track?.id)).toEqual(entries.map((entry) => entry.track?.id));
  });

  it('returns a completed job from its checkpoint without remote calls', async () => {
    const entries = collection(30);
    const job = { jobKey: fetchJobKey('pl2'), pageSize: 10, loadPage: vi.fn(pagesOf(entries)), decodeItems: decodePlaylistEntries };

    const first = await fetcher.fetch(job);
    job.loadPage.mockClear();
    const second = await fetcher.fetch(job);

    expect(job.loadPage).not.toHaveBeenCalled();
    expect(second.start).toBe('complete');
    expect(second.remoteCalls).toBe(0);
    expect(second.items).toEqual(first.items);
    expect(second.total).toBe(30);
  });

  it('checkpoints every fifth page by default and skips the save on the last page', async () => {
    const save = vi.spyOn(checkpoints, 'save');

    await fetcher.fetch({
      jobKey: fetchJobKey('pl3'),
      pageSize: 10,
      loadPage: pagesOf(collection(100)),
      decodeItems: decodePlaylistEntries,
    });

    expect(save.mock.calls.map(([, progress]) => [progress.cursor, progress.complete])).toEqual([
      [50, false],
      [100, true],
    ]);
  });

  it('retries a transient page failure and counts every attempt', async () => {
    const entries = collection(5);
    const serve = pagesOf(entries);
    let failures = 1;
    const loadPage = vi.fn(async (offset: number, limit: number) => {
      if (offset === 0 && limit === 100 && failures > 0) {
        failures -= 1;
        return failed({ kind: 'transient', status: 503, message: 'unavailable' });
      }
      return serve(offset, limit);
    });

    const result = await fetcher.fetch({ jobKey: fetchJobKey('pl4'), pageSize: 100, loadPage, decodeItems: decodePlaylistEntries });

    expect(result.items).toHaveLength(5);
    expect(result.remoteCalls).toBe(3);
  });

  it('completes an empty collection after the probe', async () => {
    const result = await fetcher.fetch({
      jobKey: fetchJobKey('empty'),
      pageSize: 100,
      loadPage: pagesOf([]),
      decodeItems: decodePlaylistEntries,
    });

    expect(result).toEqual({ items: [], total: 0, start: 'fresh', remoteCalls: 1 });
  });
});
