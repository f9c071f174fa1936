import type { CreatePlaylistInput, PlaylistReader, PlaylistWriter } from '../remote/playlist-api.js';
import { failed, RemoteResult, succeeded } from '../remote/retry.js';
import type { Page, PlaylistEntry, RemoteCollection, RemoteUser } from '../types.js';

/**
 * In-process stand-in for the playlist API. Collections are served from
 * memory; writes are recorded per target so tests can assert what landed.
 */
export class FakePlaylistRemote implements PlaylistReader, PlaylistWriter {
  readonly collections = new Map<string, PlaylistEntry[]>();
  readonly created: Array<{ userId: string; input: CreatePlaylistInput; id: string }> = [];
  readonly written = new Map<string, string[]>();
  readonly writeCalls: Array<{ playlistId: string; size: number }> = [];
  readonly failingReads = new Set<string>();
  pageCalls = 0;
  nameCalls = 0;
  /** Rejects the write call with this 1-based index once, as a 403. */
  rejectWriteCall?: number;

  constructor(collections: Record<string, PlaylistEntry[]> = {}) {
    for (const [id, entries] of Object.entries(collections)) {
      this.collections.set(id, entries);
    }
  }

  async getPlaylistPage(playlistId: string, offset: number, limit: number): Promise<RemoteResult<Page<PlaylistEntry>>> {
    this.pageCalls += 1;
    const entries = this.collections.get(playlistId);
    if (!entries || this.failingReads.has(playlistId)) {
      return failed({ kind: 'terminal', status: 404, message: 'not found' });
    }
    return succeeded({ items: entries.slice(offset, offset + limit), total: entries.length });
  }

  async getPlaylistName(playlistId: string): Promise<RemoteResult<string>> {
    this.nameCalls += 1;
    return succeeded(`Collection ${playlistId}`);
  }

  async getCurrentUser(): Promise<RemoteResult<RemoteUser>> {
    return succeeded({ id: 'test-user', displayName: 'Test User' });
  }

  async createPlaylist(userId: string, input: CreatePlaylistInput): Promise<RemoteResult<RemoteCollection>> {
    const id = `created-${this.created.length + 1}`;
    this.created.push({ userId, input, id });
    this.written.set(id, []);
    return succeeded({ id, name: input.name, url: `https://example.test/${id}` });
  }

  async addItems(playlistId: string, ids: string[]): Promise<RemoteResult<void>> {
    this.writeCalls.push({ playlistId, size: ids.length });
    if (this.rejectWriteCall === this.writeCalls.length) {
      this.rejectWriteCall = undefined;
      return failed({ kind: 'terminal', status: 403, message: 'forbidden' });
    }
    this.written.set(playlistId, [...(this.written.get(playlistId) ?? []), ...ids]);
    return succeeded(undefined);
  }
}
