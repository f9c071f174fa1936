import type { PlaylistEntry, TrackRecord } from '../types.js';

/** API-shaped playlist entry, as the paginated read endpoint returns it. */
export function apiEntry(
  id: string | null,
  options: { name?: string; artist?: string; addedAt?: string | null; releaseDate?: string } = {}
): Record<string, unknown> {
  return {
    added_at: options.addedAt === undefined ? '2024-01-01T00:00:00Z' : options.addedAt,
    track: {
      id,
      name: options.name ?? `Track ${id ?? 'local'}`,
      artists: [{ id: `artist-${options.artist ?? 'one'}`, name: options.artist ?? 'Artist One' }],
      album: { id: 'album-1', name: 'Album One', release_date: options.releaseDate ?? '2019-04-12' },
      duration_ms: 200_000,
      popularity: 50,
      explicit: false,
      external_ids: { isrc: 'TEST00000001' },
    },
  };
}

/** Decoded playlist entry with the same defaults as {@link apiEntry}. */
export function playlistEntry(id: string | null, name = `Track ${id ?? 'local'}`): PlaylistEntry {
  return {
    added_at: '2024-01-01T00:00:00Z',
    track: {
      id,
      name,
      artists: [{ id: 'artist-one', name: 'Artist One' }],
      album: { id: 'album-1', name: 'Album One', release_date: '2019-04-12' },
      duration_ms: 200_000,
      popularity: 50,
      explicit: false,
      external_ids: { isrc: 'TEST00000001' },
    },
  };
}

export function trackRecord(overrides: Partial<TrackRecord> & Pick<TrackRecord, 'id' | 'source'>): TrackRecord {
  return {
    name: `Track ${overrides.id}`,
    artistId: 'artist-one',
    artist: 'Artist One',
    albumId: 'album-1',
    album: 'Album One',
    releaseDate: '2019-04-12',
    durationMs: 200_000,
    popularity: 50,
    explicit: false,
    isrc: null,
    addedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}
