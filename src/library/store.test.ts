import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Database from 'better-sqlite3';
import { trackRecord } from '../test-utils/fixtures.js';
import type { AudioFeatures } from '../types.js';
import { LibraryStore } from './store.js';

function features(trackId: string, tempo: number): AudioFeatures {
  return {
    trackId,
    danceability: 0.5,
    energy: 0.8,
    key: 5,
    loudness: -6.2,
    mode: 1,
    speechiness: 0.04,
    acousticness: 0.1,
    instrumentalness: 0,
    liveness: 0.2,
    valence: 0.6,
    tempo,
    durationMs: 200_000,
    timeSignature: 4,
  };
}

describe('LibraryStore', () => {
  let db: Database.Database;
  let store: LibraryStore;

  beforeEach(() => {
    db = new Database(':memory:');
    store = new LibraryStore(db);

    store.insertTracks([
      trackRecord({ id: 't1', name: 'Alpha', source: 'A', addedAt: '2024-01-01T00:00:00.000Z', popularity: 40 }),
      trackRecord({ id: 't1', name: 'Alpha', source: 'A', addedAt: '2024-03-01T00:00:00.000Z', popularity: 70 }),
      trackRecord({ id: 't2', name: 'Beta', source: 'A' }),
      trackRecord({ id: 't1', name: 'Alpha', source: 'B', addedAt: '2024-02-01T00:00:00.000Z', popularity: 55 }),
      trackRecord({ id: 't3', name: 'Alpha', artist: 'Artist Two', artistId: 'artist-two', source: 'B' }),
      trackRecord({ id: 't5', name: 'Alpha', artist: null, artistId: null, source: 'B', addedAt: null }),
    ]);
  });

  afterEach(() => {
    db.close();
  });

  it('keeps every entry, duplicates included', () => {
    expect(store.countTracks()).toBe(6);
    expect(store.countTracks('A')).toBe(3);
    expect(store.listSources()).toEqual(['A', 'B']);
    expect(store.listTracks('A').map((track) => track.id)).toEqual(['t1', 't1', 't2']);
  });

  it('counts entries and unique ids per source', () => {
    expect(store.getSourceCounts()).toEqual([
      { source: 'A', entries: 3, uniqueTracks: 2 },
      { source: 'B', entries: 3, uniqueTracks: 3 },
    ]);
    expect(store.getUniqueTrackIds()).toEqual(['t1', 't2', 't3', 't5']);
  });

  it('deduplicates by identity and keeps the latest addedAt', () => {
    const tracks = store.getDeduplicatedTracks();

    expect(tracks.map((track) => [track.id, track.artist])).toEqual([
      ['t5', null],
      ['t1', 'Artist One'],
      ['t3', 'Artist Two'],
      ['t2', 'Artist One'],
    ]);
    expect(tracks[1]).toEqual({
      id: 't1',
      name: 'Alpha',
      artistId: 'artist-one',
      artist: 'Artist One',
      albumId: 'album-1',
      album: 'Album One',
      releaseDate: '2019-04-12',
      durationMs: 200_000,
      popularity: 70,
      explicit: false,
      isrc: null,
      addedAt: '2024-03-01T00:00:00.000Z',
    });
    expect(tracks[0].addedAt).toBeNull();
    expect(store.getDeduplicatedIds()).toEqual(['t5', 't1', 't3', 't2']);
  });

  it('treats a renamed track with the same id as a separate identity', () => {
    store.insertTracks([trackRecord({ id: 't2', name: 'Beta (Remastered)', source: 'B' })]);

    expect(store.getDeduplicatedIds()).toEqual(['t5', 't1', 't3', 't2', 't2']);
  });

  it('replaces one source without touching the others', () => {
    const result = store.replaceSource('A', [trackRecord({ id: 't9', name: 'Gamma', source: 'A' })]);

    expect(result).toEqual({ removed: 3, inserted: 1 });
    expect(store.listTracks('A').map((track) => track.id)).toEqual(['t9']);
    expect(store.countTracks('B')).toBe(3);
  });

  it('rejects records tagged with another source and leaves the store unchanged', () => {
    expect(() => store.replaceSource('A', [trackRecord({ id: 't9', source: 'B' })])).toThrow(
      'Record t9 is tagged B, expected A'
    );
    expect(store.countTracks('A')).toBe(3);
  });

  it('rolls back a refresh that fails part-way', () => {
    expect(() =>
      store.replaceSource('A', [trackRecord({ id: 't9', source: 'A' }), trackRecord({ id: '', source: 'A' })])
    ).toThrow('Cannot store a track without an id');

    expect(store.listTracks('A').map((track) => track.id)).toEqual(['t1', 't1', 't2']);
  });

  it('clears a source', () => {
    expect(store.clearSource('B')).toBe(3);
    expect(store.clearSource('B')).toBe(0);
    expect(store.listSources()).toEqual(['A']);
  });

  it('upserts audio features by track id', () => {
    expect(store.upsertAudioFeatures([features('t1', 120), features('t2', 98.5)])).toBe(2);
    expect(store.upsertAudioFeatures([features('t1', 124)])).toBe(1);

    expect(store.countAudioFeatures()).toBe(2);
    const row = db.prepare<[string], { tempo: number }>('SELECT tempo FROM audio_features WHERE track_id = ?').get('t1');
    expect(row?.tempo).toBe(124);
  });
});
