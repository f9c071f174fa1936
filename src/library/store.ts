import Database from 'better-sqlite3';
import { AppError } from '../logger.js';
import type { AudioFeatures, CanonicalTrack, TrackRecord } from '../types.js';
import { ensureLibrarySchema } from './schema.js';

type CanonicalRow = {
  id: string;
  name: string;
  artist: string | null;
  artist_id: string | null;
  album: string | null;
  album_id: string | null;
  release_date: string | null;
  duration_ms: number | null;
  popularity: number | null;
  explicit: number;
  isrc: string | null;
  added_at: string | null;
};

type TrackRow = CanonicalRow & {
  source: string;
};

export interface SourceCount {
  source: string;
  entries: number;
  uniqueTracks: number;
}

export interface ReplaceSourceResult {
  removed: number;
  inserted: number;
}

function nowIso(): string {
  return new Date().toISOString();
}

function toCanonicalTrack(row: CanonicalRow): CanonicalTrack {
  return {
    id: row.id,
    name: row.name,
    artistId: row.artist_id,
    artist: row.artist,
    albumId: row.album_id,
    album: row.album,
    releaseDate: row.release_date,
    durationMs: row.duration_ms,
    popularity: row.popularity,
    explicit: row.explicit === 1,
    isrc: row.isrc,
    addedAt: row.added_at,
  };
}

function toTrackRecord(row: TrackRow): TrackRecord {
  return { ...toCanonicalTrack(row), source: row.source };
}

const CANONICAL_COLUMNS = `
  id, name, artist, artist_id, album, album_id, release_date,
  duration_ms, popularity, explicit, isrc
`;

/**
 * Durable multiset of ingested tracks, partitioned by source tag. Rows are
 * never updated in place: a source is refreshed by clearing its rows and
 * inserting the newly fetched set.
 */
export class LibraryStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    ensureLibrarySchema(this.db);
  }

  insertTracks(records: TrackRecord[]): number {
    if (records.length === 0) return 0;

    const insert = this.db.prepare(`
      INSERT INTO tracks (
        id,
        name,
        artist,
        artist_id,
        album,
        album_id,
        release_date,
        duration_ms,
        popularity,
        explicit,
        isrc,
        added_at,
        source,
        fetched_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((rows: TrackRecord[]) => {
      const fetchedAt = nowIso();
      for (const record of rows) {
        if (!record.id) {
          throw new AppError('Cannot store a track without an id', 'INVALID_RECORD', 400, { source: record.source });
        }
        insert.run(
          record.id,
          record.name,
          record.artist,
          record.artistId,
          record.album,
          record.albumId,
          record.releaseDate,
          record.durationMs,
          record.popularity,
          record.explicit ? 1 : 0,
          record.isrc,
          record.addedAt,
          record.source,
          fetchedAt,
        );
      }
      return rows.length;
    });

    return transaction(records);
  }

  clearSource(source: string): number {
    return this.db.prepare('DELETE FROM tracks WHERE source = ?').run(source).changes;
  }

  /** Full refresh of one source: the delete and the insert commit together. */
  replaceSource(source: string, records: TrackRecord[]): ReplaceSourceResult {
    const mismatched = records.find((record) => record.source !== source);
    if (mismatched) {
      throw new AppError(
        `Record ${mismatched.id} is tagged ${mismatched.source}, expected ${source}`,
        'SOURCE_MISMATCH',
        400,
      );
    }

    const transaction = this.db.transaction((): ReplaceSourceResult => {
      const removed = this.clearSource(source);
      const inserted = this.insertTracks(records);
      return { removed, inserted };
    });
    return transaction();
  }

  listTracks(source?: string): TrackRecord[] {
    const rows = source
      ? this.db
          .prepare<[string], TrackRow>(`SELECT ${CANONICAL_COLUMNS}, added_at, source FROM tracks WHERE source = ? ORDER BY row_id`)
          .all(source)
      : this.db
          .prepare<[], TrackRow>(`SELECT ${CANONICAL_COLUMNS}, added_at, source FROM tracks ORDER BY row_id`)
          .all();
    return rows.map(toTrackRecord);
  }

  listSources(): string[] {
    return this.db
      .prepare<[], { source: string }>('SELECT DISTINCT source FROM tracks ORDER BY source')
      .all()
      .map((row) => row.source);
  }

  countTracks(source?: string): number {
    const row = source
      ? this.db.prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM tracks WHERE source = ?').get(source)
      : this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM tracks').get();
    return row?.count ?? 0;
  }

  getSourceCounts(): SourceCount[] {
    return this.db
      .prepare<[], { source: string; entries: number; unique_tracks: number }>(`
        SELECT source, COUNT(*) AS entries, COUNT(DISTINCT id) AS unique_tracks
        FROM tracks
        GROUP BY source
        ORDER BY source
      `)
      .all()
      .map((row) => ({ source: row.source, entries: row.entries, uniqueTracks: row.unique_tracks }));
  }

  getUniqueTrackIds(): string[] {
    return this.db
      .prepare<[], { id: string }>('SELECT DISTINCT id FROM tracks ORDER BY id')
      .all()
      .map((row) => row.id);
  }

  /**
   * One track per identity (id, name, primary artist). SQLite fills the bare
   * columns from the row holding MAX(added_at), so the kept fields all come
   * from the most recently added member of the group.
   */
  getDeduplicatedTracks(): CanonicalTrack[] {
    return this.db
      .prepare<[], CanonicalRow>(`
        SELECT ${CANONICAL_COLUMNS}, MAX(added_at) AS added_at
        FROM tracks
        GROUP BY id, name, artist
        ORDER BY name, artist, id
      `)
      .all()
      .map(toCanonicalTrack);
  }

  getDeduplicatedIds(): string[] {
    return this.getDeduplicatedTracks().map((track) => track.id);
  }

  upsertAudioFeatures(features: AudioFeatures[]): number {
    if (features.length === 0) return 0;

    const upsert = this.db.prepare(`
      INSERT OR REPLACE INTO audio_features (
        track_id,
        danceability,
        energy,
        key,
        loudness,
        mode,
        speechiness,
        acousticness,
        instrumentalness,
        liveness,
        valence,
        tempo,
        duration_ms,
        time_signature,
        fetched_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((rows: AudioFeatures[]) => {
      const fetchedAt = nowIso();
      for (const row of rows) {
        upsert.run(
          row.trackId,
          row.danceability,
          row.energy,
          row.key,
          row.loudness,
          row.mode,
          row.speechiness,
          row.acousticness,
          row.instrumentalness,
          row.liveness,
          row.valence,
          row.tempo,
          row.durationMs,
          row.timeSignature,
          fetchedAt,
        );
      }
      return rows.length;
    });

    return transaction(features);
  }

  countAudioFeatures(): number {
    return this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM audio_features').get()?.count ?? 0;
  }
}
