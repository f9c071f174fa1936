import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import Database from 'better-sqlite3';

export function openLibraryDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(resolve(path)), { recursive: true });
  }
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  return db;
}

export function ensureLibrarySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tracks (
      row_id INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL,
      name TEXT NOT NULL,
      artist TEXT,
      artist_id TEXT,
      album TEXT,
      album_id TEXT,
      release_date TEXT,
      duration_ms INTEGER,
      popularity INTEGER,
      explicit INTEGER NOT NULL DEFAULT 0,
      isrc TEXT,
      added_at TEXT,
      source TEXT NOT NULL,
      fetched_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audio_features (
      track_id TEXT PRIMARY KEY,
      danceability REAL,
      energy REAL,
      key INTEGER,
      loudness REAL,
      mode INTEGER,
      speechiness REAL,
      acousticness REAL,
      instrumentalness REAL,
      liveness REAL,
      valence REAL,
      tempo REAL,
      duration_ms INTEGER,
      time_signature INTEGER,
      fetched_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_tracks_source_id ON tracks(source, id);
    CREATE INDEX IF NOT EXISTS idx_tracks_identity ON tracks(id, name, artist);
    CREATE INDEX IF NOT EXISTS idx_tracks_artist ON tracks(artist, artist_id);
  `);
}
