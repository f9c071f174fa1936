/**
 * Library analyzer - read-only reporting over the canonical store
 * Source counts, overlap, duplicate weights and the pre-merge dry run
 */

import Database from 'better-sqlite3';
import { MAX_COLLECTION_SIZE } from '../config.js';
import { ensureLibrarySchema } from './schema.js';
import { LibraryStore } from './store.js';

export interface SourceSummary {
  source: string;
  entries: number;
  uniqueTracks: number;
  duplicates: number;
}

export interface OverlapSummary {
  inMultipleSources: number;
  exclusiveBySource: Array<{ source: string; tracks: number }>;
}

export interface TrackWeight {
  source: string;
  id: string;
  name: string;
  artist: string | null;
  album: string | null;
  weight: number;
  firstAdded: string | null;
  lastAdded: string | null;
}

export interface WeightStats {
  highestWeight: number;
  averageWeight: number;
  tracksWithDuplicates: number;
}

export interface ArtistCount {
  artist: string | null;
  artistId: string | null;
  uniqueTracks: number;
  totalEntries: number;
}

export interface YearCount {
  year: string;
  tracks: number;
}

export interface AudioFeatureSummary {
  tracksWithFeatures: number;
  avgTempo: number | null;
  avgEnergy: number | null;
  avgDanceability: number | null;
  avgValence: number | null;
  avgAcousticness: number | null;
  minTempo: number | null;
  maxTempo: number | null;
}

export interface DryRunReport {
  before: {
    entriesBySource: Array<{ source: string; entries: number }>;
    totalEntries: number;
  };
  after: {
    uniqueIds: number;
    mergedTracks: number;
    targetsNeeded: number;
  };
  impact: {
    duplicatesRemoved: number;
  };
  overlap: OverlapSummary;
  weightStats: WeightStats;
  generatedAt: string;
}

export interface LibraryReport {
  dryRun: DryRunReport;
  sources: SourceSummary[];
  topArtists: ArtistCount[];
  releaseYears: YearCount[];
  audioFeatures: AudioFeatureSummary | null;
}

type WeightRow = {
  source: string;
  id: string;
  name: string;
  artist: string | null;
  album: string | null;
  weight: number;
  first_added: string | null;
  last_added: string | null;
};

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class LibraryAnalyzer {
  private db: Database.Database;
  private store: LibraryStore;

  constructor(db: Database.Database) {
    this.db = db;
    ensureLibrarySchema(db);
    this.store = new LibraryStore(db);
  }

  getSourceSummary(): SourceSummary[] {
    return this.store.getSourceCounts().map((count) => ({
      ...count,
      duplicates: count.entries - count.uniqueTracks,
    }));
  }

  /**
   * A track is exclusive to a source when every entry for its id carries that
   * one source tag.
   */
  getOverlap(): OverlapSummary {
    const shared = this.db
      .prepare<[], { count: number }>(`
        SELECT COUNT(*) AS count FROM (
          SELECT id FROM tracks GROUP BY id HAVING COUNT(DISTINCT source) > 1
        )
      `)
      .get();

    const exclusive = this.db
      .prepare<[], { source: string; tracks: number }>(`
        SELECT only_source AS source, COUNT(*) AS tracks
        FROM (
          SELECT id, MIN(source) AS only_source
          FROM tracks
          GROUP BY id
          HAVING COUNT(DISTINCT source) = 1
        )
        GROUP BY only_source
        ORDER BY only_source
      `)
      .all();

    return { inMultipleSources: shared?.count ?? 0, exclusiveBySource: exclusive };
  }

  /**
   * Weight = how many times the same track appears inside one source.
   */
  getWeights(options: { source?: string; minWeight?: number; limit?: number } = {}): TrackWeight[] {
    const minWeight = options.minWeight ?? 1;
    const limit = options.limit ?? -1;
    const sourceFilter = options.source ? 'WHERE source = @source' : '';

    const rows = this.db
      .prepare<{ source?: string; minWeight: number; limit: number }, WeightRow>(`
        SELECT
          source,
          id,
          name,
          artist,
          album,
          COUNT(*) AS weight,
          MIN(added_at) AS first_added,
          MAX(added_at) AS last_added
        FROM tracks
        ${sourceFilter}
        GROUP BY source, id, name, artist, album
        HAVING COUNT(*) >= @minWeight
        ORDER BY weight DESC, name, id
        LIMIT @limit
      `)
      .all(options.source ? { source: options.source, minWeight, limit } : { minWeight, limit });

    return rows.map((row) => ({
      source: row.source,
      id: row.id,
      name: row.name,
      artist: row.artist,
      album: row.album,
      weight: row.weight,
      firstAdded: row.first_added,
      lastAdded: row.last_added,
    }));
  }

  getWeightStats(source?: string): WeightStats {
    const sourceFilter = source ? 'WHERE source = ?' : '';
    const row = this.db
      .prepare<string[], { highest: number | null; average: number | null; repeated: number | null }>(`
        SELECT
          MAX(weight) AS highest,
          AVG(weight) AS average,
          SUM(weight > 1) AS repeated
        FROM (
          SELECT COUNT(*) AS weight
          FROM tracks
          ${sourceFilter}
          GROUP BY source, id, name, artist, album
        )
      `)
      .get(...(source ? [source] : []));

    return {
      highestWeight: row?.highest ?? 0,
      averageWeight: round2(row?.average ?? 0),
      tracksWithDuplicates: row?.repeated ?? 0,
    };
  }

  getTopArtists(limit = 20): ArtistCount[] {
    return this.db
      .prepare<[number], { artist: string | null; artist_id: string | null; unique_tracks: number; total_entries: number }>(`
        SELECT
          artist,
          artist_id,
          COUNT(DISTINCT id) AS unique_tracks,
          COUNT(*) AS total_entries
        FROM tracks
        GROUP BY artist, artist_id
        ORDER BY unique_tracks DESC, total_entries DESC, artist
        LIMIT ?
      `)
      .all(limit)
      .map((row) => ({
        artist: row.artist,
        artistId: row.artist_id,
        uniqueTracks: row.unique_tracks,
        totalEntries: row.total_entries,
      }));
  }

  getReleaseYearDistribution(): YearCount[] {
    return this.db
      .prepare<[], YearCount>(`
        SELECT SUBSTR(release_date, 1, 4) AS year, COUNT(DISTINCT id) AS tracks
        FROM tracks
        WHERE release_date IS NOT NULL AND LENGTH(release_date) >= 4
        GROUP BY year
        ORDER BY year DESC
      `)
      .all();
  }

  getAudioFeatureSummary(): AudioFeatureSummary | null {
    const row = this.db
      .prepare<[], {
        tracks_with_features: number;
        avg_tempo: number | null;
        avg_energy: number | null;
        avg_danceability: number | null;
        avg_valence: number | null;
        avg_acousticness: number | null;
        min_tempo: number | null;
        max_tempo: number | null;
      }>(`
        SELECT
          COUNT(*) AS tracks_with_features,
          AVG(tempo) AS avg_tempo,
          AVG(energy) AS avg_energy,
          AVG(danceability) AS avg_danceability,
          AVG(valence) AS avg_valence,
          AVG(acousticness) AS avg_acousticness,
          MIN(tempo) AS min_tempo,
          MAX(tempo) AS max_tempo
        FROM audio_features
      `)
      .get();

    if (!row || row.tracks_with_features === 0) {
      return null;
    }

    return {
      tracksWithFeatures: row.tracks_with_features,
      avgTempo: row.avg_tempo,
      avgEnergy: row.avg_energy,
      avgDanceability: row.avg_danceability,
      avgValence: row.avg_valence,
      avgAcousticness: row.avg_acousticness,
      minTempo: row.min_tempo,
      maxTempo: row.max_tempo,
    };
  }

  /**
   * What a merge would produce right now, without touching the remote side.
   */
  getDryRunReport(maxCollectionSize = MAX_COLLECTION_SIZE): DryRunReport {
    const sources = this.store.getSourceCounts();
    const totalEntries = sources.reduce((acc, entry) => acc + entry.entries, 0);
    const uniqueIds = this.store.getUniqueTrackIds().length;
    const mergedTracks = this.store.getDeduplicatedTracks().length;

    return {
      before: {
        entriesBySource: sources.map((entry) => ({ source: entry.source, entries: entry.entries })),
        totalEntries,
      },
      after: {
        uniqueIds,
        mergedTracks,
        targetsNeeded: Math.ceil(mergedTracks / Math.max(1, maxCollectionSize)),
      },
      impact: {
        duplicatesRemoved: totalEntries - mergedTracks,
      },
      overlap: this.getOverlap(),
      weightStats: this.getWeightStats(),
      generatedAt: new Date().toISOString(),
    };
  }

  buildReport(options: { topArtists?: number; maxCollectionSize?: number } = {}): LibraryReport {
    return {
      dryRun: this.getDryRunReport(options.maxCollectionSize),
      sources: this.getSourceSummary(),
      topArtists: this.getTopArtists(options.topArtists ?? 20),
      releaseYears: this.getReleaseYearDistribution(),
      audioFeatures: this.getAudioFeatureSummary(),
    };
  }
}
