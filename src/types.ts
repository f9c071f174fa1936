/**
 * One ingested track, normalized from a playlist entry and tagged with the
 * source collection it was fetched from.
 */
export interface TrackRecord {
  id: string;
  name: string;
  artistId: string | null;
  artist: string | null;
  albumId: string | null;
  album: string | null;
  releaseDate: string | null;
  durationMs: number | null;
  popularity: number | null;
  explicit: boolean;
  isrc: string | null;
  addedAt: string | null;
  source: string;
}

/** A record of the deduplicated view; it no longer belongs to a single source. */
export type CanonicalTrack = Omit<TrackRecord, 'source'>;

export interface Page<T> {
  items: T[];
  total: number;
}

/** Raw playlist entry as returned by the paginated read endpoint, shape-checked. */
export interface PlaylistEntry {
  added_at: string | null;
  track: PlaylistTrack | null;
}

export interface PlaylistTrack {
  id: string | null;
  name: string | null;
  artists: Array<{ id: string | null; name: string | null }>;
  album: { id: string | null; name: string | null; release_date: string | null } | null;
  duration_ms: number | null;
  popularity: number | null;
  explicit: boolean;
  external_ids: { isrc?: string } | null;
}

export interface RemoteUser {
  id: string;
  displayName: string | null;
}

export interface RemoteCollection {
  id: string;
  name: string;
  url: string | null;
}

export interface AudioFeatures {
  trackId: string;
  danceability: number | null;
  energy: number | null;
  key: number | null;
  loudness: number | null;
  mode: number | null;
  speechiness: number | null;
  acousticness: number | null;
  instrumentalness: number | null;
  liveness: number | null;
  valence: number | null;
  tempo: number | null;
  durationMs: number | null;
  timeSignature: number | null;
}
