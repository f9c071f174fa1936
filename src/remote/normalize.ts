import type { Page, PlaylistEntry, PlaylistTrack, RemoteCollection, RemoteUser, TrackRecord } from '../types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function optionalInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? Math.round(value) : null;
}

export function toIsoDate(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim().length === 0) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function decodeTrack(value: unknown): PlaylistTrack | null {
  if (!isRecord(value)) return null;

  const rawArtists = value.artists;
  const artists = Array.isArray(rawArtists)
    ? rawArtists.filter(isRecord).map((artist) => ({
        id: optionalString(artist.id),
        name: optionalString(artist.name),
      }))
    : [];

  const rawAlbum = value.album;
  const album = isRecord(rawAlbum)
    ? {
        id: optionalString(rawAlbum.id),
        name: optionalString(rawAlbum.name),
        release_date: optionalString(rawAlbum.release_date),
      }
    : null;

  const rawExternalIds = value.external_ids;
  let externalIds: { isrc?: string } | null = null;
  if (isRecord(rawExternalIds)) {
    const isrc = optionalString(rawExternalIds.isrc);
    externalIds = isrc ? { isrc } : {};
  }

  return {
    id: optionalString(value.id),
    name: optionalString(value.name),
    artists,
    album,
    duration_ms: optionalInt(value.duration_ms),
    popularity: optionalInt(value.popularity),
    explicit: value.explicit === true,
    external_ids: externalIds,
  };
}

/**
 * Shape-checks one playlist entry. Returns undefined only for values that are
 * not entries at all; entries whose track is missing or unplayable keep
 * `track: null` and are dropped later by {@link toTrackRecord}.
 */
export function decodePlaylistEntry(value: unknown): PlaylistEntry | undefined {
  if (!isRecord(value)) return undefined;
  return {
    added_at: optionalString(value.added_at),
    track: decodeTrack(value.track),
  };
}

export function decodePlaylistEntries(value: unknown): PlaylistEntry[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const entries: PlaylistEntry[] = [];
  for (const item of value) {
    const entry = decodePlaylistEntry(item);
    if (!entry) return undefined;
    entries.push(entry);
  }
  return entries;
}

export function decodePlaylistPage(value: unknown): Page<PlaylistEntry> | undefined {
  if (!isRecord(value)) return undefined;
  const total = value.total;
  if (typeof total !== 'number' || !Number.isInteger(total) || total < 0) return undefined;
  const items = decodePlaylistEntries(value.items ?? []);
  if (!items) return undefined;
  return { items, total };
}

export function decodeUser(value: unknown): RemoteUser | undefined {
  if (!isRecord(value)) return undefined;
  const id = optionalString(value.id);
  if (!id) return undefined;
  return { id, displayName: optionalString(value.display_name) };
}

export function decodeCollection(value: unknown): RemoteCollection | undefined {
  if (!isRecord(value)) return undefined;
  const id = optionalString(value.id);
  if (!id) return undefined;
  const urls = value.external_urls;
  return {
    id,
    name: optionalString(value.name) ?? id,
    url: isRecord(urls) ? optionalString(urls.spotify) : null,
  };
}

/**
 * Converts a playlist entry into a stored record. Entries without a track id
 * (local files, removed tracks, podcast gaps) are data errors and yield undefined.
 */
export function toTrackRecord(entry: PlaylistEntry, source: string): TrackRecord | undefined {
  const track = entry.track;
  if (!track || !track.id) return undefined;

  const primaryArtist = track.artists[0];

  return {
    id: track.id,
    name: track.name ?? '',
    artistId: primaryArtist?.id ?? null,
    artist: primaryArtist?.name ?? null,
    albumId: track.album?.id ?? null,
    album: track.album?.name ?? null,
    releaseDate: track.album?.release_date ?? null,
    durationMs: track.duration_ms,
    popularity: track.popularity,
    explicit: track.explicit,
    isrc: track.external_ids?.isrc ?? null,
    addedAt: toIsoDate(entry.added_at),
    source,
  };
}

export interface NormalizedBatch {
  records: TrackRecord[];
  dropped: number;
}

export function normalizeEntries(entries: PlaylistEntry[], source: string): NormalizedBatch {
  const records: TrackRecord[] = [];
  let dropped = 0;
  for (const entry of entries) {
    const record = toTrackRecord(entry, source);
    if (record) {
      records.push(record);
    } else {
      dropped += 1;
    }
  }
  return { records, dropped };
}
