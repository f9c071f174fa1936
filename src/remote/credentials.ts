import type { LibraryConfig } from '../config.js';
import { AppError } from '../logger.js';
import { PlaylistApiClient, PlaylistApiOptions } from './playlist-api.js';

/**
 * Token acquisition (the OAuth dance) happens outside this tool; it only
 * consumes an already-issued bearer token.
 */
export function requireAccessToken(config: LibraryConfig): string {
  const token = config.api.accessToken?.trim();
  if (!token) {
    throw new AppError(
      'Missing API credentials. Set SPOTIFY_ACCESS_TOKEN (or api.accessToken in library-merge.yaml).',
      'MISSING_CREDENTIALS',
      401
    );
  }
  return token;
}

export function createPlaylistApiClient(
  config: LibraryConfig,
  overrides: Pick<PlaylistApiOptions, 'fetchImpl'> = {}
): PlaylistApiClient {
  return new PlaylistApiClient({
    baseUrl: config.api.baseUrl,
    accessToken: requireAccessToken(config),
    timeoutMs: config.api.timeoutMs,
    defaultRetryAfterSeconds: config.retry.defaultRetryAfterSeconds,
    fetchImpl: overrides.fetchImpl,
  });
}
